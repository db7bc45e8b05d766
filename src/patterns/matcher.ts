/**
 * Tiergate: Pattern Store: Matchers
 */

import type {
  Matcher,
  MatchFunction,
  MatchSpan,
  PatternDefinition,
} from "./types.js";

const DEFAULT_FLAGS = "i";

/** Stateful flags would make a shared RegExp depend on its previous call. */
function stripStatefulFlags(flags: string): string {
  return flags.replace(/[gy]/g, "");
}

export class RegexMatcher implements Matcher {
  readonly source: string;
  private regex: RegExp;

  constructor(pattern: string | RegExp, flags?: string) {
    const rawFlags =
      typeof pattern === "string" ? flags ?? DEFAULT_FLAGS : pattern.flags;
    const src = typeof pattern === "string" ? pattern : pattern.source;
    // Throws SyntaxError on an invalid source or flag
    this.regex = new RegExp(src, stripStatefulFlags(rawFlags));
    this.source = `/${this.regex.source}/${this.regex.flags}`;
  }

  match(text: string): MatchSpan | null {
    const m = this.regex.exec(text);
    return m ? { text: m[0], index: m.index } : null;
  }
}

export class FunctionMatcher implements Matcher {
  constructor(
    readonly source: string,
    private fn: MatchFunction,
  ) {}

  match(text: string): MatchSpan | null {
    const result = this.fn(text);
    if (result === true) return { text: "", index: 0 };
    if (!result) return null;
    return result;
  }
}

/**
 * Cache key under which a definition's compiled matcher is memoized. Regex
 * definitions with the same source and flags share one matcher.
 */
export function matcherKey(def: PatternDefinition): string {
  if (def.match) {
    return `fn:${def.tier}/${def.id}`;
  }
  if (def.pattern instanceof RegExp) {
    return `re:${stripStatefulFlags(def.pattern.flags)}:${def.pattern.source}`;
  }
  return `re:${stripStatefulFlags(def.flags ?? DEFAULT_FLAGS)}:${def.pattern ?? ""}`;
}

export function compileMatcher(def: PatternDefinition): Matcher {
  if (def.match) {
    return new FunctionMatcher(`fn:${def.tier}/${def.id}`, def.match);
  }
  if (def.pattern === undefined) {
    throw new Error("definition has neither pattern nor match");
  }
  return new RegexMatcher(def.pattern, def.flags);
}

export function renderMessage(
  template: string,
  values: { id: string; tier: string; category: string },
): string {
  return template.replace(/\{(id|tier|category)\}/g, (_, name: string) => {
    switch (name) {
      case "id":
        return values.id;
      case "tier":
        return values.tier;
      default:
        return values.category;
    }
  });
}
