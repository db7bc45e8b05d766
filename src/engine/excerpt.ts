/**
 * Reduction of oversized inputs before evaluation.
 *
 * `head` keeps the first `maxLength` characters. `excerpt` keeps the head,
 * windows around risk keywords found further in, and the tail, so a dangerous
 * command at the end of a large edit is still seen.
 */

export type TruncationStrategy = "head" | "excerpt";

export interface PreparedInput {
  text: string;
  truncated: boolean;
}

const EXCERPT_KEYWORDS = [
  "password",
  "api",
  "key",
  "token",
  "secret",
  "rm -rf",
  "sudo",
  "eval",
  "exec",
  "todo",
  "fixme",
  "hack",
];

const WINDOW_RADIUS = 50;

export function prepareInput(
  text: string,
  maxLength: number,
  strategy: TruncationStrategy,
): PreparedInput {
  if (text.length <= maxLength) {
    return { text, truncated: false };
  }
  if (strategy === "head") {
    return { text: text.slice(0, maxLength), truncated: true };
  }
  return { text: buildExcerpt(text, maxLength), truncated: true };
}

function buildExcerpt(text: string, maxLength: number): string {
  const headLength = Math.floor(maxLength / 2);
  const tailLength = Math.floor(maxLength / 5);
  const tailStart = text.length - tailLength;

  const parts = [text.slice(0, headLength)];
  // Head, tail and the separator before the tail
  let used = headLength + tailLength + 1;

  // Only the middle section needs keyword windows
  const lower = text.toLowerCase();
  for (const keyword of EXCERPT_KEYWORDS) {
    const at = lower.indexOf(keyword, headLength);
    if (at === -1 || at >= tailStart) continue;

    const start = Math.max(headLength, at - WINDOW_RADIUS);
    const end = Math.min(tailStart, at + keyword.length + WINDOW_RADIUS);
    // +1 for the separator
    if (used + (end - start) + 1 > maxLength) break;
    parts.push(text.slice(start, end));
    used += end - start + 1;
  }

  parts.push(text.slice(tailStart));
  return parts.join("\n").slice(0, maxLength);
}
