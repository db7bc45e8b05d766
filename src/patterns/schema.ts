import { z } from "zod";
import { TIERS, type MatchFunction } from "./types.js";

export const tierSchema = z.enum(TIERS);

const matchFunctionSchema = z.custom<MatchFunction>(
  (value) => typeof value === "function",
  { message: "match must be a function" },
);

export const patternDefinitionSchema = z
  .object({
    id: z.string().min(1),
    tier: tierSchema,
    message: z.string().min(1),
    category: z.string().min(1).optional(),
    pattern: z.union([z.string().min(1), z.instanceof(RegExp)]).optional(),
    flags: z
      .string()
      .regex(/^[dgimsuyv]*$/, "unsupported regex flag")
      .optional(),
    match: matchFunctionSchema.optional(),
    weight: z.number().min(0).max(1).optional(),
  })
  .refine((def) => (def.pattern === undefined) !== (def.match === undefined), {
    message: "exactly one of pattern or match is required",
  });

// ============================================================================
// Catalog files
// ============================================================================

export const catalogEntrySchema = z.object({
  id: z.string().min(1),
  pattern: z.string().min(1),
  flags: z.string().optional(),
  message: z.string().min(1),
  weight: z.number().min(0).max(1).optional(),
});

export const catalogSchema = z.object({
  name: z.string().optional(),
  tiers: z
    .object({
      ULTRA_CRITICAL: z.record(z.array(catalogEntrySchema)),
      CRITICAL_FAST: z.record(z.array(catalogEntrySchema)),
      HIGH_NORMAL: z.record(z.array(catalogEntrySchema)),
      INFO: z.record(z.array(catalogEntrySchema)),
    })
    .partial(),
});

export type Catalog = z.infer<typeof catalogSchema>;
export type CatalogEntry = z.infer<typeof catalogEntrySchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0
      ? `${issue.path.join(".")}: ${issue.message}`
      : issue.message,
  );
}
