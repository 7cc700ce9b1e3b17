import { z } from "zod";
import { BlockDetailSchema } from "./state.js";

export const AllowedVerdictSchema = z.object({
  outcome: z.literal("allowed"),
  rank: z.number().int().nonnegative(),
  /** Engine clock at evaluation; identifies the hit for `ignoreHit`. */
  at: z.number(),
  /** Let through by an ignore grant; no counter was touched. */
  ignored: z.boolean(),
});
export type AllowedVerdict = z.infer<typeof AllowedVerdictSchema>;

export const BlockedVerdictSchema = z.object({
  outcome: z.literal("blocked"),
  retryAfterMs: z.number().nonnegative(),
  blockedUntil: z.number(),
  rank: z.number().int().nonnegative(),
  /** True when this very request moved the caller up the ladder. */
  escalated: z.boolean(),
  cause: BlockDetailSchema,
});
export type BlockedVerdict = z.infer<typeof BlockedVerdictSchema>;

export const VerdictSchema = z.discriminatedUnion("outcome", [
  AllowedVerdictSchema,
  BlockedVerdictSchema,
]);
export type Verdict = z.infer<typeof VerdictSchema>;
