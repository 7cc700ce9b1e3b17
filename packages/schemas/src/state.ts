import { z } from "zod";

export const BlockKindSchema = z.enum(["count", "delay", "manual"]);
export type BlockKind = z.infer<typeof BlockKindSchema>;

export const BlockDetailSchema = z.object({
  kind: BlockKindSchema,
  reason: z.string(),
  message: z.string().nullable(),
  hits: z.number().int().positive().optional(),
  windowMs: z.number().int().positive().optional(),
  delayMs: z.number().int().positive().optional(),
});
export type BlockDetail = z.infer<typeof BlockDetailSchema>;

export const RankStateSchema = z.object({
  index: z.number().int().nonnegative(),
  blockedUntil: z.number().nullable(),
  blockedBy: BlockDetailSchema.nullable(),
});
export type RankState = z.infer<typeof RankStateSchema>;

export const WindowCountSchema = z.object({
  count: z.number().int().nonnegative(),
  windowStart: z.number(),
});
export type WindowCount = z.infer<typeof WindowCountSchema>;

export const DelayClaimSchema = z.object({
  accepted: z.boolean(),
  lastAcceptedAt: z.number(),
});
export type DelayClaim = z.infer<typeof DelayClaimSchema>;

/**
 * Lets requests through without evaluating any rule: the next `times`
 * requests, and every request up to and including `until`.
 */
export const IgnoreGrantSchema = z.object({
  times: z.number().int().nonnegative().nullable(),
  until: z.number().nullable(),
});
export type IgnoreGrant = z.infer<typeof IgnoreGrantSchema>;
