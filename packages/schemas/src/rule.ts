import { z } from "zod";

const durationMs = z.number().int().positive();

const RuleCommonSchema = z.object({
  blockMs: durationMs,
  increaseRank: z.boolean(),
  message: z.string().nullable(),
  reason: z.string().nullable(),
  groups: z.array(z.string().min(1)).min(1).nullable(),
});

export const CountRuleSchema = RuleCommonSchema.extend({
  kind: z.literal("count"),
  hits: z.number().int().positive(),
  windowMs: durationMs,
});
export type CountRule = z.infer<typeof CountRuleSchema>;

export const DelayRuleSchema = RuleCommonSchema.extend({
  kind: z.literal("delay"),
  delayMs: durationMs,
});
export type DelayRule = z.infer<typeof DelayRuleSchema>;

export const RuleSchema = z.discriminatedUnion("kind", [CountRuleSchema, DelayRuleSchema]);
export type Rule = z.infer<typeof RuleSchema>;

/**
 * What callers write when configuring a ladder. A rule is either in count
 * mode (`hits` + `windowMs`) or in delay mode (`delayMs`), never both, and
 * always carries the `blockMs` penalty applied when it is breached.
 */
export const RuleInputSchema = z
  .object({
    hits: z.number().int().positive().optional(),
    windowMs: durationMs.optional(),
    delayMs: durationMs.optional(),
    blockMs: durationMs,
    increaseRank: z.boolean().default(true),
    message: z.string().optional(),
    reason: z.string().optional(),
    groups: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]).optional(),
  })
  .strict()
  .transform((input, ctx): Rule => {
    const common = {
      blockMs: input.blockMs,
      increaseRank: input.increaseRank,
      message: input.message ?? null,
      reason: input.reason ?? null,
      groups: input.groups === undefined
        ? null
        : typeof input.groups === "string" ? [input.groups] : input.groups,
    };

    if (input.delayMs !== undefined) {
      if (input.hits !== undefined || input.windowMs !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "A delay rule cannot also set 'hits' or 'windowMs'",
        });
        return z.NEVER;
      }
      return { kind: "delay", delayMs: input.delayMs, ...common };
    }

    if (input.hits === undefined || input.windowMs === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "A rule needs either 'delayMs', or both 'hits' and 'windowMs'",
      });
      return z.NEVER;
    }
    return { kind: "count", hits: input.hits, windowMs: input.windowMs, ...common };
  });
export type RuleInput = z.input<typeof RuleInputSchema>;

// A single rule is shorthand for a group of one.
export const RankInputSchema = z.union([
  RuleInputSchema.transform((rule) => [rule]),
  z.array(RuleInputSchema).min(1, "A rank needs at least one rule"),
]);
export type RankInput = z.input<typeof RankInputSchema>;

export const LadderInputSchema = z.array(RankInputSchema).min(1, "A ladder needs at least one rank");
export type LadderInput = z.input<typeof LadderInputSchema>;

export const RankSchema = z.object({
  index: z.number().int().nonnegative(),
  rules: z.array(RuleSchema).min(1),
});
export type Rank = z.infer<typeof RankSchema>;

export const LadderSchema = z.object({
  ranks: z.array(RankSchema).min(1),
});
export type Ladder = z.infer<typeof LadderSchema>;
