import { LadderInputSchema } from "@rankguard/schemas";
import type { LadderInput, Ladder, Rank, Rule } from "@rankguard/schemas";
import { InvalidConfigurationError } from "../errors.js";

/**
 * Validates a ladder configuration into its compiled form. Throws
 * {@link InvalidConfigurationError} listing every problem found.
 */
export function compileLadder(input: LadderInput): Ladder {
  const parsed = LadderInputSchema.safeParse(input);
  if (!parsed.success) {
    const summary = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new InvalidConfigurationError(`Invalid rate-limit ladder: ${summary}`, parsed.error.issues);
  }

  return {
    ranks: parsed.data.map((rules, index) => ({ index, rules })),
  };
}

export function lastRankIndex(ladder: Ladder): number {
  return ladder.ranks.length - 1;
}

/** The rank a stored index points at, clamped to the last rank. */
export function rankAt(ladder: Ladder, index: number): Rank {
  const clamped = Math.max(0, Math.min(index, lastRankIndex(ladder)));
  const rank = ladder.ranks[clamped];
  if (!rank) {
    throw new InvalidConfigurationError("Rate-limit ladder has no ranks");
  }
  return rank;
}

export interface ApplicableRule {
  rule: Rule;
  /** Position within the rank, used in the counter key. */
  position: number;
}

export function rulesForGroup(rank: Rank, group: string): ApplicableRule[] {
  const applicable: ApplicableRule[] = [];
  rank.rules.forEach((rule, position) => {
    if (rule.groups === null || rule.groups.includes(group)) {
      applicable.push({ rule, position });
    }
  });
  return applicable;
}
