import { describe, it, expect } from "vitest";
import {
  RuleInputSchema,
  RankInputSchema,
  LadderInputSchema,
  CallerIdentitySchema,
  RankStateSchema,
  VerdictSchema,
  IgnoreGrantSchema,
} from "../index.js";

// ---------------------------------------------------------------------------
// 1. RuleInputSchema
// ---------------------------------------------------------------------------
describe("RuleInputSchema", () => {
  it("compiles a count rule with defaults", () => {
    const result = RuleInputSchema.safeParse({ hits: 5, windowMs: 60_000, blockMs: 30_000 });
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data).toEqual({
      kind: "count",
      hits: 5,
      windowMs: 60_000,
      blockMs: 30_000,
      increaseRank: true,
      message: null,
      reason: null,
      groups: null,
    });
  });

  it("compiles a delay rule", () => {
    const result = RuleInputSchema.safeParse({
      delayMs: 1_000,
      blockMs: 10_000,
      increaseRank: false,
      reason: "Too fast",
    });
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data).toEqual({
      kind: "delay",
      delayMs: 1_000,
      blockMs: 10_000,
      increaseRank: false,
      message: null,
      reason: "Too fast",
      groups: null,
    });
  });

  it("wraps a single group name in a list", () => {
    const result = RuleInputSchema.safeParse({ delayMs: 1_000, blockMs: 1_000, groups: "anonymous" });
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.groups).toEqual(["anonymous"]);
  });

  it("rejects a rule that mixes both modes", () => {
    const result = RuleInputSchema.safeParse({ hits: 1, windowMs: 1_000, delayMs: 1_000, blockMs: 1_000 });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0]?.message).toBe("A delay rule cannot also set 'hits' or 'windowMs'");
  });

  it("rejects a count rule without a window", () => {
    const result = RuleInputSchema.safeParse({ hits: 3, blockMs: 1_000 });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0]?.message).toBe(
      "A rule needs either 'delayMs', or both 'hits' and 'windowMs'",
    );
  });

  it("rejects a rule with neither mode", () => {
    expect(RuleInputSchema.safeParse({ blockMs: 1_000 }).success).toBe(false);
  });

  it("rejects a rule without blockMs", () => {
    expect(RuleInputSchema.safeParse({ hits: 1, windowMs: 1_000 }).success).toBe(false);
  });

  it("rejects non-positive durations and hit counts", () => {
    expect(RuleInputSchema.safeParse({ hits: 0, windowMs: 1_000, blockMs: 1_000 }).success).toBe(false);
    expect(RuleInputSchema.safeParse({ delayMs: -5, blockMs: 1_000 }).success).toBe(false);
    expect(RuleInputSchema.safeParse({ delayMs: 1_000, blockMs: 0 }).success).toBe(false);
  });

  it("rejects unknown keys", () => {
    expect(RuleInputSchema.safeParse({ delayMs: 1_000, blockMs: 1_000, burst: 3 }).success).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// 2. RankInputSchema / LadderInputSchema
// ---------------------------------------------------------------------------
describe("RankInputSchema", () => {
  it("treats a single rule as a group of one", () => {
    const result = RankInputSchema.safeParse({ delayMs: 500, blockMs: 1_000 });
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data).toHaveLength(1);
    expect(result.data[0]?.kind).toBe("delay");
  });

  it("keeps the order of an AND-group", () => {
    const result = RankInputSchema.safeParse([
      { hits: 10, windowMs: 60_000, blockMs: 1_000 },
      { delayMs: 500, blockMs: 2_000 },
    ]);
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.map((rule) => rule.kind)).toEqual(["count", "delay"]);
  });

  it("rejects an empty group", () => {
    const result = RankInputSchema.safeParse([]);
    expect(result.success).toBe(false);
  });
});

describe("LadderInputSchema", () => {
  it("accepts a mix of single rules and groups", () => {
    const result = LadderInputSchema.safeParse([
      { delayMs: 1_000, blockMs: 10_000 },
      [
        { hits: 5, windowMs: 60_000, blockMs: 30_000 },
        { delayMs: 2_000, blockMs: 30_000 },
      ],
    ]);
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.map((rank) => rank.length)).toEqual([1, 2]);
  });

  it("rejects an empty ladder", () => {
    const result = LadderInputSchema.safeParse([]);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0]?.message).toBe("A ladder needs at least one rank");
  });
});

// ---------------------------------------------------------------------------
// 3. State and verdict shapes
// ---------------------------------------------------------------------------
describe("CallerIdentitySchema", () => {
  it("requires a non-empty id and group", () => {
    expect(CallerIdentitySchema.safeParse({ uniqueId: "u1", group: "g" }).success).toBe(true);
    expect(CallerIdentitySchema.safeParse({ uniqueId: "", group: "g" }).success).toBe(false);
    expect(CallerIdentitySchema.safeParse({ uniqueId: "u1", group: "" }).success).toBe(false);
  });
});

describe("RankStateSchema", () => {
  it("accepts the initial state", () => {
    expect(RankStateSchema.safeParse({ index: 0, blockedUntil: null, blockedBy: null }).success).toBe(true);
  });

  it("rejects a negative index", () => {
    expect(RankStateSchema.safeParse({ index: -1, blockedUntil: null, blockedBy: null }).success).toBe(false);
  });
});

describe("VerdictSchema", () => {
  it("accepts both outcomes", () => {
    expect(VerdictSchema.safeParse({ outcome: "allowed", rank: 0, at: 0, ignored: false }).success).toBe(true);
    expect(
      VerdictSchema.safeParse({
        outcome: "blocked",
        retryAfterMs: 1_000,
        blockedUntil: 2_000,
        rank: 1,
        escalated: true,
        cause: { kind: "delay", reason: "Too fast", message: null, delayMs: 500 },
      }).success,
    ).toBe(true);
  });

  it("rejects an unknown outcome", () => {
    expect(VerdictSchema.safeParse({ outcome: "throttled", rank: 0 }).success).toBe(false);
  });
});

describe("IgnoreGrantSchema", () => {
  it("accepts a count, a deadline, or both", () => {
    expect(IgnoreGrantSchema.safeParse({ times: 3, until: null }).success).toBe(true);
    expect(IgnoreGrantSchema.safeParse({ times: null, until: 5_000 }).success).toBe(true);
    expect(IgnoreGrantSchema.safeParse({ times: 0, until: 5_000 }).success).toBe(true);
  });

  it("rejects a fractional count", () => {
    expect(IgnoreGrantSchema.safeParse({ times: 1.5, until: null }).success).toBe(false);
  });
});
