import { describe, it, expect } from "vitest";
import { compileLadder, lastRankIndex, rankAt, rulesForGroup, InvalidConfigurationError } from "../index.js";

describe("compileLadder", () => {
  it("numbers ranks and expands single rules into groups", () => {
    const ladder = compileLadder([
      { delayMs: 1_000, blockMs: 10_000 },
      [
        { hits: 5, windowMs: 60_000, blockMs: 30_000 },
        { delayMs: 2_000, blockMs: 60_000 },
      ],
    ]);

    expect(ladder.ranks.map((rank) => rank.index)).toEqual([0, 1]);
    expect(ladder.ranks[0]?.rules).toHaveLength(1);
    expect(ladder.ranks[1]?.rules.map((rule) => rule.kind)).toEqual(["count", "delay"]);
    expect(lastRankIndex(ladder)).toBe(1);
  });

  it("throws InvalidConfigurationError for an empty ladder", () => {
    expect(() => compileLadder([])).toThrow(InvalidConfigurationError);
    expect(() => compileLadder([])).toThrow("Invalid rate-limit ladder: A ladder needs at least one rank");
  });

  it("throws for an empty rank", () => {
    expect(() => compileLadder([[]])).toThrow(InvalidConfigurationError);
  });

  it("throws for a rule in both modes and keeps the zod issues", () => {
    try {
      compileLadder([[{ hits: 1, windowMs: 1_000, delayMs: 1_000, blockMs: 1_000 }]]);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidConfigurationError);
      if (!(err instanceof InvalidConfigurationError)) return;
      expect(err.code).toBe("INVALID_CONFIGURATION");
      expect(err.issues.length).toBeGreaterThan(0);
      expect(err.message).toBe(
        "Invalid rate-limit ladder: 0.0: A delay rule cannot also set 'hits' or 'windowMs'",
      );
    }
  });

  it("throws for a rule in neither mode", () => {
    expect(() => compileLadder([[{ blockMs: 1_000 }]])).toThrow(InvalidConfigurationError);
  });
});

describe("rankAt", () => {
  const ladder = compileLadder([
    { delayMs: 1_000, blockMs: 1_000 },
    { delayMs: 2_000, blockMs: 2_000 },
  ]);

  it("returns the rank at an index", () => {
    expect(rankAt(ladder, 1).index).toBe(1);
  });

  it("clamps an index past the end to the last rank", () => {
    expect(rankAt(ladder, 7).index).toBe(1);
  });
});

describe("rulesForGroup", () => {
  const ladder = compileLadder([
    [
      { delayMs: 1_000, blockMs: 1_000 },
      { hits: 2, windowMs: 1_000, blockMs: 1_000, groups: "anonymous" },
      { hits: 9, windowMs: 1_000, blockMs: 1_000, groups: ["partner", "admin"] },
    ],
  ]);
  const rank = rankAt(ladder, 0);

  it("keeps rules without a group filter for every group", () => {
    expect(rulesForGroup(rank, "authenticated").map((r) => r.position)).toEqual([0]);
  });

  it("keeps the original positions of matching rules", () => {
    expect(rulesForGroup(rank, "anonymous").map((r) => r.position)).toEqual([0, 1]);
    expect(rulesForGroup(rank, "admin").map((r) => r.position)).toEqual([0, 2]);
  });
});
