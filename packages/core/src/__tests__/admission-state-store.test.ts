import { describe, it, expect, afterEach, vi } from "vitest";
import {
  InMemoryCounterStore,
  InMemoryRankStore,
  applyBreach,
  releaseHit,
  spendGrant,
} from "../admission-state/index.js";
import type { RankBreach } from "../admission-state/index.js";
import type { BlockDetail } from "@rankguard/schemas";

const cause: BlockDetail = { kind: "delay", reason: "Too fast", message: null, delayMs: 1_000 };

function breach(overrides: Partial<RankBreach> = {}): RankBreach {
  return { now: 0, blockMs: 5_000, escalate: true, lastIndex: 2, blockedBy: cause, ttlMs: 60_000, ...overrides };
}

describe("InMemoryCounterStore", () => {
  it("should return null for unknown keys", async () => {
    const store = new InMemoryCounterStore();

    expect(await store.getWindow("counter:unknown")).toBeNull();
    expect(await store.getLastAccepted("counter:unknown")).toBeNull();
  });

  it("should start a window at the first hit", async () => {
    const store = new InMemoryCounterStore({ clock: () => 0 });

    expect(await store.incrementWindow("c", 500, 1_000)).toEqual({ count: 1, windowStart: 500 });
    expect(await store.incrementWindow("c", 900, 1_000)).toEqual({ count: 2, windowStart: 500 });
  });

  it("should expire a window at its end", async () => {
    let now = 0;
    const store = new InMemoryCounterStore({ clock: () => now });

    await store.incrementWindow("c", 0, 1_000);
    now = 999;
    expect(await store.getWindow("c")).toEqual({ count: 1, windowStart: 0 });
    now = 1_000;
    expect(await store.getWindow("c")).toBeNull();
  });

  it("should accept one of two claims in the same instant", async () => {
    const store = new InMemoryCounterStore();

    const [first, second] = await Promise.all([
      store.claimDelay("d", 100, 1_000),
      store.claimDelay("d", 100, 1_000),
    ]);

    expect([first.accepted, second.accepted].sort()).toEqual([false, true]);
  });

  it("should count concurrent increments exactly once each", async () => {
    const store = new InMemoryCounterStore();

    const results = await Promise.all(
      Array.from({ length: 10 }, () => store.incrementWindow("c", 0, 1_000)),
    );

    expect(results.map((r) => r.count).sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
  });

  it("should expire the last accepted timestamp after the delay", async () => {
    let now = 0;
    const store = new InMemoryCounterStore({ clock: () => now });

    await store.claimDelay("d", 0, 1_000);
    now = 1_000;
    expect(await store.getLastAccepted("d")).toBeNull();
  });

  it("should delete both kinds of counters", async () => {
    const store = new InMemoryCounterStore({ clock: () => 0 });

    await store.incrementWindow("c", 0, 1_000);
    await store.claimDelay("d", 0, 1_000);
    await store.delete(["c", "d"]);

    expect(await store.getWindow("c")).toBeNull();
    expect(await store.getLastAccepted("d")).toBeNull();
  });
});

describe("InMemoryRankStore", () => {
  it("should round-trip rank state", async () => {
    const store = new InMemoryRankStore({ clock: () => 0 });
    const state = { index: 1, blockedUntil: 2_000, blockedBy: cause };

    await store.set("rank:a", state, 60_000);
    expect(await store.get("rank:a")).toEqual(state);
  });

  it("should not return expired state", async () => {
    let now = 0;
    const store = new InMemoryRankStore({ clock: () => now });

    await store.set("rank:a", { index: 1, blockedUntil: null, blockedBy: null }, 10);
    now = 10;
    expect(await store.get("rank:a")).toBeNull();
  });

  it("should escalate from the initial state", async () => {
    const store = new InMemoryRankStore({ clock: () => 0 });

    const next = await store.escalate("rank:a", breach());

    expect(next).toEqual({ state: { index: 1, blockedUntil: 5_000, blockedBy: cause }, applied: true });
    expect(await store.get("rank:a")).toEqual(next.state);
  });

  it("should not escalate or extend an active block", async () => {
    const store = new InMemoryRankStore({ clock: () => 0 });

    await store.escalate("rank:a", breach());
    const again = await store.escalate("rank:a", breach({ now: 1_000, blockMs: 50_000 }));

    expect(again).toEqual({ state: { index: 1, blockedUntil: 5_000, blockedBy: cause }, applied: false });
  });

  it("should escalate exactly once under concurrent breaches", async () => {
    const store = new InMemoryRankStore({ clock: () => 0 });

    const results = await Promise.all([
      store.escalate("rank:a", breach()),
      store.escalate("rank:a", breach()),
      store.escalate("rank:a", breach()),
    ]);

    expect(results.map((r) => r.state.index)).toEqual([1, 1, 1]);
    expect(results.map((r) => r.applied)).toEqual([true, false, false]);
  });

  it("should delete state", async () => {
    const store = new InMemoryRankStore();

    await store.set("rank:a", { index: 2, blockedUntil: null, blockedBy: null }, 60_000);
    await store.delete("rank:a");
    expect(await store.get("rank:a")).toBeNull();
  });
});

describe("applyBreach", () => {
  it("caps the index at the last rank", () => {
    const next = applyBreach({ index: 2, blockedUntil: null, blockedBy: null }, breach({ now: 10 }));
    expect(next).toEqual({ state: { index: 2, blockedUntil: 5_010, blockedBy: cause }, applied: true });
  });

  it("clamps a stored index past the end before stepping", () => {
    const next = applyBreach({ index: 9, blockedUntil: null, blockedBy: null }, breach());
    expect(next.state.index).toBe(2);
  });

  it("keeps the index when escalation is off", () => {
    const next = applyBreach({ index: 0, blockedUntil: null, blockedBy: null }, breach({ escalate: false }));
    expect(next.state).toEqual({ index: 0, blockedUntil: 5_000, blockedBy: cause });
  });

  it("applies a new block once the previous one has ended", () => {
    const next = applyBreach({ index: 1, blockedUntil: 5_000, blockedBy: cause }, breach({ now: 5_000 }));
    expect(next).toEqual({ state: { index: 2, blockedUntil: 10_000, blockedBy: cause }, applied: true });
  });

  it("reports an active block as not applied", () => {
    const stored = { index: 1, blockedUntil: 5_000, blockedBy: cause };
    expect(applyBreach(stored, breach({ now: 4_999 }))).toEqual({ state: stored, applied: false });
  });
});

describe("spendGrant", () => {
  it("spends a remaining count before looking at the deadline", () => {
    expect(spendGrant({ times: 2, until: 100 }, 500)).toEqual({ ignored: true, grant: { times: 1, until: 100 } });
  });

  it("falls back to the deadline once the count is used up", () => {
    expect(spendGrant({ times: 0, until: 100 }, 100)).toEqual({ ignored: true, grant: { times: 0, until: 100 } });
    expect(spendGrant({ times: 0, until: 100 }, 101).ignored).toBe(false);
  });

  it("ignores nothing without a grant", () => {
    expect(spendGrant(null, 0)).toEqual({ ignored: false, grant: null });
  });
});

describe("releaseHit", () => {
  it("takes one hit from a window open at the time", () => {
    expect(releaseHit({ count: 3, windowStart: 100 }, 150)).toEqual({ count: 2, windowStart: 100 });
  });

  it("leaves a window that started later or is empty", () => {
    expect(releaseHit({ count: 3, windowStart: 200 }, 150)).toBeNull();
    expect(releaseHit({ count: 0, windowStart: 100 }, 150)).toBeNull();
    expect(releaseHit(null, 150)).toBeNull();
  });
});

describe("in-memory releases and grants", () => {
  it("should release a window hit and keep its expiry", async () => {
    let now = 0;
    const store = new InMemoryCounterStore({ clock: () => now });

    await store.incrementWindow("c", 0, 1_000);
    await store.incrementWindow("c", 10, 1_000);
    await store.releaseWindow("c", 10);

    expect(await store.getWindow("c")).toEqual({ count: 1, windowStart: 0 });
    now = 1_000;
    expect(await store.getWindow("c")).toBeNull();
  });

  it("should release only the delay claim made at the given time", async () => {
    const store = new InMemoryCounterStore({ clock: () => 0 });

    await store.claimDelay("d", 0, 1_000);
    await store.releaseDelay("d", 5);
    expect(await store.getLastAccepted("d")).toBe(0);

    await store.releaseDelay("d", 0);
    expect(await store.getLastAccepted("d")).toBeNull();
  });

  it("should spend a counted grant once per request", async () => {
    const store = new InMemoryRankStore({ clock: () => 0 });

    await store.grantIgnore("ignore:a", { times: 2, until: null }, 60_000);

    expect(await store.consumeIgnore("ignore:a", 1)).toBe(true);
    expect(await store.consumeIgnore("ignore:a", 2)).toBe(true);
    expect(await store.consumeIgnore("ignore:a", 3)).toBe(false);
  });

  it("should drop a grant when its key is deleted", async () => {
    const store = new InMemoryRankStore({ clock: () => 0 });

    await store.grantIgnore("ignore:a", { times: null, until: 1_000 }, 60_000);
    await store.delete("ignore:a");

    expect(await store.consumeIgnore("ignore:a", 1)).toBe(false);
  });
});

describe("in-memory sweeping", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("should sweep expired entries without reading them", async () => {
    vi.useFakeTimers();
    let now = 0;
    const counters = new InMemoryCounterStore({ clock: () => now, cleanupIntervalMs: 1_000 });
    const ranks = new InMemoryRankStore({ clock: () => now, cleanupIntervalMs: 1_000 });

    try {
      await counters.incrementWindow("short", 0, 500);
      await counters.incrementWindow("long", 0, 60_000);
      await counters.claimDelay("d", 0, 500);
      await ranks.set("rank:a", { index: 1, blockedUntil: null, blockedBy: null }, 500);
      await ranks.grantIgnore("ignore:a", { times: 1, until: null }, 60_000);

      now = 1_000;
      vi.advanceTimersByTime(1_000);

      expect(counters.getStats()).toEqual({ windows: 1, delays: 0 });
      expect(ranks.getStats()).toEqual({ states: 0, grants: 1 });
    } finally {
      counters.destroy();
      ranks.destroy();
    }
  });

  it("should stop sweeping and drop everything on destroy", async () => {
    vi.useFakeTimers();
    const store = new InMemoryCounterStore({ clock: () => 0, cleanupIntervalMs: 1_000 });
    const sweep = vi.spyOn(store, "sweep");

    await store.incrementWindow("c", 0, 60_000);
    store.destroy();
    vi.advanceTimersByTime(5_000);

    expect(sweep).not.toHaveBeenCalled();
    expect(store.getStats()).toEqual({ windows: 0, delays: 0 });
  });
});
