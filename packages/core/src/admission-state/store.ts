import type { BlockDetail, DelayClaim, IgnoreGrant, RankState, WindowCount } from "@rankguard/schemas";

/**
 * Per-key counters backing the rule evaluator. Every mutating call must be
 * atomic per key: two concurrent callers may never both observe the same
 * stale count or both claim the same delay slot.
 */
export interface CounterStore {
  getWindow(key: string): Promise<WindowCount | null>;
  getLastAccepted(key: string): Promise<number | null>;
  /**
   * Counts one hit in the fixed window starting at the stored `windowStart`.
   * An absent or elapsed window restarts at `{ count: 1, windowStart: now }`.
   * The key expires `windowMs` after the window start.
   */
  incrementWindow(key: string, now: number, windowMs: number): Promise<WindowCount>;
  /**
   * Records `now` as the last accepted request (expiring after `delayMs`)
   * when no timestamp is stored or at least `delayMs` has passed since it.
   * A rejected claim leaves the stored timestamp untouched.
   */
  claimDelay(key: string, now: number, delayMs: number): Promise<DelayClaim>;
  /**
   * Takes back one hit counted at `at`: decrements the stored window if it
   * was already open at `at` and still holds a hit. Otherwise a no-op.
   */
  releaseWindow(key: string, at: number): Promise<void>;
  /** Drops the last accepted timestamp if it is still the one claimed at `at`. */
  releaseDelay(key: string, at: number): Promise<void>;
  delete(keys: string[]): Promise<void>;
}

export interface RankBreach {
  now: number;
  blockMs: number;
  /** Move one rank up the ladder (capped at `lastIndex`). */
  escalate: boolean;
  lastIndex: number;
  blockedBy: BlockDetail;
  ttlMs: number;
}

export interface Escalation {
  state: RankState;
  /** False when an active block was already stored and the breach changed nothing. */
  applied: boolean;
}

export interface RankStore {
  get(key: string): Promise<RankState | null>;
  set(key: string, state: RankState, ttlMs: number): Promise<void>;
  /** Removes whatever is stored under the key, rank state or ignore grant. */
  delete(key: string): Promise<void>;
  /**
   * Applies a breach atomically. While a stored block is still active the
   * stored state is returned unchanged with `applied: false`, so concurrent
   * breaches neither escalate twice nor extend the block.
   */
  escalate(key: string, breach: RankBreach): Promise<Escalation>;
  /** Replaces the ignore grant under the key. */
  grantIgnore(key: string, grant: IgnoreGrant, ttlMs: number): Promise<void>;
  /**
   * Atomically spends the grant for one request at `now`. A remaining count
   * is used (and decremented) first; otherwise a deadline not yet passed
   * lets the request through. Resolves false when nothing applies.
   */
  consumeIgnore(key: string, now: number): Promise<boolean>;
}

export const INITIAL_RANK_STATE: RankState = Object.freeze({
  index: 0,
  blockedUntil: null,
  blockedBy: null,
});

export function applyBreach(current: RankState | null, breach: RankBreach): Escalation {
  const state = current ?? INITIAL_RANK_STATE;
  if (state.blockedUntil !== null && breach.now < state.blockedUntil) {
    return { state, applied: false };
  }
  const base = Math.min(state.index, breach.lastIndex);
  return {
    state: {
      index: Math.min(base + (breach.escalate ? 1 : 0), breach.lastIndex),
      blockedUntil: breach.now + breach.blockMs,
      blockedBy: breach.blockedBy,
    },
    applied: true,
  };
}

export interface GrantUse {
  ignored: boolean;
  /** The grant to store afterwards; unchanged when nothing was spent. */
  grant: IgnoreGrant | null;
}

export function spendGrant(grant: IgnoreGrant | null, now: number): GrantUse {
  if (grant === null) return { ignored: false, grant };
  if (grant.times !== null && grant.times > 0) {
    return { ignored: true, grant: { ...grant, times: grant.times - 1 } };
  }
  return { ignored: grant.until !== null && now <= grant.until, grant };
}

export function releaseHit(window: WindowCount | null, at: number): WindowCount | null {
  if (window === null || window.windowStart > at || window.count === 0) return null;
  return { count: window.count - 1, windowStart: window.windowStart };
}
