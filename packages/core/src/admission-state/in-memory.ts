import type { DelayClaim, IgnoreGrant, RankState, WindowCount } from "@rankguard/schemas";
import type { CounterStore, Escalation, RankBreach, RankStore } from "./store.js";
import { applyBreach, releaseHit, spendGrant } from "./store.js";

interface TimedEntry<T> {
  value: T;
  expiresAt: number;
}

export interface InMemoryStoreOptions {
  clock?: () => number;
  /**
   * How often expired entries are swept. Without it entries are only
   * dropped when their key is read again. Call `destroy()` to stop the timer.
   */
  cleanupIntervalMs?: number;
}

class ExpiringMap<T> {
  private entries = new Map<string, TimedEntry<T>>();

  get(key: string, now: number): T | null {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= now) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  /** Expiry of a live entry, or null. */
  expiresAt(key: string, now: number): number | null {
    return this.get(key, now) === null ? null : (this.entries.get(key)?.expiresAt ?? null);
  }

  set(key: string, value: T, expiresAt: number): void {
    this.entries.set(key, { value, expiresAt });
  }

  delete(key: string): void {
    this.entries.delete(key);
  }

  sweep(now: number): void {
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) this.entries.delete(key);
    }
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

/** Owns the optional sweep timer shared by both in-memory stores. */
abstract class SweptStore {
  protected readonly clock: () => number;
  private cleanupTimer: NodeJS.Timeout | null = null;

  constructor(options: InMemoryStoreOptions) {
    this.clock = options.clock ?? Date.now;
    if (options.cleanupIntervalMs !== undefined) {
      this.cleanupTimer = setInterval(() => this.sweep(), options.cleanupIntervalMs);
      this.cleanupTimer.unref();
    }
  }

  /** Drops every expired entry now. */
  abstract sweep(): void;

  protected abstract clear(): void;

  /** Stops the sweep timer and drops all entries. */
  destroy(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
    this.clear();
  }
}

export class InMemoryCounterStore extends SweptStore implements CounterStore {
  private windows = new ExpiringMap<WindowCount>();
  private lastAccepted = new ExpiringMap<number>();

  constructor(options: InMemoryStoreOptions = {}) {
    super(options);
  }

  async getWindow(key: string): Promise<WindowCount | null> {
    const entry = this.windows.get(key, this.clock());
    return entry ? { ...entry } : null;
  }

  async getLastAccepted(key: string): Promise<number | null> {
    return this.lastAccepted.get(key, this.clock());
  }

  async incrementWindow(key: string, now: number, windowMs: number): Promise<WindowCount> {
    const current = this.windows.get(key, now);
    const next: WindowCount =
      current && now - current.windowStart < windowMs
        ? { count: current.count + 1, windowStart: current.windowStart }
        : { count: 1, windowStart: now };
    this.windows.set(key, next, next.windowStart + windowMs);
    return { ...next };
  }

  async claimDelay(key: string, now: number, delayMs: number): Promise<DelayClaim> {
    const last = this.lastAccepted.get(key, now);
    if (last !== null && now - last < delayMs) {
      return { accepted: false, lastAcceptedAt: last };
    }
    this.lastAccepted.set(key, now, now + delayMs);
    return { accepted: true, lastAcceptedAt: now };
  }

  async releaseWindow(key: string, at: number): Promise<void> {
    const now = this.clock();
    const expiresAt = this.windows.expiresAt(key, now);
    const next = releaseHit(this.windows.get(key, now), at);
    if (next !== null && expiresAt !== null) {
      this.windows.set(key, next, expiresAt);
    }
  }

  async releaseDelay(key: string, at: number): Promise<void> {
    if (this.lastAccepted.get(key, this.clock()) === at) {
      this.lastAccepted.delete(key);
    }
  }

  async delete(keys: string[]): Promise<void> {
    for (const key of keys) {
      this.windows.delete(key);
      this.lastAccepted.delete(key);
    }
  }

  override sweep(): void {
    const now = this.clock();
    this.windows.sweep(now);
    this.lastAccepted.sweep(now);
  }

  getStats(): { windows: number; delays: number } {
    return { windows: this.windows.size, delays: this.lastAccepted.size };
  }

  protected override clear(): void {
    this.windows.clear();
    this.lastAccepted.clear();
  }
}

export class InMemoryRankStore extends SweptStore implements RankStore {
  private states = new ExpiringMap<RankState>();
  private grants = new ExpiringMap<IgnoreGrant>();

  constructor(options: InMemoryStoreOptions = {}) {
    super(options);
  }

  async get(key: string): Promise<RankState | null> {
    const state = this.states.get(key, this.clock());
    return state ? { ...state } : null;
  }

  async set(key: string, state: RankState, ttlMs: number): Promise<void> {
    this.states.set(key, { ...state }, this.clock() + ttlMs);
  }

  async delete(key: string): Promise<void> {
    this.states.delete(key);
    this.grants.delete(key);
  }

  async escalate(key: string, breach: RankBreach): Promise<Escalation> {
    const result = applyBreach(this.states.get(key, breach.now), breach);
    if (result.applied) {
      this.states.set(key, result.state, breach.now + breach.ttlMs);
    }
    return { state: { ...result.state }, applied: result.applied };
  }

  async grantIgnore(key: string, grant: IgnoreGrant, ttlMs: number): Promise<void> {
    this.grants.set(key, { ...grant }, this.clock() + ttlMs);
  }

  async consumeIgnore(key: string, now: number): Promise<boolean> {
    const expiresAt = this.grants.expiresAt(key, now);
    const use = spendGrant(this.grants.get(key, now), now);
    if (use.ignored && use.grant !== null && expiresAt !== null) {
      this.grants.set(key, use.grant, expiresAt);
    }
    return use.ignored;
  }

  override sweep(): void {
    const now = this.clock();
    this.states.sweep(now);
    this.grants.sweep(now);
  }

  getStats(): { states: number; grants: number } {
    return { states: this.states.size, grants: this.grants.size };
  }

  protected override clear(): void {
    this.states.clear();
    this.grants.clear();
  }
}
