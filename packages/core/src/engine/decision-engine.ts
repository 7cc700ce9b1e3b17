import { CallerIdentitySchema } from "@rankguard/schemas";
import type {
  AllowedVerdict,
  BlockDetail,
  BlockedVerdict,
  CallerIdentity,
  IgnoreGrant,
  Ladder,
  LadderInput,
  RankState,
  Rule,
  Verdict,
  WindowCount,
} from "@rankguard/schemas";
import type { CounterStore, RankStore } from "../admission-state/store.js";
import { INITIAL_RANK_STATE } from "../admission-state/store.js";
import { IdentityMissingError, InvalidConfigurationError } from "../errors.js";
import type { Logger } from "../logger.js";
import { noopLogger } from "../logger.js";
import type { AdmissionMetrics } from "../telemetry/metrics.js";
import { getMetrics } from "../telemetry/metrics.js";
import { callerIgnoreKey, counterKey, endpointIgnoreKey, rankStateKey } from "./keys.js";
import { compileLadder, lastRankIndex, rankAt, rulesForGroup } from "./ladder.js";
import { evaluateRule } from "./rule-evaluator.js";

export type ReasonBuilder = (rule: Rule) => string;

export const DEFAULT_RANK_STATE_TTL_MS = 60 * 60 * 1000;
export const DEFAULT_BLOCK_MS = 5 * 60 * 1000;
export const MANUAL_BLOCK_REASON = "Access temporarily limited";

export function defaultReasonBuilder(rule: Rule): string {
  return rule.kind === "delay" ? "Delay between requests exceeded" : "Max hits per time exceeded";
}

export interface DecisionEngineConfig {
  counterStore: CounterStore;
  rankStore: RankStore;
  logger?: Logger;
  /** Defaults to the process-wide metrics from {@link getMetrics}. */
  metrics?: AdmissionMetrics;
  clock?: () => number;
  /**
   * Storage TTL of a caller's rank state, counted from its last write and
   * never shorter than an active block. Default: one hour.
   */
  rankStateTtlMs?: number;
  reasonBuilder?: ReasonBuilder;
}

export type RuleCounter =
  | { position: number; kind: "count"; window: WindowCount | null }
  | { position: number; kind: "delay"; lastAcceptedAt: number | null };

export interface Standing {
  state: RankState;
  /** Index of the rank whose rules apply to the next request. */
  rank: number;
  retryAfterMs: number;
  counters: RuleCounter[];
}

export interface ManualBlockOptions {
  forMs?: number;
  reason?: string;
  message?: string;
}

/** At least one of the two must be given. */
export interface IgnoreOptions {
  /** Let every request through for this long. */
  forMs?: number;
  /** Let this many requests through. */
  times?: number;
}

export type Guard = (identity: CallerIdentity) => Promise<Verdict>;

/**
 * Turns a caller identity and an escalation ladder into an allow/block
 * verdict. Holds no per-caller state of its own: everything lives in the
 * counter and rank stores, whose atomic operations serialize concurrent
 * requests from the same caller.
 */
export class DecisionEngine {
  private readonly counterStore: CounterStore;
  private readonly rankStore: RankStore;
  private readonly logger: Logger;
  private readonly metrics: AdmissionMetrics;
  private readonly clock: () => number;
  private readonly rankStateTtlMs: number;
  private readonly reasonBuilder: ReasonBuilder;

  constructor(config: DecisionEngineConfig) {
    const rankStateTtlMs = config.rankStateTtlMs ?? DEFAULT_RANK_STATE_TTL_MS;
    if (!Number.isFinite(rankStateTtlMs) || rankStateTtlMs <= 0) {
      throw new InvalidConfigurationError(`rankStateTtlMs must be a positive number, got ${rankStateTtlMs}`);
    }

    this.counterStore = config.counterStore;
    this.rankStore = config.rankStore;
    this.logger = config.logger ?? noopLogger;
    this.metrics = config.metrics ?? getMetrics();
    this.clock = config.clock ?? Date.now;
    this.rankStateTtlMs = rankStateTtlMs;
    this.reasonBuilder = config.reasonBuilder ?? defaultReasonBuilder;
  }

  /** Compiles the ladder once and returns a per-request evaluator for one endpoint. */
  guard(endpointKey: string, ladderInput: LadderInput): Guard {
    const ladder = compileLadder(ladderInput);
    return (identity) => this.evaluate(identity, ladder, endpointKey);
  }

  async evaluate(identity: CallerIdentity, ladder: Ladder, endpointKey: string): Promise<Verdict> {
    const started = Date.now();
    const labels = { endpoint: endpointKey };
    this.metrics.evaluationsTotal.inc(labels);

    try {
      const verdict = await this.decide(identity, ladder, endpointKey, this.clock());
      if (verdict.outcome === "allowed") {
        this.metrics.allowedTotal.inc(labels);
      } else {
        this.metrics.blockedTotal.inc(labels);
        if (verdict.escalated) this.metrics.escalationsTotal.inc(labels);
      }
      return verdict;
    } finally {
      this.metrics.evaluationLatencyMs.observe(labels, Date.now() - started);
    }
  }

  async standing(identity: CallerIdentity, ladder: Ladder, endpointKey: string): Promise<Standing> {
    const now = this.clock();
    const state = await this.loadState(endpointKey, identity);
    const rank = rankAt(ladder, state.index);

    const counters = await Promise.all(
      rulesForGroup(rank, identity.group).map(async ({ rule, position }): Promise<RuleCounter> => {
        const key = counterKey(endpointKey, identity, rank.index, position);
        if (rule.kind === "count") {
          return { position, kind: "count", window: await this.counterStore.getWindow(key) };
        }
        return { position, kind: "delay", lastAcceptedAt: await this.counterStore.getLastAccepted(key) };
      }),
    );

    return {
      state,
      rank: rank.index,
      retryAfterMs: isBlocked(state, now) && state.blockedUntil !== null ? state.blockedUntil - now : 0,
      counters,
    };
  }

  /** Puts the caller back on the first rank. An active block stays in force. */
  async resetRank(identity: CallerIdentity, endpointKey: string): Promise<RankState> {
    const state = await this.loadState(endpointKey, identity);
    const next: RankState = { ...state, index: 0 };
    await this.saveState(endpointKey, identity, next);
    this.logger.debug({ endpoint: endpointKey, ...identity, from: state.index }, "Reset rank");
    return next;
  }

  /** Moves the caller `by` ranks (negative to step down), clamped to the ladder. */
  async adjustRank(
    identity: CallerIdentity,
    ladder: Ladder,
    endpointKey: string,
    by: number,
  ): Promise<RankState> {
    if (!Number.isInteger(by)) {
      throw new InvalidConfigurationError(`Rank adjustment must be an integer, got ${by}`);
    }
    const state = await this.loadState(endpointKey, identity);
    const index = Math.max(0, Math.min(state.index + by, lastRankIndex(ladder)));
    const next: RankState = { ...state, index };
    await this.saveState(endpointKey, identity, next);
    this.logger.debug({ endpoint: endpointKey, ...identity, from: state.index, to: index }, "Adjusted rank");
    return next;
  }

  /**
   * Blocks the caller without evaluating any rule. The duration defaults to
   * the block time of the first rule of the caller's current rank.
   */
  async block(
    identity: CallerIdentity,
    ladder: Ladder,
    endpointKey: string,
    options: ManualBlockOptions = {},
  ): Promise<BlockedVerdict> {
    const now = this.clock();
    const state = await this.loadState(endpointKey, identity);
    const rank = rankAt(ladder, state.index);
    const forMs = options.forMs ?? rank.rules[0]?.blockMs ?? DEFAULT_BLOCK_MS;
    if (!Number.isFinite(forMs) || forMs <= 0) {
      throw new InvalidConfigurationError(`Block duration must be a positive number, got ${forMs}`);
    }

    const cause: BlockDetail = {
      kind: "manual",
      reason: options.reason ?? MANUAL_BLOCK_REASON,
      message: options.message ?? null,
    };
    const next: RankState = { index: state.index, blockedUntil: now + forMs, blockedBy: cause };
    await this.saveState(endpointKey, identity, next);
    this.logger.debug({ endpoint: endpointKey, ...identity, forMs }, "Manually blocked caller");

    return {
      outcome: "blocked",
      retryAfterMs: forMs,
      blockedUntil: now + forMs,
      rank: rank.index,
      escalated: false,
      cause,
    };
  }

  /** Forgets everything stored about the caller on this endpoint. */
  async pardon(identity: CallerIdentity, ladder: Ladder, endpointKey: string): Promise<void> {
    const keys = ladder.ranks.flatMap((rank) =>
      rank.rules.map((_rule, position) => counterKey(endpointKey, identity, rank.index, position)),
    );
    await Promise.all([
      this.rankStore.delete(rankStateKey(endpointKey, identity)),
      this.rankStore.delete(callerIgnoreKey(endpointKey, identity)),
      this.counterStore.delete(keys),
    ]);
    this.logger.debug({ endpoint: endpointKey, ...identity }, "Pardoned caller");
  }

  /**
   * Takes back an allowed request so it does not count against the caller:
   * its hit leaves every count window it was added to, and the delay slots it
   * claimed are freed. A request that was let through by an ignore grant
   * touched no counter, so there is nothing to give back.
   */
  async ignoreHit(
    identity: CallerIdentity,
    ladder: Ladder,
    endpointKey: string,
    verdict: AllowedVerdict,
  ): Promise<void> {
    if (verdict.ignored) return;
    const rank = rankAt(ladder, verdict.rank);
    await Promise.all(
      rulesForGroup(rank, identity.group).map(({ rule, position }) => {
        const key = counterKey(endpointKey, identity, rank.index, position);
        return rule.kind === "count"
          ? this.counterStore.releaseWindow(key, verdict.at)
          : this.counterStore.releaseDelay(key, verdict.at);
      }),
    );
    this.logger.debug({ endpoint: endpointKey, ...identity, at: verdict.at }, "Gave back request");
  }

  /**
   * Lets the caller's next requests to the endpoint through without
   * evaluating any rule. Replaces an earlier grant. An active block still
   * rejects.
   */
  async ignore(identity: CallerIdentity, endpointKey: string, options: IgnoreOptions): Promise<IgnoreGrant> {
    const grant = await this.grant(callerIgnoreKey(endpointKey, identity), options);
    this.logger.debug({ endpoint: endpointKey, ...identity, ...grant }, "Ignoring caller");
    return grant;
  }

  /** As {@link ignore}, for every caller of the endpoint. */
  async ignoreAll(endpointKey: string, options: IgnoreOptions): Promise<IgnoreGrant> {
    const grant = await this.grant(endpointIgnoreKey(endpointKey), options);
    this.logger.debug({ endpoint: endpointKey, ...grant }, "Ignoring endpoint");
    return grant;
  }

  private async grant(key: string, options: IgnoreOptions): Promise<IgnoreGrant> {
    const { forMs, times } = options;
    if (forMs === undefined && times === undefined) {
      throw new InvalidConfigurationError("An ignore needs 'forMs', 'times' or both");
    }
    if (forMs !== undefined && (!Number.isFinite(forMs) || forMs <= 0)) {
      throw new InvalidConfigurationError(`Ignore duration must be a positive number, got ${forMs}`);
    }
    if (times !== undefined && (!Number.isInteger(times) || times <= 0)) {
      throw new InvalidConfigurationError(`Ignore count must be a positive integer, got ${times}`);
    }

    const now = this.clock();
    const grant: IgnoreGrant = {
      times: times ?? null,
      until: forMs === undefined ? null : now + forMs,
    };
    // A counted grant lives as long as rank state; a deadline one a moment past its deadline.
    const ttlMs = Math.max(
      times === undefined ? 0 : this.rankStateTtlMs,
      grant.until === null ? 0 : grant.until - now + 1,
    );
    await this.rankStore.grantIgnore(key, grant, ttlMs);
    return grant;
  }

  private async decide(
    identity: CallerIdentity,
    ladder: Ladder,
    endpointKey: string,
    now: number,
  ): Promise<Verdict> {
    const parsed = CallerIdentitySchema.safeParse(identity);
    if (!parsed.success) {
      throw new IdentityMissingError("Caller identity needs a non-empty uniqueId and group");
    }
    const caller = parsed.data;
    const rankKey = rankStateKey(endpointKey, caller);
    const state = (await this.rankStore.get(rankKey)) ?? INITIAL_RANK_STATE;

    if (state.blockedUntil !== null && now < state.blockedUntil) {
      this.logger.debug(
        { endpoint: endpointKey, ...caller, blockedUntil: state.blockedUntil },
        "Rejected request during active block",
      );
      return {
        outcome: "blocked",
        retryAfterMs: state.blockedUntil - now,
        blockedUntil: state.blockedUntil,
        rank: Math.min(state.index, lastRankIndex(ladder)),
        escalated: false,
        cause: state.blockedBy ?? { kind: "manual", reason: MANUAL_BLOCK_REASON, message: null },
      };
    }

    const rank = rankAt(ladder, state.index);
    const scope = await this.ignoredBy(endpointKey, caller, now);
    if (scope !== null) {
      this.logger.debug({ endpoint: endpointKey, ...caller, scope }, "Ignored request");
      return { outcome: "allowed", rank: rank.index, at: now, ignored: true };
    }

    // Every applicable rule runs and updates its counter, breached or not.
    const outcomes = await Promise.all(
      rulesForGroup(rank, caller.group).map(({ rule, position }) =>
        evaluateRule(
          this.counterStore,
          rule,
          position,
          counterKey(endpointKey, caller, rank.index, position),
          now,
        ),
      ),
    );

    const breached = outcomes.filter((outcome) => outcome.status === "breach");
    const worst = breached.reduce<(typeof breached)[number] | null>(
      (acc, outcome) => (acc === null || outcome.rule.blockMs > acc.rule.blockMs ? outcome : acc),
      null,
    );
    if (worst === null) {
      return { outcome: "allowed", rank: rank.index, at: now, ignored: false };
    }

    const blockMs = worst.rule.blockMs;
    const blockedBy = this.describe(worst.rule);
    const { state: next, applied } = await this.rankStore.escalate(rankKey, {
      now,
      blockMs,
      escalate: breached.some((outcome) => outcome.rule.increaseRank),
      lastIndex: lastRankIndex(ladder),
      blockedBy,
      ttlMs: Math.max(this.rankStateTtlMs, blockMs),
    });

    const blockedUntil = next.blockedUntil ?? now + blockMs;
    // Only the request whose breach was stored escalated.
    const escalated = applied && next.index > rank.index;
    this.logger.debug(
      {
        endpoint: endpointKey,
        ...caller,
        rank: rank.index,
        nextRank: next.index,
        breached: breached.map((outcome) => outcome.position),
        blockMs,
      },
      escalated ? "Rule breached, escalated rank" : "Rule breached",
    );

    return {
      outcome: "blocked",
      retryAfterMs: blockedUntil - now,
      blockedUntil,
      rank: next.index,
      escalated,
      cause: next.blockedBy ?? blockedBy,
    };
  }

  /** Endpoint-wide grants are spent before the caller's own. */
  private async ignoredBy(
    endpointKey: string,
    caller: CallerIdentity,
    now: number,
  ): Promise<"endpoint" | "caller" | null> {
    if (await this.rankStore.consumeIgnore(endpointIgnoreKey(endpointKey), now)) return "endpoint";
    if (await this.rankStore.consumeIgnore(callerIgnoreKey(endpointKey, caller), now)) return "caller";
    return null;
  }

  private describe(rule: Rule): BlockDetail {
    const reason = rule.reason ?? this.reasonBuilder(rule);
    if (rule.kind === "count") {
      return { kind: "count", reason, message: rule.message, hits: rule.hits, windowMs: rule.windowMs };
    }
    return { kind: "delay", reason, message: rule.message, delayMs: rule.delayMs };
  }

  private async loadState(endpointKey: string, identity: CallerIdentity): Promise<RankState> {
    return (await this.rankStore.get(rankStateKey(endpointKey, identity))) ?? { ...INITIAL_RANK_STATE };
  }

  private async saveState(endpointKey: string, identity: CallerIdentity, state: RankState): Promise<void> {
    const now = this.clock();
    const remainingBlock = isBlocked(state, now) && state.blockedUntil !== null ? state.blockedUntil - now : 0;
    await this.rankStore.set(
      rankStateKey(endpointKey, identity),
      state,
      Math.max(this.rankStateTtlMs, remainingBlock),
    );
  }
}

function isBlocked(state: RankState, now: number): boolean {
  return state.blockedUntil !== null && now < state.blockedUntil;
}
