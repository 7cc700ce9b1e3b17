// Engine
export {
  DecisionEngine,
  defaultReasonBuilder,
  DEFAULT_BLOCK_MS,
  DEFAULT_RANK_STATE_TTL_MS,
  MANUAL_BLOCK_REASON,
} from "./engine/decision-engine.js";
export type {
  DecisionEngineConfig,
  Guard,
  IgnoreOptions,
  ManualBlockOptions,
  ReasonBuilder,
  RuleCounter,
  Standing,
} from "./engine/decision-engine.js";
export { compileLadder, lastRankIndex, rankAt, rulesForGroup } from "./engine/ladder.js";
export type { ApplicableRule } from "./engine/ladder.js";
export { evaluateRule } from "./engine/rule-evaluator.js";
export type { RuleOutcome, RuleStatus } from "./engine/rule-evaluator.js";
export { callerIgnoreKey, counterKey, endpointIgnoreKey, rankStateKey } from "./engine/keys.js";

// Admission state stores
export {
  InMemoryCounterStore,
  InMemoryRankStore,
  INITIAL_RANK_STATE,
  applyBreach,
  releaseHit,
  spendGrant,
} from "./admission-state/index.js";
export type {
  CounterStore,
  Escalation,
  GrantUse,
  RankStore,
  RankBreach,
  InMemoryStoreOptions,
} from "./admission-state/index.js";

// Errors
export {
  AdmissionError,
  InvalidConfigurationError,
  StoreUnavailableError,
  IdentityMissingError,
} from "./errors.js";
export type { AdmissionErrorCode } from "./errors.js";

// Logging
export { noopLogger } from "./logger.js";
export type { Logger } from "./logger.js";

// Telemetry
export {
  getMetrics,
  setMetrics,
  createInMemoryMetrics,
  InMemoryCounter,
  InMemoryHistogram,
} from "./telemetry/index.js";
export type { AdmissionMetrics, Counter, Histogram, HistogramSummary } from "./telemetry/index.js";
