export { InMemoryCounterStore, InMemoryRankStore } from "./in-memory.js";
export type { InMemoryStoreOptions } from "./in-memory.js";
export { INITIAL_RANK_STATE, applyBreach, releaseHit, spendGrant } from "./store.js";
export type { CounterStore, Escalation, GrantUse, RankStore, RankBreach } from "./store.js";
