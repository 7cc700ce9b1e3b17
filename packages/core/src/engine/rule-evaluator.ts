import type { Rule } from "@rankguard/schemas";
import type { CounterStore } from "../admission-state/store.js";

export type RuleStatus = "pass" | "breach";

export interface RuleOutcome {
  rule: Rule;
  position: number;
  status: RuleStatus;
}

/**
 * Evaluates one rule against its counter, updating the counter as a side
 * effect. Count mode uses a fixed window whose origin is the first hit after
 * the previous window ran out, so a burst straddling a window boundary can
 * see up to twice `hits`. Delay mode measures from the last accepted request.
 */
export async function evaluateRule(
  store: CounterStore,
  rule: Rule,
  position: number,
  key: string,
  now: number,
): Promise<RuleOutcome> {
  switch (rule.kind) {
    case "count": {
      const window = await store.incrementWindow(key, now, rule.windowMs);
      return { rule, position, status: window.count <= rule.hits ? "pass" : "breach" };
    }
    case "delay": {
      const claim = await store.claimDelay(key, now, rule.delayMs);
      return { rule, position, status: claim.accepted ? "pass" : "breach" };
    }
  }
}
