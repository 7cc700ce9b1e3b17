import type { FastifyInstance } from "fastify";
import { InMemoryCounterStore, InMemoryRankStore } from "@rankguard/core";
import type { CounterStore, RankStore } from "@rankguard/core";
import { buildServer } from "../app.js";
import { loadConfig } from "../config.js";

export const ADMIN_KEY = "test-key-admin";
export const USER_KEY = "test-key-user";

export interface TestClock {
  now: number;
}

export interface TestContext {
  app: FastifyInstance;
  clock: TestClock;
  counterStore: CounterStore;
  rankStore: RankStore;
}

export interface TestServerOptions {
  env?: NodeJS.ProcessEnv;
  counterStore?: CounterStore;
  rankStore?: RankStore;
}

export async function buildTestServer(options: TestServerOptions = {}): Promise<TestContext> {
  const clock: TestClock = { now: 1_700_000_000_000 };
  const now = () => clock.now;
  const counterStore = options.counterStore ?? new InMemoryCounterStore({ clock: now });
  const rankStore = options.rankStore ?? new InMemoryRankStore({ clock: now });

  const config = loadConfig({
    API_KEYS: `${ADMIN_KEY},${USER_KEY}`,
    API_KEY_GROUPS: `${ADMIN_KEY}:admin`,
    ...options.env,
  });

  const app = await buildServer({
    config,
    stores: { counterStore, rankStore },
    clock: now,
    logger: false,
  });

  return { app, clock, counterStore, rankStore };
}

export function bearer(key: string): { authorization: string } {
  return { authorization: `Bearer ${key}` };
}
