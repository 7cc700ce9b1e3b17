import { Redis } from "ioredis";
import { InMemoryCounterStore, InMemoryRankStore } from "@rankguard/core";
import type { CounterStore, RankStore } from "@rankguard/core";
import { RedisCounterStore, RedisRankStore } from "./redis.js";
import type { RedisScriptClient } from "./redis.js";

export { RedisCounterStore, RedisRankStore, DEFAULT_KEY_PREFIX } from "./redis.js";
export type { RedisScriptClient, RedisStoreOptions } from "./redis.js";

export interface AdmissionStores {
  counterStore: CounterStore;
  rankStore: RankStore;
  /** The connection the stores share, when they are Redis-backed. */
  redis: Redis | null;
  /** Quits the owned Redis connection or stops the in-memory sweep timers. */
  close(): Promise<void>;
}

export interface AdmissionStoreOptions {
  redisUrl: string | null;
  keyPrefix: string;
  /** Sweep interval for the in-memory stores. */
  cleanupIntervalMs?: number;
  sharedRedis?: RedisScriptClient;
}

export function createAdmissionStores(options: AdmissionStoreOptions): AdmissionStores {
  if (options.sharedRedis) {
    return {
      counterStore: new RedisCounterStore(options.sharedRedis, { keyPrefix: options.keyPrefix }),
      rankStore: new RedisRankStore(options.sharedRedis, { keyPrefix: options.keyPrefix }),
      redis: null,
      // The caller owns a shared connection.
      close: async () => {},
    };
  }
  if (options.redisUrl) {
    const redis = new Redis(options.redisUrl, { lazyConnect: true, maxRetriesPerRequest: 1 });
    return {
      counterStore: new RedisCounterStore(redis, { keyPrefix: options.keyPrefix }),
      rankStore: new RedisRankStore(redis, { keyPrefix: options.keyPrefix }),
      redis,
      close: async () => {
        await redis.quit();
      },
    };
  }
  const counterStore = new InMemoryCounterStore({ cleanupIntervalMs: options.cleanupIntervalMs });
  const rankStore = new InMemoryRankStore({ cleanupIntervalMs: options.cleanupIntervalMs });
  return {
    counterStore,
    rankStore,
    redis: null,
    close: async () => {
      counterStore.destroy();
      rankStore.destroy();
    },
  };
}
