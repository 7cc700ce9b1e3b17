import { z } from "zod";
import { StoreUnavailableError } from "@rankguard/core";
import type { CounterStore, Escalation, RankBreach, RankStore } from "@rankguard/core";
import { BlockDetailSchema } from "@rankguard/schemas";
import type { BlockDetail, DelayClaim, IgnoreGrant, RankState, WindowCount } from "@rankguard/schemas";

/** The ioredis calls the stores make. `Redis` from ioredis satisfies it. */
export interface RedisScriptClient {
  eval(script: string, numKeys: number, ...args: Array<string | number>): Promise<unknown>;
  hmget(key: string, ...fields: string[]): Promise<Array<string | null>>;
  get(key: string): Promise<string | null>;
  del(...keys: string[]): Promise<number>;
}

export const DEFAULT_KEY_PREFIX = "admission:";

// KEYS[1] window hash; ARGV now, windowMs. Returns {count, windowStart}.
export const INCREMENT_WINDOW_SCRIPT = `
local now = tonumber(ARGV[1])
local window = tonumber(ARGV[2])
local stored = redis.call('HMGET', KEYS[1], 'count', 'start')
local count = tonumber(stored[1])
local start = tonumber(stored[2])
local startRaw = stored[2]
if count == nil or start == nil or now - start >= window then
  count = 0
  start = now
  startRaw = ARGV[1]
end
count = count + 1
redis.call('HSET', KEYS[1], 'count', count, 'start', startRaw)
redis.call('PEXPIRE', KEYS[1], math.max(1, start + window - now))
return {count, start}
`;

// KEYS[1] last accepted timestamp; ARGV now, delayMs. Returns {accepted, lastAcceptedAt}.
export const CLAIM_DELAY_SCRIPT = `
local now = tonumber(ARGV[1])
local gap = tonumber(ARGV[2])
local last = tonumber(redis.call('GET', KEYS[1]))
if last and now - last < gap then
  return {0, last}
end
redis.call('SET', KEYS[1], ARGV[1], 'PX', ARGV[2])
return {1, now}
`;

// KEYS[1] window hash; ARGV at. Takes one hit back from a window open at `at`.
export const RELEASE_WINDOW_SCRIPT = `
local at = tonumber(ARGV[1])
local stored = redis.call('HMGET', KEYS[1], 'count', 'start')
local count = tonumber(stored[1])
local start = tonumber(stored[2])
if count == nil or start == nil or start > at or count <= 0 then
  return 0
end
redis.call('HSET', KEYS[1], 'count', count - 1)
return 1
`;

// KEYS[1] last accepted timestamp; ARGV at.
export const RELEASE_DELAY_SCRIPT = `
local last = tonumber(redis.call('GET', KEYS[1]))
if last and last == tonumber(ARGV[1]) then
  return redis.call('DEL', KEYS[1])
end
return 0
`;

// KEYS[1] rank hash; ARGV now, blockMs, step, lastIndex, blockedBy, ttlMs.
// Returns {index, blockedUntil, blockedBy, applied} as strings.
export const ESCALATE_SCRIPT = `
local now = tonumber(ARGV[1])
local blockMs = tonumber(ARGV[2])
local step = tonumber(ARGV[3])
local last = tonumber(ARGV[4])
local stored = redis.call('HMGET', KEYS[1], 'index', 'blockedUntil', 'blockedBy')
local blockedUntil = tonumber(stored[2])
if blockedUntil and now < blockedUntil then
  return {tostring(stored[1] or '0'), tostring(stored[2]), tostring(stored[3] or ''), '0'}
end
local index = math.min(math.min(tonumber(stored[1]) or 0, last) + step, last)
local untilRaw = string.format('%d', now + blockMs)
redis.call('HSET', KEYS[1], 'index', index, 'blockedUntil', untilRaw, 'blockedBy', ARGV[5])
redis.call('PEXPIRE', KEYS[1], ARGV[6])
return {tostring(index), untilRaw, ARGV[5], '1'}
`;

// KEYS[1] rank hash; ARGV index, blockedUntil, blockedBy, ttlMs.
export const SET_RANK_SCRIPT = `
redis.call('DEL', KEYS[1])
redis.call('HSET', KEYS[1], 'index', ARGV[1], 'blockedUntil', ARGV[2], 'blockedBy', ARGV[3])
redis.call('PEXPIRE', KEYS[1], ARGV[4])
return 1
`;

// KEYS[1] grant hash; ARGV times, until, ttlMs. Empty strings stand for null.
export const GRANT_IGNORE_SCRIPT = `
redis.call('DEL', KEYS[1])
redis.call('HSET', KEYS[1], 'times', ARGV[1], 'until', ARGV[2])
redis.call('PEXPIRE', KEYS[1], ARGV[3])
return 1
`;

// KEYS[1] grant hash; ARGV now. Returns 1 when the request is ignored.
export const CONSUME_IGNORE_SCRIPT = `
local now = tonumber(ARGV[1])
local stored = redis.call('HMGET', KEYS[1], 'times', 'until')
local times = tonumber(stored[1])
if times and times > 0 then
  redis.call('HSET', KEYS[1], 'times', times - 1)
  return 1
end
local deadline = tonumber(stored[2])
if deadline and now <= deadline then
  return 1
end
return 0
`;

const NumberPairSchema = z.tuple([z.number(), z.number()]);
const ReplyTextSchema = z.union([z.string(), z.number()]).transform(String);
const EscalationReplySchema = z.tuple([ReplyTextSchema, ReplyTextSchema, ReplyTextSchema, ReplyTextSchema]);

async function attempt<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof StoreUnavailableError) throw err;
    throw new StoreUnavailableError(operation, err);
  }
}

export interface RedisStoreOptions {
  keyPrefix?: string;
}

export class RedisCounterStore implements CounterStore {
  private readonly prefix: string;

  constructor(
    private redis: RedisScriptClient,
    options: RedisStoreOptions = {},
  ) {
    this.prefix = options.keyPrefix ?? DEFAULT_KEY_PREFIX;
  }

  async getWindow(key: string): Promise<WindowCount | null> {
    return attempt("getWindow", async () => {
      const [count, start] = await this.redis.hmget(this.windowKey(key), "count", "start");
      if (count == null || start == null) return null;
      return { count: Number(count), windowStart: Number(start) };
    });
  }

  async getLastAccepted(key: string): Promise<number | null> {
    return attempt("getLastAccepted", async () => {
      const raw = await this.redis.get(this.delayKey(key));
      if (raw === null) return null;
      const timestamp = Number(raw);
      return Number.isFinite(timestamp) ? timestamp : null;
    });
  }

  async incrementWindow(key: string, now: number, windowMs: number): Promise<WindowCount> {
    return attempt("incrementWindow", async () => {
      const reply = await this.redis.eval(INCREMENT_WINDOW_SCRIPT, 1, this.windowKey(key), now, windowMs);
      const [count, windowStart] = NumberPairSchema.parse(reply);
      return { count, windowStart };
    });
  }

  async claimDelay(key: string, now: number, delayMs: number): Promise<DelayClaim> {
    return attempt("claimDelay", async () => {
      const reply = await this.redis.eval(CLAIM_DELAY_SCRIPT, 1, this.delayKey(key), now, delayMs);
      const [accepted, lastAcceptedAt] = NumberPairSchema.parse(reply);
      return { accepted: accepted === 1, lastAcceptedAt };
    });
  }

  async releaseWindow(key: string, at: number): Promise<void> {
    await attempt("releaseWindow", () => this.redis.eval(RELEASE_WINDOW_SCRIPT, 1, this.windowKey(key), at));
  }

  async releaseDelay(key: string, at: number): Promise<void> {
    await attempt("releaseDelay", () => this.redis.eval(RELEASE_DELAY_SCRIPT, 1, this.delayKey(key), at));
  }

  async delete(keys: string[]): Promise<void> {
    if (keys.length === 0) return;
    await attempt("delete", () =>
      this.redis.del(...keys.flatMap((key) => [this.windowKey(key), this.delayKey(key)])),
    );
  }

  private windowKey(key: string): string {
    return `${this.prefix}window:${key}`;
  }

  private delayKey(key: string): string {
    return `${this.prefix}delay:${key}`;
  }
}

export class RedisRankStore implements RankStore {
  private readonly prefix: string;

  constructor(
    private redis: RedisScriptClient,
    options: RedisStoreOptions = {},
  ) {
    this.prefix = options.keyPrefix ?? DEFAULT_KEY_PREFIX;
  }

  async get(key: string): Promise<RankState | null> {
    return attempt("get", async () => {
      const [index, blockedUntil, blockedBy] = await this.redis.hmget(
        this.prefix + key,
        "index",
        "blockedUntil",
        "blockedBy",
      );
      if (index == null) return null;
      return decodeRankState(index, blockedUntil ?? "", blockedBy ?? "");
    });
  }

  async set(key: string, state: RankState, ttlMs: number): Promise<void> {
    await attempt("set", () =>
      this.redis.eval(
        SET_RANK_SCRIPT,
        1,
        this.prefix + key,
        state.index,
        state.blockedUntil === null ? "" : String(state.blockedUntil),
        encodeBlockDetail(state.blockedBy),
        Math.max(1, Math.ceil(ttlMs)),
      ),
    );
  }

  async delete(key: string): Promise<void> {
    await attempt("delete", () => this.redis.del(this.prefix + key));
  }

  async escalate(key: string, breach: RankBreach): Promise<Escalation> {
    return attempt("escalate", async () => {
      const reply = await this.redis.eval(
        ESCALATE_SCRIPT,
        1,
        this.prefix + key,
        breach.now,
        breach.blockMs,
        breach.escalate ? 1 : 0,
        breach.lastIndex,
        encodeBlockDetail(breach.blockedBy),
        Math.max(1, Math.ceil(breach.ttlMs)),
      );
      const [index, blockedUntil, blockedBy, applied] = EscalationReplySchema.parse(reply);
      return { state: decodeRankState(index, blockedUntil, blockedBy), applied: applied === "1" };
    });
  }

  async grantIgnore(key: string, grant: IgnoreGrant, ttlMs: number): Promise<void> {
    await attempt("grantIgnore", () =>
      this.redis.eval(
        GRANT_IGNORE_SCRIPT,
        1,
        this.prefix + key,
        grant.times === null ? "" : grant.times,
        grant.until === null ? "" : grant.until,
        Math.max(1, Math.ceil(ttlMs)),
      ),
    );
  }

  async consumeIgnore(key: string, now: number): Promise<boolean> {
    return attempt("consumeIgnore", async () => {
      const reply = await this.redis.eval(CONSUME_IGNORE_SCRIPT, 1, this.prefix + key, now);
      return z.number().parse(reply) === 1;
    });
  }
}

function encodeBlockDetail(detail: BlockDetail | null): string {
  return detail === null ? "" : JSON.stringify(detail);
}

function decodeRankState(index: string, blockedUntil: string, blockedBy: string): RankState {
  return {
    index: Number(index),
    blockedUntil: blockedUntil === "" ? null : Number(blockedUntil),
    blockedBy: blockedBy === "" ? null : BlockDetailSchema.parse(JSON.parse(blockedBy)),
  };
}
