import type { Redis } from "ioredis";
import { StoreError } from "@tollgate/shared";

// ARGV: capacity, refill per minute, cost, now (ms), ttl (s).
// Reply: { allowed, retry_after, remaining, reset_seconds }; retry_after is a
// string since Redis truncates fractional Lua numbers in replies.
const tokenBucketLua = `
local key = KEYS[1]
local capacity = tonumber(ARGV[1])
local refill_per_minute = tonumber(ARGV[2])
local cost = tonumber(ARGV[3])
local now_ms = tonumber(ARGV[4])
local ttl = tonumber(ARGV[5])

local state = redis.call("HMGET", key, "tokens", "last_refill_ms")
local tokens = tonumber(state[1])
local last_refill = tonumber(state[2])

if tokens == nil or last_refill == nil then
  tokens = capacity
  last_refill = now_ms
end

local elapsed = now_ms - last_refill
if elapsed < 0 then
  elapsed = 0
end

tokens = math.min(capacity, tokens + (elapsed * refill_per_minute) / 60000)
if now_ms > last_refill then
  last_refill = now_ms
end

local allowed = 0
local retry_after = 0
if tokens >= cost then
  tokens = tokens - cost
  allowed = 1
else
  retry_after = ((cost - tokens) * 60) / refill_per_minute
end

redis.call("HSET", key, "tokens", tokens, "last_refill_ms", last_refill)
redis.call("EXPIRE", key, ttl)

local remaining = math.floor(tokens)
if remaining < 0 then
  remaining = 0
end

local reset_seconds = math.ceil(((capacity - tokens) * 60) / refill_per_minute)
if reset_seconds < 0 then
  reset_seconds = 0
end

return { allowed, string.format("%.17g", retry_after), remaining, reset_seconds }
`;

// ARGV: capacity, refill per minute, now (ms). Read-only.
const tokenBucketPeekLua = `
local key = KEYS[1]
local capacity = tonumber(ARGV[1])
local refill_per_minute = tonumber(ARGV[2])
local now_ms = tonumber(ARGV[3])

local state = redis.call("HMGET", key, "tokens", "last_refill_ms")
local tokens = tonumber(state[1])
local last_refill = tonumber(state[2])

if tokens == nil or last_refill == nil then
  return capacity
end

local elapsed = now_ms - last_refill
if elapsed < 0 then
  elapsed = 0
end

return math.floor(math.min(capacity, tokens + (elapsed * refill_per_minute) / 60000))
`;

export type ScriptName = "token_bucket" | "token_bucket_peek";

const scriptMap: Record<ScriptName, string> = {
  token_bucket: tokenBucketLua,
  token_bucket_peek: tokenBucketPeekLua
};

export interface ScriptRunner {
  evalScript(name: ScriptName, keys: string[], args: Array<string | number>): Promise<unknown>;
}

export class RedisScriptManager implements ScriptRunner {
  private readonly shas = new Map<ScriptName, string>();

  constructor(private readonly redis: Redis) {}

  async loadScripts(): Promise<void> {
    for (const [name, script] of Object.entries(scriptMap) as Array<[ScriptName, string]>) {
      const sha = await this.redis.script("LOAD", script);
      if (typeof sha !== "string") {
        throw new StoreError(`SCRIPT LOAD returned no sha for ${name}`, "protocol");
      }
      this.shas.set(name, sha);
    }
  }

  async evalScript(name: ScriptName, keys: string[], args: Array<string | number>): Promise<unknown> {
    const sha = this.shas.get(name);
    const normalizedArgs = args.map((value) => String(value));

    if (!sha) {
      await this.loadScripts();
      return this.evalScript(name, keys, normalizedArgs);
    }

    try {
      return await this.redis.evalsha(sha, keys.length, ...keys, ...normalizedArgs);
    } catch (error) {
      const message = error instanceof Error ? error.message : "";
      if (message.includes("NOSCRIPT")) {
        await this.loadScripts();
        return this.evalScript(name, keys, normalizedArgs);
      }
      throw error;
    }
  }
}
