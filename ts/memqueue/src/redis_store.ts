import { Cluster, Redis } from "ioredis"
import type { ILogger } from "@memqueue/pino-logger"
import type { KeyValueStore } from "./store"

/** The commands the store issues; both Redis and Cluster provide them */
export type RedisCommands = Pick<Redis, "get" | "set" | "del" | "eval" | "quit">

/**
 * Appends only when the key exists, so a bucket is never created by APPEND.
 * APPEND leaves the key's TTL untouched.
 */
export const APPEND_IF_PRESENT_SCRIPT = `
if redis.call("EXISTS", KEYS[1]) == 1 then
  redis.call("APPEND", KEYS[1], ARGV[1])
  return 1
else
  return 0
end
`

export type RedisKeyValueStoreConfig = {
  /** Expire message, bucket and cursor keys after this many seconds. Unset = no expiry. */
  keyTtlSeconds?: number
  logger?: ILogger
}

const CONNECT_TIMEOUT_MS = 2000
const CLUSTER_CONNECT_ATTEMPTS = 3
const CLUSTER_RETRY_DELAY_MS = 500

/**
 * Delay before the cluster client retries its startup nodes; null gives up,
 * which rejects every pending command.
 */
export function clusterRetryDelay(times: number): number | null {
  if (times > CLUSTER_CONNECT_ATTEMPTS) {
    return null
  }
  return times * CLUSTER_RETRY_DELAY_MS
}

/**
 * One endpoint gives a single connection, several give a cluster client.
 * Fails fast: a request is retried at most once, and nothing is queued while
 * the cache is unreachable.
 */
export function createRedisClient(endpoints: string[], logger?: ILogger): Redis | Cluster {
  const redisOptions = {
    maxRetriesPerRequest: 1,
    connectTimeout: CONNECT_TIMEOUT_MS,
  }

  const client =
    endpoints.length === 1
      ? new Redis(endpoints[0], {
          ...redisOptions,
          enableOfflineQueue: false, // reject instead of hanging while Redis is down
        })
      : new Cluster(endpoints, {
          redisOptions,
          // the cluster client ignores maxRetriesPerRequest and keeps its own offline queue
          enableOfflineQueue: false,
          clusterRetryStrategy: clusterRetryDelay,
        })

  client.on("error", (err: Error) => {
    logger?.error("Redis client error", { error: err.message })
  })

  client.on("connect", () => {
    logger?.info("Redis client connected", { endpoints: endpoints.length })
  })

  client.on("end", () => {
    logger?.info("Redis client connection closed")
  })

  return client
}

export class RedisKeyValueStore implements KeyValueStore {
  private readonly ttlSeconds?: number
  private readonly logger?: ILogger

  constructor(private readonly redis: RedisCommands, config: RedisKeyValueStoreConfig = {}) {
    this.ttlSeconds = config.keyTtlSeconds
    this.logger = config.logger
  }

  async get(key: string): Promise<string | null> {
    return this.redis.get(key)
  }

  async set(key: string, value: string): Promise<void> {
    if (this.ttlSeconds === undefined) {
      await this.redis.set(key, value)
    } else {
      await this.redis.set(key, value, "EX", this.ttlSeconds)
    }
  }

  async add(key: string, value: string): Promise<boolean> {
    // 'NX' = Only set if Not Exists
    const result =
      this.ttlSeconds === undefined
        ? await this.redis.set(key, value, "NX")
        : await this.redis.set(key, value, "EX", this.ttlSeconds, "NX")
    return result === "OK"
  }

  async append(key: string, suffix: string): Promise<boolean> {
    const result = await this.redis.eval(APPEND_IF_PRESENT_SCRIPT, 1, key, suffix)
    return result === 1
  }

  async delete(key: string): Promise<boolean> {
    const removed = await this.redis.del(key)
    return removed > 0
  }

  async close(): Promise<void> {
    await this.redis.quit()
    this.logger?.info("Redis store closed")
  }
}
