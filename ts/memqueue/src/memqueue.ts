import { randomUUID } from "crypto"
import { createLogger, type ILogger } from "@memqueue/pino-logger"
import { ClientCursor } from "./client_cursor"
import { superjsonCodec, type PayloadCodec } from "./codec"
import {
  DEFAULT_LIST_WINDOW_MINUTES,
  DEFAULT_PURGE_WINDOW_MINUTES,
  validateConfig,
  type MemQueueOptions,
  type MemQueueSettings,
} from "./config"
import { MemQueueError, QueueErrors, unwrapOrThrow } from "./errors"
import type { QueueHooks } from "./hooks"
import { DEFAULT_CLIENT_ID, queueMarkerKey, validateName } from "./keys"
import { QueueReader } from "./queue_reader"
import { QueueWriter } from "./queue_writer"
import { createRedisClient, RedisKeyValueStore } from "./redis_store"
import { SequentialConsumer } from "./sequential_consumer"
import type { KeyValueStore } from "./store"
import { TimeBucketIndex } from "./time_buckets"

export type MemQueueDeps<T> = {
  codec?: PayloadCodec<T>
  logger?: ILogger
  hooks?: QueueHooks
}

/** Endpoints and key expiry belong to the store, so an injected store takes neither */
export type MemQueueArgs<T> = Omit<MemQueueOptions, "endpoints" | "keyTtlSeconds"> &
  MemQueueDeps<T> & {
    store: KeyValueStore
  }

/**
 * A message queue over a shared key-value cache.
 *
 * One instance owns one store connection; share the instance rather than the
 * store. Every operation is a handful of store round trips with no locking.
 *
 * @example
 * ```ts
 * const mq = new MemQueue<{ orderId: number }>({ store: new MemoryKeyValueStore() })
 * const clientID = mq.createClientID()
 *
 * await mq.put("orders", { orderId: 1 }, clientID)
 * await mq.nextmsg("orders", clientID) // { orderId: 1 }
 * await mq.nextmsg("orders", clientID) // null, caught up
 * ```
 */
export class MemQueue<T = unknown> {
  readonly settings: MemQueueSettings
  private readonly store: KeyValueStore
  private readonly log: ILogger
  private readonly writer: QueueWriter<T>
  private readonly reader: QueueReader<T>
  private readonly consumer: SequentialConsumer<T>

  /** Throws a MemQueueError with a config-* type for invalid options */
  constructor(args: MemQueueArgs<T>) {
    this.settings = unwrapOrThrow(validateConfig(args))
    this.store = args.store
    this.log = args.logger ?? createLogger().child({ component: "memqueue" })

    const codec = args.codec ?? superjsonCodec<T>()
    const hooks = args.hooks ?? {}
    const index = new TimeBucketIndex(this.store, this.log, hooks)
    const cursor = new ClientCursor(this.store)

    this.writer = new QueueWriter({
      store: this.store,
      index,
      codec,
      maxPayloadBytes: this.settings.maxPayloadBytes,
      logger: this.log,
      hooks,
    })
    this.reader = new QueueReader({
      store: this.store,
      index,
      cursor,
      codec,
      autodelete: this.settings.autodelete,
      logger: this.log,
      hooks,
    })
    this.consumer = new SequentialConsumer({
      store: this.store,
      reader: this.reader,
      cursor,
      clientLagSeconds: this.settings.clientLagSeconds,
      logger: this.log,
      hooks,
    })
  }

  /** Stores a message and returns the key it was stored under */
  async put(queue: string, payload: T, clientID: string = DEFAULT_CLIENT_ID): Promise<string> {
    return this.writer.put(queue, payload, clientID)
  }

  /** Reads a message by key, deleting it when auto-delete is on; null if absent */
  async get(queue: string, messageKey: string, clientID: string = DEFAULT_CLIENT_ID): Promise<T | null> {
    this.checkNames(queue, clientID)
    return this.reader.fetch(queue, messageKey, clientID)
  }

  /** Reads the newest message of the queue */
  async last(queue: string, clientID: string = DEFAULT_CLIENT_ID): Promise<T | null> {
    this.checkNames(queue, clientID)
    return this.reader.last(queue, clientID)
  }

  /** The next message this client has not seen, or null when it is caught up */
  async nextmsg(queue: string, clientID: string = DEFAULT_CLIENT_ID): Promise<T | null> {
    this.checkNames(queue, clientID)
    return this.consumer.nextmsg(queue, clientID)
  }

  /**
   * Keys of the messages written in the last `windowMinutes` minutes plus the
   * current one, in write order. Best effort: buckets evicted by the cache are
   * silently missing.
   */
  async listMessages(
    queue: string,
    windowMinutes: number = DEFAULT_LIST_WINDOW_MINUTES,
    clientID: string = DEFAULT_CLIENT_ID,
  ): Promise<string[]> {
    this.checkNames(queue, clientID)
    const keys = await this.reader.listMessageKeys(queue, windowMinutes)
    this.log.debug("Listed messages", { queue, clientID, windowMinutes, count: keys.length })
    return keys
  }

  /** Returns true if the message existed */
  async delete(queue: string, messageKey: string): Promise<boolean> {
    unwrapOrThrow(validateName("queue", queue))
    return this.store.delete(messageKey)
  }

  /**
   * Deletes every message listed in the window and returns how many were
   * removed. Bucket lists are left for the cache to expire.
   */
  async purgeQueue(
    queue: string,
    windowMinutes: number = DEFAULT_PURGE_WINDOW_MINUTES,
    clientID: string = DEFAULT_CLIENT_ID,
  ): Promise<number> {
    const keys = await this.listMessages(queue, windowMinutes, clientID)

    let removed = 0
    for (const key of keys) {
      if (await this.store.delete(key)) {
        removed++
      }
    }

    this.log.info("Purged queue", { queue, clientID, windowMinutes, listed: keys.length, removed })
    return removed
  }

  /** Epoch millis of the queue's last write, or 0 if it was never written */
  async checkQueue(queue: string): Promise<number> {
    unwrapOrThrow(validateName("queue", queue))
    const raw = await this.store.get(queueMarkerKey(queue))
    if (raw === null) {
      return 0
    }

    const ms = Number(raw)
    if (raw.trim() === "" || !Number.isFinite(ms)) {
      throw new MemQueueError(QueueErrors.CorruptMarker(queue, raw))
    }
    return ms
  }

  /**
   * A fresh identifier for a consumer. Nothing registers or authenticates it;
   * callers pass it to put/get/nextmsg themselves.
   */
  createClientID(): string {
    return randomUUID()
  }

  async close(): Promise<void> {
    await this.store.close()
  }

  private checkNames(queue: string, clientID: string): void {
    unwrapOrThrow(validateName("queue", queue))
    unwrapOrThrow(validateName("clientID", clientID))
  }
}

/**
 * Builds a queue on a Redis store connected to `options.endpoints`.
 * One endpoint connects directly; several are treated as a cluster.
 */
export function createMemQueue<T = unknown>(options: MemQueueOptions & MemQueueDeps<T>): MemQueue<T> {
  const settings = unwrapOrThrow(validateConfig(options))
  if (settings.endpoints.length === 0) {
    throw new MemQueueError(QueueErrors.Config("config-missing-endpoints", "at least one endpoint is required"))
  }

  const logger = options.logger ?? createLogger().child({ component: "memqueue" })
  const store = new RedisKeyValueStore(createRedisClient(settings.endpoints, logger), {
    keyTtlSeconds: settings.keyTtlSeconds,
    logger,
  })

  return new MemQueue<T>({ ...options, store, logger })
}
