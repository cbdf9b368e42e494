import { Err, Ok, type Result } from "ts-results"
import type { ILogger } from "@memqueue/pino-logger"
import type { ClientCursor } from "./client_cursor"
import type { PayloadCodec } from "./codec"
import { MemQueueError, QueueErrors, toError, type CorruptBucketError } from "./errors"
import type { QueueHooks } from "./hooks"
import { BUCKET_DELIMITER, lastMessageKey } from "./keys"
import type { KeyValueStore } from "./store"
import type { TimeBucketIndex } from "./time_buckets"

/**
 * Splits a comma-terminated bucket list. The empty token after the final
 * delimiter is dropped here, per bucket, so concatenated buckets never
 * contain empty keys.
 */
export function parseBucket(bucketKey: string, raw: string): Result<string[], CorruptBucketError> {
  if (!raw.endsWith(BUCKET_DELIMITER)) {
    return Err(QueueErrors.CorruptBucket(bucketKey, "list is not delimiter-terminated"))
  }

  const entries = raw.split(BUCKET_DELIMITER)
  entries.pop()

  if (entries.some((e) => e.length === 0)) {
    return Err(QueueErrors.CorruptBucket(bucketKey, "list contains an empty entry"))
  }
  return Ok(entries)
}

export type QueueReaderArgs<T> = {
  store: KeyValueStore
  index: TimeBucketIndex
  cursor: ClientCursor
  codec: PayloadCodec<T>
  autodelete: boolean
  logger: ILogger
  hooks?: QueueHooks
}

export class QueueReader<T> {
  private readonly store: KeyValueStore
  private readonly index: TimeBucketIndex
  private readonly cursor: ClientCursor
  private readonly codec: PayloadCodec<T>
  private readonly autodelete: boolean
  private readonly log: ILogger
  private readonly hooks: QueueHooks

  constructor({ store, index, cursor, codec, autodelete, logger, hooks }: QueueReaderArgs<T>) {
    this.store = store
    this.index = index
    this.cursor = cursor
    this.codec = codec
    this.autodelete = autodelete
    this.log = logger
    this.hooks = hooks ?? {}
  }

  /** Message keys written in the trailing window, oldest bucket first */
  async listMessageKeys(queue: string, windowMinutes: number): Promise<string[]> {
    const bucketKeys = this.index.bucketKeys(queue, windowMinutes)
    const lists = await Promise.all(bucketKeys.map((k) => this.store.get(k)))

    const keys: string[] = []
    for (let i = 0; i < bucketKeys.length; i++) {
      const raw = lists[i]
      if (raw === null) continue

      const parsed = parseBucket(bucketKeys[i], raw)
      if (parsed.err) {
        this.log.warn("Corrupt bucket", { queue, bucket: bucketKeys[i] })
        throw new MemQueueError(parsed.val)
      }
      keys.push(...parsed.val)
    }
    return keys
  }

  /**
   * Reads a message and records it as delivered to the client.
   * The cursor advances even when the message is gone, or cannot be decoded.
   */
  async fetch(queue: string, messageKey: string, clientID: string): Promise<T | null> {
    const raw = await this.store.get(messageKey)

    if (this.autodelete) {
      await this.store.delete(messageKey)
    }

    await this.cursor.set(queue, clientID, messageKey)

    const found = raw !== null
    this.log.debug("Message delivered", { queue, clientID, key: messageKey, found })
    this.hooks.onDeliver?.(queue, clientID, messageKey, found)

    if (raw === null) {
      return null
    }
    return this.decode(messageKey, raw)
  }

  /** The queue's newest message; null if the queue was never written */
  async last(queue: string, clientID: string): Promise<T | null> {
    const key = await this.store.get(lastMessageKey(queue))
    if (key === null) {
      return null
    }
    return this.fetch(queue, key, clientID)
  }

  private decode(messageKey: string, raw: string): T {
    try {
      return this.codec.decode(raw)
    } catch (e) {
      this.log.warn("Undecodable payload", { key: messageKey })
      throw new MemQueueError(QueueErrors.CorruptPayload(messageKey, toError(e)))
    }
  }
}
