import { randomUUID } from "crypto"
import type { ILogger } from "@memqueue/pino-logger"
import type { PayloadCodec } from "./codec"
import { MemQueueError, QueueErrors, unwrapOrThrow } from "./errors"
import type { QueueHooks } from "./hooks"
import { lastMessageKey, messageKey, validateName } from "./keys"
import type { KeyValueStore } from "./store"
import type { TimeBucketIndex } from "./time_buckets"

export type QueueWriterArgs<T> = {
  store: KeyValueStore
  index: TimeBucketIndex
  codec: PayloadCodec<T>
  maxPayloadBytes: number
  logger: ILogger
  hooks?: QueueHooks
}

export class QueueWriter<T> {
  private readonly store: KeyValueStore
  private readonly index: TimeBucketIndex
  private readonly codec: PayloadCodec<T>
  private readonly maxPayloadBytes: number
  private readonly log: ILogger
  private readonly hooks: QueueHooks

  constructor({ store, index, codec, maxPayloadBytes, logger, hooks }: QueueWriterArgs<T>) {
    this.store = store
    this.index = index
    this.codec = codec
    this.maxPayloadBytes = maxPayloadBytes
    this.log = logger
    this.hooks = hooks ?? {}
  }

  /**
   * Stores the payload under a fresh key, registers it in the current minute's
   * bucket and moves the queue's last-message pointer to it.
   * Store failures propagate; nothing is retried.
   */
  async put(queue: string, payload: T, clientID: string): Promise<string> {
    unwrapOrThrow(validateName("queue", queue))
    unwrapOrThrow(validateName("clientID", clientID))

    const encoded = this.codec.encode(payload)
    const bytes = Buffer.byteLength(encoded, "utf8")
    if (bytes > this.maxPayloadBytes) {
      throw new MemQueueError(QueueErrors.PayloadTooLarge(bytes, this.maxPayloadBytes))
    }

    const key = messageKey(queue, clientID, Date.now(), randomUUID())
    await this.store.set(key, encoded)
    await this.index.registerMessage(queue, key)
    await this.store.set(lastMessageKey(queue), key)

    this.log.debug("Message stored", { queue, clientID, key, bytes })
    this.hooks.onPut?.(queue, key)
    return key
  }
}
