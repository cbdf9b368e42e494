import type { ILogger } from "@memqueue/pino-logger"
import type { ClientCursor } from "./client_cursor"
import type { QueueHooks } from "./hooks"
import { lastMessageKey } from "./keys"
import type { QueueReader } from "./queue_reader"
import type { KeyValueStore } from "./store"

/**
 * Minutes of buckets nextmsg scans: one per second of the lag threshold, so a
 * client that has never consumed still finds messages older than the threshold.
 */
export function lagWindowMinutes(clientLagSeconds: number): number {
  return Math.ceil(clientLagSeconds)
}

export type SequentialConsumerArgs<T> = {
  store: KeyValueStore
  reader: QueueReader<T>
  cursor: ClientCursor
  clientLagSeconds: number
  logger: ILogger
  hooks?: QueueHooks
}

/**
 * Hands each client the message after the one it last received.
 *
 * A client silent for longer than the lag threshold is fast-forwarded to the
 * newest message; the messages in between are skipped for that client.
 */
export class SequentialConsumer<T> {
  private readonly store: KeyValueStore
  private readonly reader: QueueReader<T>
  private readonly cursor: ClientCursor
  private readonly clientLagSeconds: number
  private readonly log: ILogger
  private readonly hooks: QueueHooks

  constructor({ store, reader, cursor, clientLagSeconds, logger, hooks }: SequentialConsumerArgs<T>) {
    this.store = store
    this.reader = reader
    this.cursor = cursor
    this.clientLagSeconds = clientLagSeconds
    this.log = logger
    this.hooks = hooks ?? {}
  }

  /** Returns null when the client is caught up */
  async nextmsg(queue: string, clientID: string): Promise<T | null> {
    const [{ lastKey, lastTime }, lastGlobal] = await Promise.all([
      this.cursor.get(queue, clientID),
      this.store.get(lastMessageKey(queue)),
    ])

    if (lastKey === lastGlobal) {
      return null
    }

    if (lastTime !== null) {
      const lagMs = Date.now() - lastTime
      if (lagMs > this.clientLagSeconds * 1000) {
        this.log.debug("Fast-forwarding lagging client", { queue, clientID, lagMs })
        this.hooks.onFastForward?.(queue, clientID, lagMs)
        return this.reader.last(queue, clientID)
      }
    }

    const keys = await this.reader.listMessageKeys(queue, lagWindowMinutes(this.clientLagSeconds))
    // not found covers a never-consumed client and one whose last message left the window
    const next = lastKey === null ? 0 : keys.indexOf(lastKey) + 1

    if (next >= keys.length) {
      return null
    }
    return this.reader.fetch(queue, keys[next], clientID)
  }
}
