import { Err, Ok, type Result } from "ts-results"
import { QueueErrors, unwrapOrThrow, type CorruptCursorError } from "./errors"
import { cursorMessageKey, cursorTimeKey } from "./keys"
import type { KeyValueStore } from "./store"

export type CursorPosition = {
  /** Key of the last message delivered to the client */
  lastKey: string | null
  /** Epoch millis of that delivery */
  lastTime: number | null
}

export function parseCursorTime(cursorKey: string, raw: string | null): Result<number | null, CorruptCursorError> {
  if (raw === null) {
    return Ok(null)
  }
  const ms = Number(raw)
  if (raw.trim() === "" || !Number.isFinite(ms)) {
    return Err(QueueErrors.CorruptCursor(cursorKey, `delivery time is not a number: ${JSON.stringify(raw)}`))
  }
  return Ok(ms)
}

/**
 * Per (queue, client) record of the last delivery. Writes are unconditional;
 * a client is expected to drive its own cursor sequentially.
 */
export class ClientCursor {
  constructor(private readonly store: KeyValueStore) {}

  async get(queue: string, clientID: string): Promise<CursorPosition> {
    const timeKey = cursorTimeKey(queue, clientID)
    const [lastKey, rawTime] = await Promise.all([
      this.store.get(cursorMessageKey(queue, clientID)),
      this.store.get(timeKey),
    ])
    return { lastKey, lastTime: unwrapOrThrow(parseCursorTime(timeKey, rawTime)) }
  }

  async set(queue: string, clientID: string, messageKey: string): Promise<void> {
    await this.store.set(cursorMessageKey(queue, clientID), messageKey)
    await this.store.set(cursorTimeKey(queue, clientID), String(Date.now()))
  }
}
