import { Err, Ok, type Result } from "ts-results"
import type { ILogger } from "@memqueue/pino-logger"
import { MemQueueError, QueueErrors, unwrapOrThrow, type InvalidWindowError } from "./errors"
import type { QueueHooks } from "./hooks"
import { BUCKET_DELIMITER, bucketKey, queueMarkerKey } from "./keys"
import type { KeyValueStore } from "./store"

const MINUTE_MILLIS = 60 * 1000

/** Floor the epoch millis to the start of its minute */
export function floorToMinute(ms: number): number {
  return Math.floor(ms / MINUTE_MILLIS) * MINUTE_MILLIS
}

const pad2 = (n: number) => String(n).padStart(2, "0")

/** UTC wall-clock minute as YYYYMMDDHHmm */
export function minuteStamp(ms: number): string {
  const d = new Date(ms)
  return (
    String(d.getUTCFullYear()) +
    pad2(d.getUTCMonth() + 1) +
    pad2(d.getUTCDate()) +
    pad2(d.getUTCHours()) +
    pad2(d.getUTCMinutes())
  )
}

export function validateWindow(windowMinutes: number): Result<number, InvalidWindowError> {
  if (!Number.isInteger(windowMinutes) || windowMinutes < 0) {
    return Err(QueueErrors.InvalidWindow(`window must be a non-negative integer of minutes, got ${windowMinutes}`))
  }
  return Ok(windowMinutes)
}

/**
 * Bucket keys from `windowMinutes` minutes before `nowMs` through the current
 * minute, oldest first. Always windowMinutes + 1 keys.
 */
export function bucketKeysAt(queue: string, windowMinutes: number, nowMs: number): Result<string[], InvalidWindowError> {
  return validateWindow(windowMinutes).map((window) => {
    const current = floorToMinute(nowMs)
    const keys: string[] = []
    for (let i = window; i >= 0; i--) {
      keys.push(bucketKey(queue, minuteStamp(current - i * MINUTE_MILLIS)))
    }
    return keys
  })
}

/**
 * Partitions a queue's message keys into one append-only list per minute.
 * Registration needs no lock: append and add are each atomic in the cache
 * and message keys are unique.
 */
export class TimeBucketIndex {
  constructor(
    private readonly store: KeyValueStore,
    private readonly log: ILogger,
    private readonly hooks: QueueHooks = {},
  ) {}

  bucketKeys(queue: string, windowMinutes: number): string[] {
    return unwrapOrThrow(bucketKeysAt(queue, windowMinutes, Date.now()))
  }

  async registerMessage(queue: string, messageKey: string): Promise<void> {
    const [currentBucket] = this.bucketKeys(queue, 0)
    const entry = `${messageKey}${BUCKET_DELIMITER}`

    if (!(await this.store.append(currentBucket, entry))) {
      // first write of the minute
      if (!(await this.store.add(currentBucket, entry))) {
        // another writer created it between our append and add
        this.log.warn("Lost bucket creation race, appending", { queue, bucket: currentBucket })
        this.hooks.onBucketRace?.(queue, currentBucket)

        if (!(await this.store.append(currentBucket, entry))) {
          throw new MemQueueError(QueueErrors.BucketRegistration(currentBucket, messageKey))
        }
      }
    }

    await this.store.set(queueMarkerKey(queue), String(Date.now()))
  }
}
