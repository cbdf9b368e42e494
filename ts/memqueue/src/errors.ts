import type { Result } from "ts-results"

export type ConfigError = {
  type:
    | "config-missing-endpoints"
    | "config-backup-unsupported"
    | "config-invalid-number"
    | "config-invalid-boolean"
  message: string
}

export type InvalidNameError = { type: "invalid-name"; message: string }

export type InvalidWindowError = { type: "invalid-window"; message: string }

export type PayloadTooLargeError = {
  type: "payload-too-large"
  message: string
  bytes: number
  limit: number
}

/** A bucket value that is not a comma-terminated list of non-empty keys */
export type CorruptBucketError = {
  type: "corrupt-bucket"
  message: string
  bucketKey: string
}

export type CorruptCursorError = {
  type: "corrupt-cursor"
  message: string
  cursorKey: string
}

export type CorruptMarkerError = {
  type: "corrupt-marker"
  message: string
  queue: string
}

export type CorruptPayloadError = {
  type: "corrupt-payload"
  message: string
  messageKey: string
  /** The decoder's own error, with stack trace */
  error: Error
}

/** append, add and the retried append all failed for the current bucket */
export type BucketRegistrationError = {
  type: "bucket-registration-failed"
  message: string
  bucketKey: string
  messageKey: string
}

export type QueueError =
  | ConfigError
  | InvalidNameError
  | InvalidWindowError
  | PayloadTooLargeError
  | CorruptBucketError
  | CorruptCursorError
  | CorruptMarkerError
  | CorruptPayloadError
  | BucketRegistrationError

export type QueueErrorType = QueueError["type"]

/** Error factories for queue errors */
export const QueueErrors = {
  Config: (type: ConfigError["type"], message: string): ConfigError => ({ type, message }),
  InvalidName: (message: string): InvalidNameError => ({ type: "invalid-name", message }),
  InvalidWindow: (message: string): InvalidWindowError => ({ type: "invalid-window", message }),
  PayloadTooLarge: (bytes: number, limit: number): PayloadTooLargeError => ({
    type: "payload-too-large",
    message: `encoded payload is ${bytes} bytes, limit is ${limit}`,
    bytes,
    limit,
  }),
  CorruptBucket: (bucketKey: string, message: string): CorruptBucketError => ({
    type: "corrupt-bucket",
    message: `${bucketKey}: ${message}`,
    bucketKey,
  }),
  CorruptCursor: (cursorKey: string, message: string): CorruptCursorError => ({
    type: "corrupt-cursor",
    message: `${cursorKey}: ${message}`,
    cursorKey,
  }),
  CorruptMarker: (queue: string, raw: string): CorruptMarkerError => ({
    type: "corrupt-marker",
    message: `${queue}: last-write time is not a number: ${JSON.stringify(raw)}`,
    queue,
  }),
  CorruptPayload: (messageKey: string, error: Error): CorruptPayloadError => ({
    type: "corrupt-payload",
    message: `${messageKey}: payload could not be decoded: ${error.message}`,
    messageKey,
    error,
  }),
  BucketRegistration: (bucketKey: string, messageKey: string): BucketRegistrationError => ({
    type: "bucket-registration-failed",
    message: `could not register ${messageKey} in ${bucketKey}`,
    bucketKey,
    messageKey,
  }),
}

/**
 * Thrown by the public queue API. The typed error value is kept on `detail`
 * so callers can switch on `detail.type`.
 */
export class MemQueueError extends Error {
  readonly detail: QueueError

  constructor(detail: QueueError) {
    super(detail.message)
    this.name = "MemQueueError"
    this.detail = detail
  }

  get type(): QueueErrorType {
    return this.detail.type
  }
}

export function isMemQueueError(e: unknown, type?: QueueErrorType): e is MemQueueError {
  return e instanceof MemQueueError && (type === undefined || e.type === type)
}

/** Unwraps an Ok value, or throws its error as a MemQueueError */
export function unwrapOrThrow<T>(result: Result<T, QueueError>): T {
  if (result.err) {
    throw new MemQueueError(result.val)
  }
  return result.val
}

export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e))
}
