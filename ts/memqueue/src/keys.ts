import { Err, Ok, type Result } from "ts-results"
import { QueueErrors, type InvalidNameError } from "./errors"

/** Terminates every entry of a bucket list */
export const BUCKET_DELIMITER = ","

export const DEFAULT_CLIENT_ID = "UnknownClient"

// the delimiter, whitespace and control characters would break bucket lists or memcached keys
const FORBIDDEN_NAME_CHARS = /[,\s\x00-\x1f\x7f]/

export function validateName(kind: "queue" | "clientID", name: string): Result<string, InvalidNameError> {
  if (name.length === 0) {
    return Err(QueueErrors.InvalidName(`${kind} must not be empty`))
  }
  if (FORBIDDEN_NAME_CHARS.test(name)) {
    return Err(QueueErrors.InvalidName(`${kind} must not contain commas, whitespace or control characters: ${JSON.stringify(name)}`))
  }
  return Ok(name)
}

/** Existence marker; holds the time of the last write */
export function queueMarkerKey(queue: string): string {
  return queue
}

export function messageKey(queue: string, clientID: string, writtenAtMs: number, uniqueID: string): string {
  return `${queue}_${clientID}_${writtenAtMs}_${uniqueID}`
}

export function bucketKey(queue: string, minuteStamp: string): string {
  return `${queue}_LIST_${minuteStamp}`
}

export function lastMessageKey(queue: string): string {
  return `${queue}_LASTMSG`
}

export function cursorMessageKey(queue: string, clientID: string): string {
  return `${queue}_LASTMSG_${clientID}`
}

export function cursorTimeKey(queue: string, clientID: string): string {
  return `${queue}_LASTTIME_${clientID}`
}
