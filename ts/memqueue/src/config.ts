import { Err, Ok, type Result } from "ts-results"
import { QueueErrors, type ConfigError } from "./errors"

export const DEFAULT_CLIENT_LAG_SECONDS = 120
/** Nominal per-value limit of memcached and friends */
export const DEFAULT_MAX_PAYLOAD_BYTES = 1024 * 1024
export const DEFAULT_LIST_WINDOW_MINUTES = 10
export const DEFAULT_PURGE_WINDOW_MINUTES = 30

export type MemQueueOptions = {
  /** Cache endpoints, e.g. "redis://127.0.0.1:6379". Needed only when the queue builds its own store. */
  endpoints?: string[]
  /** Mirroring to backup caches is not supported; any entry is rejected */
  backupEndpoints?: string[]
  /** Delete each message right after it is read. Default false. */
  autodelete?: boolean
  /** Silence after which nextmsg skips a client to the newest message. Default 120. */
  clientLagSeconds?: number
  /** Largest encoded payload put accepts. Default 1 MiB. */
  maxPayloadBytes?: number
  /** Expiry applied to every key the store writes */
  keyTtlSeconds?: number
}

export type MemQueueSettings = {
  endpoints: string[]
  autodelete: boolean
  clientLagSeconds: number
  maxPayloadBytes: number
  keyTtlSeconds?: number
}

function positive(name: string, value: number | undefined, fallback: number): Result<number, ConfigError> {
  if (value === undefined) {
    return Ok(fallback)
  }
  if (!Number.isFinite(value) || value <= 0) {
    return Err(QueueErrors.Config("config-invalid-number", `${name} must be a positive number, got ${value}`))
  }
  return Ok(value)
}

export function validateConfig(options: MemQueueOptions): Result<MemQueueSettings, ConfigError> {
  if (options.backupEndpoints && options.backupEndpoints.length > 0) {
    return Err(
      QueueErrors.Config(
        "config-backup-unsupported",
        "backupEndpoints is not supported: writes are not mirrored to backup caches",
      ),
    )
  }

  const endpoints = options.endpoints ?? []
  if (endpoints.some((e) => e.trim() === "")) {
    return Err(QueueErrors.Config("config-missing-endpoints", "endpoints must not contain empty entries"))
  }

  const clientLagSeconds = positive("clientLagSeconds", options.clientLagSeconds, DEFAULT_CLIENT_LAG_SECONDS)
  if (clientLagSeconds.err) return clientLagSeconds

  const maxPayloadBytes = positive("maxPayloadBytes", options.maxPayloadBytes, DEFAULT_MAX_PAYLOAD_BYTES)
  if (maxPayloadBytes.err) return maxPayloadBytes

  let keyTtlSeconds: number | undefined
  if (options.keyTtlSeconds !== undefined) {
    const ttl = positive("keyTtlSeconds", options.keyTtlSeconds, 0)
    if (ttl.err) return ttl
    if (!Number.isInteger(ttl.val)) {
      return Err(QueueErrors.Config("config-invalid-number", `keyTtlSeconds must be whole seconds, got ${ttl.val}`))
    }
    keyTtlSeconds = ttl.val
  }

  return Ok({
    endpoints,
    autodelete: options.autodelete ?? false,
    clientLagSeconds: clientLagSeconds.val,
    maxPayloadBytes: maxPayloadBytes.val,
    keyTtlSeconds,
  })
}

function splitList(raw: string | undefined): string[] | undefined {
  if (raw === undefined) return undefined
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
}

function parseNumber(name: string, raw: string | undefined): Result<number | undefined, ConfigError> {
  if (raw === undefined || raw.trim() === "") return Ok(undefined)
  const n = Number(raw)
  if (!Number.isFinite(n)) {
    return Err(QueueErrors.Config("config-invalid-number", `${name} is not a number: ${JSON.stringify(raw)}`))
  }
  return Ok(n)
}

function parseBoolean(name: string, raw: string | undefined): Result<boolean | undefined, ConfigError> {
  if (raw === undefined || raw.trim() === "") return Ok(undefined)
  const v = raw.trim().toLowerCase()
  if (v === "true" || v === "1") return Ok(true)
  if (v === "false" || v === "0") return Ok(false)
  return Err(QueueErrors.Config("config-invalid-boolean", `${name} must be true, false, 1 or 0, got ${JSON.stringify(raw)}`))
}

/**
 * Reads MEMQUEUE_* variables. Endpoints are required here, since a queue
 * configured from the environment always builds its own store.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Result<MemQueueSettings, ConfigError> {
  const endpoints = splitList(env.MEMQUEUE_ENDPOINTS) ?? []
  if (endpoints.length === 0) {
    return Err(QueueErrors.Config("config-missing-endpoints", "MEMQUEUE_ENDPOINTS is not set"))
  }

  const autodelete = parseBoolean("MEMQUEUE_AUTODELETE", env.MEMQUEUE_AUTODELETE)
  if (autodelete.err) return autodelete
  const clientLagSeconds = parseNumber("MEMQUEUE_CLIENT_LAG_SECONDS", env.MEMQUEUE_CLIENT_LAG_SECONDS)
  if (clientLagSeconds.err) return clientLagSeconds
  const maxPayloadBytes = parseNumber("MEMQUEUE_MAX_PAYLOAD_BYTES", env.MEMQUEUE_MAX_PAYLOAD_BYTES)
  if (maxPayloadBytes.err) return maxPayloadBytes
  const keyTtlSeconds = parseNumber("MEMQUEUE_KEY_TTL_SECONDS", env.MEMQUEUE_KEY_TTL_SECONDS)
  if (keyTtlSeconds.err) return keyTtlSeconds

  return validateConfig({
    endpoints,
    backupEndpoints: splitList(env.MEMQUEUE_BACKUP_ENDPOINTS),
    autodelete: autodelete.val,
    clientLagSeconds: clientLagSeconds.val,
    maxPayloadBytes: maxPayloadBytes.val,
    keyTtlSeconds: keyTtlSeconds.val,
  })
}
