import pino from "pino"

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent"

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"]

export interface ILogger {
  debug(message: string, data?: Record<string, unknown>): void
  info(message: string, data?: Record<string, unknown>): void
  warn(message: string, data?: Record<string, unknown>): void
  error(message: string, data?: Record<string, unknown>): void
  /** Creates a logger that adds the given fields to every entry */
  child(fields: Record<string, unknown>): ILogger
}

export type LoggerConfig = {
  /**
   * Minimum level to output.
   * @default process.env.LOG_LEVEL, then "info"
   */
  level?: LogLevel

  /**
   * Name reported in every entry.
   * @default process.env.MEMQUEUE_SERVICE, then "memqueue"
   */
  service?: string

  /** Where serialized lines go. Defaults to stdout. */
  destination?: pino.DestinationStream
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((l) => l === value)
}

/** Adapts a pino logger to the message-first ILogger shape */
export class PinoLogger implements ILogger {
  constructor(private readonly log: pino.Logger) {}

  debug(message: string, data?: Record<string, unknown>): void {
    this.log.debug(data ?? {}, message)
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log.info(data ?? {}, message)
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log.warn(data ?? {}, message)
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log.error(data ?? {}, message)
  }

  child(fields: Record<string, unknown>): ILogger {
    return new PinoLogger(this.log.child(fields))
  }
}

/**
 * Creates a JSON logger.
 *
 * @example
 * ```ts
 * const logger = createLogger({ service: "orders-consumer" })
 * logger.info("queue drained", { queue: "orders" })
 * // {"level":"info","time":"...","service":"orders-consumer","queue":"orders","msg":"queue drained"}
 * ```
 */
export function createLogger(config: LoggerConfig = {}): ILogger {
  const envLevel = process.env.LOG_LEVEL
  const level = config.level ?? (isLogLevel(envLevel) ? envLevel : "info")
  const service = config.service ?? process.env.MEMQUEUE_SERVICE ?? "memqueue"

  const options: pino.LoggerOptions = {
    level,
    base: { service },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      // emit "level":"info" rather than the numeric level
      level: (label) => ({ level: label }),
    },
  }

  const log = config.destination ? pino(options, config.destination) : pino(options)
  return new PinoLogger(log)
}

/** A logger that drops everything; handy in tests */
export function createSilentLogger(): ILogger {
  return new PinoLogger(pino({ level: "silent" }))
}
