export {
  PinoLogger,
  createLogger,
  createSilentLogger,
  isLogLevel,
  type ILogger,
  type LogLevel,
  type LoggerConfig,
} from "./logger"
