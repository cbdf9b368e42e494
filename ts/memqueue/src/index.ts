export { MemQueue, createMemQueue, type MemQueueArgs, type MemQueueDeps } from "./memqueue"
export {
  DEFAULT_CLIENT_LAG_SECONDS,
  DEFAULT_LIST_WINDOW_MINUTES,
  DEFAULT_MAX_PAYLOAD_BYTES,
  DEFAULT_PURGE_WINDOW_MINUTES,
  configFromEnv,
  validateConfig,
  type MemQueueOptions,
  type MemQueueSettings,
} from "./config"
export { superjsonCodec, rawStringCodec, type PayloadCodec } from "./codec"
export {
  MemQueueError,
  QueueErrors,
  isMemQueueError,
  type QueueError,
  type QueueErrorType,
  type ConfigError,
} from "./errors"
export type { QueueHooks } from "./hooks"
export { DEFAULT_CLIENT_ID } from "./keys"
export type { KeyValueStore } from "./store"
export { MemoryKeyValueStore, type MemoryKeyValueStoreOptions } from "./memory_store"
export { RedisKeyValueStore, createRedisClient, type RedisKeyValueStoreConfig } from "./redis_store"
export { TimeBucketIndex } from "./time_buckets"
export { QueueReader } from "./queue_reader"
export { QueueWriter } from "./queue_writer"
export { ClientCursor, type CursorPosition } from "./client_cursor"
export { SequentialConsumer } from "./sequential_consumer"
