export { formatDuration } from "./libs/formatDuration.js";

// Logging
export { createLogger, isLogLevel } from "./logger.js";
export type { Logger, LogLevel, LoggerOptions } from "./logger.js";

// Persistence
export type { KeyValueStore } from "./storage/KeyValueStore.js";
export { JsonFileStore } from "./storage/JsonFileStore.js";
export { MemoryStore } from "./storage/MemoryStore.js";
