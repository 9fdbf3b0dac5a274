// Config
export { ModelRegistry } from "./config/registry.js";
export { loadConfig, saveConfig } from "./config/loader.js";
export { ConfigFileSchema, ModelEntrySchema } from "./config/schema.js";
export type { ConfigFile, ModelConfig, ModelEntry, SamplingOptions } from "./config/types.js";
export { ensurePaths, resolveHome, resolvePaths } from "./config/paths.js";
export type { MqPaths } from "./config/paths.js";
export { resolveSecret, requireSecret } from "./config/secrets.js";

// Infrastructure
export { createLogger, redactSensitive, setLogLevel } from "./infra/logger.js";
export type { LogLevel } from "./infra/logger.js";
export {
  AppError,
  UserError,
  ValidationError,
  NotFoundError,
  ConflictError,
  MergeConflictError,
  ConfigError,
  LlmError,
} from "./infra/errors.js";
export type { LlmErrorInfo } from "./infra/errors.js";

// Sessions
export { SessionStore, generateSessionId, validateSessionId } from "./sessions/store.js";
export {
  createLatestPointer,
  FileLatestPointer,
  MemoryLatestPointer,
  SymlinkLatestPointer,
} from "./sessions/latest-pointer.js";
export type { LatestPointer, NewSession, Session } from "./sessions/types.js";

// LLM
export { chat, toLlmError, DEFAULT_MAX_RETRIES, DEFAULT_TIMEOUT_MS } from "./llm/chat.js";
export {
  assertCredentials,
  getProvider,
  isKnownProvider,
  listProviders,
} from "./llm/providers.js";
export type { AIProvider } from "./llm/providers.js";
export { withRetry, fetchWithRetry } from "./llm/retry.js";
export type { RetryOptions } from "./llm/retry.js";
export type { ChatFn, ChatMessage, ChatRequest, ChatResult } from "./llm/types.js";

// Batch
export { parseBatchInput, assertNoMergeConflicts } from "./batch/input.js";
export { BatchRow } from "./batch/row.js";
export { extractTagValues } from "./batch/tags.js";
export { createRowProcessor } from "./batch/row-processor.js";
export type { RowProcessorOptions } from "./batch/row-processor.js";
export { ReorderBuffer } from "./batch/reorder-buffer.js";
export { dispatchOrdered } from "./batch/dispatcher.js";
export type { DispatchOptions } from "./batch/dispatcher.js";
export { AtomicFileSink, StreamSink } from "./batch/sink.js";
export type { TextWriter } from "./batch/sink.js";
export { runBatch } from "./batch/run.js";
export type { RunBatchOptions } from "./batch/run.js";
export type {
  BatchInputRow,
  BatchSummary,
  OutputSink,
  RowProcessor,
} from "./batch/types.js";

// CLI
export { runCli, createProgram } from "./cli/program.js";
export type { CliDeps } from "./cli/context.js";
