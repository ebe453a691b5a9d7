/**
 * toolbridge
 *
 * Model-driven agent that answers questions by calling tools exposed by
 * JSON-RPC stdio servers.
 */

export * from './types.js';
export * from './errors/index.js';
export * from './config/index.js';
export * from './mcp/index.js';
export * from './providers/index.js';
export * from './engine/index.js';
export * from './observability/index.js';
export { PromptLoader, DEFAULT_PROMPTS_PATH, type PromptFile } from './prompts/prompt-loader.js';
export { AgentSession, withAgentSession, type AgentSessionOptions, type AskOptions } from './session/agent-session.js';
export { createAppContext, type AppContext, type AppContextOptions } from './context.js';
export {
  createCancellationTokenSource,
  createLinkedToken,
  createTimeoutToken,
  race,
  sleep,
  toAbortSignal,
  NONE_TOKEN,
  type AbortSignalLink,
  type CancellationToken,
  type CancellationTokenSource,
  type Disposable,
} from './utilities/cancellation.js';
export {
  StructuredLogger,
  ConsoleSink,
  FileSink,
  MemorySink,
  configureLogger,
  createComponentLogger,
  logger,
  parseLogLevel,
  type LogEntry,
  type LogLevel,
  type LogSink,
  type LoggerConfig,
} from './utilities/logger.js';
