export {
  ConversationEngine,
  DEFAULT_MAX_ITERATIONS,
  type ConversationEngineConfig,
  type EngineEvent,
  type EngineEventListener,
  type EngineState,
  type SystemPromptSource,
  type ToolInvoker,
  type TurnOptions,
  type TurnResult,
} from './conversation-engine.js';
export { ConversationLog } from './conversation-log.js';
