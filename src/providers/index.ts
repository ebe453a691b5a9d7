export {
  ModelProviderRegistry,
  createDefaultRegistry,
  parseModelIdentifier,
  DEFAULT_TEMPERATURE,
  type ModelProviderRegistryOptions,
} from './registry.js';
export { AzureOpenAIAdapter, AzureOpenAIChatClient, DEFAULT_AZURE_API_VERSION } from './adapters/azure.js';
export { OllamaAdapter, OllamaChatClient } from './adapters/ollama.js';
export { MockAdapter, type MockReply, type MockScript, type RecordedRequest } from './adapters/mock.js';
export type {
  BoundModel,
  ChatClient,
  ChatCompletion,
  ChatOptions,
  ChatRequest,
  ProviderAdapter,
  ProviderModelId,
  ProviderStatus,
  TokenUsage,
  ToolSchemaSource,
} from './types.js';
