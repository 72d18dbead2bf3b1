export { ModelRouter } from './model-router.service.js';
export type { ModelSelection, ComplexityInputs, SelectOptions } from './model-router.service.js';
export { createProviderRegistry, createCompletion, configuredProviders } from './router.js';
export { createGoogleProvider } from './providers/google.provider.js';
export { createOpenAIProvider } from './providers/openai.provider.js';
export { OpenAIEmbedder } from './embedding.service.js';
export type { Embedder } from './embedding.service.js';
export type {
  ChatMessage,
  CompletionOptions,
  CompletionResult,
  ProviderModule,
  ProviderRegistry,
} from './types.js';
