export type { LLMProvider, LLMRequest } from './provider.js';
export { BaseLLMProvider, collectText } from './provider.js';
export {
  VercelAIProvider,
  createVercelAIProvider,
  type LocalServerConfig,
  type OpenRouterConfig,
  type VercelAIProviderConfig,
} from './vercel-ai-provider.js';
