/**
 * @module providers/index
 * Re-exports all provider types and factories.
 */

export {
  type LLMProvider,
  type LLMRequest,
  type LLMResponse,
  OpenAICompatibleProvider,
  createLLMProvider,
} from './llm.js';
