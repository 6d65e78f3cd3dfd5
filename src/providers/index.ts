// Provider Registry
// Builds the configured inference provider

import type { InferenceProvider } from './types.js';
import { OpenAIProvider } from './openai.js';
import { env, isConfigured } from '../env.js';

export function createProvider(): InferenceProvider {
  if (!isConfigured('OPENAI_API_KEY')) {
    throw new Error('Provider "openai" is not available or not configured');
  }

  return new OpenAIProvider({
    apiKey: env.OPENAI_API_KEY,
    model: env.OPENAI_MODEL,
    baseUrl: env.OPENAI_BASE_URL || undefined,
  });
}

// Re-export types
export type {
  CompletionResult,
  ConversationMessage,
  InferenceProvider,
  ProviderTool,
  ProviderToolCall,
  ToolCallRequest,
} from './types.js';
