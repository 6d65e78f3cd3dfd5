// Provider Interface
// The inference capability the orchestrator talks to

import type { FunctionSchemaEntry, JsonObject } from '../services/tools/types.js';

/** A tool call as requested by the model, arguments still JSON-encoded. */
export interface ProviderToolCall {
  callId: string;
  toolName: string;
  argumentsJson: string;
}

/** A requested call after its arguments have been decoded once. */
export interface ToolCallRequest {
  callId: string;
  toolName: string;
  arguments: JsonObject;
  decodeError?: string;
}

export type ConversationMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string | null; toolCalls?: ToolCallRequest[] }
  | { role: 'tool'; callId: string; content: string };

export type ProviderTool = FunctionSchemaEntry;

export interface CompletionResult {
  textContent: string | null;
  requestedCalls: ProviderToolCall[];
}

export interface InferenceProvider {
  name: string;
  /** Without `tools` the call is plain text only. */
  complete(messages: ConversationMessage[], tools?: ProviderTool[]): Promise<CompletionResult>;
}
