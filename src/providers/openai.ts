// OpenAI Provider
// Chat completions with function calling via the official SDK

import OpenAI from 'openai';
import type { CompletionResult, ConversationMessage, InferenceProvider, ProviderTool } from './types.js';

type ChatMessageParam = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type ChatTool = OpenAI.Chat.Completions.ChatCompletionTool;

// Only the parts of a completion this provider reads
export interface CompletionLike {
  choices: Array<{
    message: {
      content: string | null;
      tool_calls?: Array<{
        id: string;
        function: { name: string; arguments: string };
      }>;
    };
  }>;
}

export interface OpenAIProviderOptions {
  apiKey: string;
  model: string;
  baseUrl?: string;
}

export function toOpenAIMessages(messages: ConversationMessage[]): ChatMessageParam[] {
  return messages.map((m): ChatMessageParam => {
    switch (m.role) {
      case 'system':
        return { role: 'system', content: m.content };
      case 'user':
        return { role: 'user', content: m.content };
      case 'assistant':
        if (m.toolCalls && m.toolCalls.length > 0) {
          return {
            role: 'assistant',
            content: m.content,
            tool_calls: m.toolCalls.map(tc => ({
              id: tc.callId,
              type: 'function' as const,
              function: {
                name: tc.toolName,
                arguments: JSON.stringify(tc.arguments),
              },
            })),
          };
        }
        return { role: 'assistant', content: m.content };
      case 'tool':
        return { role: 'tool', tool_call_id: m.callId, content: m.content };
    }
  });
}

export function toOpenAITools(tools: ProviderTool[]): ChatTool[] {
  return tools.map(tool => ({
    type: 'function' as const,
    function: {
      name: tool.function.name,
      description: tool.function.description,
      parameters: {
        type: 'object' as const,
        properties: tool.function.parameters.properties,
        required: tool.function.parameters.required,
      },
    },
  }));
}

export function fromCompletion(completion: CompletionLike): CompletionResult {
  const choice = completion.choices[0];
  if (!choice) {
    throw new Error('OpenAI API error: completion contained no choices');
  }

  return {
    textContent: choice.message.content,
    requestedCalls: (choice.message.tool_calls ?? []).map(tc => ({
      callId: tc.id,
      toolName: tc.function.name,
      argumentsJson: tc.function.arguments,
    })),
  };
}

export class OpenAIProvider implements InferenceProvider {
  name = 'openai';
  private client: OpenAI;
  private model: string;

  constructor(options: OpenAIProviderOptions) {
    if (!options.apiKey) {
      throw new Error('OPENAI_API_KEY not configured');
    }
    this.client = new OpenAI({
      apiKey: options.apiKey,
      ...(options.baseUrl ? { baseURL: options.baseUrl } : {}),
    });
    this.model = options.model;
  }

  async complete(messages: ConversationMessage[], tools?: ProviderTool[]): Promise<CompletionResult> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages: toOpenAIMessages(messages),
      ...(tools && tools.length > 0
        ? { tools: toOpenAITools(tools), tool_choice: 'auto' as const }
        : {}),
    });

    return fromCompletion(completion);
  }
}
