// Chat Service
// The operations the HTTP layer exposes: submit a conversation, list tools, report health

import { z } from 'zod';
import { AppError } from '../utils/errors.js';
import type { ConversationMessage } from '../providers/types.js';
import {
  ConversationOrchestrator,
  type OrchestrationContext,
  type OrchestratorResult,
} from './orchestrator/index.js';
import { ToolCatalog, toFunctionSchema, type FunctionSchemaEntry } from './tools/index.js';

// Client-facing schema: tool messages are only ever produced by the orchestrator
export const ConversationSchema = z
  .array(
    z.object({
      role: z.enum(['system', 'user', 'assistant']),
      content: z.string().min(1),
    }),
  )
  .min(1, 'Message history must not be empty')
  .refine(messages => messages[messages.length - 1]?.role === 'user', {
    message: 'Message history must end with a user message',
  });

export interface ToolListing {
  tools: FunctionSchemaEntry[];
  count: number;
}

export interface HealthReport {
  status: 'healthy';
  toolsAvailable: number;
}

export class ChatService {
  private orchestrator: ConversationOrchestrator;
  private catalog: ToolCatalog;

  constructor(context: OrchestrationContext) {
    this.orchestrator = new ConversationOrchestrator(context);
    this.catalog = new ToolCatalog(context.toolService);
  }

  /** Rejects with a 400 AppError before touching any capability when the history is missing or malformed. */
  async submitConversation(history: unknown): Promise<OrchestratorResult> {
    if (history === null || history === undefined) {
      throw AppError.badRequest('No message provided');
    }

    const parsed = ConversationSchema.safeParse(history);
    if (!parsed.success) {
      throw AppError.validationError(parsed.error.issues[0]?.message ?? 'Invalid message history', parsed.error.issues);
    }

    const messages: ConversationMessage[] = parsed.data.map(m => ({ role: m.role, content: m.content }));
    return this.orchestrator.run(messages);
  }

  async listAvailableTools(): Promise<ToolListing> {
    const tools = toFunctionSchema(await this.catalog.fetch());
    return { tools, count: tools.length };
  }

  async reportHealth(): Promise<HealthReport> {
    const definitions = await this.catalog.fetch();
    return { status: 'healthy', toolsAvailable: definitions.length };
  }
}
