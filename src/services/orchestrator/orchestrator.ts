// Conversation Orchestrator
// Two-phase tool-calling protocol: ask the model, run the tools it requested, ask it again for the answer

import { logger } from '../../logger.js';
import type { ConversationMessage, InferenceProvider } from '../../providers/types.js';
import { ToolCatalog, toFunctionSchema } from '../tools/catalog.js';
import { ToolInvoker } from '../tools/invoker.js';
import type { ToolExecutionService } from '../tools/types.js';
import { ConcurrentDispatcher } from './dispatcher.js';
import { parseToolCallRequests } from './parser.js';
import type { ExecutionSummary, OrchestratorResult, ToolInvocationOutcome } from './types.js';

const log = logger.child({ component: 'orchestrator' });

export const TOOL_USE_PROMPT =
  'You are a helpful assistant that can use various tools to help users. ' +
  'When a user asks for something that matches available tools, use the appropriate function. ' +
  'You may call multiple tools at once when the request needs more than one of them. ' +
  'Always provide clear, friendly responses with proper formatting. ' +
  'If you create or access any links, format them as clickable markdown links.';

export const SUMMARY_PROMPT =
  'Format your response in a user-friendly way. ' +
  'If there are any URLs in the tool results, format them as clickable markdown links. ' +
  'Provide a clear, concise summary of what was accomplished. ' +
  "Don't show raw JSON or technical details unless specifically requested.";

/** Capabilities one orchestration turn runs against. */
export interface OrchestrationContext {
  provider: InferenceProvider;
  toolService: ToolExecutionService;
}

export function summarizeOutcomes(outcomes: ToolInvocationOutcome[]): ExecutionSummary {
  const successfulExecutions = outcomes.filter(o => o.success).length;
  return {
    toolsExecuted: outcomes.length,
    successfulExecutions,
    failedExecutions: outcomes.length - successfulExecutions,
    concurrentExecution: outcomes.length > 1,
  };
}

export class ConversationOrchestrator {
  private provider: InferenceProvider;
  private catalog: ToolCatalog;
  private dispatcher: ConcurrentDispatcher;

  constructor(context: OrchestrationContext) {
    this.provider = context.provider;
    this.catalog = new ToolCatalog(context.toolService);
    this.dispatcher = new ConcurrentDispatcher(new ToolInvoker(context.toolService));
  }

  /**
   * Runs one turn for a history that ends with a user message.
   * There is at most one round of tool calls; the follow-up request never offers tools again.
   */
  async run(history: ConversationMessage[]): Promise<OrchestratorResult> {
    const messages: ConversationMessage[] = [
      { role: 'system', content: TOOL_USE_PROMPT },
      ...history,
    ];

    const definitions = await this.catalog.fetch();
    const tools = toFunctionSchema(definitions);

    const first = tools.length > 0
      ? await this.provider.complete(messages, tools)
      : await this.provider.complete(messages);

    if (first.requestedCalls.length === 0) {
      return { response: first.textContent ?? '' };
    }

    const requests = parseToolCallRequests(first.requestedCalls);
    log.info({ calls: requests.map(r => r.toolName) }, `Model requested ${requests.length} tool call(s)`);

    // The follow-up request needs the exact calls so each tool message can be matched to its id
    messages.push({
      role: 'assistant',
      content: first.textContent,
      toolCalls: requests,
    });

    const outcomes = await this.dispatcher.dispatchAll(requests);

    for (const outcome of outcomes) {
      messages.push({
        role: 'tool',
        callId: outcome.callId,
        content: JSON.stringify(outcome.result),
      });
    }
    messages.push({ role: 'system', content: SUMMARY_PROMPT });

    const second = await this.provider.complete(messages);
    const executionSummary = summarizeOutcomes(outcomes);

    log.info(executionSummary, 'Tool round complete');

    return {
      response: second.textContent ?? '',
      executionSummary,
    };
  }
}
