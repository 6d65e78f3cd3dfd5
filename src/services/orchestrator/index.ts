// Orchestrator Module - Main exports

export {
  ConversationOrchestrator,
  summarizeOutcomes,
  TOOL_USE_PROMPT,
  SUMMARY_PROMPT,
} from './orchestrator.js';
export { ConcurrentDispatcher } from './dispatcher.js';
export { parseToolCallRequests, decodeArguments } from './parser.js';
export type { OrchestrationContext } from './orchestrator.js';
export type { Invoker } from './dispatcher.js';
export type { ExecutionSummary, OrchestratorResult, ToolCallRequest, ToolInvocationOutcome } from './types.js';
