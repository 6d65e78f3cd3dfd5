// Orchestrator Types

import type { JsonObject, JsonValue } from '../tools/types.js';

export type { ToolCallRequest } from '../../providers/types.js';

export interface ToolInvocationOutcome {
  callId: string;
  toolName: string;
  arguments: JsonObject;
  result: JsonValue;
  success: boolean;
}

export interface ExecutionSummary {
  toolsExecuted: number;
  successfulExecutions: number;
  failedExecutions: number;
  concurrentExecution: boolean;
}

export interface OrchestratorResult {
  response: string;
  executionSummary?: ExecutionSummary;
}
