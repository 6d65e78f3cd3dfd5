// Concurrent Dispatcher
// Runs every tool call of one model response at once and collects the outcomes in request order

import { logger } from '../../logger.js';
import { errorMessage } from '../../utils/errors.js';
import type { ToolInvoker } from '../tools/invoker.js';
import type { ToolCallRequest, ToolInvocationOutcome } from './types.js';

const log = logger.child({ component: 'dispatcher' });

export type Invoker = Pick<ToolInvoker, 'invoke'>;

export class ConcurrentDispatcher {
  constructor(private invoker: Invoker) {}

  /**
   * Starts all invocations before awaiting any, then joins them in the order they were requested.
   * The returned array matches `requests` index for index; completion order is never exposed.
   */
  async dispatchAll(requests: ToolCallRequest[]): Promise<ToolInvocationOutcome[]> {
    // Each task settles to an outcome, so a failure cannot reject while an earlier task is awaited
    const tasks = requests.map(request =>
      this.runTask(request).catch((error: unknown) => failedOutcome(request, `Failed to execute ${request.toolName}: ${errorMessage(error)}`)),
    );

    const outcomes: ToolInvocationOutcome[] = [];
    for (const task of tasks) {
      outcomes.push(await task);
    }
    return outcomes;
  }

  private async runTask(request: ToolCallRequest): Promise<ToolInvocationOutcome> {
    if (request.decodeError !== undefined) {
      log.warn({ callId: request.callId, tool: request.toolName }, `Skipping call with undecodable arguments: ${request.decodeError}`);
      return failedOutcome(request, `Invalid arguments for ${request.toolName}: ${request.decodeError}`);
    }

    const startTime = Date.now();
    log.info({ callId: request.callId, tool: request.toolName, args: request.arguments }, `Executing tool: ${request.toolName}`);

    const result = await this.invoker.invoke(request.toolName, request.arguments);

    log.debug(
      { callId: request.callId, tool: request.toolName, success: result.success, durationMs: Date.now() - startTime },
      `Tool ${request.toolName} finished`,
    );

    return {
      callId: request.callId,
      toolName: request.toolName,
      arguments: request.arguments,
      result: result.result,
      success: result.success,
    };
  }
}

function failedOutcome(request: ToolCallRequest, message: string): ToolInvocationOutcome {
  return {
    callId: request.callId,
    toolName: request.toolName,
    arguments: request.arguments,
    result: { error: message },
    success: false,
  };
}
