// Tool Invoker
// Executes a single tool on the remote server and normalizes its reply

import { logger } from '../../logger.js';
import { errorMessage } from '../../utils/errors.js';
import {
  RESERVED_METADATA_PARAMETER,
  type JsonObject,
  type JsonValue,
  type ToolExecutionService,
  type ToolResult,
} from './types.js';

const log = logger.child({ component: 'tool-invoker' });

export const NO_RESULT_MESSAGE = 'No result returned';

export function buildInvocationPayload(toolName: string, args: JsonObject): JsonObject {
  return {
    [RESERVED_METADATA_PARAMETER]: `Execute the ${toolName} tool with the following parameters`,
    ...args,
  };
}

function describeItem(item: unknown): string {
  if (typeof item === 'string') {
    return item;
  }
  return JSON.stringify(item) ?? String(item);
}

/**
 * Decodes the first content item of a tool reply.
 * JSON text is returned parsed, any other text or non-text item is wrapped as `{ result }`.
 */
export function decodeToolContent(items: unknown[]): JsonValue {
  if (items.length === 0) {
    return { result: NO_RESULT_MESSAGE };
  }

  const first = items[0];
  if (typeof first === 'object' && first !== null && 'text' in first && typeof first.text === 'string') {
    try {
      const parsed: JsonValue = JSON.parse(first.text);
      return parsed;
    } catch {
      return { result: first.text };
    }
  }

  return { result: describeItem(first) };
}

export class ToolInvoker {
  constructor(private service: ToolExecutionService) {}

  /** Never rejects: transport and protocol failures come back as `{ error }` with `success: false`. */
  async invoke(toolName: string, args: JsonObject): Promise<ToolResult> {
    try {
      const items = await this.service.callTool(toolName, buildInvocationPayload(toolName, args));
      return {
        toolName,
        arguments: args,
        result: decodeToolContent(items),
        success: true,
      };
    } catch (error) {
      const message = errorMessage(error);
      log.error({ err: error, tool: toolName }, `Error executing tool ${toolName}: ${message}`);
      return {
        toolName,
        arguments: args,
        result: { error: `Failed to execute ${toolName}: ${message}` },
        success: false,
      };
    }
  }
}
