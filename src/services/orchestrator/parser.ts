// Tool Call Parser
// Decodes the model's JSON-encoded call arguments exactly once

import type { ProviderToolCall } from '../../providers/types.js';
import { errorMessage } from '../../utils/errors.js';
import type { JsonObject, JsonValue } from '../tools/types.js';
import type { ToolCallRequest } from './types.js';

function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function decodeArguments(argumentsJson: string): { arguments: JsonObject; decodeError?: string } {
  if (argumentsJson.trim() === '') {
    return { arguments: {} };
  }

  let parsed: JsonValue;
  try {
    parsed = JSON.parse(argumentsJson);
  } catch (error) {
    return { arguments: {}, decodeError: errorMessage(error) };
  }

  if (!isJsonObject(parsed)) {
    return { arguments: {}, decodeError: 'arguments must be a JSON object' };
  }

  return { arguments: parsed };
}

export function parseToolCallRequests(calls: ProviderToolCall[]): ToolCallRequest[] {
  return calls.map(call => {
    const decoded = decodeArguments(call.argumentsJson);
    const request: ToolCallRequest = {
      callId: call.callId,
      toolName: call.toolName,
      arguments: decoded.arguments,
    };
    if (decoded.decodeError !== undefined) {
      request.decodeError = decoded.decodeError;
    }
    return request;
  });
}
