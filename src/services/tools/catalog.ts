// Tool Catalog
// Fetches the remote tool list and translates it into the function-calling format

import { logger } from '../../logger.js';
import { errorMessage } from '../../utils/errors.js';
import {
  RESERVED_METADATA_PARAMETER,
  type FunctionSchemaEntry,
  type JsonObject,
  type JsonValue,
  type RemoteTool,
  type RemoteToolSchema,
  type ToolDefinition,
  type ToolExecutionService,
} from './types.js';

const log = logger.child({ component: 'tool-catalog' });

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function resolveSchema(inputSchema: unknown): RemoteToolSchema {
  if (!isJsonObject(inputSchema)) {
    return { kind: 'absent' };
  }

  const properties = inputSchema.properties;
  const required = inputSchema.required;

  return {
    kind: 'present',
    properties: isJsonObject(properties) ? properties : {},
    required: Array.isArray(required)
      ? required.filter((name: JsonValue): name is string => typeof name === 'string')
      : [],
  };
}

export function toToolDefinition(tool: RemoteTool): ToolDefinition {
  const schema = resolveSchema(tool.inputSchema);
  const properties = schema.kind === 'present' ? schema.properties : {};
  const required = schema.kind === 'present' ? schema.required : [];

  return {
    name: tool.name,
    description: tool.description ?? '',
    parameterSchema: properties,
    requiredParameters: required.filter(name => name !== RESERVED_METADATA_PARAMETER),
  };
}

export function toFunctionSchema(definitions: ToolDefinition[]): FunctionSchemaEntry[] {
  return definitions.map(definition => ({
    type: 'function' as const,
    function: {
      name: definition.name,
      description: definition.description,
      parameters: {
        type: 'object' as const,
        properties: definition.parameterSchema,
        required: definition.requiredParameters,
      },
    },
  }));
}

export class ToolCatalog {
  constructor(private service: ToolExecutionService) {}

  /**
   * Lists the tools currently offered by the remote server.
   * A failed listing is logged and yields an empty catalog so the conversation can go on without tools.
   */
  async fetch(): Promise<ToolDefinition[]> {
    let tools: RemoteTool[];
    try {
      tools = await this.service.listTools();
    } catch (error) {
      log.error({ err: error }, `Error fetching tools: ${errorMessage(error)}`);
      return [];
    }

    const definitions: ToolDefinition[] = [];
    const seen = new Set<string>();

    for (const tool of tools) {
      if (seen.has(tool.name)) {
        log.warn(`Tool "${tool.name}" listed more than once, keeping the first entry`);
        continue;
      }
      seen.add(tool.name);
      definitions.push(toToolDefinition(tool));
    }

    log.debug({ tools: definitions.map(d => d.name) }, `Fetched ${definitions.length} tool(s)`);
    return definitions;
  }
}
