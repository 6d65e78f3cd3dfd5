// Tool system types and interfaces
// Remote tools are discovered on the MCP server and exposed to the model as functions

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/** Parameter name the invoker fills in itself; the model never supplies it. */
export const RESERVED_METADATA_PARAMETER = 'instructions';

/** A tool entry as listed by the remote tool server, before translation. */
export interface RemoteTool {
  name: string;
  description?: string;
  inputSchema?: unknown;
}

/** Input schema resolved once during catalog translation. */
export type RemoteToolSchema =
  | { kind: 'present'; properties: JsonObject; required: string[] }
  | { kind: 'absent' };

export interface ToolDefinition {
  name: string;
  description: string;
  parameterSchema: JsonObject;
  requiredParameters: string[];
}

export type FunctionParameters = {
  type: 'object';
  properties: JsonObject;
  required: string[];
};

export type FunctionSchemaEntry = {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: FunctionParameters;
  };
};

/** Result of one invocation, before it is correlated with a call id. */
export interface ToolResult {
  toolName: string;
  arguments: JsonObject;
  result: JsonValue;
  success: boolean;
}

/**
 * The remote tool-execution capability.
 * `callTool` resolves to the raw content items of the tool's reply; both calls may reject on transport errors.
 */
export interface ToolExecutionService {
  listTools(): Promise<RemoteTool[]>;
  callTool(toolName: string, payload: JsonObject): Promise<unknown[]>;
}
