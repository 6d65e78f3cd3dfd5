// Tool System
// Remote tool discovery, translation and invocation

export { ToolCatalog, toFunctionSchema, toToolDefinition, resolveSchema } from './catalog.js';
export { ToolInvoker, decodeToolContent, buildInvocationPayload, NO_RESULT_MESSAGE } from './invoker.js';
export { McpToolService } from './mcp-client.js';
export type { McpToolServiceOptions, TransportFactory } from './mcp-client.js';
export { RESERVED_METADATA_PARAMETER } from './types.js';
export type {
  FunctionSchemaEntry,
  JsonObject,
  JsonValue,
  RemoteTool,
  RemoteToolSchema,
  ToolDefinition,
  ToolExecutionService,
  ToolResult,
} from './types.js';
