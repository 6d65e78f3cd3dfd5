// MCP Tool Service
// Talks to the remote MCP server over Streamable HTTP, one short-lived session per operation

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { JsonObject, RemoteTool, ToolExecutionService } from './types.js';

export type TransportFactory = () => Transport | Promise<Transport>;

export interface McpToolServiceOptions {
  serverUrl: string;
  clientName?: string;
  clientVersion?: string;
  createTransport?: TransportFactory;
}

export class McpToolService implements ToolExecutionService {
  private createTransport: TransportFactory;
  private clientName: string;
  private clientVersion: string;

  constructor(options: McpToolServiceOptions) {
    const url = new URL(options.serverUrl);
    this.createTransport = options.createTransport ?? (() => new StreamableHTTPClientTransport(url));
    this.clientName = options.clientName ?? 'tool-chat-gateway';
    this.clientVersion = options.clientVersion ?? '1.0.0';
  }

  async listTools(): Promise<RemoteTool[]> {
    return this.withClient(async (client) => {
      const tools: RemoteTool[] = [];
      let cursor: string | undefined;

      do {
        const page = await client.listTools(cursor ? { cursor } : undefined);
        for (const tool of page.tools) {
          tools.push({
            name: tool.name,
            description: tool.description,
            inputSchema: tool.inputSchema,
          });
        }
        cursor = page.nextCursor;
      } while (cursor);

      return tools;
    });
  }

  async callTool(toolName: string, payload: JsonObject): Promise<unknown[]> {
    return this.withClient(async (client) => {
      const result = await client.callTool({ name: toolName, arguments: payload });
      const content: unknown = 'content' in result ? result.content : [];
      const items = Array.isArray(content) ? content : [];

      if ('isError' in result && result.isError === true) {
        throw new Error(describeToolError(items));
      }

      return items;
    });
  }

  private async withClient<T>(operation: (client: Client) => Promise<T>): Promise<T> {
    const client = new Client({ name: this.clientName, version: this.clientVersion });
    await client.connect(await this.createTransport());
    try {
      return await operation(client);
    } finally {
      await client.close();
    }
  }
}

function describeToolError(items: unknown[]): string {
  const texts = items.flatMap((item) => {
    if (typeof item === 'object' && item !== null && 'text' in item && typeof item.text === 'string') {
      return [item.text];
    }
    return [];
  });
  return texts.length > 0 ? texts.join('\n') : 'Tool reported an error';
}
