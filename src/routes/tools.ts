// Tool routes
import type { FastifyPluginAsync } from 'fastify';
import type { ChatService } from '../services/chat-service.js';

export interface ToolRouteOptions {
  service: ChatService;
}

export const toolRoutes: FastifyPluginAsync<ToolRouteOptions> = async (server, opts) => {
  // GET /v1/tools - Function schema of every tool the MCP server offers right now
  server.get('/tools', async () => opts.service.listAvailableTools());

  // GET /v1/health - Liveness plus the current tool count
  server.get('/health', async () => opts.service.reportHealth());
};
