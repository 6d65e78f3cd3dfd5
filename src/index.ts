// Tool Chat Gateway
// Chat API that lets the model call tools hosted on an MCP server

// Load environment variables from .env file
import 'dotenv/config';

import { env, assertRequiredConfiguration, logConfiguration } from './env.js';
import { logger } from './logger.js';
import { createProvider } from './providers/index.js';
import { buildServer } from './server.js';
import { ChatService } from './services/chat-service.js';
import { McpToolService } from './services/tools/index.js';

try {
  assertRequiredConfiguration();
} catch (err) {
  logger.fatal({ err }, 'Invalid configuration');
  process.exit(1);
}

const service = new ChatService({
  provider: createProvider(),
  toolService: new McpToolService({ serverUrl: env.MCP_SERVER_URL }),
});

const server = await buildServer(service);

// Start server
try {
  await server.listen({ port: env.PORT, host: env.HOST });
  server.log.info(`Gateway listening on http://${env.HOST}:${env.PORT}`);
  server.log.info(`Health: http://${env.HOST}:${env.PORT}/v1/health`);
  logConfiguration();
} catch (err) {
  server.log.error(err);
  process.exit(1);
}
