// Chat routes
import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { ChatService } from '../services/chat-service.js';

export interface ChatRouteOptions {
  service: ChatService;
}

// `message` keeps single-turn clients working; `messages` carries a full history
const ChatRequestSchema = z.object({
  messages: z.unknown().optional(),
  message: z.string().optional(),
});

export const chatRoutes: FastifyPluginAsync<ChatRouteOptions> = async (server, opts) => {
  // POST /v1/chat - Run one tool-assisted conversation turn
  server.post('/chat', async (request) => {
    const body = ChatRequestSchema.parse(request.body ?? {});

    const history = body.messages === undefined && body.message
      ? [{ role: 'user', content: body.message }]
      : body.messages;

    return opts.service.submitConversation(history);
  });
};
