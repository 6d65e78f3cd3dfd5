// Server factory
// Builds the Fastify app around an already constructed chat service

import Fastify, { type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import { env } from './env.js';
import { chatRoutes } from './routes/chat.js';
import { toolRoutes } from './routes/tools.js';
import type { ChatService } from './services/chat-service.js';
import { AppError, ErrorCode, errorMessage, formatErrorResponse } from './utils/errors.js';

export interface BuildServerOptions {
  logger?: FastifyServerOptions['logger'];
}

function clientStatusCode(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode >= 400 && error.statusCode < 500 ? error.statusCode : undefined;
  }
  return undefined;
}

export async function buildServer(service: ChatService, options: BuildServerOptions = {}) {
  const server = Fastify({
    logger: options.logger ?? {
      level: env.LOG_LEVEL,
      transport: {
        target: 'pino-pretty',
        options: {
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    },
  });

  await server.register(cors, {
    origin: env.CORS_ORIGINS.length > 0 ? env.CORS_ORIGINS : true,
  });

  server.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      return reply.code(error.statusCode).send(formatErrorResponse(error, error.statusCode < 500));
    }

    if (error instanceof ZodError) {
      const appError = AppError.validationError('Invalid request body', error.issues);
      return reply.code(appError.statusCode).send(formatErrorResponse(appError, true));
    }

    const statusCode = clientStatusCode(error);
    if (statusCode !== undefined) {
      const appError = new AppError(ErrorCode.BAD_REQUEST, errorMessage(error), statusCode);
      return reply.code(statusCode).send(formatErrorResponse(appError));
    }

    request.log.error({ err: error }, 'Request failed');
    const appError = AppError.internal(errorMessage(error));
    return reply.code(appError.statusCode).send(formatErrorResponse(appError));
  });

  // Legacy redirect
  server.get('/health', async (request, reply) => {
    return reply.code(301).redirect('/v1/health');
  });

  await server.register(chatRoutes, { prefix: '/v1', service });
  await server.register(toolRoutes, { prefix: '/v1', service });

  return server;
}
