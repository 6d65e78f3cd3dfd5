// Environment configuration for the tool chat gateway
// Load inference and tool-server settings from environment variables

import { logger } from './logger.js';

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    logger.error(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

function parseList(value: string | undefined): string[] {
  return (value || '')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
}

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 5000),
  HOST: process.env.HOST || '0.0.0.0',
  NODE_ENV: process.env.NODE_ENV || 'development',
  CORS_ORIGINS: parseList(process.env.CORS_ORIGINS),

  // OpenAI (inference)
  OPENAI_API_KEY: strEnv(process.env.OPENAI_API_KEY),
  OPENAI_MODEL: strEnv(process.env.OPENAI_MODEL, 'gpt-3.5-turbo'),
  OPENAI_BASE_URL: strEnv(process.env.OPENAI_BASE_URL),

  // MCP tool server
  MCP_SERVER_URL: strEnv(process.env.MCP_SERVER_URL),

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
};

type RequiredKey = 'OPENAI_API_KEY' | 'MCP_SERVER_URL';

const REQUIRED_KEYS: RequiredKey[] = ['OPENAI_API_KEY', 'MCP_SERVER_URL'];

export function isConfigured(key: RequiredKey): boolean {
  return !!env[key];
}

export function missingConfiguration(): RequiredKey[] {
  return REQUIRED_KEYS.filter(key => !isConfigured(key));
}

// Startup refuses to run without an inference key and a tool server
export function assertRequiredConfiguration(): void {
  const missing = missingConfiguration();
  if (missing.length > 0) {
    throw new Error(`Missing required environment variable(s): ${missing.join(', ')}`);
  }
}

// Log configuration on startup (redact secrets)
export function logConfiguration() {
  logger.info(
    {
      environment: env.NODE_ENV,
      server: `${env.HOST}:${env.PORT}`,
      model: env.OPENAI_MODEL,
      openaiBaseUrl: env.OPENAI_BASE_URL || 'default',
      mcpServer: env.MCP_SERVER_URL,
      corsOrigins: env.CORS_ORIGINS.length > 0 ? env.CORS_ORIGINS : 'any',
    },
    'Gateway configuration',
  );
}
