import { z } from 'zod';

const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
const LogOutputSchema = z.enum(['file', 'console', 'silent']);
const NodeEnvSchema = z.enum(['development', 'production', 'test']);

function parseInteger(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function toTrimmedString(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function toLowerString(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim().toLowerCase();
  return trimmed.length > 0 ? trimmed : undefined;
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

const PositiveIntEnvSchema = z.preprocess(parseInteger, z.number().int().positive());

export const ServerUrlSchema = z
  .string()
  .trim()
  .refine(isHttpUrl, { message: 'Server URL must be an http:// or https:// address' });

export const LoggerEnvSchema = z.object({
  LOG_LEVEL: z.preprocess(toLowerString, LogLevelSchema).catch('info'),
  LOG_OUTPUT: z.preprocess(toLowerString, LogOutputSchema).catch('file'),
  SERVICE_NAME: z.preprocess(toTrimmedString, z.string().min(1)).catch('channelterm'),
  BASE_DIR: z.preprocess(toTrimmedString, z.string().optional()),
  NODE_ENV: z.preprocess(toLowerString, NodeEnvSchema).catch('development'),
});

export const ConfigEnvSchema = z.object({
  CHAT_SERVER_URL: z.preprocess(toTrimmedString, ServerUrlSchema).catch('http://localhost:8081'),
  HTTP_TIMEOUT_MS: PositiveIntEnvSchema.catch(10_000),
  HEARTBEAT_INTERVAL_MS: PositiveIntEnvSchema.catch(25_000),
  HEARTBEAT_TIMEOUT_MS: PositiveIntEnvSchema.catch(10_000),
});

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LogOutput = z.infer<typeof LogOutputSchema>;
