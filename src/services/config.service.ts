/**
 * Configuration Service
 *
 * Centralized configuration for the chat client. Values come from the
 * environment (optionally loaded from .env by the CLI) and are validated
 * through the zod schemas in env-schemas.ts.
 */

import { ConfigEnvSchema } from './env-schemas';
import { createLogger } from './logger.service';

const logger = createLogger('config');

/**
 * Streaming keep-alive settings
 */
export interface HeartbeatConfig {
  intervalMs: number;
  timeoutMs: number;
}

/**
 * Client configuration
 */
interface ClientConfig {
  serverUrl: string;
  httpTimeoutMs: number;
  heartbeat: HeartbeatConfig;
}

function loadClientConfig(): ClientConfig {
  const env = ConfigEnvSchema.parse(process.env);

  return {
    serverUrl: env.CHAT_SERVER_URL,
    httpTimeoutMs: env.HTTP_TIMEOUT_MS,
    heartbeat: {
      intervalMs: env.HEARTBEAT_INTERVAL_MS,
      timeoutMs: env.HEARTBEAT_TIMEOUT_MS,
    },
  };
}

class ConfigService {
  private config: ClientConfig;

  constructor() {
    this.config = loadClientConfig();
    this.validateConfig();
  }

  private validateConfig(): void {
    const { heartbeat } = this.config;
    if (heartbeat.timeoutMs >= heartbeat.intervalMs) {
      logger.warn('HEARTBEAT_TIMEOUT_MS is not shorter than HEARTBEAT_INTERVAL_MS', {
        intervalMs: heartbeat.intervalMs,
        timeoutMs: heartbeat.timeoutMs,
      });
    }
  }

  /**
   * REST base address of the chat server
   */
  getServerUrl(): string {
    return this.config.serverUrl;
  }

  getHttpTimeoutMs(): number {
    return this.config.httpTimeoutMs;
  }

  getHeartbeatConfig(): HeartbeatConfig {
    return { ...this.config.heartbeat };
  }

  /**
   * Reload configuration from environment
   */
  reload(): void {
    this.config = loadClientConfig();
    this.validateConfig();
    logger.debug('Configuration reloaded');
  }
}

export const configService = new ConfigService();
