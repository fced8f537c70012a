/**
 * Structured Logging Service
 *
 * Entries are appended as JSON lines to <BASE_DIR>/logs/client.log.
 * The terminal belongs to the chat UI, so console output is opt-in
 * (LOG_OUTPUT=console) and LOG_OUTPUT=silent disables logging entirely.
 */

import { createWriteStream, existsSync, mkdirSync, type WriteStream } from 'node:fs';
import { join } from 'node:path';
import { resolveBaseDir } from './base-dir';
import { type LogLevel, LoggerEnvSchema, type LogOutput } from './env-schemas';

interface LogEntry {
  level: LogLevel;
  timestamp: string;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

/**
 * Logger configuration
 */
interface LoggerConfig {
  level: LogLevel;
  output: LogOutput;
  includeTimestamp: boolean;
  serviceName: string;
}

function getLogLevelPriority(level: LogLevel): number {
  const priorities: Record<LogLevel, number> = {
    error: 0,
    warn: 1,
    info: 2,
    debug: 3,
  };
  return priorities[level];
}

function hasToJson(value: object): value is { toJSON: () => unknown } {
  return 'toJSON' in value && typeof value.toJSON === 'function';
}

/**
 * Safely stringify an object, handling circular references.
 * Objects that define toJSON() are serialized through it.
 */
function safeStringify(obj: unknown): string {
  try {
    const ancestors = new WeakSet<object>();

    function preprocessValue(value: unknown): unknown {
      if (typeof value !== 'object' || value === null) {
        return value;
      }

      if (ancestors.has(value)) {
        return '[Circular]';
      }

      if (hasToJson(value)) {
        return preprocessValue(value.toJSON());
      }

      ancestors.add(value);

      try {
        if (Array.isArray(value)) {
          return value.map((item) => preprocessValue(item));
        }

        const result: Record<string, unknown> = {};
        for (const [key, val] of Object.entries(value)) {
          result[key] = preprocessValue(val);
        }
        return result;
      } finally {
        ancestors.delete(value);
      }
    }

    return JSON.stringify(preprocessValue(obj));
  } catch {
    return String(obj);
  }
}

let _logFileStream: WriteStream | null = null;
let _logFilePath: string | null = null;

function initLogFileStream(): WriteStream | null {
  try {
    const logsDir = join(resolveBaseDir(), 'logs');
    if (!existsSync(logsDir)) {
      mkdirSync(logsDir, { recursive: true });
    }
    _logFilePath = join(logsDir, 'client.log');
    const stream = createWriteStream(_logFilePath, { flags: 'a' });
    stream.on('error', () => {
      _logFileStream = null;
    });
    return stream;
  } catch {
    return null;
  }
}

function getLogFileStream(): WriteStream | null {
  if (!_logFileStream) {
    _logFileStream = initLogFileStream();
  }
  return _logFileStream;
}

/**
 * Get the path of the log file (for display in startup messages).
 */
export function getLogFilePath(): string {
  if (_logFilePath) {
    return _logFilePath;
  }
  return join(resolveBaseDir(), 'logs', 'client.log');
}

function getDefaultConfig(): LoggerConfig {
  const env = LoggerEnvSchema.parse(process.env);
  return {
    level: env.LOG_LEVEL,
    output: env.NODE_ENV === 'test' ? 'silent' : env.LOG_OUTPUT,
    includeTimestamp: true,
    serviceName: env.SERVICE_NAME,
  };
}

export class Logger {
  private config: LoggerConfig;
  private component: string;

  constructor(component: string, config?: Partial<LoggerConfig>) {
    this.component = component;
    this.config = {
      ...getDefaultConfig(),
      ...config,
    };
  }

  /**
   * Create a child logger scoped to a sub-component
   */
  child(component: string): Logger {
    return new Logger(`${this.component}:${component}`, this.config);
  }

  private shouldLog(level: LogLevel): boolean {
    return (
      this.config.output !== 'silent' &&
      getLogLevelPriority(level) <= getLogLevelPriority(this.config.level)
    );
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      timestamp: this.config.includeTimestamp ? new Date().toISOString() : '',
      message,
      context: {
        ...context,
        service: this.config.serviceName,
        component: this.component,
      },
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    if (this.config.output === 'console') {
      this.consoleOutput(entry);
    } else {
      this.writeToLogFile(entry);
    }
  }

  private writeToLogFile(entry: LogEntry): void {
    const stream = getLogFileStream();
    if (stream) {
      stream.write(`${safeStringify(entry)}\n`);
    }
  }

  /**
   * Human-readable output for running with LOG_OUTPUT=console.
   * Always writes to stderr so stdout stays free for the UI.
   */
  private consoleOutput(entry: LogEntry): void {
    const levelColors: Record<LogLevel, string> = {
      error: '\x1b[31m', // Red
      warn: '\x1b[33m', // Yellow
      info: '\x1b[36m', // Cyan
      debug: '\x1b[37m', // White
    };
    const reset = '\x1b[0m';

    let output = `${levelColors[entry.level]}[${entry.level.toUpperCase()}]${reset}`;
    if (entry.timestamp) {
      output += ` ${entry.timestamp}`;
    }
    output += ` [${this.component}] ${entry.message}`;

    if (entry.context) {
      const { service: _service, component: _component, ...rest } = entry.context;
      if (Object.keys(rest).length > 0) {
        output += ` ${safeStringify(rest)}`;
      }
    }

    console.error(output);
    if (entry.error?.stack) {
      console.error(entry.error.stack);
    }
  }

  error(message: string, context?: Record<string, unknown>): void;
  error(message: string, error: Error, context?: Record<string, unknown>): void;
  error(
    message: string,
    errorOrContext?: Error | Record<string, unknown>,
    context?: Record<string, unknown>
  ): void {
    if (errorOrContext instanceof Error) {
      this.log('error', message, context, errorOrContext);
    } else {
      this.log('error', message, errorOrContext);
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  /**
   * Log session lifecycle events
   */
  sessionEvent(
    event: 'starting' | 'connected' | 'halted' | 'exiting' | 'stopped',
    context?: Record<string, unknown>
  ): void {
    this.info(`Session ${event}`, { event, ...context });
  }

  /**
   * Log REST calls
   */
  apiCall(
    method: string,
    path: string,
    duration: number,
    success: boolean,
    context?: Record<string, unknown>
  ): void {
    this.debug(`API call ${success ? 'succeeded' : 'failed'}`, {
      method,
      path,
      duration,
      success,
      ...context,
    });
  }
}

export function createLogger(component: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger(component, config);
}
