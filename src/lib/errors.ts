export class ChatClientError extends Error {
  readonly code: string;
  readonly metadata: Record<string, unknown>;
  readonly retryable: boolean;

  constructor(
    message: string,
    options?: {
      code?: string;
      metadata?: Record<string, unknown>;
      retryable?: boolean;
      cause?: unknown;
    }
  ) {
    super(message);
    this.name = 'ChatClientError';
    this.code = options?.code ?? 'CHAT_CLIENT_FAILED';
    this.metadata = options?.metadata ?? {};
    this.retryable = options?.retryable ?? false;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/** Bad or missing credentials. The CLI answers with a fresh prompt. */
export class AuthError extends ChatClientError {
  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, {
      code: 'AUTH_FAILED',
      metadata: options?.status === undefined ? {} : { status: options.status },
      retryable: true,
      cause: options?.cause,
    });
    this.name = 'AuthError';
  }
}

/** Non-success HTTP status or an unreadable response body. */
export class ApiError extends ChatClientError {
  readonly status: number | null;

  constructor(
    message: string,
    options?: { status?: number; code?: string; path?: string; cause?: unknown }
  ) {
    super(message, {
      code: options?.code ?? 'API_REQUEST_FAILED',
      metadata: { status: options?.status ?? null, path: options?.path ?? null },
      cause: options?.cause,
    });
    this.name = 'ApiError';
    this.status = options?.status ?? null;
  }
}

/** Connect, read or heartbeat failure on the streaming connection. Fatal to the session. */
export class TransportError extends ChatClientError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: 'TRANSPORT_FAILED', cause });
    this.name = 'TransportError';
  }
}

/** History fetch failure. Fatal to the session. */
export class LoadError extends ChatClientError {
  constructor(channelId: number, cause?: unknown) {
    super(`failed to load history for channel ${channelId}: ${toErrorMessage(cause)}`, {
      code: 'HISTORY_LOAD_FAILED',
      metadata: { channelId },
      cause,
    });
    this.name = 'LoadError';
  }
}

/** Message submission failure. Reported to the user; the session continues. */
export class SendError extends ChatClientError {
  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, {
      code: 'SEND_FAILED',
      metadata: options?.status === undefined ? {} : { status: options.status },
      retryable: true,
      cause: options?.cause,
    });
    this.name = 'SendError';
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}
