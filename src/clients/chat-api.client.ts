/**
 * Chat API Client
 *
 * REST access to the chat server: login, channel topology, message history
 * and message submission. Every response body is validated with the
 * chat-types schemas before it reaches the session.
 */

import type { z } from 'zod';
import { ApiError, AuthError, SendError, toErrorMessage } from '@/lib/errors';
import { createLogger } from '@/services/logger.service';
import {
  type ChannelCategory,
  ChannelCategoryListSchema,
  LoginResponseSchema,
  type Message,
  MessageListSchema,
  type SendMessageRequest,
  type User,
} from '@/shared/chat-types';

const logger = createLogger('chat-api-client');

const DEFAULT_TIMEOUT_MS = 10_000;

export interface ChatApiClientOptions {
  /** Abort each request after this many milliseconds. */
  timeoutMs?: number;
}

/** Authenticated identity returned by a successful login. */
export interface ChatSessionCredentials {
  user: User;
  token: string;
}

/**
 * The REST operations the session needs. ChatApiClient implements it;
 * tests substitute in-memory fakes.
 */
export interface ChatApi {
  getCategories(): Promise<ChannelCategory[]>;
  getMessages(channelId: number): Promise<Message[]>;
  sendMessage(channelId: number, content: string): Promise<void>;
}

function describeStatus(response: Response): string {
  return `${response.status} ${response.statusText}`.trim();
}

async function readBodyText(response: Response): Promise<string> {
  try {
    return (await response.text()).trim();
  } catch {
    return '';
  }
}

/** First validation issue as `path: message`, e.g. `0.created_at: Invalid timestamp`. */
function summarizeIssues(error: z.ZodError): string {
  const [issue] = error.issues;
  if (!issue) {
    return 'invalid body';
  }
  const at = issue.path.length > 0 ? issue.path.join('.') : 'body';
  const more = error.issues.length > 1 ? ` (+${error.issues.length - 1} more)` : '';
  return `${at}: ${issue.message}${more}`;
}

export class ChatApiClient implements ChatApi {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private session: ChatSessionCredentials | null = null;

  constructor(baseUrl: string, options: ChatApiClientOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /** REST base address, as configured. */
  get serverUrl(): string {
    return this.baseUrl;
  }

  /**
   * Authenticate and keep the returned bearer token for later requests.
   * @throws AuthError on a non-200 status or an empty token
   */
  async login(username: string, password: string): Promise<ChatSessionCredentials> {
    const response = await this.request('POST', '/api/login', {
      body: { username, password },
      authenticated: false,
    });

    if (response.status !== 200) {
      throw new AuthError(`login failed with status: ${describeStatus(response)}`, {
        status: response.status,
      });
    }

    const parsed = await this.parseBody(response, LoginResponseSchema, '/api/login');
    if (parsed.token === '') {
      throw new AuthError('login successful, but no token was received from server');
    }

    this.session = { user: parsed.user, token: parsed.token };
    logger.info('Logged in', { userId: parsed.user.id, username: parsed.user.username });
    return this.session;
  }

  async getCategories(): Promise<ChannelCategory[]> {
    const path = '/api/categories';
    const response = await this.request('GET', path);
    await this.ensureOk(response, path);
    return this.parseBody(response, ChannelCategoryListSchema, path);
  }

  /**
   * Fetch a channel's history in server order (newest first).
   */
  async getMessages(channelId: number): Promise<Message[]> {
    const path = `/api/channels/${channelId}/messages`;
    const response = await this.request('GET', path);
    await this.ensureOk(response, path);
    return this.parseBody(response, MessageListSchema, path);
  }

  /**
   * Submit a message to a channel. The server infers the author from the token.
   * @throws SendError unless the server answers 201
   */
  async sendMessage(channelId: number, content: string): Promise<void> {
    const body: SendMessageRequest = { channel_id: channelId, content };
    let response: Response;
    try {
      response = await this.request('POST', '/api/messages', { body });
    } catch (error) {
      throw new SendError(`failed to send message: ${toErrorMessage(error)}`, { cause: error });
    }

    if (response.status !== 201) {
      const text = await readBodyText(response);
      throw new SendError(`failed to send message: ${describeStatus(response)} - ${text}`, {
        status: response.status,
      });
    }
  }

  private async request(
    method: 'GET' | 'POST',
    path: string,
    options: { body?: unknown; authenticated?: boolean } = {}
  ): Promise<Response> {
    const headers: Record<string, string> = {};
    if (options.authenticated !== false) {
      headers.Authorization = `Bearer ${this.session?.token ?? ''}`;
    }
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    const startedAt = Date.now();
    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      logger.apiCall(method, path, Date.now() - startedAt, response.ok, {
        status: response.status,
      });
      return response;
    } catch (error) {
      logger.apiCall(method, path, Date.now() - startedAt, false, {
        error: toErrorMessage(error),
      });
      throw new ApiError(`${method} ${path} failed: ${toErrorMessage(error)}`, {
        code: 'NETWORK_ERROR',
        path,
        cause: error,
      });
    }
  }

  private async ensureOk(response: Response, path: string): Promise<void> {
    if (response.ok) {
      return;
    }
    const text = await readBodyText(response);
    const detail = text ? ` - ${text}` : '';
    throw new ApiError(`request to ${path} failed with status: ${describeStatus(response)}${detail}`, {
      status: response.status,
      path,
    });
  }

  private async parseBody<T extends z.ZodTypeAny>(
    response: Response,
    schema: T,
    path: string
  ): Promise<z.output<T>> {
    let json: unknown;
    try {
      json = await response.json();
    } catch (error) {
      throw new ApiError(`failed to decode response from ${path}: ${toErrorMessage(error)}`, {
        code: 'INVALID_RESPONSE',
        status: response.status,
        path,
        cause: error,
      });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new ApiError(`unexpected response shape from ${path}: ${summarizeIssues(parsed.error)}`, {
        code: 'INVALID_RESPONSE',
        status: response.status,
        path,
      });
    }
    return parsed.data;
  }
}
