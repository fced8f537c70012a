import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ApiError, AuthError, SendError } from '@/lib/errors';
import { ChatApiClient } from './chat-api.client';

vi.mock('@/services/logger.service', () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    apiCall: vi.fn(),
  }),
}));

const fetchMock = vi.fn<typeof fetch>();

function jsonResponse(body: unknown, status = 200, statusText = 'OK'): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'Content-Type': 'application/json' },
  });
}

function requestAt(index: number): { url: string; init: RequestInit } {
  const call = fetchMock.mock.calls[index];
  if (!call) {
    throw new Error(`No fetch call at index ${index}`);
  }
  return { url: String(call[0]), init: call[1] ?? {} };
}

async function loggedInClient(): Promise<ChatApiClient> {
  const client = new ChatApiClient('http://chat.example.test:8081/');
  fetchMock.mockResolvedValueOnce(
    jsonResponse({ id: 1, username: 'alice', role: 'member', token: 'test-token' })
  );
  await client.login('alice', 'test-password');
  fetchMock.mockClear();
  return client;
}

describe('ChatApiClient', () => {
  beforeEach(() => {
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    fetchMock.mockReset();
    vi.unstubAllGlobals();
  });

  describe('login', () => {
    it('posts credentials and stores the user and token', async () => {
      const client = new ChatApiClient('http://chat.example.test:8081');
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ id: 4, username: 'alice', role: 'admin', token: 'test-token' })
      );

      const session = await client.login('alice', 'test-password');

      const { url, init } = requestAt(0);
      expect(url).toBe('http://chat.example.test:8081/api/login');
      expect(init.method).toBe('POST');
      expect(init.body).toBe(JSON.stringify({ username: 'alice', password: 'test-password' }));
      expect(init.headers).toEqual({ 'Content-Type': 'application/json' });
      expect(session).toEqual({
        token: 'test-token',
        user: { id: 4, username: 'alice', role: 'admin', avatarUrl: null },
      });
    });

    it('throws AuthError on a non-200 status', async () => {
      const client = new ChatApiClient('http://chat.example.test');
      fetchMock.mockResolvedValueOnce(jsonResponse({ error: 'nope' }, 401, 'Unauthorized'));

      const attempt = client.login('alice', 'wrong');

      await expect(attempt).rejects.toBeInstanceOf(AuthError);
      await expect(attempt).rejects.toThrow('login failed with status: 401 Unauthorized');
    });

    it('throws AuthError when the token is empty', async () => {
      const client = new ChatApiClient('http://chat.example.test');
      fetchMock.mockResolvedValueOnce(jsonResponse({ id: 4, username: 'alice', token: '' }));

      await expect(client.login('alice', 'test-password')).rejects.toThrow(
        'login successful, but no token was received from server'
      );

      fetchMock.mockResolvedValueOnce(jsonResponse([]));
      await client.getCategories();
      expect(requestAt(1).init.headers).toEqual({ Authorization: 'Bearer ' });
    });

    it('wraps network failures in ApiError', async () => {
      const client = new ChatApiClient('http://chat.example.test');
      fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

      const attempt = client.login('alice', 'test-password');

      await expect(attempt).rejects.toBeInstanceOf(ApiError);
      await expect(attempt).rejects.toThrow('POST /api/login failed: fetch failed');
    });
  });

  describe('getCategories', () => {
    it('sends the bearer token and parses categories', async () => {
      const client = await loggedInClient();
      fetchMock.mockResolvedValueOnce(
        jsonResponse([
          {
            id: 1,
            name: 'General',
            position: 0,
            channels: [{ id: 10, name: 'lobby', category_id: 1, position: 0 }],
          },
        ])
      );

      const categories = await client.getCategories();

      const { url, init } = requestAt(0);
      expect(url).toBe('http://chat.example.test:8081/api/categories');
      expect(init.method).toBe('GET');
      expect(init.headers).toEqual({ Authorization: 'Bearer test-token' });
      expect(categories).toEqual([
        {
          id: 1,
          name: 'General',
          position: 0,
          channels: [{ id: 10, name: 'lobby', categoryId: 1, position: 0 }],
        },
      ]);
    });

    it('throws ApiError with the status on failure', async () => {
      const client = await loggedInClient();
      fetchMock.mockResolvedValueOnce(new Response('boom', { status: 500, statusText: 'Error' }));

      const attempt = client.getCategories();

      await expect(attempt).rejects.toBeInstanceOf(ApiError);
      await expect(attempt).rejects.toMatchObject({ status: 500 });
      await expect(attempt).rejects.toThrow(
        'request to /api/categories failed with status: 500 Error - boom'
      );
    });

    it('rejects a body that does not match the schema', async () => {
      const client = await loggedInClient();
      fetchMock.mockResolvedValueOnce(jsonResponse({ categories: [] }));

      const attempt = client.getCategories();

      await expect(attempt).rejects.toMatchObject({
        name: 'ApiError',
        code: 'INVALID_RESPONSE',
      });
      await expect(attempt).rejects.toThrow(
        'unexpected response shape from /api/categories: body: Expected array, received object'
      );
    });

    it('treats a null body as no categories', async () => {
      const client = await loggedInClient();
      fetchMock.mockResolvedValueOnce(jsonResponse(null));

      await expect(client.getCategories()).resolves.toEqual([]);
    });
  });

  describe('getMessages', () => {
    it('returns messages in server order', async () => {
      const client = await loggedInClient();
      fetchMock.mockResolvedValueOnce(
        jsonResponse([
          {
            id: 3,
            channel_id: 10,
            user_id: 1,
            username: 'alice',
            content: 'third',
            created_at: '2024-03-01T09:07:00Z',
          },
          {
            id: 2,
            channel_id: 10,
            user_id: 2,
            username: 'bob',
            content: 'second',
            created_at: '2024-03-01T09:06:00Z',
          },
        ])
      );

      const messages = await client.getMessages(10);

      expect(requestAt(0).url).toBe('http://chat.example.test:8081/api/channels/10/messages');
      expect(messages.map((message) => message.id)).toEqual([3, 2]);
    });

    it('treats a null body as an empty history', async () => {
      const client = await loggedInClient();
      fetchMock.mockResolvedValueOnce(jsonResponse(null));

      await expect(client.getMessages(7)).resolves.toEqual([]);
    });

    it('names the first invalid field in the error message', async () => {
      const client = await loggedInClient();
      fetchMock.mockResolvedValueOnce(
        jsonResponse([
          {
            id: 3,
            channel_id: 10,
            user_id: 1,
            username: 'alice',
            content: 'third',
            created_at: 'yesterday',
          },
        ])
      );

      await expect(client.getMessages(10)).rejects.toThrow(
        'unexpected response shape from /api/channels/10/messages: 0.created_at: Invalid timestamp'
      );
    });
  });

  describe('sendMessage', () => {
    it('posts channel_id and content', async () => {
      const client = await loggedInClient();
      fetchMock.mockResolvedValueOnce(new Response(null, { status: 201, statusText: 'Created' }));

      await client.sendMessage(10, 'hello');

      const { url, init } = requestAt(0);
      expect(url).toBe('http://chat.example.test:8081/api/messages');
      expect(init.method).toBe('POST');
      expect(init.body).toBe(JSON.stringify({ channel_id: 10, content: 'hello' }));
      expect(init.headers).toEqual({
        Authorization: 'Bearer test-token',
        'Content-Type': 'application/json',
      });
    });

    it('throws SendError with status and body text when not created', async () => {
      const client = await loggedInClient();
      fetchMock.mockResolvedValueOnce(
        new Response('channel is read-only', { status: 403, statusText: 'Forbidden' })
      );

      const attempt = client.sendMessage(10, 'hello');

      await expect(attempt).rejects.toBeInstanceOf(SendError);
      await expect(attempt).rejects.toThrow(
        'failed to send message: 403 Forbidden - channel is read-only'
      );
    });

    it('throws SendError on network failure', async () => {
      const client = await loggedInClient();
      fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

      await expect(client.sendMessage(10, 'hello')).rejects.toThrow(
        'failed to send message: POST /api/messages failed: fetch failed'
      );
    });
  });
});
