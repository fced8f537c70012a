import type { ChatApi } from '@/clients/chat-api.client';
import { LoadError } from '@/lib/errors';
import { createLogger } from '@/services/logger.service';
import type { SessionEvent } from './reducer';

const logger = createLogger('history-loader');

export type HistoryLoadResult = Extract<
  SessionEvent,
  { type: 'HISTORY_LOADED' | 'HISTORY_FAILED' }
>;

/**
 * Fetches a channel's history on first access.
 *
 * The server answers newest-first; buffers in the session are oldest-first,
 * so the response is always reversed before it is delivered.
 */
export class HistoryLoader {
  constructor(private readonly api: Pick<ChatApi, 'getMessages'>) {}

  /** Never rejects: a failure is returned as HISTORY_FAILED. */
  async load(channelId: number): Promise<HistoryLoadResult> {
    try {
      const newestFirst = await this.api.getMessages(channelId);
      const messages = [...newestFirst].reverse();
      logger.debug('History loaded', { channelId, count: messages.length });
      return { type: 'HISTORY_LOADED', payload: { channelId, messages } };
    } catch (error) {
      const failure = new LoadError(channelId, error);
      logger.error('History load failed', failure, { channelId });
      return { type: 'HISTORY_FAILED', payload: { channelId, reason: failure.message } };
    }
  }
}
