/**
 * Chat Session runtime
 *
 * Runs the reducer on a single consumer loop fed by one ordered event queue.
 * Producers (the transport pump, command tasks and user input) only ever push
 * events; the session state is read and replaced inside the loop alone.
 */

import type { ChatApi } from '@/clients/chat-api.client';
import { EventQueue } from '@/lib/event-queue';
import { toErrorMessage } from '@/lib/errors';
import { createLogger } from '@/services/logger.service';
import type { Transport } from '@/transport/session-transport';
import type { HistoryLoader } from './history-loader';
import {
  createInitialSessionState,
  initialCommands,
  reduceSessionEvent,
  type SessionCommand,
  type SessionEvent,
  type SessionState,
} from './reducer';

const logger = createLogger('chat-session');

export interface ChatSessionOptions {
  api: Pick<ChatApi, 'getCategories' | 'sendMessage'>;
  transport: Transport;
  loader: Pick<HistoryLoader, 'load'>;
  /** Bearer token from login; the transport uses it as its credential. */
  token: string;
}

type Listener = () => void;

export class ChatSession {
  /** Resolves once the user asks to quit (or the session is stopped). */
  readonly exited: Promise<void>;

  private state: SessionState = createInitialSessionState();
  private readonly events = new EventQueue<SessionEvent>();
  private readonly listeners = new Set<Listener>();
  private readonly tasks = new Set<Promise<void>>();
  private readonly resolveExited: () => void;
  private consumer: Promise<void> | null = null;
  private pump: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;

  constructor(private readonly options: ChatSessionOptions) {
    let resolve: () => void = () => undefined;
    this.exited = new Promise<void>((r) => {
      resolve = r;
    });
    this.resolveExited = resolve;
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  /**
   * Open the transport, start the consumer loop and run the initial commands.
   * @throws Error when the session was already started
   */
  start(): void {
    if (this.consumer) {
      throw new Error('ChatSession already started');
    }
    logger.sessionEvent('starting');
    this.consumer = this.consume();
    this.pump = this.pumpTransport();
    this.execute(initialCommands());
  }

  /** Queue a user-input event. Dropped once the session is stopped. */
  dispatch = (event: SessionEvent): void => {
    this.events.push(event);
  };

  getState = (): SessionState => this.state;

  /** Compatible with React's useSyncExternalStore. */
  subscribe = (listener: Listener): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  /**
   * Release the transport and wait for every loop and in-flight command to
   * finish. Idempotent.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  // ===========================================================================
  // Loops
  // ===========================================================================

  private async consume(): Promise<void> {
    for await (const event of this.events) {
      const previous = this.state;
      const { state, commands } = reduceSessionEvent(previous, event);
      if (state !== previous) {
        this.state = state;
        this.logPhaseChange(previous, state);
        this.notify();
      }
      this.execute(commands);
    }
  }

  private async pumpTransport(): Promise<void> {
    try {
      for await (const event of this.options.transport.connect(this.options.token)) {
        this.events.push(event);
      }
    } catch (error) {
      this.events.push({ type: 'TRANSPORT_ERROR', payload: { reason: toErrorMessage(error) } });
    }
  }

  private async shutdown(): Promise<void> {
    this.options.transport.close();
    this.events.close();
    await Promise.all([this.consumer, this.pump]);
    // Events still buffered when the queue closed may have started more tasks.
    while (this.tasks.size > 0) {
      await Promise.all([...this.tasks]);
    }
    this.resolveExited();
    logger.sessionEvent('stopped');
  }

  private notify(): void {
    for (const listener of this.listeners) {
      listener();
    }
  }

  private logPhaseChange(previous: SessionState, next: SessionState): void {
    if (previous.connectionState !== 'live' && next.connectionState === 'live') {
      logger.sessionEvent('connected');
    }
    if (previous.phase.phase !== 'error' && next.phase.phase === 'error') {
      logger.sessionEvent('halted', { reason: next.phase.reason });
    }
  }

  // ===========================================================================
  // Commands
  // ===========================================================================

  private execute(commands: SessionCommand[]): void {
    for (const command of commands) {
      this.executeCommand(command);
    }
  }

  private executeCommand(command: SessionCommand): void {
    const { api, loader } = this.options;
    switch (command.type) {
      case 'FETCH_TOPOLOGY':
        this.runTask(async () => {
          try {
            const categories = await api.getCategories();
            return { type: 'TOPOLOGY_LOADED', payload: { categories } };
          } catch (error) {
            return { type: 'TOPOLOGY_FAILED', payload: { reason: toErrorMessage(error) } };
          }
        });
        return;
      case 'LOAD_HISTORY':
        this.runTask(() => loader.load(command.channelId));
        return;
      case 'SEND_MESSAGE':
        this.runTask(async () => {
          const { channelId, content } = command;
          try {
            await api.sendMessage(channelId, content);
            return { type: 'SEND_SUCCEEDED', payload: { channelId } };
          } catch (error) {
            logger.warn('Send failed', { channelId, error: toErrorMessage(error) });
            return { type: 'SEND_FAILED', payload: { channelId, reason: toErrorMessage(error) } };
          }
        });
        return;
      case 'EXIT':
        logger.sessionEvent('exiting');
        this.resolveExited();
        return;
    }
  }

  /**
   * Run a command as an independent task whose result is queued as an event.
   */
  private runTask(work: () => Promise<SessionEvent>): void {
    const task: Promise<void> = work()
      .then((event) => {
        this.events.push(event);
      })
      .catch((error: unknown) => {
        logger.error('Session task failed', { error: toErrorMessage(error) });
      })
      .finally(() => {
        this.tasks.delete(task);
      });
    this.tasks.add(task);
  }
}
