/**
 * Session Transport
 *
 * Owns the single streaming connection of a session. Inbound frames are
 * decoded into transport events and handed out as an async stream; failures
 * are reported on the same stream as one TRANSPORT_ERROR, after which the
 * stream ends. There is no reconnect: the session halts on the first error.
 *
 * Only this class writes to the socket. Heartbeat pings and frame reads run on
 * the same event loop, so a ping write never interleaves with a read.
 */

import WebSocket from 'ws';
import { EventQueue } from '@/lib/event-queue';
import { TransportError, toErrorMessage } from '@/lib/errors';
import { createLogger } from '@/services/logger.service';
import { decodeFrame, type TransportEvent } from '@/shared/websocket/frame.schema';
import { buildStreamUrl } from './stream-url';

const logger = createLogger('session-transport');
const heartbeatLogger = logger.child('heartbeat');

// =============================================================================
// Configuration
// =============================================================================

export const DEFAULT_HEARTBEAT_INTERVAL_MS = 25_000;
export const DEFAULT_HEARTBEAT_TIMEOUT_MS = 10_000;

/** Close codes that end the stream without an error. */
const EXPECTED_CLOSE_CODES: ReadonlySet<number> = new Set([1000, 1001]);

export interface SessionTransportOptions {
  /** REST base address; the streaming endpoint and Origin header derive from it. */
  restBaseUrl: string;
  heartbeatIntervalMs?: number;
  /** How long to wait for the pong answering our own ping. */
  heartbeatTimeoutMs?: number;
  handshakeTimeoutMs?: number;
}

/**
 * What the session needs from a transport. Tests substitute scripted fakes.
 */
export interface Transport {
  connect(token: string): AsyncIterable<TransportEvent>;
  close(): void;
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
}

// =============================================================================
// Transport
// =============================================================================

export class SessionTransport implements Transport {
  private readonly restBaseUrl: string;
  private readonly heartbeatIntervalMs: number;
  private readonly heartbeatTimeoutMs: number;
  private readonly handshakeTimeoutMs: number | undefined;

  private socket: WebSocket | null = null;
  private events: EventQueue<TransportEvent> | null = null;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private pongTimer: NodeJS.Timeout | null = null;
  private opened = false;
  private closing = false;
  private errorReported = false;

  constructor(options: SessionTransportOptions) {
    this.restBaseUrl = options.restBaseUrl;
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS;
    this.heartbeatTimeoutMs = options.heartbeatTimeoutMs ?? DEFAULT_HEARTBEAT_TIMEOUT_MS;
    this.handshakeTimeoutMs = options.handshakeTimeoutMs;
  }

  /**
   * Open the streaming connection.
   *
   * The returned stream yields TRANSPORT_CONNECTED once the handshake
   * completes, then one event per decoded frame. It ends after a close, a
   * reported error, or a call to close().
   * @throws TransportError when called more than once on the same instance
   */
  connect(token: string): AsyncIterable<TransportEvent> {
    if (this.events) {
      throw new TransportError('transport is already connected');
    }
    const events = new EventQueue<TransportEvent>();
    this.events = events;

    const url = buildStreamUrl(this.restBaseUrl, token);
    logger.info('Opening stream', { host: new URL(url).host });

    const socket = new WebSocket(url, {
      origin: this.restBaseUrl,
      handshakeTimeout: this.handshakeTimeoutMs,
    });
    this.socket = socket;

    socket.on('open', () => this.handleOpen());
    socket.on('message', (data, isBinary) => this.handleMessage(data, isBinary));
    socket.on('pong', () => {
      heartbeatLogger.debug('Pong received');
      this.clearPongTimer();
    });
    socket.on('error', (error) => this.handleError(error));
    socket.on('close', (code, reason) => this.handleClose(code, reason.toString('utf8')));

    return events;
  }

  /**
   * Stop the heartbeat, close the socket and end the stream. Never reports an
   * error. Safe to call at any time and more than once.
   */
  close(): void {
    if (this.closing) {
      return;
    }
    this.closing = true;
    this.stopHeartbeat();

    const socket = this.socket;
    if (socket) {
      if (socket.readyState === WebSocket.OPEN) {
        socket.close(1000, 'client closing');
      } else if (socket.readyState === WebSocket.CONNECTING) {
        socket.terminate();
      }
    }
    this.events?.close();
  }

  // ===========================================================================
  // Socket events
  // ===========================================================================

  private handleOpen(): void {
    this.opened = true;
    logger.info('Stream connected');
    this.events?.push({ type: 'TRANSPORT_CONNECTED' });
    this.startHeartbeat();
  }

  private handleMessage(data: WebSocket.RawData, isBinary: boolean): void {
    if (isBinary) {
      logger.debug('Dropping binary frame');
      return;
    }
    const event = decodeFrame(rawDataToString(data));
    if (!event) {
      logger.debug('Dropping unrecognized frame');
      return;
    }
    this.events?.push(event);
  }

  private handleError(error: Error): void {
    const prefix = this.opened ? 'websocket read error' : 'websocket dial error';
    this.reportError(`${prefix}: ${toErrorMessage(error)}`, error);
  }

  private handleClose(code: number, reason: string): void {
    this.stopHeartbeat();
    if (EXPECTED_CLOSE_CODES.has(code)) {
      logger.info('Stream closed', { code, reason });
    } else {
      this.reportError(`websocket closed unexpectedly (code ${code})`);
    }
    this.events?.close();
  }

  /** Push the connection's single TRANSPORT_ERROR, unless we are closing it ourselves. */
  private reportError(reason: string, cause?: unknown): void {
    if (this.closing || this.errorReported) {
      return;
    }
    this.errorReported = true;
    logger.error('Stream failed', new TransportError(reason, cause));
    this.events?.push({ type: 'TRANSPORT_ERROR', payload: { reason } });
  }

  // ===========================================================================
  // Heartbeat
  // ===========================================================================

  private startHeartbeat(): void {
    this.stopHeartbeat();
    this.heartbeatTimer = setInterval(() => this.sendPing(), this.heartbeatIntervalMs);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
    this.clearPongTimer();
  }

  private clearPongTimer(): void {
    if (this.pongTimer) {
      clearTimeout(this.pongTimer);
      this.pongTimer = null;
    }
  }

  private sendPing(): void {
    const socket = this.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      return;
    }
    // An earlier ping is still unanswered; its timer keeps running.
    if (!this.pongTimer) {
      this.pongTimer = setTimeout(() => {
        this.pongTimer = null;
        this.failHeartbeat('websocket heartbeat timed out');
      }, this.heartbeatTimeoutMs);
    }
    heartbeatLogger.debug('Ping sent');
    socket.ping(undefined, undefined, (error?: Error) => {
      if (error) {
        this.failHeartbeat(`websocket ping failed: ${toErrorMessage(error)}`, error);
      }
    });
  }

  private failHeartbeat(reason: string, cause?: unknown): void {
    heartbeatLogger.warn('Terminating stream', { reason });
    this.reportError(reason, cause);
    this.stopHeartbeat();
    this.socket?.terminate();
  }
}
