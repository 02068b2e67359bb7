/**
 * P100 session.
 * Owns one device link at a time and supervises its lifetime.
 *
 * The session wires a transport to the frame decoder and correlator, puts a
 * FIFO queue in front of the correlator, negotiates the feedback level after
 * every connect, and re-establishes the link with exponential backoff when it
 * drops. Each successful connection bumps `generation` so that callers can
 * tell when cached device lists may be stale.
 */

import { EventEmitter } from 'node:events';
import { pino, type Logger } from 'pino';
import {
  ConnectionError,
  ConnectionLostError,
  NotConnectedError,
  TimeoutError,
  UnexpectedResponseError,
} from '../../core/errors.js';
import { DeviceStateCache } from '../../core/state/device-state.js';
import { DEFAULT_COMMAND_TIMEOUT_MS, feedbackLevel as feedbackLevelCommand, withTimeout } from './commands.js';
import { Correlator } from './correlator.js';
import { FrameDecoder } from './protocol.js';
import { CommandQueue } from './queue.js';
import type { Transport } from './transport.js';
import type {
  Command,
  ConnectionState,
  DeviceStateSnapshot,
  P100SessionEvents,
  P100SessionOptions,
  ReconnectConfig,
  SendOptions,
  TransportFactory,
} from './types.js';
import { FeedbackLevel } from './types.js';

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_CONNECT_TIMEOUT_MS = 10000;

export const DEFAULT_RECONNECT: ReconnectConfig = {
  enabled: true,
  maxAttempts: 0, // Infinite
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  stableAfterMs: 60000,
};

/**
 * Delay before reconnection attempt number `attempt` (zero-based).
 *
 * @example
 * reconnectDelay(3, DEFAULT_RECONNECT)
 * // => 8000
 */
export function reconnectDelay(attempt: number, config: Pick<ReconnectConfig, 'initialDelayMs' | 'maxDelayMs'>): number {
  return Math.min(config.initialDelayMs * Math.pow(2, attempt), config.maxDelayMs);
}

// ============================================================================
// Typed EventEmitter
// ============================================================================

type P100SessionEventKey = keyof P100SessionEvents;

/**
 * Typed EventEmitter for session events.
 * Avoids unsafe declaration merging between interface and class.
 */
class TypedEventEmitter extends EventEmitter {
  override on<K extends P100SessionEventKey>(event: K, listener: P100SessionEvents[K]): this {
    return super.on(event, listener);
  }

  override once<K extends P100SessionEventKey>(event: K, listener: P100SessionEvents[K]): this {
    return super.once(event, listener);
  }

  override off<K extends P100SessionEventKey>(event: K, listener: P100SessionEvents[K]): this {
    return super.off(event, listener);
  }

  override emit<K extends P100SessionEventKey>(event: K, ...args: Parameters<P100SessionEvents[K]>): boolean {
    return super.emit(event, ...args);
  }
}

// ============================================================================
// Session
// ============================================================================

/**
 * Connection to one P100.
 *
 * Emits events:
 * - 'connectionStateChange' - disconnected / connecting / connected / reconnecting
 * - 'connected' - link up and feedback level negotiated
 * - 'disconnected' - link lost (with the cause) or closed on request (null)
 * - 'stateChange' - a tracked observable changed
 * - 'traffic' - every line sent or received
 * - 'echo' - command echo at feedback level 2
 * - 'error' - malformed frames, exhausted reconnection
 *
 * @example
 * const session = new P100Session({
 *   transportFactory: () => new TcpTransport({ host: '192.168.1.50' }),
 * });
 *
 * session.on('stateChange', (state) => {
 *   console.log(`Volume: ${String(state.main.volume)}`);
 * });
 *
 * await session.connect();
 * const tenths = await session.request(volumeQuery('main'));
 */
export class P100Session extends TypedEventEmitter {
  readonly commandTimeoutMs: number;

  private readonly transportFactory: TransportFactory;
  private readonly connectTimeoutMs: number;
  private readonly reconnectConfig: ReconnectConfig;
  private readonly logger: Logger;
  private readonly deviceState = new DeviceStateCache();
  private readonly correlator: Correlator;
  private readonly queue: CommandQueue;

  private feedbackLevel: FeedbackLevel;
  private transport: Transport | null = null;
  private connectionState: ConnectionState = 'disconnected';
  private connectionGeneration = 0;
  private connectedAt: number | null = null;

  // Reconnection
  private reconnectAttempts = 0;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private manualDisconnect = false;

  constructor(options: P100SessionOptions) {
    super();
    this.transportFactory = options.transportFactory;
    this.feedbackLevel = options.feedbackLevel ?? FeedbackLevel.StatusUpdates;
    this.commandTimeoutMs = options.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.reconnectConfig = {
      ...DEFAULT_RECONNECT,
      ...options.reconnect,
    };
    this.logger = (options.logger ?? pino({ level: 'silent' })).child({ module: 'session' });

    this.correlator = new Correlator({
      state: this.deviceState,
      logger: this.logger,
      onTraffic: (entry) => this.emit('traffic', entry),
      onEcho: (payload) => this.emit('echo', payload),
      onMalformed: (error) => {
        this.reportError(error);
      },
    });
    this.queue = new CommandQueue(this.correlator, this.logger);

    this.deviceState.subscribe((snapshot, update) => {
      this.emit('stateChange', snapshot, update);
    });
  }

  // --------------------------------------------------------------------------
  // Public API
  // --------------------------------------------------------------------------

  /**
   * Connect to the device and negotiate the feedback level.
   * A failed attempt leaves the session disconnected; it is not retried.
   *
   * @throws ConnectionError if the link cannot be established
   */
  async connect(): Promise<void> {
    if (this.connectionState === 'connected' || this.connectionState === 'connecting') {
      return;
    }

    this.manualDisconnect = false;
    this.clearReconnectTimer();
    this.reconnectAttempts = 0;
    this.setConnectionState('connecting');

    try {
      await this.establish();
    } catch (error: unknown) {
      if (this.getConnectionState() === 'connecting') {
        this.setConnectionState('disconnected');
      }
      throw toConnectionError(error);
    }
  }

  /**
   * Close the link, cancel reconnection and fail all outstanding commands.
   */
  async disconnect(): Promise<void> {
    this.manualDisconnect = true;
    this.clearReconnectTimer();

    const transport = this.transport;
    const wasConnected = this.connectionState === 'connected';
    this.transport = null;
    this.connectedAt = null;
    this.abortOutstanding(new ConnectionLostError('Disconnected by client'));
    this.setConnectionState('disconnected');

    if (transport) {
      await this.closeTransport(transport);
    }

    if (wasConnected) {
      this.logger.info('Disconnected');
      this.emit('disconnected', null);
    }
  }

  /**
   * Queue a command. Resolves with the matched reply value, or null for
   * commands without a reply.
   *
   * @throws NotConnectedError unless the session is connected
   */
  async send<T>(command: Command<T>, options: SendOptions = {}): Promise<T | null> {
    if (this.connectionState !== 'connected') {
      throw new NotConnectedError(`Not connected to device (${this.connectionState})`);
    }
    return this.queue.enqueue(command, options);
  }

  /**
   * Queue a query and return its reply value.
   *
   * @throws UnexpectedResponseError when the command carries no reply
   */
  async request<T>(command: Command<T>, options: SendOptions = {}): Promise<T> {
    const value = await this.send(command, options);
    if (value === null) {
      throw new UnexpectedResponseError(command.text, 'no reply value');
    }
    return value;
  }

  /**
   * Change the feedback level. Applied now when connected, and on every
   * later connection.
   */
  async setFeedbackLevel(level: FeedbackLevel): Promise<void> {
    this.feedbackLevel = level;
    if (this.connectionState === 'connected') {
      await this.negotiate();
    }
  }

  getFeedbackLevel(): FeedbackLevel {
    return this.feedbackLevel;
  }

  getConnectionState(): ConnectionState {
    return this.connectionState;
  }

  isConnected(): boolean {
    return this.connectionState === 'connected';
  }

  /**
   * Number of successful connections so far.
   */
  get generation(): number {
    return this.connectionGeneration;
  }

  /**
   * Last known device state.
   */
  getSnapshot(): DeviceStateSnapshot {
    return this.deviceState.snapshot();
  }

  /**
   * Reconnection attempts since the last stable connection.
   */
  getReconnectAttempts(): number {
    return this.reconnectAttempts;
  }

  // --------------------------------------------------------------------------
  // Connection Handling
  // --------------------------------------------------------------------------

  private async establish(): Promise<void> {
    const transport = this.transportFactory();
    const decoder = new FrameDecoder();
    this.transport = transport;

    transport.on('data', (chunk) => {
      for (const frame of decoder.push(chunk)) {
        this.correlator.handleFrame(frame);
      }
    });
    transport.on('close', (error) => {
      this.handleTransportClose(transport, error);
    });

    this.logger.info({ endpoint: transport.description }, 'Connecting');

    try {
      await this.withConnectTimeout(transport.connect(), transport.description);
    } catch (error: unknown) {
      if (this.transport === transport) {
        this.transport = null;
      }
      await this.closeTransport(transport);
      throw error;
    }

    if (this.transport !== transport) {
      await this.closeTransport(transport);
      throw new ConnectionError(`${transport.description}: connection attempt cancelled`);
    }

    this.correlator.attach((data) => transport.write(data));
    await this.negotiate();

    if (this.transport !== transport) {
      throw new ConnectionError(`${transport.description}: connection lost during negotiation`);
    }

    this.connectionGeneration++;
    this.connectedAt = Date.now();
    this.setConnectionState('connected');
    this.logger.info(
      { endpoint: transport.description, generation: this.connectionGeneration },
      'Connected'
    );
    this.emit('connected', this.connectionGeneration);
  }

  /**
   * Send `VERB(n)` and wait for the confirmation. A device that stays silent
   * is tolerated; only a lost link fails the negotiation.
   */
  private async negotiate(): Promise<void> {
    const level = this.feedbackLevel;
    const command = withTimeout(feedbackLevelCommand(level), this.commandTimeoutMs);

    try {
      await this.queue.enqueue(command);
    } catch (error: unknown) {
      if (!(error instanceof TimeoutError)) {
        throw error;
      }
      this.logger.warn({ level }, 'Device did not confirm feedback level');
    }

    this.correlator.setEchoEnabled(level === FeedbackLevel.EchoAndStatus);
    this.logger.debug({ level }, 'Feedback level set');
  }

  private async withConnectTimeout(connecting: Promise<void>, description: string): Promise<void> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new ConnectionError(
          `Connection timeout to ${description} after ${String(this.connectTimeoutMs)}ms`
        ));
      }, this.connectTimeoutMs);

      void connecting.then(
        () => {
          clearTimeout(timer);
          resolve();
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(error);
        }
      );
    });
  }

  private handleTransportClose(transport: Transport, error: Error | null): void {
    if (transport !== this.transport) return;

    this.transport = null;
    transport.removeAllListeners();

    const lost = error instanceof ConnectionLostError
      ? error
      : new ConnectionLostError(error?.message ?? `${transport.description}: connection closed`, { cause: error });
    this.abortOutstanding(lost);

    // A link that drops before negotiation completes fails the attempt itself
    if (this.connectionState !== 'connected') return;

    const uptime = this.connectedAt === null ? 0 : Date.now() - this.connectedAt;
    this.connectedAt = null;

    this.logger.warn({ error: lost.message, uptime }, 'Connection lost');
    this.emit('disconnected', lost);

    if (uptime >= this.reconnectConfig.stableAfterMs) {
      this.reconnectAttempts = 0;
    }

    if (this.reconnectConfig.enabled && !this.manualDisconnect) {
      this.setConnectionState('reconnecting');
      this.scheduleReconnect();
    } else {
      this.setConnectionState('disconnected');
    }
  }

  private async closeTransport(transport: Transport): Promise<void> {
    transport.removeAllListeners();
    try {
      await transport.close();
    } catch (error: unknown) {
      this.logger.warn({ error, endpoint: transport.description }, 'Failed to close transport');
    }
  }

  private abortOutstanding(error: ConnectionLostError): void {
    this.queue.flush(error);
    this.correlator.detach(error);
  }

  private setConnectionState(state: ConnectionState): void {
    if (this.connectionState === state) return;
    this.connectionState = state;
    this.emit('connectionStateChange', state);
  }

  private reportError(error: Error): void {
    // EventEmitter throws on 'error' without listeners
    if (this.listenerCount('error') > 0) {
      this.emit('error', error);
    }
  }

  // --------------------------------------------------------------------------
  // Reconnection
  // --------------------------------------------------------------------------

  private scheduleReconnect(): void {
    if (this.manualDisconnect) return;

    const { maxAttempts } = this.reconnectConfig;

    if (maxAttempts > 0 && this.reconnectAttempts >= maxAttempts) {
      const error = new ConnectionError(`Max reconnection attempts (${String(maxAttempts)}) reached`);
      this.logger.error({ attempts: this.reconnectAttempts }, error.message);
      this.setConnectionState('disconnected');
      this.reportError(error);
      return;
    }

    const delay = reconnectDelay(this.reconnectAttempts, this.reconnectConfig);
    this.logger.info({ attempt: this.reconnectAttempts + 1, delayMs: delay }, 'Scheduling reconnection');

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.reconnectAttempts++;
      void this.attemptReconnect();
    }, delay);
  }

  private async attemptReconnect(): Promise<void> {
    if (this.manualDisconnect || this.connectionState !== 'reconnecting') return;

    try {
      await this.establish();
    } catch (error: unknown) {
      if (this.manualDisconnect || this.connectionState !== 'reconnecting') return;
      this.logger.warn(
        { attempt: this.reconnectAttempts, error: error instanceof Error ? error.message : String(error) },
        'Reconnection attempt failed'
      );
      this.scheduleReconnect();
    }
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }
}

function toConnectionError(error: unknown): ConnectionError {
  if (error instanceof ConnectionError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new ConnectionError(`Connection failed: ${message}`, { cause: error });
}
