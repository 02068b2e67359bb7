/**
 * Command/response correlator.
 *
 * Owns the single in-flight command slot. Inbound frames are processed
 * strictly in arrival order: a status frame either answers the pending
 * command (per its matcher) or is an unsolicited update; both kinds land in
 * the device state cache in the order they were received.
 *
 * States: idle (no pending request) and awaiting (pending request, deadline
 * armed). The wire has no request identifiers, so a second submission while
 * awaiting is refused with BusyError rather than queued here; callers go
 * through CommandQueue.
 */

import type { Logger } from 'pino';
import {
  BusyError,
  ConnectionLostError,
  MalformedFrameError,
  NotConnectedError,
  TimeoutError,
} from '../../core/errors.js';
import type { DeviceStateCache } from '../../core/state/device-state.js';
import { COMMAND_PREFIX, encodeCommand, parseStatus } from './protocol.js';
import type { Command, Frame, MatchOutcome, TrafficEntry } from './types.js';

// ============================================================================
// Types
// ============================================================================

export type FrameWriter = (data: Buffer) => Promise<void>;

export type CorrelatorState = 'idle' | 'awaiting';

export interface CorrelatorOptions {
  state: DeviceStateCache;
  logger: Logger;
  /** Monitor tap for every outbound and inbound line */
  onTraffic?: (entry: TrafficEntry) => void;
  /** Command echoes (feedback level 2) */
  onEcho?: (payload: string) => void;
  /** Lines without a known sentinel */
  onMalformed?: (error: MalformedFrameError) => void;
}

/**
 * The single outstanding request.
 */
interface PendingRequest {
  text: string;
  updatesState: boolean;
  deadline: number;
  timer: NodeJS.Timeout;
  /** Run the matcher on a status payload; completes the request on a match */
  offer: (payload: string) => MatchStatus;
  fail: (error: Error) => void;
}

type MatchStatus = MatchOutcome<unknown>['status'];

// ============================================================================
// Correlator
// ============================================================================

export class Correlator {
  private readonly state: DeviceStateCache;
  private readonly logger: Logger;
  private readonly onTraffic: ((entry: TrafficEntry) => void) | undefined;
  private readonly onEcho: ((payload: string) => void) | undefined;
  private readonly onMalformed: ((error: MalformedFrameError) => void) | undefined;

  private writer: FrameWriter | null = null;
  private pending: PendingRequest | null = null;
  private echoEnabled = false;

  constructor(options: CorrelatorOptions) {
    this.state = options.state;
    this.logger = options.logger.child({ module: 'correlator' });
    this.onTraffic = options.onTraffic;
    this.onEcho = options.onEcho;
    this.onMalformed = options.onMalformed;
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  /**
   * Start accepting submissions on a freshly established link.
   */
  attach(writer: FrameWriter): void {
    this.writer = writer;
  }

  /**
   * Stop accepting submissions and abort the pending request, if any.
   */
  detach(error: Error = new ConnectionLostError()): void {
    this.writer = null;
    this.echoEnabled = false;
    const pending = this.pending;
    if (pending) {
      this.logger.debug({ command: pending.text }, 'Aborting pending command');
      pending.fail(
        error instanceof ConnectionLostError ? error : new ConnectionLostError(error.message, { cause: error })
      );
    }
  }

  /**
   * Whether echo frames are expected (feedback level 2).
   */
  setEchoEnabled(enabled: boolean): void {
    this.echoEnabled = enabled;
  }

  get isAttached(): boolean {
    return this.writer !== null;
  }

  getState(): CorrelatorState {
    return this.pending ? 'awaiting' : 'idle';
  }

  /**
   * Text of the command awaiting its reply.
   */
  getPendingCommand(): string | null {
    return this.pending?.text ?? null;
  }

  // --------------------------------------------------------------------------
  // Submission
  // --------------------------------------------------------------------------

  /**
   * Write a command and wait for its reply.
   * Resolves exactly once: with the matched value (null for commands without
   * a reply), or rejects with TimeoutError or ConnectionLostError.
   *
   * @throws NotConnectedError when no link is attached
   * @throws BusyError while another command is awaiting
   */
  async submit<T>(command: Command<T>): Promise<T | null> {
    const writer = this.writer;
    if (!writer) {
      throw new NotConnectedError();
    }
    if (this.pending) {
      throw new BusyError(this.pending.text);
    }

    const bytes = encodeCommand(command.text);

    if (!command.expect) {
      this.reportTraffic('tx', `${COMMAND_PREFIX}${command.text}`);
      await writer(bytes);
      return null;
    }

    const matcher = command.expect();

    const completion = new Promise<T | null>((resolve, reject) => {
      const release = (): boolean => {
        if (this.pending !== request) return false;
        clearTimeout(request.timer);
        this.pending = null;
        return true;
      };

      const request: PendingRequest = {
        text: command.text,
        updatesState: command.updatesState,
        deadline: Date.now() + command.timeoutMs,
        timer: setTimeout(() => {
          this.logger.debug({ command: command.text, timeoutMs: command.timeoutMs }, 'Command timed out');
          request.fail(new TimeoutError(command.text, command.timeoutMs));
        }, command.timeoutMs),
        offer: (payload) => {
          const outcome = matcher(payload);
          if (outcome.status === 'complete' && release()) {
            resolve(outcome.value);
          }
          return outcome.status;
        },
        fail: (error) => {
          if (release()) reject(error);
        },
      };
      this.pending = request;
    });

    this.reportTraffic('tx', `${COMMAND_PREFIX}${command.text}`);
    writer(bytes).catch((error: unknown) => {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.pending?.fail(new ConnectionLostError(`Write failed for ${command.text}: ${cause.message}`, { cause }));
    });

    return completion;
  }

  // --------------------------------------------------------------------------
  // Frame Handling
  // --------------------------------------------------------------------------

  /**
   * Process one inbound frame. Never throws.
   */
  handleFrame(frame: Frame): void {
    this.reportTraffic('rx', frame.raw);

    switch (frame.kind) {
      case 'status':
        this.handleStatus(frame.payload);
        break;
      case 'echo':
        if (this.echoEnabled) {
          this.onEcho?.(frame.payload);
        } else {
          this.logger.debug({ payload: frame.payload }, 'Ignoring echo below feedback level 2');
        }
        break;
      case 'unrecognized': {
        const error = new MalformedFrameError(frame.raw);
        this.logger.warn({ raw: frame.raw }, 'Discarding unrecognized frame');
        this.onMalformed?.(error);
        break;
      }
    }
  }

  private handleStatus(payload: string): void {
    const pending = this.pending;

    if (pending) {
      let status: MatchStatus;
      try {
        status = pending.offer(payload);
      } catch (error) {
        this.logger.error({ error, payload, command: pending.text }, 'Response matcher failed');
        status = 'none';
      }

      if (status === 'complete') {
        if (pending.updatesState) {
          this.applyStatus(payload);
        }
        return;
      }

      if (status === 'partial') {
        return;
      }
    }

    this.applyStatus(payload);
  }

  private applyStatus(payload: string): void {
    const update = parseStatus(payload);
    if (!update) {
      this.logger.debug({ payload }, 'Status frame carries no tracked observable');
      return;
    }

    try {
      this.state.apply(update);
    } catch (error) {
      this.logger.error({ error, payload }, 'State listener failed');
    }
  }

  private reportTraffic(direction: TrafficEntry['direction'], line: string): void {
    this.logger.debug({ direction, line }, direction === 'tx' ? 'Sending' : 'Received');
    if (!this.onTraffic) return;

    try {
      this.onTraffic({ direction, line, at: new Date() });
    } catch (error) {
      this.logger.error({ error }, 'Traffic listener failed');
    }
  }
}
