/**
 * Type definitions for the P100 adapter.
 * Based on the Steinway Lyngdorf P100 external control protocol.
 */

import type { Logger } from 'pino';
import type { Transport } from './transport.js';

// ============================================================================
// Protocol Enumerations
// ============================================================================

/**
 * Verbosity of unsolicited device traffic, negotiated once per connection.
 */
export enum FeedbackLevel {
  /** Replies to queries only */
  Minimal = 0,
  /** Status pushes whenever an observable changes */
  StatusUpdates = 1,
  /** Command echoes in addition to status pushes */
  EchoAndStatus = 2,
}

export enum PowerState {
  Off = 0,
  On = 1,
}

export type Zone = 'main' | 'zone2';

// ============================================================================
// Frames
// ============================================================================

export type FrameKind = 'status' | 'echo' | 'unrecognized';

/**
 * One decoded line from the device.
 */
export interface Frame {
  kind: FrameKind;
  /** Text between sentinel and terminator (whole line when unrecognized) */
  payload: string;
  /** Line as received, without terminator */
  raw: string;
}

/**
 * Structurally read `VERB(arg)"text"` or `VERB arg` payload.
 */
export interface PayloadField {
  arg: string;
  text: string | null;
}

// ============================================================================
// Status Updates
// ============================================================================

/**
 * A device observable carried by a status frame.
 */
export type StatusUpdate =
  | { field: 'power'; zone: Zone; value: PowerState }
  | { field: 'volume'; zone: Zone; value: number }
  | { field: 'muted'; zone: Zone; value: boolean }
  | { field: 'sourceIndex'; zone: Zone; value: number; name: string | null }
  | { field: 'audioModeIndex'; zone: 'main'; value: number; name: string | null };

// ============================================================================
// Commands
// ============================================================================

export type MatchOutcome<T> =
  | { status: 'none' }
  | { status: 'partial' }
  | { status: 'complete'; value: T };

/**
 * Decides whether a status payload answers the pending command.
 * Created fresh for every submission so it may accumulate state.
 */
export type ResponseMatcher<T> = (payload: string) => MatchOutcome<T>;

/**
 * An immutable request to the device.
 */
export interface Command<T> {
  /** Verb and argument, without sentinel or terminator */
  readonly text: string;
  /** Matcher factory; absent when the verb has no reply */
  readonly expect: (() => ResponseMatcher<T>) | null;
  /** Deadline for the reply */
  readonly timeoutMs: number;
  /** Whether frames that answer this command update the device state */
  readonly updatesState: boolean;
}

/**
 * Named entry of a source or audio-mode list.
 */
export interface NamedEntry {
  /** Zero-based device index */
  index: number;
  name: string;
}

// ============================================================================
// Connection
// ============================================================================

export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'reconnecting';

/**
 * Reconnection behaviour configuration.
 */
export interface ReconnectConfig {
  /** Enable automatic reconnection */
  enabled: boolean;
  /** Maximum reconnection attempts (0 = infinite) */
  maxAttempts: number;
  /** Initial delay between attempts in milliseconds */
  initialDelayMs: number;
  /** Maximum delay between attempts in milliseconds */
  maxDelayMs: number;
  /** Connection uptime after which the backoff starts over */
  stableAfterMs: number;
}

export type TransportFactory = () => Transport;

/**
 * Configuration options for P100Session.
 */
export interface P100SessionOptions {
  /** Creates a fresh transport for every connection attempt */
  transportFactory: TransportFactory;
  /** Feedback level negotiated after each connect (default: StatusUpdates) */
  feedbackLevel?: FeedbackLevel;
  /** Default reply deadline for commands (default: 5000) */
  commandTimeoutMs?: number;
  /** Timeout for establishing the transport (default: 10000) */
  connectTimeoutMs?: number;
  /** Reconnection configuration */
  reconnect?: Partial<ReconnectConfig>;
  /** Parent logger (default: silent) */
  logger?: Logger;
}

export interface SendOptions {
  /** Aborts the caller's wait; the device exchange itself runs to completion */
  signal?: AbortSignal;
}

// ============================================================================
// Events
// ============================================================================

export type TrafficDirection = 'tx' | 'rx';

/**
 * One line crossing the wire, as seen by the monitor tap.
 */
export interface TrafficEntry {
  direction: TrafficDirection;
  line: string;
  at: Date;
}

/**
 * Events emitted by P100Session.
 */
export interface P100SessionEvents {
  connected: (generation: number) => void;
  disconnected: (error: Error | null) => void;
  connectionStateChange: (state: ConnectionState) => void;
  stateChange: (state: DeviceStateSnapshot, update: StatusUpdate) => void;
  traffic: (entry: TrafficEntry) => void;
  echo: (payload: string) => void;
  error: (error: Error) => void;
}

// ============================================================================
// Device State
// ============================================================================

export interface ZoneState {
  power: PowerState | null;
  /** Tenths of a dB */
  volume: number | null;
  muted: boolean | null;
  sourceIndex: number | null;
}

export interface MainZoneState extends ZoneState {
  audioModeIndex: number | null;
}

export interface DeviceState {
  main: MainZoneState;
  zone2: ZoneState;
  /** Epoch ms of the last applied update */
  updatedAt: number | null;
}

export type DeviceStateSnapshot = Readonly<{
  main: Readonly<MainZoneState>;
  zone2: Readonly<ZoneState>;
  updatedAt: number | null;
}>;
