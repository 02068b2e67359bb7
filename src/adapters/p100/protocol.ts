/**
 * P100 external control protocol helpers.
 * Handles framing, classification and structural reading of protocol lines.
 *
 * The P100 protocol is a simple text-based protocol over TCP or RS-232:
 * - Commands are sent as `!` + text + `\r`
 * - Status lines (replies and unsolicited pushes) arrive as `!` + payload + `\r`
 * - At feedback level 2 every accepted command is echoed as `#` + text + `\r`
 * - There are no request identifiers; replies are recognised by their verb
 */

import type { Frame, FrameKind, PayloadField, StatusUpdate, Zone } from './types.js';
import { PowerState } from './types.js';

// ============================================================================
// Constants
// ============================================================================

export const COMMAND_PREFIX = '!';
export const STATUS_PREFIX = '!';
export const ECHO_PREFIX = '#';
export const TERMINATOR = '\r';

export const DEFAULT_TCP_PORT = 84;
export const DEFAULT_BAUD_RATE = 115200;

/**
 * Longest partial line kept while waiting for a terminator.
 */
export const MAX_LINE_LENGTH = 4096;

// ============================================================================
// Encoding
// ============================================================================

/**
 * Encode command text into wire bytes.
 *
 * @example
 * encodeCommand('POWERONMAIN')
 * // => <Buffer 21 50 4f 57 45 52 4f 4e 4d 41 49 4e 0d>  ('!POWERONMAIN\r')
 */
export function encodeCommand(text: string): Buffer {
  if (text.length === 0 || text.includes(TERMINATOR) || text.includes('\n')) {
    throw new RangeError(`Invalid command text: ${JSON.stringify(text)}`);
  }
  return Buffer.from(`${COMMAND_PREFIX}${text}${TERMINATOR}`, 'latin1');
}

/**
 * Classify a complete line by its leading sentinel.
 */
export function classifyLine(line: string): Frame {
  let kind: FrameKind = 'unrecognized';
  if (line.startsWith(STATUS_PREFIX)) {
    kind = 'status';
  } else if (line.startsWith(ECHO_PREFIX)) {
    kind = 'echo';
  }

  return {
    kind,
    payload: kind === 'unrecognized' ? line : line.slice(1),
    raw: line,
  };
}

// ============================================================================
// Decoding
// ============================================================================

/**
 * Incremental line decoder.
 * Tolerates arbitrary fragmentation and coalescing of transport chunks.
 */
export class FrameDecoder {
  private buffer = '';

  /**
   * Feed a chunk and collect every frame it completes.
   * Incomplete trailing data is retained for the next call.
   */
  push(chunk: Buffer | string): Frame[] {
    this.buffer += typeof chunk === 'string' ? chunk : chunk.toString('latin1');

    const frames: Frame[] = [];
    let end = this.buffer.indexOf(TERMINATOR);

    while (end !== -1) {
      const line = this.buffer.substring(0, end).replace(/\n/g, '').trim();
      this.buffer = this.buffer.substring(end + TERMINATOR.length);
      if (line.length > 0) {
        frames.push(classifyLine(line));
      }
      end = this.buffer.indexOf(TERMINATOR);
    }

    if (this.buffer.length > MAX_LINE_LENGTH) {
      frames.push({ kind: 'unrecognized', payload: this.buffer, raw: this.buffer });
      this.buffer = '';
    }

    return frames;
  }

  /**
   * Number of buffered characters awaiting a terminator.
   */
  get pending(): number {
    return this.buffer.length;
  }

  reset(): void {
    this.buffer = '';
  }
}

// ============================================================================
// Payload Reading
// ============================================================================

/**
 * Read the argument of a verb from a status payload.
 * Accepts `VERB(arg)`, `VERB(arg)"text"` and `VERB arg`.
 * The verb must be followed directly by `(` or a space, so `SRC` never
 * reads `SRCCOUNT(3)`.
 *
 * @example
 * readField('SRC(1)"DVD Player"', 'SRC')
 * // => { arg: '1', text: 'DVD Player' }
 *
 * @example
 * readField('VOL -350', 'VOL')
 * // => { arg: '-350', text: null }
 */
export function readField(payload: string, verb: string): PayloadField | null {
  if (!payload.startsWith(verb)) return null;
  const rest = payload.substring(verb.length);

  if (rest.startsWith('(')) {
    // A quoted argument may itself contain parentheses
    const closeQuote = rest.startsWith('"', 1) ? rest.indexOf('"', 2) : 0;
    if (closeQuote === -1) return null;
    const close = rest.indexOf(')', closeQuote);
    if (close === -1) return null;
    const arg = rest.substring(1, close).trim();
    const tail = rest.substring(close + 1).trim();
    return { arg, text: readQuoted(tail) };
  }

  if (rest.startsWith(' ')) {
    const arg = rest.trim();
    return arg.length > 0 ? { arg, text: null } : null;
  }

  return null;
}

function readQuoted(tail: string): string | null {
  if (tail.length >= 2 && tail.startsWith('"') && tail.endsWith('"')) {
    return tail.substring(1, tail.length - 1);
  }
  return null;
}

/**
 * Read a signed integer argument, or null when the verb or number is absent.
 */
export function readInteger(payload: string, verb: string): number | null {
  const field = readField(payload, verb);
  if (!field || !/^[+-]?\d+$/.test(field.arg)) return null;
  return parseInt(field.arg, 10);
}

/**
 * Read an indexed, optionally named entry such as `SRC(2)"Tuner"`.
 */
export function readIndexed(payload: string, verb: string): { index: number; name: string | null } | null {
  const field = readField(payload, verb);
  if (!field || !/^\d+$/.test(field.arg)) return null;
  return { index: parseInt(field.arg, 10), name: field.text };
}

// ============================================================================
// Status Parsing
// ============================================================================

const POWER_EVENTS = new Map<string, { zone: Zone; value: PowerState }>([
  ['POWERONMAIN', { zone: 'main', value: PowerState.On }],
  ['POWEROFFMAIN', { zone: 'main', value: PowerState.Off }],
  ['POWERONZONE2', { zone: 'zone2', value: PowerState.On }],
  ['POWEROFFZONE2', { zone: 'zone2', value: PowerState.Off }],
]);

const MUTE_EVENTS = new Map<string, { zone: Zone; value: boolean }>([
  ['MUTEON', { zone: 'main', value: true }],
  ['MUTEOFF', { zone: 'main', value: false }],
  ['ZMUTEON', { zone: 'zone2', value: true }],
  ['ZMUTEOFF', { zone: 'zone2', value: false }],
]);

/**
 * Read a power state from `POWER(n)` / `POWERZONE2(n)`.
 */
export function readPower(payload: string, zone: Zone): PowerState | null {
  const value = readInteger(payload, zone === 'main' ? 'POWER' : 'POWERZONE2');
  if (value === PowerState.On) return PowerState.On;
  if (value === PowerState.Off) return PowerState.Off;
  return null;
}

/**
 * Read a mute flag from `MUTE(n)` or the bare `MUTEON` / `MUTEOFF` forms.
 */
export function readMute(payload: string, zone: Zone): boolean | null {
  const event = MUTE_EVENTS.get(payload);
  if (event) {
    return event.zone === zone ? event.value : null;
  }

  const value = readInteger(payload, zone === 'main' ? 'MUTE' : 'ZMUTE');
  if (value === 0 || value === 1) return value === 1;
  return null;
}

/**
 * Map a status payload onto the device observable it reports.
 * Returns null for payloads that carry no tracked observable.
 *
 * @example
 * parseStatus('VOL(-350)')
 * // => { field: 'volume', zone: 'main', value: -350 }
 */
export function parseStatus(payload: string): StatusUpdate | null {
  const powerEvent = POWER_EVENTS.get(payload);
  if (powerEvent) {
    return { field: 'power', ...powerEvent };
  }

  const muteEvent = MUTE_EVENTS.get(payload);
  if (muteEvent) {
    return { field: 'muted', ...muteEvent };
  }

  for (const zone of ['main', 'zone2'] as const) {
    const power = readPower(payload, zone);
    if (power !== null) return { field: 'power', zone, value: power };

    const volume = readInteger(payload, zone === 'main' ? 'VOL' : 'ZVOL');
    if (volume !== null) return { field: 'volume', zone, value: volume };

    const muted = readMute(payload, zone);
    if (muted !== null) return { field: 'muted', zone, value: muted };

    const source = readIndexed(payload, zone === 'main' ? 'SRC' : 'ZSRC');
    if (source) return { field: 'sourceIndex', zone, value: source.index, name: source.name };
  }

  const mode = readIndexed(payload, 'AUDMODE');
  if (mode) {
    return { field: 'audioModeIndex', zone: 'main', value: mode.index, name: mode.name };
  }

  return null;
}

// ============================================================================
// Unit Conversion
// ============================================================================

/**
 * Convert protocol volume (tenths of a dB) to dB.
 */
export function tenthsToDb(tenths: number): number {
  return tenths / 10;
}

/**
 * Convert dB to protocol volume (tenths of a dB), rounded to the nearest step.
 */
export function dbToTenths(db: number): number {
  return Math.round(db * 10);
}
