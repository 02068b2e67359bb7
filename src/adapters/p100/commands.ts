/**
 * Command builders for the P100 protocol.
 *
 * Each builder returns an immutable Command carrying its wire text, the
 * matcher that recognises its reply, and its deadline. Matchers read the
 * reply structurally (verb prefix plus typed field) rather than through a
 * general grammar.
 */

import { InvalidArgumentError } from '../../core/errors.js';
import { dbToTenths, readField, readIndexed, readInteger, readMute, readPower } from './protocol.js';
import type { Command, FeedbackLevel, MatchOutcome, NamedEntry, PowerState, ResponseMatcher, Zone } from './types.js';

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_COMMAND_TIMEOUT_MS = 5000;

/** Volume limits in dB */
export const MIN_VOLUME_DB = -99.9;
export const MAX_VOLUME_DB = 24.0;
export const DEFAULT_VOLUME_STEP_DB = 0.5;

const NONE: MatchOutcome<never> = { status: 'none' };
const PARTIAL: MatchOutcome<never> = { status: 'partial' };

// ============================================================================
// Command Construction
// ============================================================================

interface CommandOptions {
  timeoutMs?: number;
  updatesState?: boolean;
}

/**
 * Command with no reply; it completes once written.
 */
export function action(text: string): Command<null> {
  return Object.freeze({
    text,
    expect: null,
    timeoutMs: DEFAULT_COMMAND_TIMEOUT_MS,
    updatesState: true,
  });
}

/**
 * Command answered by a status frame that `read` can decode.
 */
export function query<T>(
  text: string,
  read: (payload: string) => T | null,
  options: CommandOptions = {}
): Command<T> {
  const matcher: ResponseMatcher<T> = (payload) => {
    const value = read(payload);
    return value === null ? NONE : { status: 'complete', value };
  };

  return Object.freeze({
    text,
    expect: () => matcher,
    timeoutMs: options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS,
    updatesState: options.updatesState ?? true,
  });
}

/**
 * Command answered by a count frame followed by that many entry frames.
 *
 * @example
 * // SRCS? => !SRCCOUNT(2)  !SRC(0)"Blu-ray"  !SRC(1)"DVD Player"
 * listQuery('SRCS?', 'SRCCOUNT', 'SRC')
 */
export function listQuery(text: string, countVerb: string, entryVerb: string): Command<NamedEntry[]> {
  const expect = (): ResponseMatcher<NamedEntry[]> => {
    let expected: number | null = null;
    const entries = new Map<number, NamedEntry>();

    return (payload) => {
      if (expected === null) {
        const count = readInteger(payload, countVerb);
        if (count === null || count < 0) return NONE;
        if (count === 0) return { status: 'complete', value: [] };
        expected = count;
        return PARTIAL;
      }

      // A repeated or out-of-range index is a selection push, not an entry
      const entry = readIndexed(payload, entryVerb);
      if (!entry || entry.index >= expected || entries.has(entry.index)) return NONE;

      entries.set(entry.index, { index: entry.index, name: entry.name ?? `${entryVerb} ${String(entry.index)}` });
      if (entries.size === expected) {
        return { status: 'complete', value: [...entries.values()].sort((a, b) => a.index - b.index) };
      }
      return PARTIAL;
    };
  };

  return Object.freeze({
    text,
    expect,
    timeoutMs: DEFAULT_COMMAND_TIMEOUT_MS,
    updatesState: false,
  });
}

/**
 * Copy of a command with a different deadline.
 */
export function withTimeout<T>(command: Command<T>, timeoutMs: number): Command<T> {
  return Object.freeze({ ...command, timeoutMs });
}

// ============================================================================
// Validation
// ============================================================================

function assertIndex(index: number, what: string): void {
  if (!Number.isInteger(index) || index < 0) {
    throw new InvalidArgumentError(`Invalid ${what} index: ${String(index)}`);
  }
}

function assertVolume(db: number): void {
  if (!Number.isFinite(db) || db < MIN_VOLUME_DB || db > MAX_VOLUME_DB) {
    throw new InvalidArgumentError(
      `Volume ${String(db)} dB out of range (${String(MIN_VOLUME_DB)} to ${String(MAX_VOLUME_DB)})`
    );
  }
}

function assertStep(stepDb: number): void {
  if (!Number.isFinite(stepDb) || stepDb <= 0) {
    throw new InvalidArgumentError('Step must be positive');
  }
}

// ============================================================================
// Power
// ============================================================================

export function powerOn(zone: Zone): Command<null> {
  return action(zone === 'main' ? 'POWERONMAIN' : 'POWERONZONE2');
}

export function powerOff(zone: Zone): Command<null> {
  return action(zone === 'main' ? 'POWEROFFMAIN' : 'POWEROFFZONE2');
}

export function powerQuery(zone: Zone): Command<PowerState> {
  return query(zone === 'main' ? 'POWER?' : 'POWERZONE2?', (payload) => readPower(payload, zone));
}

// ============================================================================
// Volume
// ============================================================================

function volumeVerb(zone: Zone): string {
  return zone === 'main' ? 'VOL' : 'ZVOL';
}

/**
 * Set absolute volume. The wire value is tenths of a dB.
 *
 * @example
 * volumeSet('main', -35).text
 * // => 'VOL(-350)'
 */
export function volumeSet(zone: Zone, db: number): Command<null> {
  assertVolume(db);
  return action(`${volumeVerb(zone)}(${String(dbToTenths(db))})`);
}

export function volumeUp(zone: Zone, stepDb: number = DEFAULT_VOLUME_STEP_DB): Command<null> {
  assertStep(stepDb);
  const verb = `${volumeVerb(zone)}+`;
  return action(stepDb === DEFAULT_VOLUME_STEP_DB ? verb : `${verb}(${String(dbToTenths(stepDb))})`);
}

export function volumeDown(zone: Zone, stepDb: number = DEFAULT_VOLUME_STEP_DB): Command<null> {
  assertStep(stepDb);
  const verb = `${volumeVerb(zone)}-`;
  return action(stepDb === DEFAULT_VOLUME_STEP_DB ? verb : `${verb}(${String(dbToTenths(stepDb))})`);
}

/**
 * Query volume; resolves to tenths of a dB.
 */
export function volumeQuery(zone: Zone): Command<number> {
  const verb = volumeVerb(zone);
  return query(`${verb}?`, (payload) => readInteger(payload, verb));
}

export function muteOn(zone: Zone): Command<null> {
  return action(zone === 'main' ? 'MUTEON' : 'ZMUTEON');
}

export function muteOff(zone: Zone): Command<null> {
  return action(zone === 'main' ? 'MUTEOFF' : 'ZMUTEOFF');
}

export function muteToggle(zone: Zone): Command<null> {
  return action(zone === 'main' ? 'MUTE' : 'ZMUTE');
}

export function muteQuery(zone: Zone): Command<boolean> {
  return query(zone === 'main' ? 'MUTE?' : 'ZMUTE?', (payload) => readMute(payload, zone));
}

// ============================================================================
// Sources
// ============================================================================

export function sourceSelect(index: number): Command<null> {
  assertIndex(index, 'source');
  return action(`SRC(${String(index)})`);
}

export function sourceQuery(): Command<{ index: number; name: string | null }> {
  return query('SRC?', (payload) => readIndexed(payload, 'SRC'));
}

export function sourceList(): Command<NamedEntry[]> {
  return listQuery('SRCS?', 'SRCCOUNT', 'SRC');
}

// ============================================================================
// Audio Modes
// ============================================================================

export function audioModeSelect(index: number): Command<null> {
  assertIndex(index, 'audio mode');
  return action(`AUDMODE(${String(index)})`);
}

export function audioModeNext(): Command<null> {
  return action('AUDMODE+');
}

export function audioModePrevious(): Command<null> {
  return action('AUDMODE-');
}

export function audioModeQuery(): Command<{ index: number; name: string | null }> {
  return query('AUDMODE?', (payload) => readIndexed(payload, 'AUDMODE'));
}

export function audioModeList(): Command<NamedEntry[]> {
  return listQuery('AUDMODEL?', 'AUDMODECOUNT', 'AUDMODE');
}

/**
 * Query the decoded input format, e.g. `!AUDTYPE("Dolby Atmos 7.1.4")`.
 */
export function audioTypeQuery(): Command<string> {
  return query('AUDTYPE?', (payload) => {
    const field = readField(payload, 'AUDTYPE');
    if (!field) return null;
    return field.text ?? field.arg.replace(/^"|"$/g, '');
  });
}

// ============================================================================
// Session
// ============================================================================

/**
 * Set the feedback level. The device confirms with `!VERB(n)`.
 */
export function feedbackLevel(level: FeedbackLevel): Command<number> {
  return query(`VERB(${String(level)})`, (payload) => {
    const value = readInteger(payload, 'VERB');
    return value === level ? value : null;
  });
}
