/**
 * Name lookup over device lists (sources, audio modes).
 */

import { AmbiguousError, InvalidArgumentError, NotFoundError } from '../core/errors.js';
import type { NamedEntry } from '../adapters/p100/types.js';

/**
 * Resolve a user-supplied name against a device list.
 *
 * A case-insensitive exact match wins; otherwise the name may be any
 * case-insensitive substring, provided exactly one entry contains it.
 *
 * @example
 * resolveByName([{ index: 0, name: 'Blu-ray' }, { index: 1, name: 'DVD Player' }], 'dvd', 'source')
 * // => { index: 1, name: 'DVD Player' }
 *
 * @throws NotFoundError when nothing matches
 * @throws AmbiguousError when several entries match
 */
export function resolveByName(entries: readonly NamedEntry[], query: string, kind: string): NamedEntry {
  const needle = query.trim().toLowerCase();
  if (needle.length === 0) {
    throw new InvalidArgumentError(`Empty ${kind} name`);
  }

  const exact = entries.filter((entry) => entry.name.toLowerCase() === needle);
  const candidates = exact.length > 0
    ? exact
    : entries.filter((entry) => entry.name.toLowerCase().includes(needle));

  const [first] = candidates;
  if (!first) {
    throw new NotFoundError(kind, query);
  }
  if (candidates.length > 1) {
    throw new AmbiguousError(kind, query, candidates.map((entry) => entry.name));
  }
  return first;
}

/**
 * Entry `offset` positions away from `index` in list order, wrapping at
 * both ends. An index missing from the list starts from the first entry.
 */
export function stepThrough(entries: readonly NamedEntry[], index: number | null, offset: number): NamedEntry | null {
  if (entries.length === 0) return null;

  const position = entries.findIndex((entry) => entry.index === index);
  if (position === -1) {
    return entries[0] ?? null;
  }

  const next = (((position + offset) % entries.length) + entries.length) % entries.length;
  return entries[next] ?? null;
}
