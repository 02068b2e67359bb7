/**
 * Shared behaviour of controls that select from a device-defined list.
 *
 * The list is fetched once per session generation: a reconnect may mean a
 * different device or a changed configuration, so it is fetched again on
 * first use after every new connection.
 */

import type { P100Session } from '../adapters/p100/session.js';
import type { Command, NamedEntry } from '../adapters/p100/types.js';
import { resolveByName } from './names.js';

export interface CatalogCommands {
  /** Singular noun used in errors, e.g. 'source' */
  kind: string;
  list: () => Command<NamedEntry[]>;
  current: () => Command<{ index: number; name: string | null }>;
  select: (index: number) => Command<null>;
}

interface CachedList {
  generation: number;
  entries: NamedEntry[];
}

export abstract class CatalogControl {
  protected readonly session: P100Session;
  protected readonly commands: CatalogCommands;

  private cache: CachedList | null = null;

  protected constructor(session: P100Session, commands: CatalogCommands) {
    this.session = session;
    this.commands = commands;
  }

  /**
   * Entries in index order.
   *
   * @param forceRefresh - Ignore the list cached for this connection
   */
  async list(forceRefresh = false): Promise<NamedEntry[]> {
    const generation = this.session.generation;
    if (!forceRefresh && this.cache?.generation === generation) {
      return [...this.cache.entries];
    }

    const entries = await this.session.request(this.commands.list());
    this.cache = { generation, entries };
    return [...entries];
  }

  /**
   * The selected entry. A reply without a name is completed from the list.
   */
  async current(): Promise<NamedEntry> {
    const reply = await this.session.request(this.commands.current());
    if (reply.name !== null) {
      return { index: reply.index, name: reply.name };
    }

    const entries = await this.list();
    return entries.find((entry) => entry.index === reply.index)
      ?? { index: reply.index, name: `${this.commands.kind} ${String(reply.index)}` };
  }

  async select(target: number | NamedEntry): Promise<void> {
    const index = typeof target === 'number' ? target : target.index;
    await this.session.send(this.commands.select(index));
  }

  /**
   * Select by exact or unambiguous partial name.
   *
   * @throws NotFoundError when no entry matches
   * @throws AmbiguousError when several entries match
   */
  async selectByName(name: string): Promise<NamedEntry> {
    const entries = await this.list();
    const entry = resolveByName(entries, name, this.commands.kind);
    await this.select(entry);
    return entry;
  }

  /**
   * Drop the cached list; the next call to `list()` asks the device.
   */
  invalidate(): void {
    this.cache = null;
  }
}
