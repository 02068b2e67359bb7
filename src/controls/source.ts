/**
 * Input source selection for the main zone.
 */

import { sourceList, sourceQuery, sourceSelect } from '../adapters/p100/commands.js';
import type { P100Session } from '../adapters/p100/session.js';
import type { NamedEntry } from '../adapters/p100/types.js';
import { NotFoundError } from '../core/errors.js';
import { CatalogControl } from './catalog.js';
import { stepThrough } from './names.js';

export type Source = NamedEntry;

export class SourceControl extends CatalogControl {
  constructor(session: P100Session) {
    super(session, {
      kind: 'source',
      list: sourceList,
      current: sourceQuery,
      select: sourceSelect,
    });
  }

  /**
   * Select the following source, wrapping from the last to the first.
   */
  async next(): Promise<Source> {
    return this.step(1, 'next');
  }

  /**
   * Select the preceding source, wrapping from the first to the last.
   */
  async previous(): Promise<Source> {
    return this.step(-1, 'previous');
  }

  /**
   * Last selected source index reported by the device.
   */
  cached(): number | null {
    return this.session.getSnapshot().main.sourceIndex;
  }

  private async step(offset: number, label: string): Promise<Source> {
    const entries = await this.list();
    const current = await this.current();
    const target = stepThrough(entries, current.index, offset);
    if (!target) {
      throw new NotFoundError(this.commands.kind, label);
    }
    await this.select(target);
    return target;
  }
}
