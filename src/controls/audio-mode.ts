/**
 * Audio (listening) mode selection.
 */

import {
  audioModeList,
  audioModeNext,
  audioModePrevious,
  audioModeQuery,
  audioModeSelect,
  audioTypeQuery,
} from '../adapters/p100/commands.js';
import type { P100Session } from '../adapters/p100/session.js';
import type { NamedEntry } from '../adapters/p100/types.js';
import { CatalogControl } from './catalog.js';

export type AudioMode = NamedEntry;

export class AudioModeControl extends CatalogControl {
  constructor(session: P100Session) {
    super(session, {
      kind: 'audio mode',
      list: audioModeList,
      current: audioModeQuery,
      select: audioModeSelect,
    });
  }

  // The device steps through its own mode order for these two.

  async next(): Promise<void> {
    await this.session.send(audioModeNext());
  }

  async previous(): Promise<void> {
    await this.session.send(audioModePrevious());
  }

  /**
   * Format of the incoming audio stream, as described by the device.
   */
  async audioType(): Promise<string> {
    return this.session.request(audioTypeQuery());
  }

  cached(): number | null {
    return this.session.getSnapshot().main.audioModeIndex;
  }
}
