/**
 * Volume and mute control for one zone.
 * Values are in dB; the wire carries tenths of a dB.
 */

import {
  DEFAULT_VOLUME_STEP_DB,
  MAX_VOLUME_DB,
  MIN_VOLUME_DB,
  muteOff,
  muteOn,
  muteQuery,
  muteToggle,
  volumeDown,
  volumeQuery,
  volumeSet,
  volumeUp,
} from '../adapters/p100/commands.js';
import { tenthsToDb } from '../adapters/p100/protocol.js';
import type { P100Session } from '../adapters/p100/session.js';
import type { Zone } from '../adapters/p100/types.js';

export interface VolumeLimits {
  minDb: number;
  maxDb: number;
}

export interface CachedVolume {
  /** Null until the device has reported a level */
  volumeDb: number | null;
  muted: boolean | null;
}

export class VolumeControl {
  private readonly session: P100Session;
  readonly zone: Zone;

  constructor(session: P100Session, zone: Zone = 'main') {
    this.session = session;
    this.zone = zone;
  }

  async get(): Promise<number> {
    const tenths = await this.session.request(volumeQuery(this.zone));
    return tenthsToDb(tenths);
  }

  /**
   * @throws InvalidArgumentError outside -99.9 to +24.0 dB
   */
  async set(db: number): Promise<void> {
    await this.session.send(volumeSet(this.zone, db));
  }

  async up(stepDb: number = DEFAULT_VOLUME_STEP_DB): Promise<void> {
    await this.session.send(volumeUp(this.zone, stepDb));
  }

  async down(stepDb: number = DEFAULT_VOLUME_STEP_DB): Promise<void> {
    await this.session.send(volumeDown(this.zone, stepDb));
  }

  async mute(): Promise<void> {
    await this.session.send(muteOn(this.zone));
  }

  async unmute(): Promise<void> {
    await this.session.send(muteOff(this.zone));
  }

  async toggleMute(): Promise<void> {
    await this.session.send(muteToggle(this.zone));
  }

  async isMuted(): Promise<boolean> {
    return this.session.request(muteQuery(this.zone));
  }

  cached(): CachedVolume {
    const zone = this.session.getSnapshot()[this.zone];
    return {
      volumeDb: zone.volume === null ? null : tenthsToDb(zone.volume),
      muted: zone.muted,
    };
  }

  limits(): VolumeLimits {
    return { minDb: MIN_VOLUME_DB, maxDb: MAX_VOLUME_DB };
  }
}
