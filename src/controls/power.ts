/**
 * Power control for one zone.
 */

import { powerOff, powerOn, powerQuery } from '../adapters/p100/commands.js';
import type { P100Session } from '../adapters/p100/session.js';
import { PowerState, type Zone } from '../adapters/p100/types.js';

export class PowerControl {
  private readonly session: P100Session;
  readonly zone: Zone;

  constructor(session: P100Session, zone: Zone = 'main') {
    this.session = session;
    this.zone = zone;
  }

  async on(): Promise<void> {
    await this.session.send(powerOn(this.zone));
  }

  async off(): Promise<void> {
    await this.session.send(powerOff(this.zone));
  }

  /**
   * Query the current state and switch to the opposite one.
   *
   * @returns the state requested
   */
  async toggle(): Promise<PowerState> {
    const current = await this.status();
    if (current === PowerState.On) {
      await this.off();
      return PowerState.Off;
    }
    await this.on();
    return PowerState.On;
  }

  async status(): Promise<PowerState> {
    return this.session.request(powerQuery(this.zone));
  }

  /**
   * Last power state reported by the device, without a round trip.
   */
  cached(): PowerState | null {
    return this.session.getSnapshot()[this.zone].power;
  }
}
