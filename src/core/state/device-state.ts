/**
 * Device state cache.
 *
 * Last known value of every tracked observable. Written only by the
 * correlator, in frame arrival order; readers get frozen copies.
 */

import type {
  DeviceState,
  DeviceStateSnapshot,
  MainZoneState,
  StatusUpdate,
  ZoneState,
} from '../../adapters/p100/types.js';

export type StateChangeListener = (snapshot: DeviceStateSnapshot, update: StatusUpdate) => void;

function emptyZone(): ZoneState {
  return { power: null, volume: null, muted: null, sourceIndex: null };
}

function emptyMainZone(): MainZoneState {
  return { ...emptyZone(), audioModeIndex: null };
}

export function createEmptyState(): DeviceState {
  return { main: emptyMainZone(), zone2: emptyZone(), updatedAt: null };
}

export class DeviceStateCache {
  private state: DeviceState = createEmptyState();
  private readonly listeners = new Set<StateChangeListener>();

  /**
   * Apply one update. Listeners are only told about actual changes.
   *
   * @returns true when the stored value changed
   */
  apply(update: StatusUpdate, now: number = Date.now()): boolean {
    const zone: ZoneState | MainZoneState = this.state[update.zone];
    let changed = false;

    switch (update.field) {
      case 'power':
        changed = zone.power !== update.value;
        zone.power = update.value;
        break;
      case 'volume':
        changed = zone.volume !== update.value;
        zone.volume = update.value;
        break;
      case 'muted':
        changed = zone.muted !== update.value;
        zone.muted = update.value;
        break;
      case 'sourceIndex':
        changed = zone.sourceIndex !== update.value;
        zone.sourceIndex = update.value;
        break;
      case 'audioModeIndex':
        changed = this.state.main.audioModeIndex !== update.value;
        this.state.main.audioModeIndex = update.value;
        break;
    }

    this.state.updatedAt = now;

    if (changed && this.listeners.size > 0) {
      const snapshot = this.snapshot();
      for (const listener of this.listeners) {
        listener(snapshot, update);
      }
    }

    return changed;
  }

  /**
   * Immutable copy of the current state.
   */
  snapshot(): DeviceStateSnapshot {
    return Object.freeze({
      main: Object.freeze({ ...this.state.main }),
      zone2: Object.freeze({ ...this.state.zone2 }),
      updatedAt: this.state.updatedAt,
    });
  }

  /**
   * Forget everything, e.g. after the device was replaced.
   */
  reset(): void {
    this.state = createEmptyState();
  }

  subscribe(listener: StateChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
