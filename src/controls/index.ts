/**
 * High-level device controls built on a P100Session.
 */

import type { P100Session } from '../adapters/p100/session.js';
import { AudioModeControl } from './audio-mode.js';
import { PowerControl } from './power.js';
import { SourceControl } from './source.js';
import { VolumeControl } from './volume.js';

export { PowerControl } from './power.js';
export { VolumeControl } from './volume.js';
export type { VolumeLimits, CachedVolume } from './volume.js';
export { SourceControl } from './source.js';
export type { Source } from './source.js';
export { AudioModeControl } from './audio-mode.js';
export type { AudioMode } from './audio-mode.js';
export { CatalogControl } from './catalog.js';
export type { CatalogCommands } from './catalog.js';
export { resolveByName, stepThrough } from './names.js';

export interface P100Device {
  session: P100Session;
  power: PowerControl;
  zone2Power: PowerControl;
  volume: VolumeControl;
  zone2Volume: VolumeControl;
  source: SourceControl;
  audioMode: AudioModeControl;
}

/**
 * Bundle every control for one session.
 *
 * @example
 * const device = createDevice(session);
 * await device.power.on();
 * await device.source.selectByName('Blu-ray');
 */
export function createDevice(session: P100Session): P100Device {
  return {
    session,
    power: new PowerControl(session, 'main'),
    zone2Power: new PowerControl(session, 'zone2'),
    volume: new VolumeControl(session, 'main'),
    zone2Volume: new VolumeControl(session, 'zone2'),
    source: new SourceControl(session),
    audioMode: new AudioModeControl(session),
  };
}
