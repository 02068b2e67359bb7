/**
 * Device control tests against a scripted device.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { P100Session } from '../src/adapters/p100/session.js';
import { PowerState } from '../src/adapters/p100/types.js';
import { createDevice, resolveByName, stepThrough, type P100Device } from '../src/controls/index.js';
import { AmbiguousError, InvalidArgumentError, NotFoundError } from '../src/core/errors.js';
import { createFakeFactory, latest, silentLogger, type FakeTransport } from './helpers/fake-transport.js';
import { createFakeDevice, type FakeDeviceState } from './helpers/fake-device.js';

const ENTRIES = [
  { index: 0, name: 'Blu-ray' },
  { index: 1, name: 'DVD Player' },
  { index: 2, name: 'Tuner' },
];

async function connectDevice(initial: Partial<FakeDeviceState> = {}): Promise<{
  device: P100Device;
  transports: FakeTransport[];
  state: FakeDeviceState;
}> {
  const fake = createFakeDevice(initial);
  const { factory, transports } = createFakeFactory(fake.responder);
  const session = new P100Session({ transportFactory: factory, logger: silentLogger });
  await session.connect();
  return { device: createDevice(session), transports, state: fake.state };
}

function sent(transports: readonly FakeTransport[]): string[] {
  return latest(transports).written.filter((text) => !text.startsWith('VERB'));
}

describe('resolveByName', () => {
  it('prefers an exact case-insensitive match', () => {
    const entries = [...ENTRIES, { index: 3, name: 'Tuner 2' }];
    expect(resolveByName(entries, 'tuner', 'source')).toEqual({ index: 2, name: 'Tuner' });
  });

  it('accepts an unambiguous substring', () => {
    expect(resolveByName(ENTRIES, 'DVD', 'source')).toEqual({ index: 1, name: 'DVD Player' });
    expect(resolveByName(ENTRIES, 'D', 'source')).toEqual({ index: 1, name: 'DVD Player' });
  });

  it('rejects a substring shared by several entries', () => {
    expect(() => resolveByName(ENTRIES, 'r', 'source')).toThrow(AmbiguousError);
    expect(() => resolveByName(ENTRIES, 'r', 'source')).toThrow(
      "Multiple sources match 'r': Blu-ray, DVD Player, Tuner"
    );
  });

  it('rejects unknown and empty names', () => {
    expect(() => resolveByName(ENTRIES, 'Phono', 'source')).toThrow(NotFoundError);
    expect(() => resolveByName(ENTRIES, 'Phono', 'source')).toThrow("No source found matching 'Phono'");
    expect(() => resolveByName(ENTRIES, '  ', 'source')).toThrow(InvalidArgumentError);
  });
});

describe('stepThrough', () => {
  it('wraps in both directions', () => {
    expect(stepThrough(ENTRIES, 2, 1)).toEqual({ index: 0, name: 'Blu-ray' });
    expect(stepThrough(ENTRIES, 0, -1)).toEqual({ index: 2, name: 'Tuner' });
    expect(stepThrough(ENTRIES, 0, 1)).toEqual({ index: 1, name: 'DVD Player' });
  });

  it('starts from the first entry for an unknown index', () => {
    expect(stepThrough(ENTRIES, 7, 1)).toEqual({ index: 0, name: 'Blu-ray' });
    expect(stepThrough([], 0, 1)).toBeNull();
  });
});

describe('PowerControl', () => {
  it('switches and reports power', async () => {
    const { device, transports, state } = await connectDevice({ power: 0 });

    expect(await device.power.status()).toBe(PowerState.Off);
    await device.power.on();

    expect(state.power).toBe(1);
    expect(sent(transports)).toEqual(['POWER?', 'POWERONMAIN']);
    expect(device.power.cached()).toBe(PowerState.On);
  });

  it('toggles from the queried state', async () => {
    const { device, transports } = await connectDevice({ power: 1 });

    await expect(device.power.toggle()).resolves.toBe(PowerState.Off);
    expect(sent(transports)).toEqual(['POWER?', 'POWEROFFMAIN']);
  });

  it('addresses zone 2 separately', async () => {
    const { device, transports } = await connectDevice();

    await device.zone2Power.on();

    expect(sent(transports)).toEqual(['POWERONZONE2']);
    expect(device.zone2Power.zone).toBe('zone2');
  });
});

describe('VolumeControl', () => {
  it('reads the level in dB', async () => {
    const { device } = await connectDevice({ volume: -350 });

    await expect(device.volume.get()).resolves.toBe(-35);
    expect(device.volume.cached()).toEqual({ volumeDb: -35, muted: null });
  });

  it('sets and steps the level', async () => {
    const { device, transports } = await connectDevice();

    await device.volume.set(-20.5);
    await device.volume.up();
    await device.volume.down(3);

    expect(sent(transports)).toEqual(['VOL(-205)', 'VOL+', 'VOL-(30)']);
  });

  it('refuses levels outside the device range without sending', async () => {
    const { device, transports } = await connectDevice();

    await expect(device.volume.set(30)).rejects.toBeInstanceOf(InvalidArgumentError);
    expect(sent(transports)).toEqual([]);
    expect(device.volume.limits()).toEqual({ minDb: -99.9, maxDb: 24 });
  });

  it('mutes and reports the mute state', async () => {
    const { device, transports } = await connectDevice({ muted: false });

    await device.volume.mute();
    await expect(device.volume.isMuted()).resolves.toBe(true);

    expect(sent(transports)).toEqual(['MUTEON', 'MUTE?']);
    expect(device.volume.cached().muted).toBe(true);
  });
});

describe('SourceControl', () => {
  it('lists sources once per connection', async () => {
    const { device, transports } = await connectDevice();

    const first = await device.source.list();
    const second = await device.source.list();

    expect(first).toEqual(ENTRIES);
    expect(second).toEqual(ENTRIES);
    expect(sent(transports)).toEqual(['SRCS?']);
  });

  it('refetches on request', async () => {
    const { device, transports } = await connectDevice();

    await device.source.list();
    await device.source.list(true);

    expect(sent(transports)).toEqual(['SRCS?', 'SRCS?']);
  });

  it('selects by partial name', async () => {
    const { device, transports, state } = await connectDevice({ source: 0 });

    await expect(device.source.selectByName('DVD')).resolves.toEqual({ index: 1, name: 'DVD Player' });

    expect(sent(transports)).toEqual(['SRCS?', 'SRC(1)']);
    expect(state.source).toBe(1);
    expect(device.source.cached()).toBe(1);
  });

  it('refuses ambiguous and unknown names without selecting', async () => {
    const { device, transports } = await connectDevice();

    await expect(device.source.selectByName('r')).rejects.toBeInstanceOf(AmbiguousError);
    await expect(device.source.selectByName('Phono')).rejects.toBeInstanceOf(NotFoundError);
    expect(sent(transports)).toEqual(['SRCS?']);
  });

  it('selects by index or entry', async () => {
    const { device, transports } = await connectDevice();

    await device.source.select(2);
    await device.source.select({ index: 0, name: 'Blu-ray' });

    expect(sent(transports)).toEqual(['SRC(2)', 'SRC(0)']);
  });

  it('reports the current source', async () => {
    const { device } = await connectDevice({ source: 2 });

    await expect(device.source.current()).resolves.toEqual({ index: 2, name: 'Tuner' });
  });

  it('steps forward and backward with wrap-around', async () => {
    const { device, transports } = await connectDevice({ source: 2 });

    await expect(device.source.next()).resolves.toEqual({ index: 0, name: 'Blu-ray' });
    await expect(device.source.previous()).resolves.toEqual({ index: 2, name: 'Tuner' });

    expect(sent(transports)).toEqual(['SRCS?', 'SRC?', 'SRC(0)', 'SRC?', 'SRC(2)']);
  });

  it('fetches the list again after a reconnect', async () => {
    vi.useFakeTimers();
    const { device, transports } = await connectDevice();

    await device.source.list();
    expect(latest(transports).written).toContain('SRCS?');

    latest(transports).drop();
    await vi.advanceTimersByTimeAsync(1000);
    expect(transports).toHaveLength(2);
    expect(device.session.generation).toBe(2);

    await device.source.list();
    expect(sent(transports)).toEqual(['SRCS?']);
  });
});

describe('AudioModeControl', () => {
  it('selects audio modes by name', async () => {
    const { device, transports } = await connectDevice();

    await expect(device.audioMode.selectByName('stereo')).resolves.toEqual({ index: 1, name: 'Stereo' });

    expect(sent(transports)).toEqual(['AUDMODEL?', 'AUDMODE(1)']);
    expect(device.audioMode.cached()).toBe(1);
  });

  it('lets the device step through its modes', async () => {
    const { device, transports } = await connectDevice();

    await device.audioMode.next();
    await device.audioMode.previous();

    expect(sent(transports)).toEqual(['AUDMODE+', 'AUDMODE-']);
  });

  it('reports the current mode and input format', async () => {
    const { device } = await connectDevice({ audioMode: 2 });

    await expect(device.audioMode.current()).resolves.toEqual({ index: 2, name: 'Surround' });
    await expect(device.audioMode.audioType()).resolves.toBe('PCM 2.0');
  });

  it('refuses unknown modes', async () => {
    const { device } = await connectDevice();

    await expect(device.audioMode.selectByName('Party')).rejects.toThrow("No audio mode found matching 'Party'");
  });
});

afterEach(() => {
  vi.useRealTimers();
});
