/**
 * Command queue tests: ordering and cancellation.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { setImmediate as nextTurn } from 'node:timers/promises';
import { CommandQueue } from '../src/adapters/p100/queue.js';
import { Correlator } from '../src/adapters/p100/correlator.js';
import { muteOn, muteQuery, powerQuery, volumeQuery } from '../src/adapters/p100/commands.js';
import { classifyLine } from '../src/adapters/p100/protocol.js';
import { DeviceStateCache } from '../src/core/state/device-state.js';
import { CancelledError, ConnectionLostError } from '../src/core/errors.js';
import { silentLogger } from './helpers/fake-transport.js';

describe('CommandQueue', () => {
  let correlator: Correlator;
  let queue: CommandQueue;
  let written: string[];

  const reply = (line: string): void => {
    correlator.handleFrame(classifyLine(line));
  };

  beforeEach(() => {
    written = [];
    correlator = new Correlator({ state: new DeviceStateCache(), logger: silentLogger });
    correlator.attach(async (data) => {
      written.push(data.toString('latin1').trim());
    });
    queue = new CommandQueue(correlator, silentLogger);
  });

  it('sends the next command only after the previous one completed', async () => {
    const volume = queue.enqueue(volumeQuery('main'));
    const mute = queue.enqueue(muteQuery('main'));
    await nextTurn();

    expect(written).toEqual(['!VOL?']);
    expect(queue.length).toBe(1);

    reply('!VOL(-350)');
    await nextTurn();
    expect(written).toEqual(['!VOL?', '!MUTE?']);

    reply('!MUTE(0)');
    await expect(volume).resolves.toBe(-350);
    await expect(mute).resolves.toBe(false);
  });

  it('keeps submission order for commands without replies', async () => {
    const first = queue.enqueue(muteOn('main'));
    const second = queue.enqueue(powerQuery('main'));
    await first;
    await nextTurn();

    expect(written).toEqual(['!MUTEON', '!POWER?']);
    reply('!POWER(1)');
    await expect(second).resolves.toBe(1);
  });

  it('continues after a failed command', async () => {
    const failing = queue.enqueue(volumeQuery('main'));
    const next = queue.enqueue(muteQuery('main'));
    await nextTurn();

    correlator.detach(new ConnectionLostError('blip'));
    correlator.attach(async (data) => {
      written.push(data.toString('latin1').trim());
    });
    await expect(failing).rejects.toThrow('blip');
    await nextTurn();
    reply('!MUTE(1)');

    await expect(next).resolves.toBe(true);
    expect(written).toEqual(['!VOL?', '!MUTE?']);
  });

  it('rejects an already aborted signal without queueing', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(queue.enqueue(volumeQuery('main'), { signal: controller.signal })).rejects.toBeInstanceOf(
      CancelledError
    );
    await nextTurn();
    expect(written).toEqual([]);
  });

  it('skips a command cancelled while queued', async () => {
    const controller = new AbortController();
    const first = queue.enqueue(volumeQuery('main'));
    const cancelled = queue.enqueue(muteQuery('main'), { signal: controller.signal });
    const last = queue.enqueue(powerQuery('main'));
    await nextTurn();

    controller.abort();
    await expect(cancelled).rejects.toBeInstanceOf(CancelledError);

    reply('!VOL(-350)');
    await nextTurn();
    expect(written).toEqual(['!VOL?', '!POWER?']);

    reply('!POWER(1)');
    await expect(first).resolves.toBe(-350);
    await expect(last).resolves.toBe(1);
  });

  it('lets an in-flight command finish before the next one after cancellation', async () => {
    const controller = new AbortController();
    const inFlight = queue.enqueue(volumeQuery('main'), { signal: controller.signal });
    const next = queue.enqueue(muteQuery('main'));
    await nextTurn();

    controller.abort();
    await expect(inFlight).rejects.toThrow('Command VOL? was cancelled');

    await nextTurn();
    expect(written).toEqual(['!VOL?']);
    expect(correlator.getState()).toBe('awaiting');

    reply('!VOL(-350)');
    await nextTurn();
    expect(written).toEqual(['!VOL?', '!MUTE?']);

    reply('!MUTE(0)');
    await expect(next).resolves.toBe(false);
  });

  it('fails queued commands on flush', async () => {
    const inFlight = queue.enqueue(volumeQuery('main'));
    const queued = queue.enqueue(muteQuery('main'));
    await nextTurn();

    const error = new ConnectionLostError('gone');
    queue.flush(error);
    correlator.detach(error);

    await expect(inFlight).rejects.toBe(error);
    await expect(queued).rejects.toBe(error);
    expect(written).toEqual(['!VOL?']);
  });

  it('drains once everything has completed', async () => {
    const volume = queue.enqueue(volumeQuery('main'));
    await nextTurn();
    reply('!VOL(-10)');

    await queue.drain();
    await expect(volume).resolves.toBe(-10);
    expect(queue.length).toBe(0);
  });
});
