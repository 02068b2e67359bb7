/**
 * Configuration schema tests.
 */

import { describe, it, expect } from 'vitest';
import { parseConfig, safeParseConfig, validateTiming } from '../src/core/config/schema.js';

describe('parseConfig', () => {
  it('fills defaults around a TCP connection', () => {
    const config = parseConfig({ connection: { type: 'tcp', host: '192.168.1.50' } });

    expect(config).toEqual({
      connection: { type: 'tcp', host: '192.168.1.50', port: 84 },
      protocol: { feedbackLevel: 1, commandTimeoutMs: 5000, connectTimeoutMs: 10000 },
      reconnect: {
        enabled: true,
        maxAttempts: 0,
        initialDelayMs: 1000,
        maxDelayMs: 30000,
        stableAfterMs: 60000,
      },
      logging: { level: 'info', prettyPrint: true },
    });
  });

  it('accepts a serial connection', () => {
    const config = parseConfig({ connection: { type: 'serial', path: '/dev/ttyUSB0' } });

    expect(config.connection).toEqual({ type: 'serial', path: '/dev/ttyUSB0', baudRate: 115200 });
  });

  it('keeps explicit values', () => {
    const config = parseConfig({
      connection: { type: 'tcp', host: 'p100.local', port: 4001 },
      protocol: { feedbackLevel: 2, commandTimeoutMs: 750 },
      reconnect: { enabled: false },
      logging: { level: 'debug', prettyPrint: false },
    });

    expect(config.connection).toEqual({ type: 'tcp', host: 'p100.local', port: 4001 });
    expect(config.protocol.feedbackLevel).toBe(2);
    expect(config.protocol.commandTimeoutMs).toBe(750);
    expect(config.protocol.connectTimeoutMs).toBe(10000);
    expect(config.reconnect.enabled).toBe(false);
    expect(config.logging).toEqual({ level: 'debug', prettyPrint: false });
  });

  it('rejects an unknown connection type', () => {
    expect(() => parseConfig({ connection: { type: 'usb', path: '/dev/usb0' } })).toThrow();
  });

  it('rejects a missing connection', () => {
    expect(safeParseConfig({}).success).toBe(false);
  });

  it('rejects an unsupported feedback level', () => {
    const result = safeParseConfig({
      connection: { type: 'tcp', host: 'p100.local' },
      protocol: { feedbackLevel: 3 },
    });

    expect(result.success).toBe(false);
  });

  it('rejects out-of-range ports', () => {
    expect(safeParseConfig({ connection: { type: 'tcp', host: 'p100.local', port: 70000 } }).success).toBe(false);
  });
});

describe('validateTiming', () => {
  it('accepts the defaults', () => {
    const config = parseConfig({ connection: { type: 'tcp', host: 'p100.local' } });
    expect(validateTiming(config)).toEqual([]);
  });

  it('warns when the first delay exceeds the cap', () => {
    const config = parseConfig({
      connection: { type: 'tcp', host: 'p100.local' },
      reconnect: { initialDelayMs: 5000, maxDelayMs: 2000 },
    });

    expect(validateTiming(config)).toEqual([
      'reconnect.initialDelayMs (5000) exceeds reconnect.maxDelayMs (2000); every attempt will wait 2000ms.',
    ]);
  });
});
