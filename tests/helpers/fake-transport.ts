/**
 * In-process stand-in for a P100 link.
 */

import { EventEmitter } from 'node:events';
import { pino } from 'pino';
import { ConnectionError, ConnectionLostError } from '../../src/core/errors.js';
import type { Transport } from '../../src/adapters/p100/transport.js';

/**
 * Lines the device sends back for one command text, terminators included.
 */
export type Responder = (text: string) => string[];

export const silentLogger = pino({ level: 'silent' });

/**
 * Answers feedback negotiation and nothing else.
 */
export const confirmFeedback: Responder = (text) => {
  const level = /^VERB\((\d)\)$/.exec(text)?.[1];
  return level === undefined ? [] : [`!VERB(${level})\r`];
};

export class FakeTransport extends EventEmitter implements Transport {
  readonly description = 'fake://p100';

  /** Command texts written, without sentinel or terminator */
  readonly written: string[] = [];

  connected = false;
  closed = false;

  private readonly responder: Responder;
  private readonly connectError: Error | null;

  constructor(responder: Responder = confirmFeedback, connectError: Error | null = null) {
    super();
    this.responder = responder;
    this.connectError = connectError;
  }

  async connect(): Promise<void> {
    if (this.connectError) {
      throw this.connectError;
    }
    this.connected = true;
  }

  async write(data: Buffer): Promise<void> {
    if (this.closed) {
      throw new ConnectionLostError('fake transport closed');
    }

    const line = data.toString('latin1');
    const text = line.slice(1, -1);
    this.written.push(text);

    const replies = this.responder(text);
    if (replies.length > 0) {
      queueMicrotask(() => {
        this.receive(replies.join(''));
      });
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.emit('close', null);
  }

  /**
   * Deliver raw bytes as if read from the wire.
   */
  receive(data: string): void {
    this.emit('data', Buffer.from(data, 'latin1'));
  }

  /**
   * Simulate the link failing.
   */
  drop(error: Error = new ConnectionLostError('fake link dropped')): void {
    if (this.closed) return;
    this.closed = true;
    this.emit('close', error);
  }
}

/**
 * Transport factory that records every transport it creates.
 * Attempts (1-based) for which `failingAttempts` returns true fail to connect.
 */
export function createFakeFactory(responder: Responder = confirmFeedback, failingAttempts: (attempt: number) => boolean = () => false): {
  factory: () => FakeTransport;
  transports: FakeTransport[];
} {
  const transports: FakeTransport[] = [];
  const factory = (): FakeTransport => {
    const attempt = transports.length + 1;
    const transport = new FakeTransport(
      responder,
      failingAttempts(attempt) ? new ConnectionError(`fake connect refused (attempt ${String(attempt)})`) : null
    );
    transports.push(transport);
    return transport;
  };
  return { factory, transports };
}

/**
 * Last transport created by a fake factory.
 */
export function latest(transports: readonly FakeTransport[]): FakeTransport {
  const transport = transports[transports.length - 1];
  if (!transport) {
    throw new Error('No transport created yet');
  }
  return transport;
}
