/**
 * FIFO command queue in front of the correlator.
 *
 * Commands are chained so that each one is submitted only after the previous
 * command has completed on the wire. Cancelling a caller never shortens that
 * wait: the chain follows the device exchange, not the caller.
 */

import type { Logger } from 'pino';
import { CancelledError } from '../../core/errors.js';
import type { Correlator } from './correlator.js';
import type { Command, SendOptions } from './types.js';

interface QueueEntry {
  text: string;
  /** Set when the entry must fail without reaching the wire */
  failure: Error | null;
}

export class CommandQueue {
  private readonly correlator: Correlator;
  private readonly logger: Logger;

  private tail: Promise<void> = Promise.resolve();
  private readonly waiting = new Set<QueueEntry>();

  constructor(correlator: Correlator, logger: Logger) {
    this.correlator = correlator;
    this.logger = logger.child({ module: 'queue' });
  }

  /**
   * Queue a command behind everything already submitted.
   *
   * An aborted signal rejects the caller with CancelledError straight away.
   * If the command has not started yet it is skipped; if it is on the wire
   * the exchange still runs to completion before the next command goes out.
   */
  enqueue<T>(command: Command<T>, options: SendOptions = {}): Promise<T | null> {
    const { signal } = options;
    if (signal?.aborted) {
      return Promise.reject(new CancelledError(command.text));
    }

    const entry: QueueEntry = { text: command.text, failure: null };
    this.waiting.add(entry);

    const execution = this.tail.then(async () => {
      this.waiting.delete(entry);
      if (entry.failure) {
        throw entry.failure;
      }
      if (signal?.aborted) {
        this.logger.debug({ command: command.text }, 'Skipping cancelled command');
        throw new CancelledError(command.text);
      }
      return this.correlator.submit(command);
    });

    // The chain only orders commands; outcomes are delivered through `execution`
    this.tail = execution.then(
      () => undefined,
      () => undefined
    );

    if (!signal) {
      return execution;
    }

    return new Promise<T | null>((resolve, reject) => {
      const onAbort = (): void => {
        reject(new CancelledError(command.text));
      };
      signal.addEventListener('abort', onAbort, { once: true });

      void execution.then(
        (value) => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  /**
   * Fail every command that has not reached the wire yet.
   */
  flush(error: Error): void {
    if (this.waiting.size > 0) {
      this.logger.debug({ count: this.waiting.size, reason: error.message }, 'Flushing queued commands');
    }
    for (const entry of this.waiting) {
      entry.failure = error;
    }
  }

  /**
   * Commands waiting for their turn (excluding the one in flight).
   */
  get length(): number {
    return this.waiting.size;
  }

  /**
   * Resolves once everything queued so far has completed.
   */
  async drain(): Promise<void> {
    await this.tail;
  }
}
