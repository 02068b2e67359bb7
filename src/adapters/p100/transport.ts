/**
 * Byte-stream transports for the P100: TCP socket and RS-232 serial link.
 *
 * A transport instance serves exactly one connection attempt. It owns its
 * socket or port handle, reports received bytes as `data`, and reports the
 * end of the link, for whatever reason, as a single `close` event. It never
 * retries on its own; reconnection belongs to the session.
 */

import { Socket } from 'node:net';
import { EventEmitter } from 'node:events';
import { SerialPort } from 'serialport';
import { ConnectionError, ConnectionLostError } from '../../core/errors.js';
import { DEFAULT_BAUD_RATE, DEFAULT_TCP_PORT } from './protocol.js';

// ============================================================================
// Contract
// ============================================================================

export interface Transport {
  /** Human-readable endpoint, e.g. `tcp://192.168.1.50:84` */
  readonly description: string;
  connect(): Promise<void>;
  write(data: Buffer): Promise<void>;
  close(): Promise<void>;
  on(event: 'data', listener: (chunk: Buffer) => void): this;
  on(event: 'close', listener: (error: Error | null) => void): this;
  removeAllListeners(): this;
}

const DEFAULT_CONNECT_TIMEOUT_MS = 10000;

/**
 * Shared close bookkeeping: `close` is emitted at most once.
 */
abstract class BaseTransport extends EventEmitter {
  private closed = false;

  protected get isClosed(): boolean {
    return this.closed;
  }

  protected emitClose(error: Error | null): void {
    if (this.closed) return;
    this.closed = true;
    this.emit('close', error);
  }
}

// ============================================================================
// TCP
// ============================================================================

export interface TcpTransportOptions {
  host: string;
  /** TCP port (default: 84) */
  port?: number;
  /** Connection timeout in milliseconds (default: 10000) */
  connectTimeoutMs?: number;
}

export class TcpTransport extends BaseTransport implements Transport {
  readonly description: string;

  private readonly host: string;
  private readonly port: number;
  private readonly connectTimeoutMs: number;
  private socket: Socket | null = null;

  constructor(options: TcpTransportOptions) {
    super();
    this.host = options.host;
    this.port = options.port ?? DEFAULT_TCP_PORT;
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.description = `tcp://${this.host}:${String(this.port)}`;
  }

  async connect(): Promise<void> {
    if (this.socket) {
      throw new ConnectionError(`${this.description}: transport already used`);
    }

    const socket = new Socket();
    this.socket = socket;

    return new Promise((resolve, reject) => {
      let established = false;

      const connectTimeout = setTimeout(() => {
        socket.destroy();
        reject(new ConnectionError(
          `Connection timeout to ${this.description} after ${String(this.connectTimeoutMs)}ms`
        ));
      }, this.connectTimeoutMs);

      socket.once('connect', () => {
        clearTimeout(connectTimeout);
        established = true;
        socket.setNoDelay(true);
        socket.setKeepAlive(true, 5000);
        resolve();
      });

      socket.on('data', (chunk: Buffer) => {
        this.emit('data', chunk);
      });

      socket.on('error', (error) => {
        if (!established) {
          clearTimeout(connectTimeout);
          reject(new ConnectionError(`Failed to connect to ${this.description}: ${error.message}`, { cause: error }));
          return;
        }
        this.emitClose(new ConnectionLostError(`${this.description}: ${error.message}`, { cause: error }));
      });

      socket.on('close', () => {
        clearTimeout(connectTimeout);
        if (established) {
          this.emitClose(new ConnectionLostError(`${this.description}: connection closed by peer`));
          return;
        }
        reject(new ConnectionError(`${this.description}: closed before the connection was established`));
      });

      socket.connect(this.port, this.host);
    });
  }

  async write(data: Buffer): Promise<void> {
    const socket = this.socket;
    if (!socket || this.isClosed || socket.destroyed) {
      throw new ConnectionLostError(`${this.description}: not open`);
    }

    return new Promise((resolve, reject) => {
      socket.write(data, (error) => {
        if (error) {
          reject(new ConnectionLostError(`${this.description}: ${error.message}`, { cause: error }));
          return;
        }
        resolve();
      });
    });
  }

  async close(): Promise<void> {
    const socket = this.socket;
    this.emitClose(null);
    if (socket && !socket.destroyed) {
      socket.destroy();
    }
  }
}

// ============================================================================
// Serial
// ============================================================================

export interface SerialTransportOptions {
  /** Device path, e.g. /dev/ttyUSB0 or COM3 */
  path: string;
  /** Baud rate (default: 115200) */
  baudRate?: number;
}

export class SerialTransport extends BaseTransport implements Transport {
  readonly description: string;

  private readonly path: string;
  private readonly baudRate: number;
  private port: SerialPort | null = null;

  constructor(options: SerialTransportOptions) {
    super();
    this.path = options.path;
    this.baudRate = options.baudRate ?? DEFAULT_BAUD_RATE;
    this.description = `serial://${this.path}@${String(this.baudRate)}`;
  }

  async connect(): Promise<void> {
    if (this.port) {
      throw new ConnectionError(`${this.description}: transport already used`);
    }

    const port = new SerialPort({
      path: this.path,
      baudRate: this.baudRate,
      dataBits: 8,
      parity: 'none',
      stopBits: 1,
      rtscts: false,
      xon: false,
      xoff: false,
      autoOpen: false,
    });
    this.port = port;

    await new Promise<void>((resolve, reject) => {
      port.open((error) => {
        if (error) {
          reject(new ConnectionError(`Failed to open ${this.description}: ${error.message}`, { cause: error }));
          return;
        }
        resolve();
      });
    });

    port.on('data', (chunk: Buffer) => {
      this.emit('data', chunk);
    });

    port.on('error', (error: Error) => {
      this.emitClose(new ConnectionLostError(`${this.description}: ${error.message}`, { cause: error }));
    });

    port.on('close', () => {
      this.emitClose(new ConnectionLostError(`${this.description}: port closed`));
    });
  }

  async write(data: Buffer): Promise<void> {
    const port = this.port;
    if (!port || this.isClosed || !port.isOpen) {
      throw new ConnectionLostError(`${this.description}: not open`);
    }

    return new Promise((resolve, reject) => {
      port.write(data, (error) => {
        if (error) {
          reject(new ConnectionLostError(`${this.description}: ${error.message}`, { cause: error }));
          return;
        }
        port.drain((drainError) => {
          if (drainError) {
            reject(new ConnectionLostError(`${this.description}: ${drainError.message}`, { cause: drainError }));
            return;
          }
          resolve();
        });
      });
    });
  }

  async close(): Promise<void> {
    const port = this.port;
    this.emitClose(null);
    if (!port || !port.isOpen) return;

    await new Promise<void>((resolve, reject) => {
      port.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }
}
