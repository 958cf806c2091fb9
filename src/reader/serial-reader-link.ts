import { SerialPort } from 'serialport';
import type { Clock, ClockTimer, ReaderLink } from '../ports/index.js';
import type { Logger } from '../types/index.js';
import { ReaderError, errorMessage } from '../core/errors.js';
import { isFrameComplete } from './frame-codec.js';

/**
 * Serial link configuration.
 */
export interface SerialReaderLinkConfig {
  /** Device path, e.g. /dev/ttyUSB0 */
  path: string;
  baudRate: number;
}

/**
 * ReaderLink over a serial port (RS-485 adapter).
 *
 * The port is owned exclusively by the poll loop: one request is in
 * flight at a time, and bytes arriving between requests are discarded.
 */
export class SerialReaderLink implements ReaderLink {
  private readonly config: SerialReaderLinkConfig;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private port: SerialPort | null = null;
  private buffer = '';
  private waiter: (() => void) | null = null;

  constructor(config: SerialReaderLinkConfig, clock: Clock, logger: Logger) {
    this.config = config;
    this.clock = clock;
    this.logger = logger.child({ component: 'serial-reader', path: config.path });
  }

  async open(): Promise<void> {
    if (this.port?.isOpen) {
      return;
    }

    const port = new SerialPort({
      path: this.config.path,
      baudRate: this.config.baudRate,
      autoOpen: false,
    });

    await new Promise<void>((resolve, reject) => {
      port.open((err) => {
        if (err) {
          reject(new ReaderError(`Failed to open ${this.config.path}: ${err.message}`, err));
          return;
        }
        resolve();
      });
    });

    port.on('data', (chunk: Buffer) => {
      this.buffer += chunk.toString('latin1');
      if (this.waiter && isFrameComplete(this.buffer)) {
        this.waiter();
      }
    });
    port.on('error', (err: Error) => {
      this.logger.error({ error: err.message }, 'Serial port error');
    });
    port.on('close', () => {
      this.logger.warn('Serial port closed');
      this.waiter?.();
    });

    this.port = port;
    this.logger.info({ baudRate: this.config.baudRate }, 'Serial connection established');
  }

  async request(command: Buffer, timeoutMs: number): Promise<string | null> {
    const port = this.port;
    if (!port?.isOpen) {
      throw new ReaderError('Serial port is not open');
    }

    // Stale bytes from a previous cycle would corrupt this frame
    this.buffer = '';

    await new Promise<void>((resolve, reject) => {
      port.write(command, (err) => {
        if (err) {
          reject(new ReaderError(`Serial write failed: ${err.message}`, err));
          return;
        }
        resolve();
      });
    });

    await new Promise<void>((resolve) => {
      let timer: ClockTimer | null = null;
      const done = (): void => {
        if (timer) {
          this.clock.clearTimer(timer);
        }
        this.waiter = null;
        resolve();
      };
      if (isFrameComplete(this.buffer)) {
        done();
        return;
      }
      this.waiter = done;
      timer = this.clock.setTimer(done, timeoutMs);
    });

    if (!port.isOpen) {
      throw new ReaderError('Serial port closed during request');
    }

    const response = this.buffer;
    this.buffer = '';
    return response.length > 0 ? response : null;
  }

  async close(): Promise<void> {
    const port = this.port;
    this.port = null;
    this.waiter?.();
    if (!port?.isOpen) {
      return;
    }

    await new Promise<void>((resolve) => {
      port.close((err) => {
        if (err) {
          this.logger.warn({ error: errorMessage(err) }, 'Error closing serial port');
        }
        resolve();
      });
    });
    this.logger.info('Serial connection closed');
  }

  isOpen(): boolean {
    return this.port?.isOpen ?? false;
  }
}
