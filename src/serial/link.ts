import { SerialPort } from 'serialport';
import { ConnectError, errorMessage } from '../errors.js';
import { DEFAULT_BAUD, READ_TIMEOUT_MS } from '../types.js';
import { LineParser } from './protocol.js';

export type ReadResult =
  | { ok: true; line: string }
  | { ok: false; reason: 'timeout' | 'disconnected' | 'aborted' };

/** A connected source of lines; what the dispatcher reads from. */
export interface LineSession {
  readonly path: string;
  readonly isOpen: boolean;
  readLine(timeoutMs?: number, signal?: AbortSignal): Promise<ReadResult>;
  close(): Promise<void>;
}

export interface SerialLinkOptions {
  path: string;
  baudRate?: number;
}

const TIMEOUT: ReadResult = { ok: false, reason: 'timeout' };
const DISCONNECTED: ReadResult = { ok: false, reason: 'disconnected' };
const ABORTED: ReadResult = { ok: false, reason: 'aborted' };

/**
 * Opens the serial device. Rejects with {@link ConnectError} when the device
 * is absent, busy or access is denied.
 */
export function connectSerial(options: SerialLinkOptions): Promise<SerialSession> {
  const { path, baudRate = DEFAULT_BAUD } = options;

  return new Promise<SerialSession>((resolve, reject) => {
    let port: SerialPort;
    try {
      port = new SerialPort({ path, baudRate, autoOpen: false });
    } catch (err) {
      reject(new ConnectError(path, errorMessage(err)));
      return;
    }

    port.open((err) => {
      if (err) {
        port.removeAllListeners();
        reject(new ConnectError(path, err.message));
        return;
      }
      console.log(`Connected to serial port ${path} at ${baudRate} baud`);
      resolve(new SerialSession(path, port));
    });
  });
}

/**
 * A live connection to the pad. Lines are queued as they arrive and handed
 * out one at a time by {@link readLine}; lines received before the port went
 * away are still delivered before the session reports 'disconnected'.
 */
export class SerialSession implements LineSession {
  readonly path: string;
  private port: SerialPort | null;
  private parser = new LineParser();
  private queue: string[] = [];
  private waiter: ((result: ReadResult) => void) | null = null;
  private lost = false;

  constructor(path: string, port: SerialPort) {
    this.path = path;
    this.port = port;

    this.parser.on('line', (line: string) => this.push(line));

    port.on('data', (buf: Buffer) => this.parser.parse(buf));
    port.on('error', (err: Error) => {
      console.error(`Serial error on ${path}:`, err.message);
      this.markLost();
    });
    port.on('close', () => this.markLost());
  }

  get isOpen(): boolean {
    return !this.lost && this.port !== null && this.port.isOpen;
  }

  /**
   * Waits up to `timeoutMs` for the next line. 'timeout' means nothing
   * arrived, 'disconnected' that the session is gone, 'aborted' that
   * `signal` fired while waiting.
   */
  readLine(timeoutMs: number = READ_TIMEOUT_MS, signal?: AbortSignal): Promise<ReadResult> {
    const queued = this.queue.shift();
    if (queued !== undefined) return Promise.resolve({ ok: true, line: queued });
    if (!this.isOpen) return Promise.resolve(DISCONNECTED);
    if (signal?.aborted) return Promise.resolve(ABORTED);
    if (this.waiter) return Promise.reject(new Error('readLine is already waiting on this session'));

    return new Promise<ReadResult>((resolve) => {
      const finish = (result: ReadResult) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        this.waiter = null;
        resolve(result);
      };
      const onAbort = () => finish(ABORTED);
      const timer = setTimeout(() => finish(TIMEOUT), timeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiter = finish;
    });
  }

  /** Closes the port. Safe to call more than once. */
  async close(): Promise<void> {
    const port = this.port;
    if (!port) return;
    this.port = null;

    port.removeAllListeners();
    port.on('error', (err) => console.warn(`Serial error on ${this.path} while closing:`, err.message));
    this.parser.reset();
    this.markLost();

    if (port.isOpen) {
      await new Promise<void>((resolve) => {
        port.close((err) => {
          if (err) console.warn(`Error closing ${this.path}:`, err.message);
          resolve();
        });
      });
    }
    console.log(`Disconnected from ${this.path}`);
  }

  private push(line: string): void {
    if (this.waiter) {
      this.waiter({ ok: true, line });
    } else {
      this.queue.push(line);
    }
  }

  private markLost(): void {
    this.lost = true;
    // a waiting reader only exists while the queue is empty
    this.waiter?.(DISCONNECTED);
  }
}
