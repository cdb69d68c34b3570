import { EventEmitter } from 'events';
import { errorMessage } from '../errors.js';
import { describeAction } from '../actions/action.js';
import { classifyLine } from './protocol.js';
import {
  MAX_RECONNECT_DELAY_MS,
  READ_TIMEOUT_MS,
  RECONNECT_DELAY_MS,
  STOP_JOIN_TIMEOUT_MS,
  VOLUME_STEP_DELAY_MS,
} from '../types.js';
import type { LineSession } from './link.js';
import type { ActionLookup } from '../config/store.js';
import type { ExecError, ExecResult } from '../actions/executor.js';
import type { Action, BackoffMode, DispatcherState, EncoderState, MediaKey } from '../types.js';

export interface ActionRunner {
  execute(action: Action): Promise<ExecResult>;
}

export interface MediaKeys {
  tapMediaKey(key: MediaKey): Promise<void>;
}

export interface ReconnectPolicy {
  backoff: BackoffMode;
  reconnectDelayMs: number;
  maxReconnectDelayMs: number;
}

export interface DispatcherOptions extends Partial<ReconnectPolicy> {
  /** Opens a session; called again for every reconnect attempt. */
  connect: () => Promise<LineSession>;
  lookup: ActionLookup;
  executor: ActionRunner;
  keys: MediaKeys;
  readTimeoutMs?: number;
  volumeStepDelayMs?: number;
  /** Source of jitter for exponential backoff, in [0, 1). */
  random?: () => number;
}

export interface ActionEvent {
  key: string;
  action: Action;
  result: ExecResult;
}

export interface ActionErrorEvent {
  key: string;
  action: Action;
  error: ExecError;
}

export interface VolumeEvent {
  value: number;
  delta: number;
}

const JITTER = 0.2;

/**
 * Delay before reconnect attempt number `attempt` (0 for the first retry).
 * Fixed backoff always waits the base delay; exponential doubles it up to
 * the maximum, spread by ±20%.
 */
export function reconnectDelay(policy: ReconnectPolicy, attempt: number, random: () => number = Math.random): number {
  if (policy.backoff === 'fixed') return policy.reconnectDelayMs;

  const base = Math.min(policy.maxReconnectDelayMs, policy.reconnectDelayMs * 2 ** attempt);
  const jitter = base * JITTER * (random() * 2 - 1);
  return Math.round(Math.min(policy.maxReconnectDelayMs, Math.max(0, base + jitter)));
}

/** Resolves true after `ms`, or false as soon as `signal` aborts. */
function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Runs the serial read loop and turns each line from the pad into volume,
 * mute, media or button handling.
 *
 * States: disconnected → connected → (read lost) → disconnected → ... and
 * stopping → stopped once {@link stop} is called. Connect failures and lost
 * links are retried after the backoff delay until stopped.
 *
 * Events: 'state', 'line', 'volume', 'mute', 'media', 'action',
 * 'action-error', 'unmapped', 'invalid-volume', 'connect-error'.
 */
export class SerialDispatcher extends EventEmitter {
  private options: DispatcherOptions;
  private policy: ReconnectPolicy;
  private readTimeoutMs: number;
  private volumeStepDelayMs: number;
  private random: () => number;

  private currentState: DispatcherState = 'disconnected';
  private session: LineSession | null = null;
  private encoder: EncoderState = { lastVolume: 0, muted: false };
  private abort: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(options: DispatcherOptions) {
    super();
    this.options = options;
    this.policy = {
      backoff: options.backoff ?? 'fixed',
      reconnectDelayMs: options.reconnectDelayMs ?? RECONNECT_DELAY_MS,
      maxReconnectDelayMs: options.maxReconnectDelayMs ?? MAX_RECONNECT_DELAY_MS,
    };
    this.readTimeoutMs = options.readTimeoutMs ?? READ_TIMEOUT_MS;
    this.volumeStepDelayMs = options.volumeStepDelayMs ?? VOLUME_STEP_DELAY_MS;
    this.random = options.random ?? Math.random;
  }

  get state(): DispatcherState {
    return this.currentState;
  }

  get isRunning(): boolean {
    return this.loop !== null;
  }

  getEncoderState(): EncoderState {
    return { ...this.encoder };
  }

  getSessionPath(): string | null {
    return this.session?.path ?? null;
  }

  start(): void {
    if (this.loop) return;

    const abort = new AbortController();
    this.abort = abort;
    this.currentState = 'disconnected';
    this.loop = this.run(abort.signal)
      .catch((err) => {
        console.error('Serial listener failed:', err);
      })
      .finally(() => {
        this.loop = null;
        this.abort = null;
        this.setState('stopped');
        console.log('Serial listener stopped');
      });
  }

  /**
   * Asks the loop to exit, closes the session and waits up to
   * `joinTimeoutMs` for the loop to finish. Resolves false if it did not
   * finish in time; shutdown can carry on either way.
   */
  async stop(joinTimeoutMs: number = STOP_JOIN_TIMEOUT_MS): Promise<boolean> {
    const loop = this.loop;
    if (!loop) return true;

    this.setState('stopping');
    this.abort?.abort();
    await this.dropSession();

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), joinTimeoutMs);
    });
    const joined = await Promise.race([loop.then(() => true), timedOut]);
    clearTimeout(timer);

    if (!joined) {
      console.warn(`Serial listener did not stop within ${joinTimeoutMs}ms, continuing shutdown`);
    }
    return joined;
  }

  /** Classifies one line and performs what it asks for. Never throws. */
  async handleLine(line: string): Promise<void> {
    this.emit('line', line);
    const command = classifyLine(line);

    try {
      switch (command.kind) {
        case 'volume':
          await this.handleVolume(command.value);
          break;
        case 'invalid-volume':
          console.warn(`Invalid volume value: "${command.raw}"`);
          this.emit('invalid-volume', command.raw);
          break;
        case 'mute':
          await this.tap('mute');
          this.encoder.muted = !this.encoder.muted;
          console.log(`Mute toggled -> ${this.encoder.muted ? 'ON' : 'OFF'}`);
          this.emit('mute', this.encoder.muted);
          break;
        case 'media':
          if (await this.tap('playPause')) {
            console.log('Media play/pause triggered');
            this.emit('media');
          }
          break;
        case 'button':
          await this.handleButton(command.key);
          break;
      }
    } catch (err) {
      console.error(`Error handling serial line "${line}":`, err);
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    let attempt = 0;

    while (!signal.aborted) {
      try {
        if (!this.session) {
          try {
            this.session = await this.options.connect();
          } catch (err) {
            this.emit('connect-error', err);
            const delay = reconnectDelay(this.policy, attempt++, this.random);
            console.warn(`${errorMessage(err)}, retrying in ${delay}ms...`);
            await sleep(delay, signal);
            continue;
          }
          if (signal.aborted) break;
          attempt = 0;
          console.log(`Serial listener started on ${this.session.path}`);
          this.setState('connected');
        }

        const result = await this.session.readLine(this.readTimeoutMs, signal);
        if (result.ok) {
          await this.handleLine(result.line);
          continue;
        }
        if (result.reason === 'timeout') continue;
        if (result.reason === 'aborted') break;

        await this.dropSession();
        this.setState('disconnected');
        const delay = reconnectDelay(this.policy, attempt++, this.random);
        console.warn(`Serial link lost, reconnecting in ${delay}ms...`);
        await sleep(delay, signal);
      } catch (err) {
        console.error('Error in serial listener:', err);
        await this.dropSession();
        this.setState('disconnected');
        await sleep(reconnectDelay(this.policy, attempt++, this.random), signal);
      }
    }

    await this.dropSession();
  }

  private async handleVolume(value: number): Promise<void> {
    const delta = value - this.encoder.lastVolume;

    if (delta !== 0) {
      const key: MediaKey = delta > 0 ? 'volumeUp' : 'volumeDown';
      const steps = Math.abs(delta);
      // a stop() cuts the burst short
      const signal = this.abort?.signal;
      for (let i = 0; i < steps; i++) {
        if (signal?.aborted) break;
        if (i > 0 && !(await sleep(this.volumeStepDelayMs, signal))) break;
        await this.tap(key);
      }
      console.log(`Volume adjusted by ${delta}`);
    }

    this.encoder.lastVolume = value;
    this.emit('volume', { value, delta } satisfies VolumeEvent);
  }

  private async handleButton(key: string): Promise<void> {
    const action = this.options.lookup.lookup(key);
    if (!action) {
      console.log(`No action configured for: '${key}'`);
      this.emit('unmapped', key);
      return;
    }

    console.log(`Executing action for ${key}: ${describeAction(action)}`);
    const result = await this.options.executor.execute(action);
    this.emit('action', { key, action, result } satisfies ActionEvent);

    if (!result.ok) {
      console.error(`Action for ${key} failed (${result.error.kind}): ${result.error.message}`);
      this.emit('action-error', { key, action, error: result.error } satisfies ActionErrorEvent);
    }
  }

  private async tap(key: MediaKey): Promise<boolean> {
    try {
      await this.options.keys.tapMediaKey(key);
      return true;
    } catch (err) {
      console.error(`Error sending ${key} key:`, errorMessage(err));
      return false;
    }
  }

  private async dropSession(): Promise<void> {
    const session = this.session;
    if (!session) return;
    this.session = null;
    try {
      await session.close();
    } catch (err) {
      console.warn(`Error closing ${session.path}:`, errorMessage(err));
    }
  }

  private setState(state: DispatcherState): void {
    if (this.currentState === state) return;
    // once stopping, only the final transition is allowed
    if (this.currentState === 'stopping' && state !== 'stopped') return;
    this.currentState = state;
    this.emit('state', state);
  }
}
