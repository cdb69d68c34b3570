import { ConfigStore } from './config/store.js';
import { validateConfig } from './config/loader.js';
import { ConfigError, ConnectError } from './errors.js';
import { describeAction, fromActionRecord } from './actions/action.js';
import { createPlatformBackend } from './actions/backend.js';
import { ActionExecutor } from './actions/executor.js';
import type { ExecResult } from './actions/executor.js';
import type { InputBackend } from './actions/backend.js';
import { connectSerial } from './serial/link.js';
import type { LineSession } from './serial/link.js';
import { findPort } from './serial/discovery.js';
import { SerialDispatcher } from './serial/dispatcher.js';
import type { ActionErrorEvent, ActionEvent, VolumeEvent } from './serial/dispatcher.js';
import type { ActionRecord, Config, DispatcherState, EncoderState, LogEntry } from './types.js';

export interface BridgeOptions {
  configPath: string;
  /** Overrides device.port from the config file. */
  port?: string;
  /** Overrides device.baudRate from the config file. */
  baudRate?: number;
  /** Do not open the serial port; lines come in through feedLine(). */
  simulate?: boolean;
  /** Reload the config when the file is edited by hand. */
  watchConfig?: boolean;
  backend?: InputBackend;
  connect?: () => Promise<LineSession>;
}

export interface BridgeStatus {
  state: DispatcherState;
  connected: boolean;
  portPath: string | null;
  simulate: boolean;
  encoder: EncoderState;
}

export type BridgeEvent =
  | { type: 'status'; status: BridgeStatus }
  | { type: 'line'; line: string }
  | { type: 'action-error'; key: string; kind: string; message: string }
  | { type: 'buttons'; buttons: Record<string, ActionRecord> };

export interface BridgeHandle {
  shutdown(): Promise<boolean>;
  getStatus(): BridgeStatus;
  onStatusChange(cb: (status: BridgeStatus) => void): void;
  onEvent(cb: (event: BridgeEvent) => void): void;
  getLogs(since?: number): { entries: LogEntry[]; cursor: number };
  getButtons(): Record<string, ActionRecord>;
  setButton(key: string, record: ActionRecord): void;
  removeButton(key: string): boolean;
  testButton(key: string): Promise<ExecResult | null>;
  feedLine(line: string): Promise<void>;
  getConfigPath(): string;
  getConfig(): Readonly<Config>;
}

const LOG_MAX = 500;

function clip(text: string): string {
  return text.length > 60 ? text.slice(0, 60) + '…' : text;
}

export async function startBridge(options: BridgeOptions): Promise<BridgeHandle> {
  const store = ConfigStore.open(options.configPath);
  const config = store.getConfig();
  const simulate = options.simulate ?? false;

  const errors = validateConfig(config);
  if (options.baudRate !== undefined && (!Number.isInteger(options.baudRate) || options.baudRate <= 0)) {
    errors.push('--baudrate must be a positive integer');
  }
  if (errors.length > 0) {
    throw new ConfigError(errors);
  }

  const backend = options.backend ?? createPlatformBackend();
  const executor = new ActionExecutor(backend);

  // Device settings are read from the current snapshot on every attempt
  const connect = options.connect ?? (async (): Promise<LineSession> => {
    const { device } = store.getConfig();
    const baudRate = options.baudRate ?? device.baudRate;
    let path = options.port ?? device.port;

    if (!path && device.vendorId && device.productId) {
      path = await findPort(device.vendorId, device.productId);
      if (!path) {
        throw new ConnectError(
          `vendor=0x${device.vendorId.toString(16)} product=0x${device.productId.toString(16)}`,
          'device not found',
        );
      }
    }
    if (!path) {
      throw new ConnectError('(none)', 'no serial port configured');
    }
    return connectSerial({ path, baudRate });
  });

  const dispatcher = new SerialDispatcher({
    connect,
    lookup: store,
    executor,
    keys: backend,
    readTimeoutMs: config.serial.readTimeoutMs,
    reconnectDelayMs: config.serial.reconnectDelayMs,
    maxReconnectDelayMs: config.serial.maxReconnectDelayMs,
    backoff: config.serial.backoff,
    volumeStepDelayMs: config.serial.volumeStepDelayMs,
  });

  const statusListeners: Array<(status: BridgeStatus) => void> = [];
  const eventListeners: Array<(event: BridgeEvent) => void> = [];

  const logBuffer: LogEntry[] = [];
  let logSeq = 0;

  function pushLog(dir: LogEntry['dir'], type: string, summary: string) {
    logBuffer.push({ seq: ++logSeq, ts: Date.now(), dir, type, summary });
    if (logBuffer.length > LOG_MAX) logBuffer.shift();
  }

  function emitEvent(event: BridgeEvent) {
    for (const cb of eventListeners) {
      try {
        cb(event);
      } catch (err) {
        console.error('Bridge event listener failed:', err);
      }
    }
  }

  function getStatus(): BridgeStatus {
    const portPath = dispatcher.getSessionPath();
    return {
      state: dispatcher.state,
      connected: portPath !== null && dispatcher.state === 'connected',
      portPath,
      simulate,
      encoder: dispatcher.getEncoderState(),
    };
  }

  function emitStatus() {
    const status = getStatus();
    for (const cb of statusListeners) cb(status);
    emitEvent({ type: 'status', status });
  }

  function buttonRecords(): Record<string, ActionRecord> {
    return { ...store.getConfig().buttons };
  }

  dispatcher.on('state', (state: DispatcherState) => {
    const path = dispatcher.getSessionPath();
    pushLog('sys', state, state === 'connected' && path ? `Connected to ${path}` : state);
    emitStatus();
  });

  dispatcher.on('connect-error', (err: unknown) => {
    pushLog('sys', 'connect-error', err instanceof Error ? err.message : String(err));
  });

  dispatcher.on('line', (line: string) => {
    pushLog('in', 'line', clip(line));
    emitEvent({ type: 'line', line });
  });

  dispatcher.on('volume', ({ value, delta }: VolumeEvent) => {
    if (delta !== 0) pushLog('out', 'volume', `${delta > 0 ? '+' : ''}${delta} (position ${value})`);
  });

  dispatcher.on('mute', (muted: boolean) => {
    pushLog('out', 'mute', muted ? 'muted' : 'unmuted');
    emitStatus();
  });

  dispatcher.on('media', () => {
    pushLog('out', 'media', 'play/pause');
  });

  dispatcher.on('unmapped', (key: string) => {
    pushLog('sys', 'unmapped', `No action configured for ${clip(key)}`);
  });

  dispatcher.on('invalid-volume', (raw: string) => {
    pushLog('sys', 'invalid-volume', `Invalid volume value "${clip(raw)}"`);
  });

  dispatcher.on('action', ({ key, action, result }: ActionEvent) => {
    if (result.ok) pushLog('out', 'action', clip(`${key} → ${describeAction(action)}`));
  });

  dispatcher.on('action-error', ({ key, error }: ActionErrorEvent) => {
    pushLog('sys', 'action-error', clip(`${key}: ${error.message}`));
    emitEvent({ type: 'action-error', key, kind: error.kind, message: error.message });
  });

  store.on('change', () => {
    pushLog('sys', 'config', 'Configuration saved');
    emitEvent({ type: 'buttons', buttons: buttonRecords() });
  });

  store.on('reload', () => {
    pushLog('sys', 'config', 'Configuration reloaded');
    emitEvent({ type: 'buttons', buttons: buttonRecords() });
  });

  if (options.watchConfig) store.watch();

  if (simulate) {
    pushLog('sys', 'simulate', 'Simulation mode, serial port not opened');
  } else {
    dispatcher.start();
  }

  return {
    async shutdown(): Promise<boolean> {
      store.unwatch();
      return dispatcher.stop();
    },
    getStatus,
    onStatusChange(cb: (status: BridgeStatus) => void) {
      statusListeners.push(cb);
    },
    onEvent(cb: (event: BridgeEvent) => void) {
      eventListeners.push(cb);
    },
    getLogs(since?: number): { entries: LogEntry[]; cursor: number } {
      const entries = since !== undefined
        ? logBuffer.filter(e => e.seq > since)
        : logBuffer.slice();
      return { entries, cursor: logSeq };
    },
    getButtons: buttonRecords,
    setButton(key: string, record: ActionRecord): void {
      store.setAction(key, fromActionRecord(record));
    },
    removeButton(key: string): boolean {
      return store.removeAction(key);
    },
    async testButton(key: string): Promise<ExecResult | null> {
      const action = store.lookup(key);
      if (!action) return null;
      pushLog('sys', 'test', `Testing ${clip(key)}`);
      return executor.execute(action);
    },
    /** Handles a line as if the pad had sent it; meant for simulation mode. */
    feedLine(line: string): Promise<void> {
      return dispatcher.handleLine(line);
    },
    getConfigPath(): string {
      return store.getPath();
    },
    getConfig(): Readonly<Config> {
      return store.getConfig();
    },
  };
}
