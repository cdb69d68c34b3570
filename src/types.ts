// Shared types for desk-deck

export type ActionType = 'none' | 'link' | 'exe' | 'keypress' | 'text';

export const ACTION_TYPES: readonly ActionType[] = ['none', 'link', 'exe', 'keypress', 'text'];

export type Action =
  | { type: 'none' }
  | { type: 'link'; value: string }
  | { type: 'exe'; value: string }
  | { type: 'keypress'; value: string }
  | { type: 'text'; value: string };

/** Shape of an action as it is written to the config file. */
export interface ActionRecord {
  type: ActionType;
  value: string;
}

export type ButtonMap = Readonly<Record<string, Action>>;

export type BackoffMode = 'fixed' | 'exponential';

export interface Config {
  device: {
    port?: string;
    vendorId?: number;
    productId?: number;
    baudRate: number;
  };
  serial: {
    readTimeoutMs: number;
    reconnectDelayMs: number;
    maxReconnectDelayMs: number;
    volumeStepDelayMs: number;
    backoff: BackoffMode;
  };
  settings: {
    host: string;
    port: number;
    openBrowser: boolean;
  };
  buttons: Record<string, ActionRecord>;
}

export interface EncoderState {
  lastVolume: number;
  muted: boolean;
}

export type MediaKey = 'volumeUp' | 'volumeDown' | 'mute' | 'playPause';

export type DispatcherState = 'disconnected' | 'connected' | 'stopping' | 'stopped';

export interface LogEntry {
  seq: number;
  ts: number;
  dir: 'in' | 'out' | 'sys';
  type: string;
  summary: string;
}

// Serial protocol constants (matches the pad firmware)
export const DEFAULT_BAUD = 9600;
export const MAX_LINE_LEN = 512;
export const READ_TIMEOUT_MS = 1000;
export const RECONNECT_DELAY_MS = 2000;
export const MAX_RECONNECT_DELAY_MS = 30000;
export const VOLUME_STEP_DELAY_MS = 10;
export const STOP_JOIN_TIMEOUT_MS = 2000;

export const VOLUME_PREFIX = 'VOLUME_';
export const MUTE_TOKEN = 'MUTE';
export const MEDIA_TOKEN = 'MEDIA';
