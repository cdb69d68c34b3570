import { readFileSync, writeFileSync } from 'fs';
import { parse, stringify } from 'yaml';
import { ConfigError } from '../errors.js';
import { actionProblem, parseActionRecord } from '../actions/action.js';
import {
  DEFAULT_BAUD,
  MAX_RECONNECT_DELAY_MS,
  READ_TIMEOUT_MS,
  RECONNECT_DELAY_MS,
  VOLUME_STEP_DELAY_MS,
} from '../types.js';
import type { ActionRecord, Config } from '../types.js';

export const DEFAULT_PORT = process.platform === 'win32' ? 'COM6' : '/dev/ttyACM0';
export const DEFAULT_BUTTON_COUNT = 9;
export const DEMO_LINK = 'https://www.youtube.com';

const SECTIONS = ['device', 'serial', 'settings', 'buttons'];

type Fields = Record<string, unknown>;

export function defaultButtons(): Record<string, ActionRecord> {
  const buttons: Record<string, ActionRecord> = {};
  for (let i = 1; i <= DEFAULT_BUTTON_COUNT; i++) {
    buttons[`BUTTON_${i}`] = { type: 'none', value: '' };
  }
  buttons.BUTTON_1 = { type: 'link', value: DEMO_LINK };
  return buttons;
}

export function defaultConfig(): Config {
  return {
    device: {
      port: DEFAULT_PORT,
      baudRate: DEFAULT_BAUD,
    },
    serial: {
      readTimeoutMs: READ_TIMEOUT_MS,
      reconnectDelayMs: RECONNECT_DELAY_MS,
      maxReconnectDelayMs: MAX_RECONNECT_DELAY_MS,
      volumeStepDelayMs: VOLUME_STEP_DELAY_MS,
      backoff: 'fixed',
    },
    settings: {
      host: 'localhost',
      port: 0,
      openBrowser: true,
    },
    buttons: defaultButtons(),
  };
}

/**
 * Loads the config file, merging it over the defaults. A missing file is
 * created with the defaults. JSON files load as well, including the old
 * flat `{ "BUTTON_1": { "type": ..., "value": ... } }` layout.
 */
export function loadConfig(path: string): Config {
  let content: string;
  try {
    content = readFileSync(path, 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      console.warn(`Config file not found: ${path}, creating defaults`);
      const config = defaultConfig();
      saveConfig(path, config);
      return config;
    }
    throw err;
  }

  const parsed: unknown = parse(content);
  return mergeConfig(defaultConfig(), asFields(parsed) ?? {});
}

export function saveConfig(path: string, config: Config): void {
  writeFileSync(path, toYaml(config), 'utf8');
}

function asFields(value: unknown): Fields | undefined {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return undefined;
  }
  const fields: Fields = {};
  for (const [key, entry] of Object.entries(value)) {
    fields[key] = entry;
  }
  return fields;
}

/** A file with none of the known sections is the old flat button map. */
function isLegacyButtonMap(fields: Fields): boolean {
  const keys = Object.keys(fields);
  return keys.length > 0 && !keys.some(k => SECTIONS.includes(k));
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = value.trim().toLowerCase().startsWith('0x') ? parseInt(value, 16) : Number(value);
    return Number.isNaN(n) ? undefined : n;
  }
  return undefined;
}

function pick<T>(value: unknown, guard: (v: unknown) => v is T, fallback: T): T {
  return guard(value) ? value : fallback;
}

const isString = (v: unknown): v is string => typeof v === 'string';
const isBoolean = (v: unknown): v is boolean => typeof v === 'boolean';

function mergeConfig(defaults: Config, overrides: Fields): Config {
  if (isLegacyButtonMap(overrides)) {
    return { ...defaults, buttons: parseButtons(overrides) };
  }

  const device = asFields(overrides.device) ?? {};
  const serial = asFields(overrides.serial) ?? {};
  const settings = asFields(overrides.settings) ?? {};
  const buttons = asFields(overrides.buttons);

  const vendorId = toNumber(device.vendorId);
  const productId = toNumber(device.productId);
  // USB ids in the file take over from the default port
  const fallbackPort = vendorId && productId ? undefined : defaults.device.port;

  return {
    device: {
      port: isString(device.port) && device.port !== '' ? device.port : fallbackPort,
      vendorId,
      productId,
      baudRate: toNumber(device.baudRate) ?? defaults.device.baudRate,
    },
    serial: {
      readTimeoutMs: toNumber(serial.readTimeoutMs) ?? defaults.serial.readTimeoutMs,
      reconnectDelayMs: toNumber(serial.reconnectDelayMs) ?? defaults.serial.reconnectDelayMs,
      maxReconnectDelayMs: toNumber(serial.maxReconnectDelayMs) ?? defaults.serial.maxReconnectDelayMs,
      volumeStepDelayMs: toNumber(serial.volumeStepDelayMs) ?? defaults.serial.volumeStepDelayMs,
      backoff: serial.backoff === 'exponential' ? 'exponential' : defaults.serial.backoff,
    },
    settings: {
      host: pick(settings.host, isString, defaults.settings.host),
      port: toNumber(settings.port) ?? defaults.settings.port,
      openBrowser: pick(settings.openBrowser, isBoolean, defaults.settings.openBrowser),
    },
    buttons: buttons ? parseButtons(buttons) : defaults.buttons,
  };
}

function parseButtons(raw: Fields): Record<string, ActionRecord> {
  const buttons: Record<string, ActionRecord> = {};
  const problems: string[] = [];

  for (const [key, entry] of Object.entries(raw)) {
    const record = parseActionRecord(entry);
    if (typeof record === 'string') {
      problems.push(`buttons.${key}: ${record}`);
    } else {
      buttons[key] = record;
    }
  }

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
  return buttons;
}

export function validateConfig(config: Config): string[] {
  const errors: string[] = [];

  const hasPort = !!config.device.port;
  const hasIds = !!config.device.vendorId && config.device.vendorId > 0 &&
                 !!config.device.productId && config.device.productId > 0;
  if (!hasPort && !hasIds) {
    errors.push('device.port or both device.vendorId and device.productId must be set');
  }
  if (!Number.isInteger(config.device.baudRate) || config.device.baudRate <= 0) {
    errors.push('device.baudRate must be a positive integer');
  }
  if (config.serial.readTimeoutMs <= 0) {
    errors.push('serial.readTimeoutMs must be positive');
  }
  if (config.serial.reconnectDelayMs <= 0) {
    errors.push('serial.reconnectDelayMs must be positive');
  }
  if (config.serial.maxReconnectDelayMs < config.serial.reconnectDelayMs) {
    errors.push('serial.maxReconnectDelayMs must not be less than serial.reconnectDelayMs');
  }
  if (config.serial.volumeStepDelayMs < 0) {
    errors.push('serial.volumeStepDelayMs must not be negative');
  }
  if (!Number.isInteger(config.settings.port) || config.settings.port < 0 || config.settings.port > 65535) {
    errors.push('settings.port must be between 0 and 65535');
  }
  for (const [key, record] of Object.entries(config.buttons)) {
    const problem = actionProblem(record);
    if (problem) errors.push(`buttons.${key}: ${problem}`);
  }

  return errors;
}

/**
 * Serializes the config back to YAML. Only writes device fields that are
 * set, with USB ids in hex as they are usually quoted.
 */
function toYaml(config: Config): string {
  const device: Record<string, string | number> = {};
  if (config.device.port) device.port = config.device.port;
  if (config.device.vendorId) device.vendorId = `0x${config.device.vendorId.toString(16)}`;
  if (config.device.productId) device.productId = `0x${config.device.productId.toString(16)}`;
  device.baudRate = config.device.baudRate;

  return stringify({
    device,
    serial: config.serial,
    settings: config.settings,
    buttons: config.buttons,
  });
}
