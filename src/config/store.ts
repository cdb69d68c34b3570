import { EventEmitter } from 'events';
import { readFileSync, unwatchFile, watchFile } from 'fs';
import { ConfigError } from '../errors.js';
import { actionProblem, fromActionRecord, toActionRecord } from '../actions/action.js';
import { loadConfig, saveConfig } from './loader.js';
import type { Action, ActionRecord, ButtonMap, Config } from '../types.js';

export interface ActionLookup {
  lookup(key: string): Action | undefined;
}

function freezeButtons(records: Record<string, ActionRecord>): ButtonMap {
  const map: Record<string, Action> = {};
  for (const [key, record] of Object.entries(records)) {
    map[key] = Object.freeze(fromActionRecord(record));
  }
  return Object.freeze(map);
}

/**
 * Holds the loaded configuration as an immutable snapshot. Every edit builds
 * a new snapshot, writes it to disk and swaps it in, so readers never see a
 * half-applied change.
 *
 * Events: 'change' (after an edit is saved), 'reload' (after the file was
 * re-read).
 */
export class ConfigStore extends EventEmitter implements ActionLookup {
  private readonly path: string;
  private config: Readonly<Config>;
  private buttonMap: ButtonMap;
  private lastWritten: string | null = null;
  private watching = false;

  constructor(path: string, config: Config) {
    super();
    this.path = path;
    this.config = Object.freeze(config);
    this.buttonMap = freezeButtons(config.buttons);
  }

  static open(path: string): ConfigStore {
    return new ConfigStore(path, loadConfig(path));
  }

  getPath(): string {
    return this.path;
  }

  getConfig(): Readonly<Config> {
    return this.config;
  }

  buttons(): ButtonMap {
    return this.buttonMap;
  }

  lookup(key: string): Action | undefined {
    return Object.hasOwn(this.buttonMap, key) ? this.buttonMap[key] : undefined;
  }

  setAction(key: string, action: Action): void {
    if (key.trim() === '') {
      throw new ConfigError(['button key must not be empty']);
    }
    const record = toActionRecord(action);
    const problem = actionProblem(record);
    if (problem) {
      throw new ConfigError([`buttons.${key}: ${problem}`]);
    }
    this.commit({ ...this.config.buttons, [key]: record });
  }

  removeAction(key: string): boolean {
    if (!Object.hasOwn(this.config.buttons, key)) return false;
    const { [key]: _removed, ...rest } = this.config.buttons;
    this.commit(rest);
    return true;
  }

  replaceButtons(buttons: Record<string, ActionRecord>): void {
    const problems: string[] = [];
    for (const [key, record] of Object.entries(buttons)) {
      const problem = actionProblem(record);
      if (problem) problems.push(`buttons.${key}: ${problem}`);
    }
    if (problems.length > 0) {
      throw new ConfigError(problems);
    }
    this.commit({ ...buttons });
  }

  /** Re-reads the config file and swaps in what it holds. */
  reload(): Readonly<Config> {
    const config = loadConfig(this.path);
    this.swap(config);
    this.emit('reload', this.config);
    return this.config;
  }

  /** Reloads when the file is edited by something other than this store. */
  watch(intervalMs = 1000): void {
    if (this.watching) return;
    this.watching = true;

    watchFile(this.path, { interval: intervalMs }, (curr, prev) => {
      if (curr.mtimeMs === prev.mtimeMs) return;

      let content: string;
      try {
        content = readFileSync(this.path, 'utf8');
      } catch (err) {
        console.warn(`Config file unreadable: ${this.path}`, err);
        return;
      }
      if (content === this.lastWritten) return;

      try {
        console.log('Config file changed, reloading...');
        this.reload();
      } catch (err) {
        console.error('Failed to reload config, keeping the previous one:', err);
      }
    });
  }

  unwatch(): void {
    if (!this.watching) return;
    unwatchFile(this.path);
    this.watching = false;
  }

  private commit(buttons: Record<string, ActionRecord>): void {
    const next: Config = { ...this.config, buttons };
    saveConfig(this.path, next);
    this.lastWritten = readFileSync(this.path, 'utf8');
    this.swap(next);
    this.emit('change', this.config);
  }

  private swap(config: Config): void {
    this.buttonMap = freezeButtons(config.buttons);
    this.config = Object.freeze(config);
  }
}
