import { spawn } from 'child_process';
import type { ChildProcess } from 'child_process';
import { buildCommands } from './platform.js';
import type { Command, PlatformCommands } from './platform.js';
import type { KeyStroke } from './keys.js';
import type { MediaKey } from '../types.js';

/** The desktop side effects an action or the encoder can trigger. */
export interface InputBackend {
  openUrl(url: string): Promise<void>;
  launch(path: string): Promise<void>;
  sendKeys(strokes: KeyStroke[]): Promise<void>;
  typeText(text: string): Promise<void>;
  tapMediaKey(key: MediaKey): Promise<void>;
}

export type CommandRunner = (command: Command) => Promise<void>;

const TOOL_TIMEOUT_MS = 10000;

/**
 * Runs a command. Detached commands resolve as soon as the process has
 * spawned and are left running; others resolve when the tool exits with 0.
 */
export function runCommand(command: Command): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const child: ChildProcess = command.detached
      ? spawn(command.file, command.args, { detached: true, stdio: 'ignore', windowsHide: true })
      : spawn(command.file, command.args, {
        stdio: ['ignore', 'ignore', 'pipe'],
        windowsHide: true,
        timeout: TOOL_TIMEOUT_MS,
      });

    child.once('error', (err) => {
      reject(new Error(`${command.file}: ${err.message}`));
    });

    if (command.detached) {
      child.once('spawn', () => {
        child.unref();
        resolve();
      });
      return;
    }

    let stderr = '';
    child.stderr?.on('data', (chunk: Buffer) => {
      stderr += chunk.toString('utf8');
    });
    child.once('close', (code, signal) => {
      if (code === 0) {
        resolve();
      } else {
        const reason = signal ? `killed by ${signal}` : `exited with code ${code}`;
        const detail = stderr.trim();
        reject(new Error(`${command.file} ${reason}${detail ? `: ${detail}` : ''}`));
      }
    });
  });
}

export function createPlatformBackend(
  platform: NodeJS.Platform = process.platform,
  runner: CommandRunner = runCommand,
): InputBackend {
  const commands: PlatformCommands = buildCommands(platform);

  // Builders may throw (a key the platform cannot send); keep that inside the promise
  const exec = async (build: () => Command): Promise<void> => runner(build());

  return {
    openUrl: url => exec(() => commands.openUrl(url)),
    launch: path => exec(() => commands.launch(path)),
    sendKeys: strokes => exec(() => commands.sendKeys(strokes)),
    typeText: text => exec(() => commands.typeText(text)),
    tapMediaKey: key => exec(() => commands.mediaKey(key)),
  };
}
