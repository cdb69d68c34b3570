#!/usr/bin/env node

import { createInterface } from 'readline';
import { startBridge } from './bridge.js';
import type { BridgeHandle } from './bridge.js';
import { listPorts, formatPort } from './serial/discovery.js';
import { startSettingsServer } from './settings/server.js';
import type { SettingsServerHandle } from './settings/server.js';
import { createPlatformBackend } from './actions/backend.js';
import { ConfigError, errorMessage } from './errors.js';
import { parseArgs, USAGE } from './cli.js';
import type { CliOptions } from './cli.js';

async function printPorts(): Promise<void> {
  const ports = await listPorts();
  console.log('Available serial ports:');
  for (const port of ports) {
    console.log(`  ${formatPort(port)}`);
  }
}

function feedStdin(bridge: BridgeHandle): void {
  const rl = createInterface({ input: process.stdin });

  // Serialize handling so pasted input keeps its order
  let processing = Promise.resolve();
  rl.on('line', (input) => {
    const line = input.trim();
    if (!line) return;
    processing = processing.then(() => bridge.feedLine(line));
  });
}

async function main(): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (err) {
    console.error(`error: ${errorMessage(err)}`);
    console.error(USAGE);
    return 1;
  }

  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  if (options.listPorts) {
    await printPorts();
    return 0;
  }

  console.log('desk-deck starting...');

  let bridge: BridgeHandle;
  try {
    bridge = await startBridge({
      configPath: options.configPath,
      port: options.port,
      baudRate: options.baudRate,
      simulate: options.simulate,
      watchConfig: true,
    });
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
    } else {
      console.error('Failed to start serial listener:', errorMessage(err));
    }
    return 1;
  }

  console.log(`Config: ${bridge.getConfigPath()}`);

  let settings: SettingsServerHandle | null = null;
  if (options.gui) {
    const settingsConfig = bridge.getConfig().settings;
    try {
      settings = await startSettingsServer(bridge, {
        host: settingsConfig.host,
        port: settingsConfig.port,
      });
      if (settingsConfig.openBrowser) {
        await createPlatformBackend().openUrl(settings.url).catch((err: unknown) => {
          console.warn(`Could not open the browser (${errorMessage(err)}); open ${settings?.url} yourself`);
        });
      }
    } catch (err) {
      console.error('Failed to start settings server:', errorMessage(err));
    }
  } else {
    console.log('desk-deck running in console mode');
  }

  if (options.simulate) {
    console.log('Simulation mode: type pad lines (VOLUME_5, MUTE, BUTTON_1, ...)');
    feedStdin(bridge);
  }

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log('\nShutting down...');
    await settings?.stop();
    await bridge.shutdown();
    console.log('Shutdown complete');
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      console.error('Shutdown failed:', err);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  console.log('Ready. Press Ctrl+C to exit.');
  return 0;
}

const code = await main();
if (code !== 0) process.exit(code);
