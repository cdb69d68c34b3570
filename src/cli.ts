import { resolve } from 'path';

export interface CliOptions {
  gui: boolean;
  listPorts: boolean;
  simulate: boolean;
  help: boolean;
  port?: string;
  baudRate?: number;
  configPath: string;
}

export const USAGE = `Usage: desk-deck [options]

  --gui                Start with the settings page (default)
  --nogui              Console mode
  --port <name>        Serial port to use (overrides the config file)
  --baudrate <n>       Baud rate (default 9600)
  --config <path>      Config file (default ./config.yaml)
  --list-ports         List available serial ports and exit
  --simulate           Read pad lines from stdin instead of a serial port
  -h, --help           Show this help`;

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = {
    gui: true,
    listPorts: false,
    simulate: false,
    help: false,
    configPath: resolve('config.yaml'),
  };

  const value = (i: number, flag: string): string => {
    const next = argv[i + 1];
    if (next === undefined || next.startsWith('--')) {
      throw new Error(`${flag} needs a value`);
    }
    return next;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--gui':
        options.gui = true;
        break;
      case '--nogui':
        options.gui = false;
        break;
      case '--list-ports':
        options.listPorts = true;
        break;
      case '--simulate':
        options.simulate = true;
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      case '--port':
        options.port = value(i++, arg);
        break;
      case '--baudrate': {
        const raw = value(i++, arg);
        const baudRate = Number(raw);
        if (!Number.isInteger(baudRate) || baudRate <= 0) {
          throw new Error(`--baudrate must be a positive integer, got "${raw}"`);
        }
        options.baudRate = baudRate;
        break;
      }
      case '--config':
        options.configPath = resolve(value(i++, arg));
        break;
      default:
        throw new Error(`unknown option: ${arg}`);
    }
  }

  return options;
}
