/** Opening the serial device failed (absent, busy or access denied). */
export class ConnectError extends Error {
  readonly port: string;

  constructor(port: string, message: string) {
    super(`Failed to open ${port}: ${message}`);
    this.name = 'ConnectError';
    this.port = port;
  }
}

export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Configuration errors:\n${problems.map(p => `  - ${p}`).join('\n')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

export class KeySpecError extends Error {
  readonly spec: string;

  constructor(spec: string, reason: string) {
    super(`Invalid key combination "${spec}": ${reason}`);
    this.name = 'KeySpecError';
    this.spec = spec;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
