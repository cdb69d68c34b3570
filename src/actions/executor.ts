import { KeySpecError, errorMessage } from '../errors.js';
import { describeAction } from './action.js';
import { parseKeySpec } from './keys.js';
import type { InputBackend } from './backend.js';
import type { Action } from '../types.js';

export type ExecErrorKind = 'LaunchFailed' | 'InvalidSpec' | 'InvalidConfig';

export interface ExecError {
  kind: ExecErrorKind;
  message: string;
}

export type ExecResult = { ok: true } | { ok: false; error: ExecError };

const OK: ExecResult = { ok: true };

function failed(kind: ExecErrorKind, message: string): ExecResult {
  return { ok: false, error: { kind, message } };
}

/**
 * Performs the single desktop side effect an action describes. Never throws:
 * every failure comes back as an {@link ExecResult}.
 */
export class ActionExecutor {
  private backend: InputBackend;

  constructor(backend: InputBackend) {
    this.backend = backend;
  }

  async execute(action: Action): Promise<ExecResult> {
    if (action.type === 'none') {
      console.log('No action to execute');
      return OK;
    }
    if (action.value === '') {
      return failed('InvalidConfig', `action of type "${action.type}" has an empty value`);
    }

    console.log(`Executing action: ${describeAction(action)}`);
    try {
      switch (action.type) {
        case 'link':
          await this.backend.openUrl(action.value);
          break;
        case 'exe':
          await this.backend.launch(action.value);
          break;
        case 'keypress':
          await this.backend.sendKeys(parseKeySpec(action.value));
          break;
        case 'text':
          await this.backend.typeText(action.value);
          break;
        default:
          return assertNever(action);
      }
    } catch (err) {
      if (err instanceof KeySpecError) {
        return failed('InvalidSpec', err.message);
      }
      return failed('LaunchFailed', errorMessage(err));
    }
    return OK;
  }
}

function assertNever(action: never): never {
  throw new Error(`Unhandled action: ${JSON.stringify(action)}`);
}
