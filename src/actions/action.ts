import { ACTION_TYPES } from '../types.js';
import type { Action, ActionRecord, ActionType } from '../types.js';

export function isActionType(value: unknown): value is ActionType {
  return ACTION_TYPES.some(type => type === value);
}

export function fromActionRecord(record: ActionRecord): Action {
  switch (record.type) {
    case 'none':
      return { type: 'none' };
    case 'link':
    case 'exe':
    case 'keypress':
    case 'text':
      return { type: record.type, value: record.value };
  }
}

export function toActionRecord(action: Action): ActionRecord {
  return action.type === 'none'
    ? { type: 'none', value: '' }
    : { type: action.type, value: action.value };
}

/**
 * Reads an untrusted `{type, value}` object (config file, settings API).
 * Returns the record, or a description of what is wrong with it.
 */
export function parseActionRecord(raw: unknown): ActionRecord | string {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return 'must be an object with "type" and "value"';
  }
  const type = 'type' in raw ? raw.type : undefined;
  const value = 'value' in raw ? raw.value : undefined;

  if (!isActionType(type)) {
    return `unknown action type "${String(type)}" (expected one of ${ACTION_TYPES.join(', ')})`;
  }
  if (value !== undefined && value !== null && typeof value !== 'string') {
    return '"value" must be a string';
  }
  return { type, value: typeof value === 'string' ? value : '' };
}

/** A non-none action needs a payload; an empty one is a configuration error. */
export function actionProblem(record: ActionRecord): string | null {
  if (record.type !== 'none' && record.value === '') {
    return `action of type "${record.type}" needs a non-empty value`;
  }
  return null;
}

export function describeAction(action: Action): string {
  return action.type === 'none' ? 'none' : `${action.type}: ${action.value}`;
}
