import { KeySpecError } from '../errors.js';

export type Modifier = 'ctrl' | 'shift' | 'alt' | 'meta';

export type NamedKey =
  | 'enter' | 'escape' | 'tab' | 'space' | 'backspace' | 'delete' | 'insert'
  | 'home' | 'end' | 'pageup' | 'pagedown' | 'up' | 'down' | 'left' | 'right'
  | 'printscreen' | 'capslock';

/**
 * One chord: modifiers held while `key` is pressed and released. `key` is a
 * named key, a function key (`f1`..`f24`), a single character, or a modifier
 * when the chord is made of modifiers only.
 */
export interface KeyStroke {
  modifiers: Modifier[];
  key: string;
}

const MODIFIER_ALIASES: Record<string, Modifier> = {
  ctrl: 'ctrl',
  control: 'ctrl',
  shift: 'shift',
  alt: 'alt',
  option: 'alt',
  meta: 'meta',
  win: 'meta',
  windows: 'meta',
  cmd: 'meta',
  command: 'meta',
  super: 'meta',
};

const KEY_ALIASES: Record<string, NamedKey> = {
  enter: 'enter',
  return: 'enter',
  esc: 'escape',
  escape: 'escape',
  tab: 'tab',
  space: 'space',
  spacebar: 'space',
  backspace: 'backspace',
  delete: 'delete',
  del: 'delete',
  insert: 'insert',
  ins: 'insert',
  home: 'home',
  end: 'end',
  pageup: 'pageup',
  'page up': 'pageup',
  pgup: 'pageup',
  pagedown: 'pagedown',
  'page down': 'pagedown',
  pgdn: 'pagedown',
  up: 'up',
  down: 'down',
  left: 'left',
  right: 'right',
  printscreen: 'printscreen',
  'print screen': 'printscreen',
  capslock: 'capslock',
  'caps lock': 'capslock',
};

const FUNCTION_KEY = /^f([1-9]|1[0-9]|2[0-4])$/;

export function isModifier(key: string): key is Modifier {
  return key === 'ctrl' || key === 'shift' || key === 'alt' || key === 'meta';
}

export function isFunctionKey(key: string): boolean {
  return FUNCTION_KEY.test(key);
}

function normalizeKey(spec: string, token: string): string {
  const name = token.toLowerCase().replace(/\s+/g, ' ');
  // "+" and "," are separators, so those keys are spelled out
  if (name === 'plus') return '+';
  if (name === 'comma') return ',';

  if (Object.hasOwn(MODIFIER_ALIASES, name)) return MODIFIER_ALIASES[name];
  if (Object.hasOwn(KEY_ALIASES, name)) return KEY_ALIASES[name];

  if (FUNCTION_KEY.test(name)) return name;
  if ([...token].length === 1) return token.toLowerCase();

  throw new KeySpecError(spec, `unknown key "${token}"`);
}

/**
 * Parses a human-readable key combination such as `ctrl+shift+t`, or a
 * sequence of them separated by commas (`ctrl+c, ctrl+v`).
 */
export function parseKeySpec(spec: string): KeyStroke[] {
  if (spec.trim() === '') {
    throw new KeySpecError(spec, 'empty');
  }

  return spec.split(',').map(part => {
    const tokens = part.split('+').map(t => t.trim());
    if (tokens.some(t => t === '')) {
      throw new KeySpecError(spec, `empty key in "${part.trim()}"`);
    }

    const keys = tokens.map(t => normalizeKey(spec, t));
    const modifiers: Modifier[] = [];
    let key: string | undefined;

    for (const k of keys) {
      if (isModifier(k)) {
        if (!modifiers.includes(k)) modifiers.push(k);
      } else if (key === undefined) {
        key = k;
      } else {
        throw new KeySpecError(spec, `more than one key in "${part.trim()}"`);
      }
    }

    if (key === undefined) {
      // modifiers only: the last one is pressed on its own
      const last = modifiers.pop();
      if (last === undefined) throw new KeySpecError(spec, 'no key');
      return { modifiers, key: last };
    }
    return { modifiers, key };
  });
}

export function formatKeyStroke(stroke: KeyStroke): string {
  const key = stroke.key === '+' ? 'plus' : stroke.key === ',' ? 'comma' : stroke.key;
  return [...stroke.modifiers, key].join('+');
}
