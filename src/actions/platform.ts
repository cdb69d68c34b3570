import { extname } from 'path';
import { KeySpecError } from '../errors.js';
import { formatKeyStroke, isFunctionKey } from './keys.js';
import type { KeyStroke, Modifier } from './keys.js';
import type { MediaKey } from '../types.js';

export interface Command {
  file: string;
  args: string[];
  /** Launched and left running instead of waited for. */
  detached: boolean;
}

/** Builds the OS tool invocations behind each desktop side effect. */
export interface PlatformCommands {
  openUrl(url: string): Command;
  launch(path: string): Command;
  sendKeys(strokes: KeyStroke[]): Command;
  typeText(text: string): Command;
  mediaKey(key: MediaKey): Command;
}

const run = (file: string, args: string[]): Command => ({ file, args, detached: false });
const detach = (file: string, args: string[]): Command => ({ file, args, detached: true });

// --- linux (xdotool) -------------------------------------------------------

const X_MODIFIERS: Record<Modifier, string> = {
  ctrl: 'ctrl',
  shift: 'shift',
  alt: 'alt',
  meta: 'super',
};

const X_MODIFIER_KEYS: Record<Modifier, string> = {
  ctrl: 'Control_L',
  shift: 'Shift_L',
  alt: 'Alt_L',
  meta: 'Super_L',
};

const X_KEYS: Record<string, string> = {
  enter: 'Return',
  escape: 'Escape',
  tab: 'Tab',
  space: 'space',
  backspace: 'BackSpace',
  delete: 'Delete',
  insert: 'Insert',
  home: 'Home',
  end: 'End',
  pageup: 'Prior',
  pagedown: 'Next',
  up: 'Up',
  down: 'Down',
  left: 'Left',
  right: 'Right',
  printscreen: 'Print',
  capslock: 'Caps_Lock',
  '+': 'plus',
  ',': 'comma',
  '.': 'period',
  '-': 'minus',
  '=': 'equal',
  '/': 'slash',
  '\\': 'backslash',
  ';': 'semicolon',
  "'": 'apostrophe',
  '`': 'grave',
  '[': 'bracketleft',
  ']': 'bracketright',
  ' ': 'space',
};

const X_MEDIA: Record<MediaKey, string> = {
  volumeUp: 'XF86AudioRaiseVolume',
  volumeDown: 'XF86AudioLowerVolume',
  mute: 'XF86AudioMute',
  playPause: 'XF86AudioPlay',
};

function xKey(key: string): string {
  if (key === 'ctrl' || key === 'shift' || key === 'alt' || key === 'meta') return X_MODIFIER_KEYS[key];
  if (Object.hasOwn(X_KEYS, key)) return X_KEYS[key];
  if (isFunctionKey(key)) return key.toUpperCase();
  return key;
}

const linux: PlatformCommands = {
  openUrl: url => detach('xdg-open', [url]),
  launch: path => extname(path).toLowerCase() === '.desktop'
    ? detach('gio', ['launch', path])
    : detach(path, []),
  sendKeys: strokes => run('xdotool', [
    'key',
    '--clearmodifiers',
    ...strokes.map(s => [...s.modifiers.map(m => X_MODIFIERS[m]), xKey(s.key)].join('+')),
  ]),
  typeText: text => run('xdotool', ['type', '--', text]),
  mediaKey: key => run('xdotool', ['key', X_MEDIA[key]]),
};

// --- darwin (osascript / System Events) -------------------------------------

const MAC_MODIFIERS: Record<Modifier, string> = {
  ctrl: 'control down',
  shift: 'shift down',
  alt: 'option down',
  meta: 'command down',
};

const MAC_KEY_CODES: Record<string, number> = {
  enter: 36, escape: 53, tab: 48, space: 49, backspace: 51, delete: 117,
  home: 115, end: 119, pageup: 116, pagedown: 121,
  left: 123, right: 124, down: 125, up: 126,
  ctrl: 59, shift: 56, alt: 58, meta: 55,
  f1: 122, f2: 120, f3: 99, f4: 118, f5: 96, f6: 97, f7: 98, f8: 100,
  f9: 101, f10: 109, f11: 103, f12: 111, f13: 105, f14: 107, f15: 113,
  f16: 106, f17: 64, f18: 79, f19: 80, f20: 90,
};

function appleString(text: string): string {
  return `"${text.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function macStroke(stroke: KeyStroke): string {
  let press: string;
  if (Object.hasOwn(MAC_KEY_CODES, stroke.key)) {
    press = `key code ${MAC_KEY_CODES[stroke.key]}`;
  } else if ([...stroke.key].length === 1) {
    press = `keystroke ${appleString(stroke.key)}`;
  } else {
    throw new KeySpecError(formatKeyStroke(stroke), `"${stroke.key}" cannot be sent on macOS`);
  }
  if (stroke.modifiers.length === 0) return press;
  return `${press} using {${stroke.modifiers.map(m => MAC_MODIFIERS[m]).join(', ')}}`;
}

const MAC_MEDIA: Record<MediaKey, string> = {
  volumeUp: 'set volume output volume ((output volume of (get volume settings)) + 6)',
  volumeDown: 'set volume output volume ((output volume of (get volume settings)) - 6)',
  mute: 'set volume output muted (not (output muted of (get volume settings)))',
  playPause: 'tell application "Music" to playpause',
};

function osascript(lines: string[]): Command {
  return run('osascript', lines.flatMap(line => ['-e', line]));
}

const MAC_BUNDLES = ['.app', '.command', '.webloc', '.inetloc'];

const darwin: PlatformCommands = {
  openUrl: url => detach('open', [url]),
  launch: path => MAC_BUNDLES.includes(extname(path).toLowerCase())
    ? detach('open', [path])
    : detach(path, []),
  sendKeys: strokes => osascript([
    'tell application "System Events"',
    ...strokes.map(macStroke),
    'end tell',
  ]),
  typeText: text => osascript([`tell application "System Events" to keystroke ${appleString(text)}`]),
  mediaKey: key => osascript([MAC_MEDIA[key]]),
};

// --- win32 (PowerShell, user32 keybd_event) --------------------------------

const VK: Record<string, number> = {
  ctrl: 0x11, shift: 0x10, alt: 0x12, meta: 0x5b,
  enter: 0x0d, escape: 0x1b, tab: 0x09, space: 0x20, backspace: 0x08,
  delete: 0x2e, insert: 0x2d, home: 0x24, end: 0x23, pageup: 0x21, pagedown: 0x22,
  left: 0x25, up: 0x26, right: 0x27, down: 0x28,
  printscreen: 0x2c, capslock: 0x14,
  ';': 0xba, '=': 0xbb, '+': 0xbb, ',': 0xbc, '-': 0xbd, '.': 0xbe, '/': 0xbf,
  '`': 0xc0, '[': 0xdb, '\\': 0xdc, ']': 0xdd, "'": 0xde, ' ': 0x20,
};

const VK_MEDIA: Record<MediaKey, number> = {
  volumeUp: 0xaf,
  volumeDown: 0xae,
  mute: 0xad,
  playPause: 0xb3,
};

const KEYEVENTF_EXTENDEDKEY = 0x0001;
const KEYEVENTF_KEYUP = 0x0002;

function virtualKey(stroke: KeyStroke, key: string): number {
  if (Object.hasOwn(VK, key)) return VK[key];
  if (isFunctionKey(key)) return 0x70 + Number(key.slice(1)) - 1;
  if (/^[a-z0-9]$/.test(key)) return key.toUpperCase().charCodeAt(0);
  throw new KeySpecError(formatKeyStroke(stroke), `"${key}" has no virtual key code`);
}

function keybdEvent(vk: number, flags: number): string {
  return `$k::keybd_event(${vk}, 0, ${flags}, [UIntPtr]::Zero)`;
}

function powershell(script: string[]): Command {
  return run('powershell.exe', ['-NoProfile', '-NonInteractive', '-Command', script.join('; ')]);
}

const KEYBD_PRELUDE = [
  `$sig = '[DllImport("user32.dll")] public static extern void keybd_event(byte bVk, byte bScan, uint dwFlags, UIntPtr dwExtraInfo);'`,
  '$k = Add-Type -MemberDefinition $sig -Name Keyboard -Namespace DeskDeck -PassThru',
];

function windowsStroke(stroke: KeyStroke): string[] {
  const mods = stroke.modifiers.map(m => VK[m]);
  const key = virtualKey(stroke, stroke.key);
  return [
    ...mods.map(vk => keybdEvent(vk, 0)),
    keybdEvent(key, 0),
    keybdEvent(key, KEYEVENTF_KEYUP),
    ...[...mods].reverse().map(vk => keybdEvent(vk, KEYEVENTF_KEYUP)),
  ];
}

/** Escapes text for WScript.Shell.SendKeys inside a single-quoted PowerShell string. */
export function sendKeysLiteral(text: string): string {
  return text
    .replace(/[+^%~(){}[\]]/g, ch => `{${ch}}`)
    .replace(/\r?\n/g, '{ENTER}')
    .replace(/'/g, "''");
}

const WIN_SHORTCUTS = ['.lnk', '.url'];

const win32: PlatformCommands = {
  openUrl: url => detach('rundll32', ['url.dll,FileProtocolHandler', url]),
  launch: path => WIN_SHORTCUTS.includes(extname(path).toLowerCase())
    ? detach('cmd', ['/c', 'start', '', path])
    : detach(path, []),
  sendKeys: strokes => powershell([...KEYBD_PRELUDE, ...strokes.flatMap(windowsStroke)]),
  typeText: text => powershell([
    `(New-Object -ComObject WScript.Shell).SendKeys('${sendKeysLiteral(text)}')`,
  ]),
  mediaKey: key => powershell([
    ...KEYBD_PRELUDE,
    keybdEvent(VK_MEDIA[key], KEYEVENTF_EXTENDEDKEY),
    keybdEvent(VK_MEDIA[key], KEYEVENTF_EXTENDEDKEY | KEYEVENTF_KEYUP),
  ]),
};

export function buildCommands(platform: NodeJS.Platform): PlatformCommands {
  switch (platform) {
    case 'win32':
      return win32;
    case 'darwin':
      return darwin;
    default:
      return linux;
  }
}
