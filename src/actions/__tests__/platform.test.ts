import { describe, it, expect, vi } from 'vitest';
import { buildCommands, sendKeysLiteral } from '../platform.js';
import { createPlatformBackend } from '../backend.js';
import type { Command } from '../platform.js';
import { parseKeySpec } from '../keys.js';
import { KeySpecError } from '../../errors.js';

describe('linux commands', () => {
  const linux = buildCommands('linux');

  it('opens links with xdg-open and leaves it running', () => {
    expect(linux.openUrl('https://example.com')).toEqual({
      file: 'xdg-open',
      args: ['https://example.com'],
      detached: true,
    });
  });

  it('launches .desktop entries through gio and anything else directly', () => {
    expect(linux.launch('/usr/share/applications/editor.desktop')).toEqual({
      file: 'gio',
      args: ['launch', '/usr/share/applications/editor.desktop'],
      detached: true,
    });
    expect(linux.launch('/usr/bin/editor')).toEqual({ file: '/usr/bin/editor', args: [], detached: true });
  });

  it('sends each chord as one xdotool key argument', () => {
    expect(linux.sendKeys(parseKeySpec('ctrl+shift+t, enter'))).toEqual({
      file: 'xdotool',
      args: ['key', '--clearmodifiers', 'ctrl+shift+t', 'Return'],
      detached: false,
    });
    expect(linux.sendKeys(parseKeySpec('meta+F5')).args).toEqual(['key', '--clearmodifiers', 'super+F5']);
    expect(linux.sendKeys(parseKeySpec('ctrl+plus')).args).toEqual(['key', '--clearmodifiers', 'ctrl+plus']);
    expect(linux.sendKeys(parseKeySpec('ctrl+shift')).args).toEqual(['key', '--clearmodifiers', 'ctrl+Shift_L']);
  });

  it('types text literally', () => {
    expect(linux.typeText('-n hello')).toEqual({ file: 'xdotool', args: ['type', '--', '-n hello'], detached: false });
  });

  it('maps media keys to XF86 keysyms', () => {
    expect(linux.mediaKey('volumeUp').args).toEqual(['key', 'XF86AudioRaiseVolume']);
    expect(linux.mediaKey('volumeDown').args).toEqual(['key', 'XF86AudioLowerVolume']);
    expect(linux.mediaKey('mute').args).toEqual(['key', 'XF86AudioMute']);
    expect(linux.mediaKey('playPause').args).toEqual(['key', 'XF86AudioPlay']);
  });

  it('is the fallback for other unix platforms', () => {
    expect(buildCommands('freebsd').openUrl('https://example.com').file).toBe('xdg-open');
  });
});

describe('darwin commands', () => {
  const darwin = buildCommands('darwin');

  it('opens links and app bundles with open', () => {
    expect(darwin.openUrl('https://example.com')).toEqual({ file: 'open', args: ['https://example.com'], detached: true });
    expect(darwin.launch('/Applications/Editor.app')).toEqual({
      file: 'open',
      args: ['/Applications/Editor.app'],
      detached: true,
    });
  });

  it('sends chords through System Events', () => {
    expect(darwin.sendKeys(parseKeySpec('cmd+shift+t, enter'))).toEqual({
      file: 'osascript',
      args: [
        '-e', 'tell application "System Events"',
        '-e', 'keystroke "t" using {command down, shift down}',
        '-e', 'key code 36',
        '-e', 'end tell',
      ],
      detached: false,
    });
  });

  it('rejects keys macOS has no code for', () => {
    expect(() => darwin.sendKeys(parseKeySpec('printscreen'))).toThrow(
      'Invalid key combination "printscreen": "printscreen" cannot be sent on macOS',
    );
  });

  it('quotes typed text for AppleScript', () => {
    expect(darwin.typeText('say "hi"').args).toEqual([
      '-e',
      'tell application "System Events" to keystroke "say \\"hi\\""',
    ]);
  });

  it('toggles mute through the volume settings', () => {
    expect(darwin.mediaKey('mute').args).toEqual([
      '-e',
      'set volume output muted (not (output muted of (get volume settings)))',
    ]);
  });
});

describe('win32 commands', () => {
  const win32 = buildCommands('win32');

  function script(command: Command): string[] {
    expect(command.file).toBe('powershell.exe');
    expect(command.args.slice(0, 3)).toEqual(['-NoProfile', '-NonInteractive', '-Command']);
    return command.args[3].split('; ');
  }

  it('opens links through the URL handler', () => {
    expect(win32.openUrl('https://www.youtube.com')).toEqual({
      file: 'rundll32',
      args: ['url.dll,FileProtocolHandler', 'https://www.youtube.com'],
      detached: true,
    });
  });

  it('starts shortcuts through cmd and runs executables directly', () => {
    expect(win32.launch('C:\\Users\\me\\Desktop\\Game.lnk')).toEqual({
      file: 'cmd',
      args: ['/c', 'start', '', 'C:\\Users\\me\\Desktop\\Game.lnk'],
      detached: true,
    });
    expect(win32.launch('C:\\Tools\\app.exe')).toEqual({ file: 'C:\\Tools\\app.exe', args: [], detached: true });
  });

  it('presses modifiers, taps the key and releases in reverse order', () => {
    expect(script(win32.sendKeys(parseKeySpec('ctrl+alt+f13'))).slice(-6)).toEqual([
      '$k::keybd_event(17, 0, 0, [UIntPtr]::Zero)',
      '$k::keybd_event(18, 0, 0, [UIntPtr]::Zero)',
      '$k::keybd_event(124, 0, 0, [UIntPtr]::Zero)',
      '$k::keybd_event(124, 0, 2, [UIntPtr]::Zero)',
      '$k::keybd_event(18, 0, 2, [UIntPtr]::Zero)',
      '$k::keybd_event(17, 0, 2, [UIntPtr]::Zero)',
    ]);
  });

  it('uses the letter code for letters', () => {
    expect(script(win32.sendKeys(parseKeySpec('c'))).slice(-2)).toEqual([
      '$k::keybd_event(67, 0, 0, [UIntPtr]::Zero)',
      '$k::keybd_event(67, 0, 2, [UIntPtr]::Zero)',
    ]);
  });

  it('rejects characters without a virtual key', () => {
    expect(() => win32.sendKeys(parseKeySpec('shift+é'))).toThrow(KeySpecError);
  });

  it('sends media keys as extended key events', () => {
    expect(script(win32.mediaKey('volumeUp')).slice(-2)).toEqual([
      '$k::keybd_event(175, 0, 1, [UIntPtr]::Zero)',
      '$k::keybd_event(175, 0, 3, [UIntPtr]::Zero)',
    ]);
    expect(script(win32.mediaKey('playPause')).slice(-2)).toEqual([
      '$k::keybd_event(179, 0, 1, [UIntPtr]::Zero)',
      '$k::keybd_event(179, 0, 3, [UIntPtr]::Zero)',
    ]);
  });

  it('types text through SendKeys', () => {
    expect(win32.typeText('hi+1').args[3]).toBe("(New-Object -ComObject WScript.Shell).SendKeys('hi{+}1')");
  });
});

describe('sendKeysLiteral', () => {
  it('wraps SendKeys metacharacters in braces', () => {
    expect(sendKeysLiteral('50% off (today)')).toBe('50{%} off {(}today{)}');
    expect(sendKeysLiteral('a{b}')).toBe('a{{}b{}}');
  });

  it('turns newlines into ENTER and doubles single quotes', () => {
    expect(sendKeysLiteral("it's\r\nok")).toBe("it''s{ENTER}ok");
  });
});

describe('createPlatformBackend', () => {
  it('hands the built command to the runner', async () => {
    const runner = vi.fn((_command: Command) => Promise.resolve());
    const backend = createPlatformBackend('linux', runner);

    await backend.openUrl('https://example.com');
    await backend.tapMediaKey('mute');

    expect(runner.mock.calls).toEqual([
      [{ file: 'xdg-open', args: ['https://example.com'], detached: true }],
      [{ file: 'xdotool', args: ['key', 'XF86AudioMute'], detached: false }],
    ]);
  });

  it('turns a key the platform cannot send into a rejection', async () => {
    const runner = vi.fn((_command: Command) => Promise.resolve());
    const backend = createPlatformBackend('darwin', runner);

    await expect(backend.sendKeys(parseKeySpec('capslock'))).rejects.toBeInstanceOf(KeySpecError);
    expect(runner).not.toHaveBeenCalled();
  });

  it('passes runner failures through', async () => {
    const backend = createPlatformBackend('linux', () => Promise.reject(new Error('xdotool: spawn xdotool ENOENT')));
    await expect(backend.typeText('hello')).rejects.toThrow('xdotool: spawn xdotool ENOENT');
  });
});
