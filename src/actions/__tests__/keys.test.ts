import { describe, it, expect } from 'vitest';
import { formatKeyStroke, parseKeySpec } from '../keys.js';
import { KeySpecError } from '../../errors.js';

describe('parseKeySpec', () => {
  it('parses a chord of modifiers and one key', () => {
    expect(parseKeySpec('ctrl+shift+t')).toEqual([{ modifiers: ['ctrl', 'shift'], key: 't' }]);
  });

  it('accepts aliases, spacing and any case', () => {
    expect(parseKeySpec('Control + Alt + Del')).toEqual([{ modifiers: ['ctrl', 'alt'], key: 'delete' }]);
    expect(parseKeySpec('cmd+space')).toEqual([{ modifiers: ['meta'], key: 'space' }]);
    expect(parseKeySpec('win+Page Up')).toEqual([{ modifiers: ['meta'], key: 'pageup' }]);
    expect(parseKeySpec('option+Return')).toEqual([{ modifiers: ['alt'], key: 'enter' }]);
  });

  it('parses a comma separated sequence', () => {
    expect(parseKeySpec('ctrl+c, ctrl+v')).toEqual([
      { modifiers: ['ctrl'], key: 'c' },
      { modifiers: ['ctrl'], key: 'v' },
    ]);
  });

  it('understands function keys up to f24', () => {
    expect(parseKeySpec('F5')).toEqual([{ modifiers: [], key: 'f5' }]);
    expect(parseKeySpec('shift+f24')).toEqual([{ modifiers: ['shift'], key: 'f24' }]);
    expect(() => parseKeySpec('f25')).toThrow('Invalid key combination "f25": unknown key "f25"');
  });

  it('spells the separator characters as words', () => {
    expect(parseKeySpec('ctrl+plus')).toEqual([{ modifiers: ['ctrl'], key: '+' }]);
    expect(parseKeySpec('shift+Comma')).toEqual([{ modifiers: ['shift'], key: ',' }]);
  });

  it('lower-cases single characters', () => {
    expect(parseKeySpec('A')).toEqual([{ modifiers: [], key: 'a' }]);
  });

  it('collapses repeated modifiers', () => {
    expect(parseKeySpec('ctrl+control+x')).toEqual([{ modifiers: ['ctrl'], key: 'x' }]);
  });

  it('presses the last modifier when a chord has modifiers only', () => {
    expect(parseKeySpec('ctrl')).toEqual([{ modifiers: [], key: 'ctrl' }]);
    expect(parseKeySpec('ctrl+shift')).toEqual([{ modifiers: ['ctrl'], key: 'shift' }]);
  });

  it('rejects malformed combinations', () => {
    expect(() => parseKeySpec('')).toThrow('Invalid key combination "": empty');
    expect(() => parseKeySpec('ctrl+')).toThrow('Invalid key combination "ctrl+": empty key in "ctrl+"');
    expect(() => parseKeySpec('ctrl+a+b')).toThrow(
      'Invalid key combination "ctrl+a+b": more than one key in "ctrl+a+b"',
    );
    expect(() => parseKeySpec('ctrl+foo')).toThrow('Invalid key combination "ctrl+foo": unknown key "foo"');
  });

  it('throws KeySpecError carrying the spec', () => {
    try {
      parseKeySpec('hyper+x');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(KeySpecError);
      expect(err instanceof KeySpecError && err.spec).toBe('hyper+x');
    }
  });
});

describe('formatKeyStroke', () => {
  it('joins modifiers and key with +', () => {
    expect(formatKeyStroke({ modifiers: ['ctrl', 'alt'], key: 'delete' })).toBe('ctrl+alt+delete');
  });

  it('spells out + and ,', () => {
    expect(formatKeyStroke({ modifiers: ['ctrl'], key: '+' })).toBe('ctrl+plus');
    expect(formatKeyStroke({ modifiers: [], key: ',' })).toBe('comma');
  });
});
