import { describe, expect, it } from 'vitest';
import { charKey, decodeTerminalKey, specialKey } from '../../src/tui/key-utils.js';

describe('decodeTerminalKey', () => {
  it('decodes printable characters', () => {
    expect(decodeTerminalKey('a')).toEqual(charKey('a'));
    expect(decodeTerminalKey('+')).toEqual(charKey('+'));
    expect(decodeTerminalKey('é')).toEqual(charKey('é'));
  });

  it('decodes space by name', () => {
    expect(decodeTerminalKey('SPACE')).toEqual(charKey(' '));
  });

  it('trusts the character flag for multi-codepoint input', () => {
    expect(decodeTerminalKey('👍🏽', true)).toEqual(charKey('👍🏽'));
  });

  it('decodes special keys and their modifiers', () => {
    expect(decodeTerminalKey('ENTER')).toEqual(specialKey('enter'));
    expect(decodeTerminalKey('KP_ENTER')).toEqual(specialKey('enter'));
    expect(decodeTerminalKey('SHIFT_LEFT')).toEqual(specialKey('left', { shift: true }));
    expect(decodeTerminalKey('SHIFT_TAB')).toEqual(specialKey('tab', { shift: true }));
    expect(decodeTerminalKey('ALT_ENTER')).toEqual(specialKey('enter', { alt: true }));
    expect(decodeTerminalKey('META_ENTER')).toEqual(specialKey('enter', { alt: true }));
    expect(decodeTerminalKey('PAGE_DOWN')).toEqual(specialKey('pageDown'));
  });

  it('decodes control letters as lowercase characters', () => {
    expect(decodeTerminalKey('CTRL_U')).toEqual(charKey('u', { ctrl: true }));
    expect(decodeTerminalKey('CTRL_C')).toEqual(charKey('c', { ctrl: true }));
    expect(decodeTerminalKey('CTRL_ALT_D')).toEqual(charKey('d', { ctrl: true, alt: true }));
  });

  it('returns null for keys the app does not use', () => {
    expect(decodeTerminalKey('F1')).toBeNull();
    expect(decodeTerminalKey('HOME')).toBeNull();
  });
});
