export type SpecialKey =
  | 'backspace'
  | 'tab'
  | 'escape'
  | 'enter'
  | 'up'
  | 'down'
  | 'left'
  | 'right'
  | 'pageUp'
  | 'pageDown';

export interface KeyModifiers {
  shift: boolean;
  ctrl: boolean;
  alt: boolean;
}

export type KeyInput = ({ code: 'char'; char: string } | { code: SpecialKey }) & { mods: KeyModifiers };

const NO_MODS: KeyModifiers = { shift: false, ctrl: false, alt: false };

const SPECIAL_NAMES: Record<string, SpecialKey> = {
  BACKSPACE: 'backspace',
  TAB: 'tab',
  ESCAPE: 'escape',
  ENTER: 'enter',
  KP_ENTER: 'enter',
  UP: 'up',
  DOWN: 'down',
  LEFT: 'left',
  RIGHT: 'right',
  PAGE_UP: 'pageUp',
  PAGE_DOWN: 'pageDown',
};

const MODIFIER_PREFIXES: [string, keyof KeyModifiers][] = [
  ['SHIFT_', 'shift'],
  ['CTRL_', 'ctrl'],
  ['ALT_', 'alt'],
  ['META_', 'alt'],
];

export function isSpaceKeyName(name: string): boolean {
  return name === 'SPACE' || name === ' ';
}

export function charKey(char: string, mods: Partial<KeyModifiers> = {}): KeyInput {
  return { code: 'char', char, mods: { ...NO_MODS, ...mods } };
}

export function specialKey(code: SpecialKey, mods: Partial<KeyModifiers> = {}): KeyInput {
  return { code, mods: { ...NO_MODS, ...mods } };
}

function isSingleCodepoint(name: string): boolean {
  return Array.from(name).length === 1;
}

/**
 * Translate a terminal-kit key name (`SHIFT_LEFT`, `CTRL_U`, `ALT_ENTER`, `a`, …)
 * into a key event. Unknown names decode to null.
 */
export function decodeTerminalKey(name: string, isCharacter = false): KeyInput | null {
  if (isSpaceKeyName(name)) return charKey(' ');
  if (isCharacter || isSingleCodepoint(name)) return charKey(name);

  const mods: KeyModifiers = { ...NO_MODS };
  let rest = name;
  let stripped = true;
  while (stripped) {
    stripped = false;
    for (const [prefix, flag] of MODIFIER_PREFIXES) {
      if (rest.startsWith(prefix) && rest.length > prefix.length) {
        mods[flag] = true;
        rest = rest.slice(prefix.length);
        stripped = true;
      }
    }
  }

  const special = SPECIAL_NAMES[rest];
  if (special) return specialKey(special, mods);
  if (isSpaceKeyName(rest)) return charKey(' ', mods);
  if (isSingleCodepoint(rest) && (mods.ctrl || mods.alt)) return charKey(rest.toLowerCase(), mods);
  return null;
}
