import { UiohookKey } from 'uiohook-napi';
import { DictationError } from '../utils/errors';

export type ModifierName = 'meta' | 'rightMeta' | 'ctrl' | 'alt' | 'shift';

export interface HotkeySpec {
  /** uiohook key code of the trigger key */
  key: number;
  keyName: string;
  modifiers: ModifierName[];
  /** Normalized form, e.g. "RightCmd+D" */
  label: string;
}

// Left and right variants are separate key codes; a generic modifier accepts either.
export const MODIFIER_CODES: Record<ModifierName, number[]> = {
  meta: [UiohookKey.Meta, UiohookKey.MetaRight],
  rightMeta: [UiohookKey.MetaRight],
  ctrl: [UiohookKey.Ctrl, UiohookKey.CtrlRight],
  alt: [UiohookKey.Alt, UiohookKey.AltRight],
  shift: [UiohookKey.Shift, UiohookKey.ShiftRight],
};

const MODIFIER_ALIASES: Record<string, ModifierName[]> = {
  cmd: ['meta'],
  command: ['meta'],
  meta: ['meta'],
  super: ['meta'],
  win: ['meta'],
  rightcmd: ['rightMeta'],
  rightcommand: ['rightMeta'],
  rightmeta: ['rightMeta'],
  ctrl: ['ctrl'],
  control: ['ctrl'],
  alt: ['alt'],
  option: ['alt'],
  opt: ['alt'],
  shift: ['shift'],
  hyper: ['meta', 'ctrl', 'alt', 'shift'],
};

export const MODIFIER_LABELS: Record<ModifierName, string> = {
  meta: 'Cmd',
  rightMeta: 'RightCmd',
  ctrl: 'Ctrl',
  alt: 'Alt',
  shift: 'Shift',
};

const MODIFIER_ORDER: ModifierName[] = ['rightMeta', 'meta', 'ctrl', 'alt', 'shift'];

const KEY_ALIASES: Record<string, string> = {
  esc: 'escape',
  return: 'enter',
};

const KEYS_BY_NAME = new Map<string, { name: string; code: number }>();
const NAMES_BY_CODE = new Map<number, string>();
for (const [name, code] of Object.entries(UiohookKey)) {
  KEYS_BY_NAME.set(name.toLowerCase(), { name, code });
  if (!NAMES_BY_CODE.has(code)) NAMES_BY_CODE.set(code, name);
}

export function keyNameForCode(code: number): string | undefined {
  return NAMES_BY_CODE.get(code);
}

export function modifierForCode(code: number): ModifierName | undefined {
  if (code === UiohookKey.MetaRight) return 'rightMeta';
  for (const name of ['meta', 'ctrl', 'alt', 'shift'] as const) {
    if (MODIFIER_CODES[name].includes(code)) return name;
  }
  return undefined;
}

/**
 * Parses "RightCmd+D", "hyper+d" or "Ctrl+Shift+Space" into key codes.
 * The last segment is the trigger key, the rest are modifiers.
 */
export function parseHotkey(input: string): HotkeySpec {
  const parts = input
    .split('+')
    .map((part) => part.trim())
    .filter(Boolean);

  const keyToken = parts.pop();
  if (!keyToken) {
    throw new DictationError(`Invalid hotkey "${input}": no key given`, 'config_error');
  }

  const modifiers = new Set<ModifierName>();
  for (const part of parts) {
    const resolved = MODIFIER_ALIASES[part.toLowerCase()];
    if (!resolved) {
      throw new DictationError(`Invalid hotkey "${input}": unknown modifier "${part}"`, 'config_error');
    }
    resolved.forEach((m) => modifiers.add(m));
  }

  const lookup = KEY_ALIASES[keyToken.toLowerCase()] ?? keyToken.toLowerCase();
  const key = KEYS_BY_NAME.get(lookup);
  if (!key) {
    throw new DictationError(`Invalid hotkey "${input}": unknown key "${keyToken}"`, 'config_error');
  }
  if (modifierForCode(key.code)) {
    throw new DictationError(`Invalid hotkey "${input}": a modifier cannot be the trigger key`, 'config_error');
  }

  const ordered = MODIFIER_ORDER.filter((m) => modifiers.has(m));
  const label = [...ordered.map((m) => MODIFIER_LABELS[m]), key.name].join('+');
  return { key: key.code, keyName: key.name, modifiers: ordered, label };
}

export interface HotkeyBinding<Action extends string> {
  action: Action;
  spec: HotkeySpec;
}

/**
 * Matches raw key-down/key-up codes against a set of hotkeys.
 * Auto-repeat of a key that is already held never triggers twice.
 */
export class HotkeyMatcher<Action extends string> {
  private held = new Set<number>();

  constructor(private readonly bindings: ReadonlyArray<HotkeyBinding<Action>>) {}

  keyDown(code: number): Action | null {
    const repeat = this.held.has(code);
    this.held.add(code);
    if (repeat) return null;

    const binding = this.bindings.find(
      ({ spec }) => spec.key === code && spec.modifiers.every((m) => this.isHeld(m)),
    );
    return binding ? binding.action : null;
  }

  keyUp(code: number): void {
    this.held.delete(code);
  }

  isPressed(code: number): boolean {
    return this.held.has(code);
  }

  heldModifiers(): ModifierName[] {
    const mods: ModifierName[] = [];
    if (this.held.has(UiohookKey.MetaRight)) mods.push('rightMeta');
    if (this.held.has(UiohookKey.Meta)) mods.push('meta');
    for (const name of ['ctrl', 'alt', 'shift'] as const) {
      if (this.isHeld(name)) mods.push(name);
    }
    return mods;
  }

  reset(): void {
    this.held.clear();
  }

  private isHeld(modifier: ModifierName): boolean {
    return MODIFIER_CODES[modifier].some((code) => this.held.has(code));
  }
}
