import { UiohookKey } from 'uiohook-napi';
import {
  HotkeyMatcher,
  keyNameForCode,
  modifierForCode,
  parseHotkey,
} from '../../agent/config/hotkey';
import { DictationError } from '../../agent/utils/errors';

jest.mock('uiohook-napi', () => jest.requireActual('../helpers/uiohookMock'));

describe('parseHotkey', () => {
  it('parses the default right-command hotkey', () => {
    expect(parseHotkey('RightCmd+D')).toEqual({
      key: UiohookKey.D,
      keyName: 'D',
      modifiers: ['rightMeta'],
      label: 'RightCmd+D',
    });
  });

  it('expands hyper into all four modifiers', () => {
    const spec = parseHotkey('hyper+d');
    expect(spec.modifiers).toEqual(['meta', 'ctrl', 'alt', 'shift']);
    expect(spec.label).toBe('Cmd+Ctrl+Alt+Shift+D');
  });

  it('accepts aliases in any case and order', () => {
    const spec = parseHotkey('shift + CONTROL + space');
    expect(spec.key).toBe(UiohookKey.Space);
    expect(spec.label).toBe('Ctrl+Shift+Space');
  });

  it('maps key aliases', () => {
    expect(parseHotkey('esc').key).toBe(UiohookKey.Escape);
    expect(parseHotkey('Cmd+Return').label).toBe('Cmd+Enter');
  });

  it.each([
    ['', 'no key given'],
    ['Foo+D', 'unknown modifier "Foo"'],
    ['Cmd+Nope', 'unknown key "Nope"'],
    ['Cmd+Shift', 'a modifier cannot be the trigger key'],
  ])('rejects %p', (input, message) => {
    let thrown: unknown;
    try {
      parseHotkey(input);
    } catch (err) {
      thrown = err;
    }
    expect(thrown).toBeInstanceOf(DictationError);
    expect(thrown).toMatchObject({ type: 'config_error' });
    expect(String(thrown)).toContain(message);
  });
});

describe('key code lookups', () => {
  it('names key codes', () => {
    expect(keyNameForCode(UiohookKey.D)).toBe('D');
    expect(keyNameForCode(0xffff)).toBeUndefined();
  });

  it('classifies modifiers', () => {
    expect(modifierForCode(UiohookKey.MetaRight)).toBe('rightMeta');
    expect(modifierForCode(UiohookKey.Meta)).toBe('meta');
    expect(modifierForCode(UiohookKey.ShiftRight)).toBe('shift');
    expect(modifierForCode(UiohookKey.D)).toBeUndefined();
  });
});

describe('HotkeyMatcher', () => {
  const toggle = parseHotkey('RightCmd+D');
  const cancel = parseHotkey('RightCmd+Escape');
  let matcher: HotkeyMatcher<'toggle' | 'cancel'>;

  beforeEach(() => {
    matcher = new HotkeyMatcher([
      { action: 'toggle', spec: toggle },
      { action: 'cancel', spec: cancel },
    ]);
  });

  it('fires when the modifiers are held and the key goes down', () => {
    expect(matcher.keyDown(UiohookKey.MetaRight)).toBeNull();
    expect(matcher.keyDown(UiohookKey.D)).toBe('toggle');
  });

  it('distinguishes bindings by trigger key', () => {
    matcher.keyDown(UiohookKey.MetaRight);
    expect(matcher.keyDown(UiohookKey.Escape)).toBe('cancel');
  });

  it('ignores auto-repeat until the key is released', () => {
    matcher.keyDown(UiohookKey.MetaRight);
    expect(matcher.keyDown(UiohookKey.D)).toBe('toggle');
    expect(matcher.keyDown(UiohookKey.D)).toBeNull();
    matcher.keyUp(UiohookKey.D);
    expect(matcher.keyDown(UiohookKey.D)).toBe('toggle');
  });

  it('needs the modifier', () => {
    expect(matcher.keyDown(UiohookKey.D)).toBeNull();
  });

  it('requires the right command key for RightCmd', () => {
    matcher.keyDown(UiohookKey.Meta);
    expect(matcher.keyDown(UiohookKey.D)).toBeNull();
  });

  it('accepts either side for a generic modifier', () => {
    const generic = new HotkeyMatcher([{ action: 'toggle', spec: parseHotkey('Cmd+D') }]);
    generic.keyDown(UiohookKey.MetaRight);
    expect(generic.keyDown(UiohookKey.D)).toBe('toggle');
  });

  it('stops matching once the modifier is released', () => {
    matcher.keyDown(UiohookKey.MetaRight);
    matcher.keyUp(UiohookKey.MetaRight);
    expect(matcher.keyDown(UiohookKey.D)).toBeNull();
  });

  it('lists held modifiers with right command separate', () => {
    matcher.keyDown(UiohookKey.MetaRight);
    matcher.keyDown(UiohookKey.ShiftRight);
    expect(matcher.heldModifiers()).toEqual(['rightMeta', 'shift']);

    matcher.reset();
    matcher.keyDown(UiohookKey.Meta);
    matcher.keyDown(UiohookKey.CtrlRight);
    expect(matcher.heldModifiers()).toEqual(['meta', 'ctrl']);
  });

  it('forgets held keys on reset', () => {
    matcher.keyDown(UiohookKey.MetaRight);
    matcher.reset();
    expect(matcher.isPressed(UiohookKey.MetaRight)).toBe(false);
    expect(matcher.keyDown(UiohookKey.D)).toBeNull();
  });
});
