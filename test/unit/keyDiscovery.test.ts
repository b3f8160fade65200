import { uIOhook, UiohookKey } from 'uiohook-napi';
import { KeyDiscovery, describeKeyPress } from '../../agent/input/keyDiscovery';

jest.mock('uiohook-napi', () => jest.requireActual('../helpers/uiohookMock'));

describe('describeKeyPress', () => {
  it('describes a plain key', () => {
    expect(describeKeyPress(UiohookKey.D, [])).toBe('🔑 D (keycode 32 / 0x0020)');
  });

  it('suggests a hotkey for a combination', () => {
    expect(describeKeyPress(UiohookKey.D, ['rightMeta', 'shift'])).toBe(
      '🔑 RightCmd+Shift+D (keycode 32 / 0x0020), use DICTATION_HOTKEY=RightCmd+Shift+D',
    );
  });

  it('flags modifiers', () => {
    expect(describeKeyPress(UiohookKey.MetaRight, [])).toBe('🔑 MetaRight (keycode 3676 / 0x0e5c) is a modifier');
  });

  it('names unknown codes', () => {
    expect(describeKeyPress(0x0abc, [])).toBe('🔑 Unknown (keycode 2748 / 0x0abc)');
  });
});

describe('KeyDiscovery', () => {
  it('prints each new key press with the modifiers held', () => {
    const lines: string[] = [];
    const discovery = new KeyDiscovery((line) => lines.push(line));
    discovery.start();

    uIOhook.emit('keydown', { keycode: UiohookKey.Meta });
    uIOhook.emit('keydown', { keycode: UiohookKey.Meta });
    uIOhook.emit('keydown', { keycode: UiohookKey.Ctrl });
    uIOhook.emit('keydown', { keycode: UiohookKey.D });
    uIOhook.emit('keyup', { keycode: UiohookKey.D });
    uIOhook.emit('keyup', { keycode: UiohookKey.Meta });
    uIOhook.emit('keyup', { keycode: UiohookKey.Ctrl });
    uIOhook.emit('keydown', { keycode: UiohookKey.D });
    discovery.stop();
    uIOhook.emit('keydown', { keycode: UiohookKey.A });

    expect(lines).toEqual([
      '🔑 Meta (keycode 3675 / 0x0e5b) is a modifier',
      '🔑 Ctrl (keycode 29 / 0x001d) is a modifier',
      '🔑 Cmd+Ctrl+D (keycode 32 / 0x0020), use DICTATION_HOTKEY=Cmd+Ctrl+D',
      '🔑 D (keycode 32 / 0x0020)',
    ]);
    expect(uIOhook.start).toHaveBeenCalledTimes(1);
    expect(uIOhook.stop).toHaveBeenCalledTimes(1);
  });
});
