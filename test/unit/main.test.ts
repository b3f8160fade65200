import { uIOhook, UiohookKey } from 'uiohook-napi';
import { loadDictationConfig } from '../../agent/config/dictationConfig';
import { createDictationApp } from '../../src/main';
import { FakeInjector, FakeMicrophone, FakeTranscriber, fakeSounds } from '../helpers/fakes';

jest.mock('uiohook-napi', () => jest.requireActual('../helpers/uiohookMock'));

const settle = () => new Promise((resolve) => setImmediate(resolve));

function press(...codes: number[]): void {
  for (const keycode of codes) uIOhook.emit('keydown', { keycode });
  for (const keycode of codes.reverse()) uIOhook.emit('keyup', { keycode });
}

describe('createDictationApp', () => {
  const config = loadDictationConfig(
    {
      ELEVENLABS_API_KEY: 'test-secret',
      DICTATION_CANCEL_HOTKEY: 'RightCmd+Escape',
      DICTATION_DRAIN_DELAY_MS: '0',
      DICTATION_COMMIT_TIMEOUT_MS: '50',
    },
    {},
    'darwin',
  );

  function build() {
    const transcriber = new FakeTranscriber();
    const injector = new FakeInjector();
    const app = createDictationApp(config, {
      createTranscriber: () => transcriber,
      createMicrophone: () => new FakeMicrophone(),
      injector,
      sounds: fakeSounds(),
    });
    return { app, transcriber, injector };
  }

  it('toggles dictation from the hotkey', async () => {
    const { app, transcriber, injector } = build();
    app.start();

    press(UiohookKey.MetaRight, UiohookKey.D);
    await settle();
    expect(app.controller.currentState).toBe('recording');

    transcriber.onCommit = () => transcriber.emit('committed', 'from the hotkey');
    press(UiohookKey.MetaRight, UiohookKey.D);
    await settle();
    await app.controller.whenIdle();

    expect(app.controller.currentState).toBe('idle');
    expect(injector.log).toEqual(['paste:from the hotkey']);
    await app.shutdown();
  });

  it('cancels from the cancel hotkey', async () => {
    const { app, transcriber, injector } = build();
    app.start();

    press(UiohookKey.MetaRight, UiohookKey.D);
    await settle();
    press(UiohookKey.MetaRight, UiohookKey.Escape);
    await settle();
    await app.controller.whenIdle();

    expect(app.controller.currentState).toBe('idle');
    expect(transcriber.commits).toBe(0);
    expect(injector.log).toEqual([]);
    await app.shutdown();
  });

  it('stops the hook and finalizes on shutdown', async () => {
    const { app, transcriber } = build();
    app.start();
    press(UiohookKey.MetaRight, UiohookKey.D);
    await settle();

    await app.shutdown();
    await app.shutdown();

    expect(app.listener.isRunning).toBe(false);
    expect(uIOhook.stop).toHaveBeenCalledTimes(1);
    expect(transcriber.closed).toBe(1);
  });
});
