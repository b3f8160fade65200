import { EventEmitter } from "events";
import { uIOhook, UiohookKeyboardEvent } from "uiohook-napi";
import { HotkeyBinding, HotkeyMatcher, HotkeySpec } from "../config/hotkey";
import { logger } from "../utils/logger";

export type HotkeyAction = "toggle" | "cancel";

/**
 * Global hotkey listener on top of the uiohook keyboard hook.
 * Emits "toggle" and "cancel" as the configured combinations go down.
 */
export class HotkeyListener extends EventEmitter {
  private readonly matcher: HotkeyMatcher<HotkeyAction>;
  private running = false;

  constructor(hotkey: HotkeySpec, cancelHotkey: HotkeySpec | null = null) {
    super();
    const bindings: HotkeyBinding<HotkeyAction>[] = [{ action: "toggle", spec: hotkey }];
    if (cancelHotkey) bindings.push({ action: "cancel", spec: cancelHotkey });
    this.matcher = new HotkeyMatcher(bindings);
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;
    uIOhook.on("keydown", this.handleKeyDown);
    uIOhook.on("keyup", this.handleKeyUp);
    uIOhook.start();
    this.running = true;
    logger.debug("[Hotkey] Keyboard hook started");
  }

  stop(): void {
    if (!this.running) return;
    uIOhook.removeListener("keydown", this.handleKeyDown);
    uIOhook.removeListener("keyup", this.handleKeyUp);
    uIOhook.stop();
    this.matcher.reset();
    this.running = false;
    logger.debug("[Hotkey] Keyboard hook stopped");
  }

  private readonly handleKeyDown = (e: UiohookKeyboardEvent): void => {
    const action = this.matcher.keyDown(e.keycode);
    if (action) {
      logger.debug(`[Hotkey] ${action} pressed`);
      this.emit(action);
    }
  };

  private readonly handleKeyUp = (e: UiohookKeyboardEvent): void => {
    this.matcher.keyUp(e.keycode);
  };
}
