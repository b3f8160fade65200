import { uIOhook, UiohookKeyboardEvent } from "uiohook-napi";
import {
  HotkeyMatcher,
  MODIFIER_LABELS,
  ModifierName,
  keyNameForCode,
  modifierForCode,
} from "../config/hotkey";
import { logger } from "../utils/logger";

/**
 * One line describing a key press, with the hotkey string that would match it.
 */
export function describeKeyPress(code: number, held: ModifierName[]): string {
  const name = keyNameForCode(code) ?? "Unknown";
  const hex = `0x${code.toString(16).padStart(4, "0")}`;
  if (modifierForCode(code)) {
    return `🔑 ${name} (keycode ${code} / ${hex}) is a modifier`;
  }

  const combo = [...held.map((m) => MODIFIER_LABELS[m]), name].join("+");
  if (held.length === 0) {
    return `🔑 ${name} (keycode ${code} / ${hex})`;
  }
  return `🔑 ${combo} (keycode ${code} / ${hex}), use DICTATION_HOTKEY=${combo}`;
}

/**
 * Prints every key press until stopped. Useful to find out what a remapped
 * hyper key actually sends.
 */
export class KeyDiscovery {
  private readonly tracker = new HotkeyMatcher<never>([]);
  private running = false;

  constructor(private readonly print: (line: string) => void = (line) => logger.info(line)) {}

  start(): void {
    if (this.running) return;
    uIOhook.on("keydown", this.handleKeyDown);
    uIOhook.on("keyup", this.handleKeyUp);
    uIOhook.start();
    this.running = true;
  }

  stop(): void {
    if (!this.running) return;
    uIOhook.removeListener("keydown", this.handleKeyDown);
    uIOhook.removeListener("keyup", this.handleKeyUp);
    uIOhook.stop();
    this.running = false;
  }

  private readonly handleKeyDown = (e: UiohookKeyboardEvent): void => {
    if (this.tracker.isPressed(e.keycode)) return;
    this.tracker.keyDown(e.keycode);
    this.print(describeKeyPress(e.keycode, this.tracker.heldModifiers()));
  };

  private readonly handleKeyUp = (e: UiohookKeyboardEvent): void => {
    this.tracker.keyUp(e.keycode);
  };
}
