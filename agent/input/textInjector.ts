import { execFile } from "child_process";
import { promisify } from "util";
import clipboardy from "clipboardy";
import { uIOhook, UiohookKey } from "uiohook-napi";
import type { TextEdit } from "../voice/partialReconciler";
import { DictationError, toDictationError } from "../utils/errors";
import { logger } from "../utils/logger";

export interface TextInjector {
  type(text: string): Promise<void>;
  backspace(count: number): Promise<void>;
  /** Inserts text through the clipboard, restoring the previous contents. */
  paste(text: string): Promise<void>;
  applyEdit(edit: TextEdit): Promise<void>;
}

export type CommandRunner = (file: string, args: string[]) => Promise<void>;

export interface TextInjectorOptions {
  platform?: NodeJS.Platform;
  restoreDelayMs?: number;
  runCommand?: CommandRunner;
}

const execFileAsync = promisify(execFile);

const runCommand: CommandRunner = async (file, args) => {
  await execFileAsync(file, args);
};

function escapeAppleScript(text: string): string {
  return text
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n");
}

function escapeSendKeys(text: string): string {
  return text
    .replace(/[+^%~(){}[\]]/g, "{$&}")
    .replace(/\n/g, "{ENTER}")
    .replace(/'/g, "''");
}

/**
 * Platform command that types `text` into the focused window.
 */
export function typingCommand(
  text: string,
  platform: NodeJS.Platform,
): { file: string; args: string[] } | null {
  switch (platform) {
    case "darwin":
      return {
        file: "osascript",
        args: ["-e", `tell application "System Events" to keystroke "${escapeAppleScript(text)}"`],
      };
    case "linux":
      return { file: "xdotool", args: ["type", "--clearmodifiers", "--delay", "0", "--", text] };
    case "win32":
      return {
        file: "powershell",
        args: [
          "-NoProfile",
          "-Command",
          `Add-Type -AssemblyName System.Windows.Forms; [System.Windows.Forms.SendKeys]::SendWait('${escapeSendKeys(text)}')`,
        ],
      };
    default:
      return null;
  }
}

export class KeyboardTextInjector implements TextInjector {
  private readonly platform: NodeJS.Platform;
  private readonly restoreDelayMs: number;
  private readonly runCommand: CommandRunner;

  constructor(options: TextInjectorOptions = {}) {
    this.platform = options.platform ?? process.platform;
    this.restoreDelayMs = options.restoreDelayMs ?? 50;
    this.runCommand = options.runCommand ?? runCommand;
  }

  async type(text: string): Promise<void> {
    if (!text) return;
    const command = typingCommand(text, this.platform);
    if (!command) {
      throw new DictationError(`Typing is not supported on ${this.platform}`, "injection_error");
    }
    try {
      await this.runCommand(command.file, command.args);
    } catch (err) {
      throw toDictationError(err, "injection_error", `${command.file} failed`);
    }
  }

  async backspace(count: number): Promise<void> {
    for (let i = 0; i < count; i++) {
      uIOhook.keyTap(UiohookKey.Backspace);
    }
  }

  async applyEdit(edit: TextEdit): Promise<void> {
    await this.backspace(edit.backspaces);
    await this.type(edit.insert);
  }

  async paste(text: string): Promise<void> {
    if (!text) return;

    let snapshot: string | null = null;
    try {
      snapshot = await clipboardy.read();
    } catch (err) {
      logger.debug("[Injector] Clipboard could not be read, it will not be restored:", err);
    }

    try {
      await clipboardy.write(text);
      const modifier = this.platform === "darwin" ? UiohookKey.Meta : UiohookKey.Ctrl;
      uIOhook.keyTap(UiohookKey.V, [modifier]);
    } catch (err) {
      logger.warn("⚠️  Paste failed, typing instead:", err);
      await this.restoreClipboard(snapshot);
      await this.type(text);
      return;
    }

    // The target app reads the clipboard asynchronously after the chord.
    await new Promise((resolve) => setTimeout(resolve, this.restoreDelayMs));
    await this.restoreClipboard(snapshot);
  }

  private async restoreClipboard(snapshot: string | null): Promise<void> {
    if (snapshot === null) return;
    try {
      await clipboardy.write(snapshot);
    } catch (err) {
      logger.warn("⚠️  Could not restore clipboard:", err);
    }
  }
}
