import type { DictationConfig } from "../agent/config/dictationConfig";
import { HotkeyListener } from "../agent/input/hotkeyListener";
import { KeyDiscovery } from "../agent/input/keyDiscovery";
import { KeyboardTextInjector, TextInjector } from "../agent/input/textInjector";
import { DictationController } from "../agent/voice/dictationController";
import { MicCapture, MicrophoneFactory } from "../agent/voice/microphone";
import { SoundCues, SystemSoundCues } from "../agent/voice/soundCues";
import type { TranscriberFactory } from "../agent/voice/stt/STTEngine";
import { ScribeRealtimeSTT } from "../agent/voice/stt/ScribeRealtimeSTT";
import { logger } from "../agent/utils/logger";

export interface DictationAppDeps {
  createTranscriber?: TranscriberFactory;
  createMicrophone?: MicrophoneFactory;
  injector?: TextInjector;
  sounds?: SoundCues;
}

export interface DictationApp {
  controller: DictationController;
  listener: HotkeyListener;
  start(): void;
  shutdown(): Promise<void>;
}

/**
 * Wires the hotkey listener to a dictation controller built from `config`.
 */
export function createDictationApp(config: DictationConfig, deps: DictationAppDeps = {}): DictationApp {
  const controller = new DictationController({
    mode: config.mode,
    timing: config.timing,
    createTranscriber: deps.createTranscriber ?? (() => new ScribeRealtimeSTT(config.transcriber)),
    createMicrophone: deps.createMicrophone ?? (() => new MicCapture(config.audio)),
    injector: deps.injector ?? new KeyboardTextInjector({ restoreDelayMs: config.timing.pasteRestoreDelayMs }),
    sounds: deps.sounds ?? new SystemSoundCues(config.sounds),
  });
  const listener = new HotkeyListener(config.hotkey, config.cancelHotkey);

  listener.on("toggle", () => {
    controller.toggle().catch((err: unknown) => logger.error("❌ Toggle failed:", err));
  });
  listener.on("cancel", () => {
    controller.cancel().catch((err: unknown) => logger.error("❌ Cancel failed:", err));
  });

  let stopped = false;
  return {
    controller,
    listener,
    start: () => listener.start(),
    shutdown: async () => {
      if (stopped) return;
      stopped = true;
      listener.stop();
      await controller.shutdown();
    },
  };
}

function printBanner(config: DictationConfig): void {
  logger.info("=".repeat(60));
  logger.info("🎤 Dictation ready");
  logger.info("=".repeat(60));
  logger.info(`Mode: ${config.mode.toUpperCase()}`);
  logger.info(
    config.mode === "streaming"
      ? "Text will appear in real time as you speak"
      : "Text will be pasted after you finish speaking",
  );
  logger.info(`Press ${config.hotkey.label} to start/stop recording`);
  if (config.cancelHotkey) {
    logger.info(`Press ${config.cancelHotkey.label} to discard a recording`);
  }
  logger.info("Press Ctrl+C to exit\n");
}

/** Runs until SIGINT or SIGTERM, then finalizes any open session. */
export function runDictation(config: DictationConfig): Promise<void> {
  const app = createDictationApp(config);
  printBanner(config);
  app.start();

  return new Promise<void>((resolve, reject) => {
    const onSignal = () => {
      process.removeListener("SIGINT", onSignal);
      process.removeListener("SIGTERM", onSignal);
      logger.info("\n\nShutting down...");
      app.shutdown().then(() => {
        logger.info("Exited.");
        resolve();
      }, reject);
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  });
}

export function runKeyDiscovery(): Promise<void> {
  const discovery = new KeyDiscovery();
  logger.info("Press any key combination to see how it is reported.");
  logger.info("Press Ctrl+C to exit\n");
  discovery.start();

  return new Promise<void>((resolve) => {
    process.once("SIGINT", () => {
      discovery.stop();
      resolve();
    });
  });
}
