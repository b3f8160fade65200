#!/usr/bin/env node
// cli.ts
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import {
  ConfigOverrides,
  DICTATION_MODES,
  DictationConfig,
  loadDictationConfig,
  loadEnvironment,
} from "./agent/config/dictationConfig";
import { toDictationError } from "./agent/utils/errors";
import { configureLogger, logger } from "./agent/utils/logger";
import { runDictation, runKeyDiscovery } from "./src/main";

function loadConfigOrExit(overrides: ConfigOverrides): DictationConfig {
  try {
    loadEnvironment();
    return loadDictationConfig(process.env, overrides);
  } catch (err) {
    logger.error(`❌ ${toDictationError(err, "config_error").message}`);
    process.exit(1);
  }
}

yargs(hideBin(process.argv))
  .scriptName("dictate")
  .command(
    "$0",
    "Listen for the hotkey and dictate into the focused window",
    (y) =>
      y
        .option("mode", {
          type: "string",
          choices: DICTATION_MODES,
          describe: "batch pastes when you stop, streaming types as you speak",
        })
        .option("hotkey", {
          type: "string",
          describe: "Toggle hotkey, e.g. RightCmd+D or Hyper+D",
        })
        .option("cancel-hotkey", {
          type: "string",
          describe: "Hotkey that discards the current recording",
        })
        .option("sounds", {
          type: "boolean",
          describe: "Play start/stop sounds (use --no-sounds to mute)",
        })
        .option("language", {
          type: "string",
          describe: "Language hint for transcription, e.g. en",
        })
        .option("log-level", {
          type: "string",
          choices: ["debug", "info", "warn", "error"],
          describe: "Minimum level written to the console and log file",
        }),
    async (argv) => {
      const config = loadConfigOrExit({
        mode: argv.mode,
        hotkey: argv.hotkey,
        cancelHotkey: argv.cancelHotkey,
        language: argv.language,
        sounds: argv.sounds,
        logLevel: argv.logLevel,
      });
      configureLogger({ level: config.logLevel, file: config.logFile });

      try {
        await runDictation(config);
        process.exit(0);
      } catch (err) {
        logger.error("\n💥 Fatal error:", toDictationError(err, "transcriber_error").message);
        process.exit(1);
      }
    },
  )
  .command(
    "keys",
    "Print the key codes and held modifiers of every key press",
    () => {},
    async () => {
      await runKeyDiscovery();
      process.exit(0);
    },
  )
  .strict()
  .help()
  .parseAsync()
  .catch((err: unknown) => {
    logger.error("\n💥 Fatal CLI error:", err);
    process.exit(1);
  });
