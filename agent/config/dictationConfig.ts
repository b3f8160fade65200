import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { HotkeySpec, parseHotkey } from './hotkey';
import { DictationError } from '../utils/errors';
import { LogLevel, isLogLevel } from '../utils/logger';

export type DictationMode = 'streaming' | 'batch';

export const DICTATION_MODES: readonly DictationMode[] = ['streaming', 'batch'];

export interface TranscriberConfig {
  apiKey: string;
  endpoint: string;
  modelId: string;
  sampleRate: number;
  languageCode: string | null;
  connectTimeoutMs: number;
}

export interface AudioConfig {
  sampleRate: number;
  channels: number;
  /** Frames per chunk sent upstream; one frame is one 16-bit sample. */
  chunkFrames: number;
  device: string | null;
}

export interface TimingConfig {
  /** Wait after stopping the microphone before committing. */
  drainDelayMs: number;
  /** How long to wait for the committed transcript after a commit. */
  commitTimeoutMs: number;
  /** Delay between the paste chord and restoring the clipboard. */
  pasteRestoreDelayMs: number;
}

export interface SoundConfig {
  enabled: boolean;
  start: string | null;
  stop: string | null;
}

export interface DictationConfig {
  mode: DictationMode;
  hotkey: HotkeySpec;
  cancelHotkey: HotkeySpec | null;
  transcriber: TranscriberConfig;
  audio: AudioConfig;
  timing: TimingConfig;
  sounds: SoundConfig;
  logLevel: LogLevel;
  logFile: string | null;
}

/** Values given on the command line; they win over the environment. */
export interface ConfigOverrides {
  mode?: string;
  hotkey?: string;
  cancelHotkey?: string;
  language?: string;
  sounds?: boolean;
  logLevel?: string;
}

export const DEFAULT_HOTKEY = 'RightCmd+D';
export const DEFAULT_MODEL_ID = 'scribe_v2_realtime';
export const REALTIME_ENDPOINT = 'wss://api.elevenlabs.io/v1/speech-to-text/realtime';
const SAMPLE_RATE = 16000;
const CHUNK_FRAMES = 4096;

const PLATFORM_SOUNDS: Partial<Record<NodeJS.Platform, { start: string; stop: string }>> = {
  darwin: {
    start: '/System/Library/Sounds/Hero.aiff',
    stop: '/System/Library/Sounds/Glass.aiff',
  },
  linux: {
    start: '/usr/share/sounds/freedesktop/stereo/device-added.oga',
    stop: '/usr/share/sounds/freedesktop/stereo/device-removed.oga',
  },
};

/**
 * Loads `.env.local` and `.env` from the working directory, first value wins.
 * Variables already set in the shell are kept.
 */
export function loadEnvironment(cwd: string = process.cwd()): void {
  const local = path.join(cwd, '.env.local');
  if (fs.existsSync(local)) {
    dotenv.config({ path: local });
  }
  dotenv.config({ path: path.join(cwd, '.env') });
}

function readPositiveInt(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function readNonNegativeInt(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

function nonEmpty(raw: string | undefined): string | null {
  const value = raw?.trim();
  return value ? value : null;
}

function isDictationMode(value: string): value is DictationMode {
  return value === 'streaming' || value === 'batch';
}

function resolveApiKey(env: NodeJS.ProcessEnv): string {
  const apiKey = nonEmpty(env.ELEVENLABS_API_KEY);
  if (!apiKey) {
    throw new DictationError(
      'ELEVENLABS_API_KEY not found. Set it in the environment or a .env file.',
      'config_error',
    );
  }
  if (/^(your[_-]?api[_-]?key|changeme|placeholder)$/i.test(apiKey)) {
    throw new DictationError('ELEVENLABS_API_KEY is still a placeholder value.', 'config_error');
  }
  return apiKey;
}

export function loadDictationConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
  platform: NodeJS.Platform = process.platform,
): DictationConfig {
  const apiKey = resolveApiKey(env);

  const rawMode = (overrides.mode ?? env.DICTATION_MODE ?? 'batch').toLowerCase();
  if (!isDictationMode(rawMode)) {
    throw new DictationError(
      `Unknown dictation mode "${rawMode}". Use one of: ${DICTATION_MODES.join(', ')}`,
      'config_error',
    );
  }

  const hotkey = parseHotkey(overrides.hotkey ?? nonEmpty(env.DICTATION_HOTKEY) ?? DEFAULT_HOTKEY);
  const rawCancel = overrides.cancelHotkey ?? nonEmpty(env.DICTATION_CANCEL_HOTKEY);
  const cancelHotkey = rawCancel ? parseHotkey(rawCancel) : null;
  if (cancelHotkey && cancelHotkey.label === hotkey.label) {
    throw new DictationError(
      `Cancel hotkey ${cancelHotkey.label} is the same as the dictation hotkey`,
      'config_error',
    );
  }

  const rawLevel = (overrides.logLevel ?? env.LOG_LEVEL ?? 'info').toLowerCase();
  const logLevel: LogLevel = isLogLevel(rawLevel) ? rawLevel : 'info';

  const platformSounds = PLATFORM_SOUNDS[platform];
  const soundsEnabled = overrides.sounds ?? (env.DICTATION_SOUNDS || '').toLowerCase() !== 'off';

  return {
    mode: rawMode,
    hotkey,
    cancelHotkey,
    transcriber: {
      apiKey,
      endpoint: nonEmpty(env.ELEVENLABS_REALTIME_URL) ?? REALTIME_ENDPOINT,
      modelId: nonEmpty(env.ELEVENLABS_STT_MODEL) ?? DEFAULT_MODEL_ID,
      sampleRate: SAMPLE_RATE,
      languageCode: nonEmpty(overrides.language) ?? nonEmpty(env.DICTATION_LANGUAGE),
      connectTimeoutMs: readPositiveInt(env.DICTATION_CONNECT_TIMEOUT_MS, 10000),
    },
    audio: {
      sampleRate: SAMPLE_RATE,
      channels: 1,
      chunkFrames: CHUNK_FRAMES,
      device: nonEmpty(env.DICTATION_MIC_DEVICE),
    },
    timing: {
      drainDelayMs: readNonNegativeInt(env.DICTATION_DRAIN_DELAY_MS, 200),
      commitTimeoutMs: readPositiveInt(env.DICTATION_COMMIT_TIMEOUT_MS, 2000),
      pasteRestoreDelayMs: readNonNegativeInt(env.DICTATION_PASTE_RESTORE_MS, 50),
    },
    sounds: {
      enabled: soundsEnabled,
      start: nonEmpty(env.DICTATION_SOUND_START) ?? platformSounds?.start ?? null,
      stop: nonEmpty(env.DICTATION_SOUND_STOP) ?? platformSounds?.stop ?? null,
    },
    logLevel,
    logFile: nonEmpty(env.LOG_FILE),
  };
}
