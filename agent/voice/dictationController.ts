import type { DictationMode, TimingConfig } from "../config/dictationConfig";
import type { TextInjector } from "../input/textInjector";
import type { MicrophoneFactory, MicrophoneSource } from "./microphone";
import { PartialReconciler, TextEdit } from "./partialReconciler";
import { SerialLock } from "./serialLock";
import { SessionTracker } from "./sessionTracker";
import type { SoundCues } from "./soundCues";
import type { RealtimeTranscriber, TranscriberFactory } from "./stt/STTEngine";
import { toDictationError } from "../utils/errors";
import { logger } from "../utils/logger";

export type ControllerState = "idle" | "connecting" | "recording";

export interface DictationControllerOptions {
  mode: DictationMode;
  timing: TimingConfig;
  createTranscriber: TranscriberFactory;
  createMicrophone: MicrophoneFactory;
  injector: TextInjector;
  sounds: SoundCues;
}

interface DictationSession {
  token: number;
  transcriber: RealtimeTranscriber;
  microphone: MicrophoneSource | null;
  acceptingAudio: boolean;
  /** Set once the final text was handled; later events are ignored. */
  finished: boolean;
  lastPartial: string;
  commitWaiter: (() => void) | null;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Owns the dictation session lifecycle: hotkey toggles open a transcriber and
 * the microphone, transcripts are inserted at the cursor, and a stopped
 * session is finalized in the background so the next one can start at once.
 *
 * Every transcriber and microphone callback carries the token of the session
 * it belongs to and does nothing once that token is no longer current.
 */
export class DictationController {
  private state: ControllerState = "idle";
  private active: DictationSession | null = null;
  private finalizing: DictationSession | null = null;
  private readonly sessions = new SessionTracker();
  private readonly reconciler = new PartialReconciler();
  private readonly toggleLock = new SerialLock();
  private readonly screen = new SerialLock();
  private readonly pending = new Set<Promise<void>>();

  constructor(private readonly options: DictationControllerOptions) {}

  get currentState(): ControllerState {
    return this.state;
  }

  get mode(): DictationMode {
    return this.options.mode;
  }

  /** Token of the live (recording or finalizing) session, if any. */
  get currentSession(): number | null {
    return this.sessions.current;
  }

  toggle(): Promise<void> {
    return this.toggleLock.run(() =>
      this.state === "idle" ? this.startSession() : this.stopSession(),
    );
  }

  start(): Promise<void> {
    return this.toggleLock.run(() => this.startSession());
  }

  stop(): Promise<void> {
    return this.toggleLock.run(() => this.stopSession());
  }

  cancel(): Promise<void> {
    return this.toggleLock.run(() => this.cancelSession());
  }

  /** Resolves once every background finalization and pending insertion is done. */
  async whenIdle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.allSettled([...this.pending]);
    }
  }

  async shutdown(): Promise<void> {
    await this.stop();
    await this.whenIdle();
  }

  private async startSession(): Promise<void> {
    if (this.active) return;

    const token = this.sessions.begin();
    this.finalizing = null;
    this.reconciler.reset();
    this.state = "connecting";
    this.options.sounds.playStart();
    logger.info("\n🎙️  Recording started... Speak now!");

    const session: DictationSession = {
      token,
      transcriber: this.options.createTranscriber(),
      microphone: null,
      acceptingAudio: true,
      finished: false,
      lastPartial: "",
      commitWaiter: null,
    };
    this.bindTranscriber(session);

    try {
      await session.transcriber.connect();
    } catch (err) {
      logger.error(`❌ Error connecting to ElevenLabs: ${toDictationError(err, "connection_error").message}`);
      this.abandon(session);
      return;
    }

    const microphone = this.options.createMicrophone();
    microphone.on("error", (err) => {
      if (!this.sessions.isCurrent(token)) return;
      logger.error(`❌ Microphone error: ${err.message}`);
      void this.toggleLock.run(async () => {
        if (this.active?.token === token) await this.stopSession();
      });
    });

    try {
      microphone.start((frame) => this.forwardAudio(session, frame));
    } catch (err) {
      logger.error(`❌ Error starting audio stream: ${toDictationError(err, "microphone_error").message}`);
      session.transcriber.close();
      this.abandon(session);
      return;
    }

    session.microphone = microphone;
    this.active = session;
    this.state = "recording";
  }

  private async stopSession(): Promise<void> {
    const session = this.active;
    if (!session) return;

    // Released right away so a new session can start while this one finalizes.
    this.active = null;
    this.finalizing = session;
    this.state = "idle";
    this.options.sounds.playStop();
    logger.info("\n🛑 Recording stopped. Finalizing transcription...");

    this.track(this.finalize(session));
  }

  private async cancelSession(): Promise<void> {
    const session = this.active ?? this.finalizing;
    if (!session || !this.sessions.isCurrent(session.token)) return;

    const wasRecording = session === this.active;
    this.active = null;
    this.finalizing = null;
    this.state = "idle";
    this.sessions.cancel(session.token);
    session.acceptingAudio = false;
    session.finished = true;
    session.commitWaiter?.();

    if (wasRecording) {
      session.microphone?.stop();
      session.transcriber.close();
      this.options.sounds.playStop();
    }

    if (this.options.mode === "streaming") {
      const edit = this.reconciler.discard();
      if (edit) this.enqueueEdit(edit);
    }
    logger.info("🚫 Dictation cancelled, nothing inserted");
  }

  private async finalize(session: DictationSession): Promise<void> {
    try {
      session.microphone?.stop();
      await sleep(this.options.timing.drainDelayMs);
      session.acceptingAudio = false;

      if (this.sessions.isCurrent(session.token) && !session.finished) {
        const committed = this.waitForCommitted(session);
        session.transcriber.commit();
        const received = await committed;

        if (!received && this.sessions.isCurrent(session.token) && !session.finished) {
          session.finished = true;
          logger.warn("⚠️  No committed transcript received in time");
          if (session.lastPartial) {
            this.insertFinal(session.lastPartial);
          }
        }
      }

      session.finished = true;
      session.transcriber.close();
      if (this.sessions.isCurrent(session.token)) {
        logger.info("✅ Transcription complete!\n");
      }
    } catch (err) {
      logger.warn(`⚠️  Error during cleanup: ${toDictationError(err, "transcriber_error").message}`);
    } finally {
      session.finished = true;
      if (this.finalizing === session) this.finalizing = null;
      this.sessions.cancel(session.token);
    }
  }

  private waitForCommitted(session: DictationSession): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => {
        session.commitWaiter = null;
        resolve(false);
      }, this.options.timing.commitTimeoutMs);

      session.commitWaiter = () => {
        clearTimeout(timer);
        session.commitWaiter = null;
        resolve(true);
      };
    });
  }

  private bindTranscriber(session: DictationSession): void {
    const { transcriber, token } = session;

    transcriber.on("session-started", () => {
      if (this.sessions.isCurrent(token)) {
        logger.info("🔌 Connected to ElevenLabs realtime transcription");
      }
    });
    transcriber.on("partial", (text) => this.handlePartial(session, text));
    transcriber.on("committed", (text) => this.handleCommitted(session, text));
    transcriber.on("error", (err) => {
      if (this.sessions.isCurrent(token)) {
        logger.error(`❌ Error: ${err.message}`);
      } else {
        logger.debug(`[Dictation] Error from stale session ${token}: ${err.message}`);
      }
    });
    transcriber.on("close", () => {
      if (this.sessions.isCurrent(token)) {
        logger.info("🔌 Connection closed");
      }
    });
  }

  private forwardAudio(session: DictationSession, frame: Buffer): void {
    if (!session.acceptingAudio || !this.sessions.isCurrent(session.token)) return;
    session.transcriber.sendAudio(frame);
  }

  private handlePartial(session: DictationSession, text: string): void {
    if (!this.sessions.isCurrent(session.token) || session.finished) {
      logger.debug(`[Dictation] Dropping partial from session ${session.token}`);
      return;
    }

    const trimmed = text.trim();
    if (!trimmed) return;
    session.lastPartial = trimmed;

    if (this.options.mode === "streaming") {
      const edit = this.reconciler.applyPartial(trimmed);
      if (edit) {
        this.enqueueEdit(edit);
        logger.info(`📝 Streaming: ${trimmed}`);
      }
    } else {
      logger.info(`📝 Processing: ${trimmed}`);
    }
  }

  private handleCommitted(session: DictationSession, text: string): void {
    session.commitWaiter?.();
    if (!this.sessions.isCurrent(session.token) || session.finished) {
      logger.debug(`[Dictation] Dropping committed transcript from session ${session.token}`);
      return;
    }
    this.insertFinal(text);
  }

  private insertFinal(text: string): void {
    const finalText = text.trim();
    if (!finalText) {
      logger.info("⚠️  No speech detected");
      return;
    }

    if (this.options.mode === "streaming") {
      const edit = this.reconciler.applyFinal(finalText);
      if (edit) this.enqueueEdit(edit);
      logger.info(`\n✅ Final: ${finalText}\n`);
    } else {
      this.enqueueScreen(() => this.options.injector.paste(finalText));
      logger.info(`\n✅ Pasted: ${finalText}\n`);
    }
  }

  private abandon(session: DictationSession): void {
    session.finished = true;
    session.acceptingAudio = false;
    this.sessions.cancel(session.token);
    this.state = "idle";
  }

  private enqueueEdit(edit: TextEdit): void {
    this.enqueueScreen(() => this.options.injector.applyEdit(edit));
  }

  // Edits must land in order: a later partial's backspaces assume the
  // earlier text is already on screen.
  private enqueueScreen(op: () => Promise<void>): void {
    this.track(
      this.screen.run(op).catch((err: unknown) => {
        logger.error(`❌ Text insertion failed: ${toDictationError(err, "injection_error").message}`);
      }),
    );
  }

  private track(task: Promise<void>): void {
    this.pending.add(task);
    void task.finally(() => this.pending.delete(task));
  }
}
