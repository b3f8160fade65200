import type { DictationError } from "../../utils/errors";

export interface RealtimeTranscriber {
  /** Opens the streaming session; resolves once audio can be sent. */
  connect(): Promise<void>;
  sendAudio(chunk: Buffer): void;
  /** Asks the service to finalize everything sent so far. */
  commit(): void;
  close(): void;
  readonly isOpen: boolean;

  on(event: "session-started", cb: (sessionId: string | null) => void): void;
  /** Fired for every in-progress transcript of the current utterance. */
  on(event: "partial", cb: (text: string) => void): void;
  /** Fired once the service has finalized an utterance. */
  on(event: "committed", cb: (text: string) => void): void;
  /** Fired for protocol and socket errors after the session opened. */
  on(event: "error", cb: (err: DictationError) => void): void;
  on(event: "close", cb: (code: number, reason: string) => void): void;
}

export type TranscriberFactory = () => RealtimeTranscriber;
