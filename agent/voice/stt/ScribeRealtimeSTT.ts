import { EventEmitter } from "events";
import WebSocket from "ws";
import type { RealtimeTranscriber } from "./STTEngine";
import { ServerMessage, encodeAudioChunk, encodeCommit, parseServerMessage } from "./scribeMessages";
import type { TranscriberConfig } from "../../config/dictationConfig";
import { DictationError, toDictationError } from "../../utils/errors";
import { logger } from "../../utils/logger";

function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
}

/**
 * Realtime speech-to-text over the ElevenLabs Scribe WebSocket API.
 * One instance serves exactly one dictation session.
 */
export class ScribeRealtimeSTT extends EventEmitter implements RealtimeTranscriber {
  #socket?: WebSocket;
  #opened = false;
  #closing = false;

  constructor(private readonly config: TranscriberConfig) {
    super();
  }

  get isOpen(): boolean {
    return this.#socket !== undefined && this.#socket.readyState === WebSocket.OPEN;
  }

  buildUrl(): string {
    const params = new URLSearchParams({
      model_id: this.config.modelId,
      audio_format: `pcm_${this.config.sampleRate}`,
      commit_strategy: "manual",
      include_timestamps: "false",
    });
    if (this.config.languageCode) {
      params.set("language_code", this.config.languageCode);
    }
    return `${this.config.endpoint}?${params.toString()}`;
  }

  connect(): Promise<void> {
    if (this.#socket) {
      return Promise.reject(
        new DictationError("Transcriber is already connected", "connection_error"),
      );
    }

    return new Promise<void>((resolve, reject) => {
      const socket = new WebSocket(this.buildUrl(), {
        headers: { "xi-api-key": this.config.apiKey },
      });
      this.#socket = socket;
      let settled = false;

      const fail = (err: DictationError) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        this.#closing = true;
        socket.terminate();
        reject(err);
      };

      const timer = setTimeout(() => {
        fail(
          new DictationError(
            `Timed out after ${this.config.connectTimeoutMs}ms connecting to ElevenLabs`,
            "connection_error",
          ),
        );
      }, this.config.connectTimeoutMs);

      socket.once("open", () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        this.#opened = true;
        logger.debug("[ScribeSTT] WebSocket connected");
        resolve();
      });

      socket.on("unexpected-response", (_req, res) => {
        const status = res.statusCode ?? 0;
        fail(
          new DictationError(
            `ElevenLabs rejected the connection (HTTP ${status})`,
            status === 401 || status === 403 ? "auth_error" : "connection_error",
          ),
        );
      });

      socket.on("error", (err) => {
        if (!this.#opened) {
          fail(toDictationError(err, "connection_error", "Could not connect to ElevenLabs"));
          return;
        }
        this.emit("error", toDictationError(err, "transcriber_error"));
      });

      socket.on("message", (data, isBinary) => this.#handleMessage(data, isBinary));

      socket.on("close", (code, reason) => {
        if (!settled) {
          fail(
            new DictationError(
              `Connection closed before the session opened (code ${code})`,
              "connection_error",
            ),
          );
        }
        if (this.#opened) {
          this.#opened = false;
          this.emit("close", code, reason.toString());
        }
      });
    });
  }

  sendAudio(chunk: Buffer): void {
    if (!this.#socket || !this.isOpen) {
      logger.debug("[ScribeSTT] Socket not open, dropping audio chunk");
      return;
    }
    this.#socket.send(encodeAudioChunk(chunk, this.config.sampleRate), (err) => {
      if (err) logger.warn("⚠️  Error sending audio:", err.message);
    });
  }

  commit(): void {
    if (!this.#socket || !this.isOpen) {
      logger.warn("⚠️  Cannot commit: connection is not open");
      return;
    }
    this.#socket.send(encodeCommit(this.config.sampleRate), (err) => {
      if (err) logger.warn("⚠️  Error sending commit:", err.message);
    });
  }

  close(): void {
    if (!this.#socket || this.#closing) return;
    this.#closing = true;
    this.#socket.close(1000, "client closed");
  }

  #handleMessage(data: WebSocket.RawData, isBinary: boolean): void {
    if (isBinary) {
      logger.debug("[ScribeSTT] Ignoring binary frame");
      return;
    }

    let message: ServerMessage;
    try {
      message = parseServerMessage(rawDataToString(data));
    } catch (err) {
      logger.warn("[ScribeSTT] Failed to parse message:", err);
      return;
    }

    switch (message.kind) {
      case "session_started":
        this.emit("session-started", message.sessionId);
        break;
      case "partial":
        this.emit("partial", message.text);
        break;
      case "committed":
        this.emit("committed", message.text);
        break;
      case "error":
        this.emit(
          "error",
          new DictationError(
            `${message.errorType}: ${message.message}`,
            message.errorType === "auth_error" ? "auth_error" : "transcriber_error",
          ),
        );
        break;
      case "unknown":
        logger.debug("[ScribeSTT] Ignoring message type:", message.messageType);
        break;
    }
  }
}
