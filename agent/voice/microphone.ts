import { EventEmitter } from "events";
import { Transform, TransformCallback } from "stream";
import mic from "mic";
import type { AudioConfig } from "../config/dictationConfig";
import { DictationError, toDictationError } from "../utils/errors";
import { logger } from "../utils/logger";

export interface MicrophoneSource {
  /** Starts capture; `onFrame` receives fixed-size raw PCM frames. */
  start(onFrame: (frame: Buffer) => void): void;
  stop(): void;
  on(event: "error", cb: (err: DictationError) => void): void;
}

export type MicrophoneFactory = () => MicrophoneSource;

/**
 * Re-slices an arbitrary byte stream into frames of exactly `frameBytes`.
 * Whatever is left when the input ends is pushed as one short frame.
 */
export class PcmFrameTransform extends Transform {
  private pending: Buffer = Buffer.alloc(0);

  constructor(private readonly frameBytes: number) {
    super();
    if (frameBytes <= 0) {
      throw new RangeError(`frameBytes must be positive, got ${frameBytes}`);
    }
  }

  _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.pending = this.pending.length ? Buffer.concat([this.pending, chunk]) : chunk;
    while (this.pending.length >= this.frameBytes) {
      this.push(this.pending.subarray(0, this.frameBytes));
      this.pending = this.pending.subarray(this.frameBytes);
    }
    callback();
  }

  _flush(callback: TransformCallback): void {
    if (this.pending.length > 0) {
      this.push(this.pending);
      this.pending = Buffer.alloc(0);
    }
    callback();
  }
}

/**
 * Microphone capture through the `mic` package (sox on macOS and Windows,
 * arecord on Linux), 16-bit signed little-endian PCM.
 */
export class MicCapture extends EventEmitter implements MicrophoneSource {
  private instance: ReturnType<typeof mic> | null = null;

  constructor(private readonly config: AudioConfig) {
    super();
  }

  start(onFrame: (frame: Buffer) => void): void {
    if (this.instance) {
      throw new DictationError("Microphone is already capturing", "microphone_error");
    }

    const device = this.config.device ?? (process.platform === "linux" ? "default" : undefined);
    const instance = mic({
      rate: String(this.config.sampleRate),
      channels: String(this.config.channels),
      bitwidth: "16",
      encoding: "signed-integer",
      endian: "little",
      fileType: "raw",
      debug: false,
      ...(device ? { device } : {}),
    });

    const frames = new PcmFrameTransform(this.config.chunkFrames * 2 * this.config.channels);
    const stream = instance.getAudioStream();
    stream.on("error", (err: Error) => {
      this.emit("error", toDictationError(err, "microphone_error", "Microphone capture failed"));
    });
    frames.on("data", (frame: Buffer) => onFrame(frame));
    stream.pipe(frames);

    try {
      instance.start();
    } catch (err) {
      throw toDictationError(err, "microphone_error", "Could not start microphone");
    }
    this.instance = instance;
    logger.debug("[Microphone] Capture started", {
      sampleRate: this.config.sampleRate,
      chunkFrames: this.config.chunkFrames,
    });
  }

  stop(): void {
    if (!this.instance) return;
    const instance = this.instance;
    this.instance = null;
    instance.stop();
    logger.debug("[Microphone] Capture stopped");
  }
}
