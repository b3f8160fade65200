declare module "mic" {
  interface MicInstance {
    start(): void;
    stop(): void;
    pause(): void;
    resume(): void;
    getAudioStream(): NodeJS.ReadableStream;
  }

  interface MicOptions {
    rate?: string;
    channels?: string;
    bitwidth?: string;
    encoding?: "signed-integer" | "unsigned-integer";
    endian?: "little" | "big";
    device?: string;
    debug?: boolean;
    exitOnSilence?: number;
    fileType?: string;
  }

  function mic(options: MicOptions): MicInstance;

  export = mic;
}
