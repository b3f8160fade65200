import { spawn } from "child_process";
import type { SoundConfig } from "../config/dictationConfig";
import { logger } from "../utils/logger";

export interface SoundCues {
  playStart(): void;
  playStop(): void;
}

const PLAYERS: Partial<Record<NodeJS.Platform, string>> = {
  darwin: "afplay",
  linux: "paplay",
};

/**
 * Plays short system sounds without waiting for them to finish.
 */
export class SystemSoundCues implements SoundCues {
  private readonly player: string | null;

  constructor(
    private readonly config: SoundConfig,
    platform: NodeJS.Platform = process.platform,
  ) {
    this.player = PLAYERS[platform] ?? null;
  }

  playStart(): void {
    this.play(this.config.start);
  }

  playStop(): void {
    this.play(this.config.stop);
  }

  private play(soundPath: string | null): void {
    if (!this.config.enabled || !this.player || !soundPath) return;

    try {
      const child = spawn(this.player, [soundPath], {
        stdio: "ignore",
        detached: true,
      });
      child.on("error", (err) => {
        logger.debug(`[Sounds] ${this.player} failed:`, err.message);
      });
      child.unref();
    } catch (err) {
      logger.debug("[Sounds] Could not play sound:", err);
    }
  }
}
