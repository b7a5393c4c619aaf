import { MIXER_BIN } from "@barctl/core";
import type { CommandRunner } from "./exec.js";

/** Reads a leading integer percentage out of a utility's stdout. */
export function parsePercent(stdout: string): number | null {
  const match = stdout.trim().match(/^(\d+(?:\.\d+)?)%?/);
  if (!match) return null;
  return Math.round(parseFloat(match[1] ?? ""));
}

/**
 * Volume and mute control over pamixer. Raise and lower always unmute
 * first; mute toggles.
 */
export class Mixer {
  constructor(
    private readonly runner: CommandRunner,
    private readonly step: number,
    private readonly bin: string = MIXER_BIN
  ) {}

  async getVolume(): Promise<number | null> {
    const { stdout } = await this.runner.run(this.bin, ["--get-volume"]);
    return parsePercent(stdout);
  }

  /** pamixer prints true/false and exits 1 when unmuted. */
  async isMuted(): Promise<boolean> {
    const { stdout } = await this.runner.run(this.bin, ["--get-mute"]);
    return stdout.trim() === "true";
  }

  async increase(): Promise<void> {
    await this.runner.run(this.bin, ["-u"]);
    await this.runner.run(this.bin, ["-i", String(this.step)]);
  }

  async decrease(): Promise<void> {
    await this.runner.run(this.bin, ["-u"]);
    await this.runner.run(this.bin, ["-d", String(this.step)]);
  }

  async toggleMute(): Promise<void> {
    await this.runner.run(this.bin, ["-t"]);
  }
}
