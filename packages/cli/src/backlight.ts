import type { CommandRunner } from "./exec.js";
import { parsePercent } from "./mixer.js";

export interface BacklightTool {
  /** Executable looked up on PATH */
  bin: string;
  getArgs: string[];
  increaseArgs(step: number): string[];
  decreaseArgs(step: number): string[];
  parseLevel(stdout: string): number | null;
}

/** `brightnessctl -m` prints `device,class,current,percent%,max`. */
export const brightnessctl: BacklightTool = {
  bin: "brightnessctl",
  getArgs: ["-m"],
  increaseArgs: (step) => ["-q", "set", `+${step}%`],
  decreaseArgs: (step) => ["-q", "set", `${step}%-`],
  parseLevel(stdout) {
    const field = stdout.trim().split("\n")[0]?.split(",")[3];
    return field === undefined ? null : parsePercent(field);
  },
};

/** `light -G` prints a float percentage such as `42.35`. */
export const light: BacklightTool = {
  bin: "light",
  getArgs: ["-G"],
  increaseArgs: (step) => ["-A", String(step)],
  decreaseArgs: (step) => ["-U", String(step)],
  parseLevel: parsePercent,
};

export const BACKLIGHT_TOOLS: readonly BacklightTool[] = [brightnessctl, light];

/**
 * Brightness control through the first installed backlight utility. With
 * none installed, changes are skipped and the level reads as null.
 */
export class Backlight {
  private resolved: BacklightTool | null | undefined;

  constructor(
    private readonly runner: CommandRunner,
    private readonly step: number,
    private readonly tools: readonly BacklightTool[] = BACKLIGHT_TOOLS
  ) {}

  /** First tool on PATH; memoized for the life of the invocation. */
  tool(): BacklightTool | null {
    if (this.resolved === undefined) {
      this.resolved = this.tools.find((t) => this.runner.exists(t.bin)) ?? null;
      if (this.resolved === null) {
        console.warn(
          `[barctl] No backlight utility found (tried ${this.tools.map((t) => t.bin).join(", ")})`
        );
      }
    }
    return this.resolved;
  }

  async getBrightness(): Promise<number | null> {
    const tool = this.tool();
    if (!tool) return null;
    const { stdout } = await this.runner.run(tool.bin, tool.getArgs);
    return tool.parseLevel(stdout);
  }

  async increase(): Promise<void> {
    const tool = this.tool();
    if (tool) await this.runner.run(tool.bin, tool.increaseArgs(this.step));
  }

  async decrease(): Promise<void> {
    const tool = this.tool();
    if (tool) await this.runner.run(tool.bin, tool.decreaseArgs(this.step));
  }
}
