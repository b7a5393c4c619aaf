import {
  DUNST_PROCESS,
  FREEDESKTOP_PROCESSES,
  MUTED_ICON,
  renderBar,
  titleFor,
} from "@barctl/core";
import type { Indicator } from "@barctl/core";
import { isProcessRunning } from "./exec.js";
import type { CommandRunner } from "./exec.js";

/** One notification daemon family and how to drive it. */
export interface NotificationBackend {
  readonly name: string;
  /** True when the daemon is running and can take notifications. */
  isAvailable(): Promise<boolean>;
  show(indicator: Indicator): Promise<void>;
}

export interface BackendOptions {
  appName: string;
  timeoutMs: number;
  replaceId: number;
}

/**
 * dunst renders the progress bar itself from the `value` hint. The stack tag
 * is per mode, so a volume popup replaces the previous volume popup only.
 */
export class DunstBackend implements NotificationBackend {
  readonly name = "dunst";

  constructor(
    private readonly runner: CommandRunner,
    private readonly options: BackendOptions
  ) {}

  isAvailable(): Promise<boolean> {
    return isProcessRunning(this.runner, DUNST_PROCESS);
  }

  async show(indicator: Indicator): Promise<void> {
    await this.runner.run("dunstify", dunstifyArgs(indicator, this.options));
  }
}

export function dunstifyArgs(indicator: Indicator, options: BackendOptions): string[] {
  const args = [
    "-a", options.appName,
    "-u", "low",
    "-t", String(options.timeoutMs),
    "-h", `string:x-dunst-stack-tag:${indicator.mode}`,
  ];
  const title = titleFor(indicator.mode);

  if (indicator.muted) {
    return [...args, "-i", MUTED_ICON, `${title}: Muted`];
  }
  return [
    ...args,
    "-i", indicator.icon,
    "-h", `int:value:${indicator.level}`,
    `${title}: ${indicator.level}%`,
  ];
}

/**
 * Any other freedesktop daemon: the bar is drawn here as text and a fixed
 * replace id keeps a single popup on screen.
 */
export class FreedesktopBackend implements NotificationBackend {
  readonly name = "notify-send";

  constructor(
    private readonly runner: CommandRunner,
    private readonly options: BackendOptions,
    private readonly daemons: readonly string[] = FREEDESKTOP_PROCESSES
  ) {}

  async isAvailable(): Promise<boolean> {
    for (const daemon of this.daemons) {
      if (await isProcessRunning(this.runner, daemon)) return true;
    }
    return false;
  }

  async show(indicator: Indicator): Promise<void> {
    await this.runner.run("notify-send", notifySendArgs(indicator, this.options));
  }
}

export function notifySendArgs(indicator: Indicator, options: BackendOptions): string[] {
  const args = ["-a", options.appName, "-r", String(options.replaceId)];
  const title = titleFor(indicator.mode);

  if (indicator.muted) {
    return [...args, "-i", MUTED_ICON, title, "Muted"];
  }
  return [...args, "-i", indicator.icon, title, renderBar(indicator.level)];
}

/** First available backend in rank order, or null when none is running. */
export async function selectBackend(
  backends: readonly NotificationBackend[]
): Promise<NotificationBackend | null> {
  for (const backend of backends) {
    if (await backend.isAvailable()) return backend;
  }
  return null;
}

export function defaultBackends(
  runner: CommandRunner,
  options: BackendOptions
): NotificationBackend[] {
  return [new DunstBackend(runner, options), new FreedesktopBackend(runner, options)];
}
