import {
  BRIGHTNESS_ICON,
  iconFor,
  normalizeLevel,
  parseCommand,
} from "@barctl/core";
import type { Command, Indicator, Settings } from "@barctl/core";
import type { CommandRunner } from "./exec.js";
import { withInstanceLock } from "./instance-lock.js";
import type { Lock } from "./instance-lock.js";
import { Mixer } from "./mixer.js";
import { Backlight } from "./backlight.js";
import { defaultBackends, selectBackend } from "./notify.js";
import type { NotificationBackend } from "./notify.js";

export interface InvocationDeps {
  settings: Settings;
  runner: CommandRunner;
  lock: Lock;
  programName: string;
  /** Ranked; defaults to dunst then notify-send. */
  backends?: readonly NotificationBackend[];
}

export interface InvocationResult {
  command: Command;
  indicator: Indicator;
  /** Name of the backend that displayed the indicator */
  backend: string | null;
}

/**
 * One key press: parse, pick the icon, lock, change the level, re-read it and
 * show it. Argument and lock errors are thrown before anything is changed.
 */
export async function runInvocation(
  modeToken: string,
  actionToken: string,
  deps: InvocationDeps
): Promise<InvocationResult> {
  const { settings, runner } = deps;
  const debug = (msg: string) => {
    if (settings.debug) console.error(`[barctl] ${msg}`);
  };

  const command = parseCommand(modeToken, actionToken);
  debug(`${command.mode} ${command.action}`);

  const mixer = new Mixer(runner, settings.volumeStep);
  const backlight = new Backlight(runner, settings.brightnessStep);

  // Icon reflects the level before the change; the bar uses the level after.
  let icon = BRIGHTNESS_ICON;
  if (command.mode === "volume") {
    icon = iconFor("volume", normalizeLevel(await mixer.getVolume()));
  }

  return withInstanceLock(deps.lock, async () => {
    switch (command.action) {
      case "increase":
        await (command.mode === "volume" ? mixer.increase() : backlight.increase());
        break;
      case "decrease":
        await (command.mode === "volume" ? mixer.decrease() : backlight.decrease());
        break;
      case "mute":
        await mixer.toggleMute();
        break;
    }

    const indicator: Indicator =
      command.mode === "volume"
        ? {
            mode: "volume",
            level: normalizeLevel(await mixer.getVolume()),
            muted: await mixer.isMuted(),
            icon,
          }
        : {
            mode: "brightness",
            level: normalizeLevel(await backlight.getBrightness()),
            muted: false,
            icon,
          };
    debug(`level ${indicator.level}${indicator.muted ? " (muted)" : ""}`);

    const backends =
      deps.backends ??
      defaultBackends(runner, {
        appName: deps.programName,
        timeoutMs: settings.notifyTimeoutMs,
        replaceId: settings.replaceId,
      });
    const backend = await selectBackend(backends);
    if (!backend) {
      console.warn("[barctl] No supported notification daemon is running; nothing shown");
      return { command, indicator, backend: null };
    }

    debug(`showing via ${backend.name}`);
    await backend.show(indicator);
    return { command, indicator, backend: backend.name };
  });
}
