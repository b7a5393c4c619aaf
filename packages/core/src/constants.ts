import { tmpdir } from "os";
import type { Settings } from "./types.js";

export const PROGRAM_NAME = "barctl";

export const DEFAULT_VOLUME_STEP = 4;
export const DEFAULT_BRIGHTNESS_STEP = 8;
export const DEFAULT_LOCK_TIMEOUT_MS = 100;
export const LOCK_POLL_INTERVAL_MS = 10;
export const COMMAND_TIMEOUT_MS = 5000;
/** An owner marker older than this is reclaimed even if its PID is alive. */
export const LOCK_STALE_MS = COMMAND_TIMEOUT_MS * 6;
export const DEFAULT_NOTIFY_TIMEOUT_MS = 5000;
export const DEFAULT_REPLACE_ID = 2593;

export const BAR_WIDTH = 25;
export const BAR_FILLED = "█";
export const BAR_EMPTY = "░";

export const MUTED_ICON = "audio-volume-muted";
export const BRIGHTNESS_ICON = "display-brightness";
export const VOLUME_ICONS = {
  none: "audio-volume-off",
  low: "audio-volume-low",
  medium: "audio-volume-medium",
  high: "audio-volume-high",
} as const;

export const MIXER_BIN = "pamixer";
export const DUNST_PROCESS = "dunst";
export const FREEDESKTOP_PROCESSES = [
  "xfce4-notifyd",
  "mako",
  "swaync",
  "notification-daemon",
] as const;

type Env = Record<string, string | undefined>;

export function parseDuration(value: string): number {
  const match = value.trim().match(/^(\d+(?:\.\d+)?)\s*(ms|s)?$/i);
  if (!match) throw new Error(`Invalid duration: ${value}`);
  const n = parseFloat(match[1] ?? "");
  return (match[2] ?? "ms").toLowerCase() === "s" ? n * 1000 : n;
}

function envInt(env: Env, key: string, fallback: number): number {
  const value = env[key];
  if (value === undefined || value.trim() === "") return fallback;
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`${key} must be a positive integer, got "${value}"`);
  }
  return n;
}

function envDuration(env: Env, key: string, fallbackMs: number): number {
  const value = env[key];
  if (value === undefined || value.trim() === "") return fallbackMs;
  try {
    return parseDuration(value);
  } catch {
    throw new Error(`${key} must be a duration such as 100ms or 1s, got "${value}"`);
  }
}

/** Reads tunables from the environment. Throws on malformed values. */
export function loadSettings(env: Env = process.env): Settings {
  const lockDir = env.BARCTL_LOCK_DIR;
  return {
    volumeStep: envInt(env, "BARCTL_VOLUME_STEP", DEFAULT_VOLUME_STEP),
    brightnessStep: envInt(env, "BARCTL_BRIGHTNESS_STEP", DEFAULT_BRIGHTNESS_STEP),
    lockTimeoutMs: envDuration(env, "BARCTL_LOCK_TIMEOUT", DEFAULT_LOCK_TIMEOUT_MS),
    lockPollMs: LOCK_POLL_INTERVAL_MS,
    lockDir: lockDir && lockDir.trim() !== "" ? lockDir : tmpdir(),
    notifyTimeoutMs: envDuration(env, "BARCTL_NOTIFY_TIMEOUT", DEFAULT_NOTIFY_TIMEOUT_MS),
    replaceId: envInt(env, "BARCTL_REPLACE_ID", DEFAULT_REPLACE_ID),
    debug: env.BARCTL_DEBUG === "1",
  };
}
