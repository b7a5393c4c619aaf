import type { Mode, VolumeIcon } from "./types.js";
import {
  BAR_EMPTY,
  BAR_FILLED,
  BAR_WIDTH,
  BRIGHTNESS_ICON,
  VOLUME_ICONS,
} from "./constants.js";

/** Clamps to 0-100 and maps unreadable levels to 0. */
export function normalizeLevel(level: number | null): number {
  if (level === null || Number.isNaN(level)) return 0;
  return Math.max(0, Math.min(100, Math.round(level)));
}

/**
 * Number of filled columns for a level. Integer division by the per-column
 * step, so with a width of 25 every 4% fills one column.
 */
export function filledColumns(level: number, width: number = BAR_WIDTH): number {
  const perColumn = Math.max(1, Math.floor(100 / width));
  return Math.min(width, Math.floor(normalizeLevel(level) / perColumn));
}

export function renderBar(level: number, width: number = BAR_WIDTH): string {
  const filled = filledColumns(level, width);
  return BAR_FILLED.repeat(filled) + BAR_EMPTY.repeat(width - filled);
}

export function volumeIcon(level: number): VolumeIcon {
  if (level <= 0) return "none";
  if (level < 30) return "low";
  if (level < 80) return "medium";
  return "high";
}

export function iconFor(mode: Mode, level: number): string {
  if (mode === "brightness") return BRIGHTNESS_ICON;
  return VOLUME_ICONS[volumeIcon(level)];
}

export function titleFor(mode: Mode): string {
  return mode === "volume" ? "Volume" : "Brightness";
}
