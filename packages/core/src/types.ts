export type Mode = "volume" | "brightness";

export type Action = "increase" | "decrease" | "mute";

export interface Command {
  mode: Mode;
  action: Action;
}

export type VolumeIcon = "none" | "low" | "medium" | "high";

/** What a notification backend is asked to show after a change. */
export interface Indicator {
  mode: Mode;
  /** Post-change level, 0-100. */
  level: number;
  /** Only ever true for volume */
  muted: boolean;
  /** Freedesktop icon name */
  icon: string;
}

export interface Settings {
  volumeStep: number;
  brightnessStep: number;
  lockTimeoutMs: number;
  lockPollMs: number;
  lockDir: string;
  notifyTimeoutMs: number;
  replaceId: number;
  debug: boolean;
}
