import type { Action, Command, Mode } from "./types.js";
import { ArgumentError } from "./errors.js";
import { PROGRAM_NAME } from "./constants.js";

const MODES = new Map<string, Mode>([
  ["v", "volume"],
  ["vol", "volume"],
  ["volume", "volume"],
  ["b", "brightness"],
  ["bright", "brightness"],
  ["brightness", "brightness"],
]);

const ACTIONS = new Map<string, Action>([
  ["up", "increase"],
  ["u", "increase"],
  ["inc", "increase"],
  ["i", "increase"],
  ["down", "decrease"],
  ["dec", "decrease"],
  ["d", "decrease"],
  ["mute", "mute"],
  ["m", "mute"],
]);

export function usage(program: string = PROGRAM_NAME): string {
  return [
    `Usage: ${program} MODE ACTION`,
    "  MODE:   volume|vol|v | brightness|bright|b",
    "  ACTION: up|u|inc|i | down|dec|d | mute|m (volume only)",
  ].join("\n");
}

export function parseMode(token: string): Mode {
  const mode = MODES.get(token.trim().toLowerCase());
  if (!mode) throw new ArgumentError(`Unknown mode: "${token}"`);
  return mode;
}

export function parseAction(mode: Mode, token: string): Action {
  const action = ACTIONS.get(token.trim().toLowerCase());
  if (!action) throw new ArgumentError(`Unknown action: "${token}"`);
  if (action === "mute" && mode !== "volume") {
    throw new ArgumentError(`Action "${token}" is only valid for volume`);
  }
  return action;
}

export function parseCommand(modeToken: string, actionToken: string): Command {
  const mode = parseMode(modeToken);
  return { mode, action: parseAction(mode, actionToken) };
}
