import { describe, it, expect } from "vitest";
import type { Indicator } from "@barctl/core";
import {
  DunstBackend,
  FreedesktopBackend,
  defaultBackends,
  dunstifyArgs,
  notifySendArgs,
  selectBackend,
} from "../src/notify.js";
import type { NotificationBackend } from "../src/notify.js";
import { FakeSystem } from "./fake-system.js";

const options = { appName: "barctl", timeoutMs: 5000, replaceId: 2593 };

const volume54: Indicator = {
  mode: "volume",
  level: 54,
  muted: false,
  icon: "audio-volume-medium",
};

describe("dunstifyArgs", () => {
  it("hands the level to dunst as a value hint", () => {
    expect(dunstifyArgs(volume54, options)).toEqual([
      "-a", "barctl",
      "-u", "low",
      "-t", "5000",
      "-h", "string:x-dunst-stack-tag:volume",
      "-i", "audio-volume-medium",
      "-h", "int:value:54",
      "Volume: 54%",
    ]);
  });

  it("tags by mode", () => {
    const args = dunstifyArgs(
      { mode: "brightness", level: 30, muted: false, icon: "display-brightness" },
      options
    );
    expect(args).toContain("string:x-dunst-stack-tag:brightness");
    expect(args[args.length - 1]).toBe("Brightness: 30%");
  });

  it("sends a muted message without a value", () => {
    expect(dunstifyArgs({ ...volume54, muted: true }, options)).toEqual([
      "-a", "barctl",
      "-u", "low",
      "-t", "5000",
      "-h", "string:x-dunst-stack-tag:volume",
      "-i", "audio-volume-muted",
      "Volume: Muted",
    ]);
  });
});

describe("notifySendArgs", () => {
  it("sends a rendered bar with a fixed replace id", () => {
    expect(notifySendArgs(volume54, options)).toEqual([
      "-a", "barctl",
      "-r", "2593",
      "-i", "audio-volume-medium",
      "Volume",
      "█".repeat(13) + "░".repeat(12),
    ]);
  });

  it("shows Muted with the muted icon", () => {
    expect(notifySendArgs({ ...volume54, muted: true }, options)).toEqual([
      "-a", "barctl",
      "-r", "2593",
      "-i", "audio-volume-muted",
      "Volume",
      "Muted",
    ]);
  });
});

describe("backend availability", () => {
  it("finds dunst by process name", async () => {
    const sys = new FakeSystem({ running: ["dunst"] });
    expect(await new DunstBackend(sys, options).isAvailable()).toBe(true);
    expect(sys.lines()).toEqual(["pgrep -x dunst"]);
  });

  it("checks freedesktop daemons in order until one is running", async () => {
    const sys = new FakeSystem({ running: ["mako"] });
    expect(await new FreedesktopBackend(sys, options).isAvailable()).toBe(true);
    expect(sys.lines()).toEqual(["pgrep -x xfce4-notifyd", "pgrep -x mako"]);
  });

  it("reports no freedesktop daemon", async () => {
    const sys = new FakeSystem({ running: [] });
    expect(await new FreedesktopBackend(sys, options).isAvailable()).toBe(false);
  });
});

describe("selectBackend", () => {
  it("prefers dunst when both are running", async () => {
    const sys = new FakeSystem({ running: ["dunst", "xfce4-notifyd"] });
    const backend = await selectBackend(defaultBackends(sys, options));
    expect(backend?.name).toBe("dunst");
  });

  it("falls through to notify-send", async () => {
    const sys = new FakeSystem({ running: ["swaync"] });
    const backend = await selectBackend(defaultBackends(sys, options));
    expect(backend?.name).toBe("notify-send");
  });

  it("returns null when nothing is running", async () => {
    const sys = new FakeSystem({ running: [] });
    expect(await selectBackend(defaultBackends(sys, options))).toBeNull();
  });

  it("stops checking at the first available backend", async () => {
    const checked: string[] = [];
    const backend = (name: string, available: boolean): NotificationBackend => ({
      name,
      isAvailable: async () => {
        checked.push(name);
        return available;
      },
      show: async () => {},
    });

    const chosen = await selectBackend([
      backend("a", false),
      backend("b", true),
      backend("c", true),
    ]);
    expect(chosen?.name).toBe("b");
    expect(checked).toEqual(["a", "b"]);
  });
});

describe("show", () => {
  it("runs dunstify", async () => {
    const sys = new FakeSystem();
    await new DunstBackend(sys, options).show(volume54);
    expect(sys.callsTo("dunstify")).toEqual([
      { command: "dunstify", args: dunstifyArgs(volume54, options) },
    ]);
  });

  it("runs notify-send", async () => {
    const sys = new FakeSystem();
    await new FreedesktopBackend(sys, options).show(volume54);
    expect(sys.callsTo("notify-send")).toEqual([
      { command: "notify-send", args: notifySendArgs(volume54, options) },
    ]);
  });
});
