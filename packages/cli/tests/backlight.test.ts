import { describe, it, expect, vi, afterEach, afterAll } from "vitest";
import { Backlight, brightnessctl, light } from "../src/backlight.js";
import { FakeSystem } from "./fake-system.js";

const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

afterEach(() => {
  warn.mockClear();
});

afterAll(() => {
  warn.mockRestore();
});

describe("backlight tools", () => {
  it("parses brightnessctl machine output", () => {
    expect(brightnessctl.parseLevel("intel_backlight,backlight,580,58%,1000\n")).toBe(58);
    expect(brightnessctl.parseLevel("garbage")).toBeNull();
  });

  it("parses light output", () => {
    expect(light.parseLevel("42.35\n")).toBe(42);
  });

  it("builds step arguments", () => {
    expect(brightnessctl.increaseArgs(8)).toEqual(["-q", "set", "+8%"]);
    expect(brightnessctl.decreaseArgs(8)).toEqual(["-q", "set", "8%-"]);
    expect(light.increaseArgs(8)).toEqual(["-A", "8"]);
    expect(light.decreaseArgs(8)).toEqual(["-U", "8"]);
  });
});

describe("Backlight", () => {
  it("prefers brightnessctl when both are installed", async () => {
    const sys = new FakeSystem({ brightness: 50, installed: ["brightnessctl", "light"] });
    const backlight = new Backlight(sys, 8);

    await backlight.increase();

    expect(sys.lines()).toEqual(["brightnessctl -q set +8%"]);
    expect(await backlight.getBrightness()).toBe(58);
  });

  it("falls back to light", async () => {
    const sys = new FakeSystem({ brightness: 40, installed: ["light"] });
    const backlight = new Backlight(sys, 8);

    await backlight.decrease();

    expect(sys.lines()).toEqual(["light -U 8"]);
    expect(await backlight.getBrightness()).toBe(32);
  });

  it("does nothing without a backlight utility", async () => {
    const sys = new FakeSystem({ installed: [] });
    const backlight = new Backlight(sys, 8);

    await backlight.increase();
    await backlight.decrease();

    expect(sys.calls).toEqual([]);
    expect(await backlight.getBrightness()).toBeNull();
    expect(warn).toHaveBeenCalledOnce();
    expect(warn).toHaveBeenCalledWith(
      "[barctl] No backlight utility found (tried brightnessctl, light)"
    );
  });
});
