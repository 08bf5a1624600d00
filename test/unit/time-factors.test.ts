import { describe, it, expect } from "vitest";
import type { QuietHoursConfig, TimePeriodsConfig } from "../../src/config/types.js";
import {
  dynamicTimeFactor,
  minuteOfDay,
  parseClock,
  quietHoursFactor,
} from "../../src/proactive/time-factors.js";

const at = (clock: string) => parseClock(clock);

const QUIET: QuietHoursConfig = { enabled: true, start: "23:00", end: "07:00", transitionMinutes: 30 };

function periods(overrides: Partial<TimePeriodsConfig> = {}): TimePeriodsConfig {
  return {
    enabled: true,
    periods: [{ start: "18:00", end: "22:00", factor: 2 }],
    transitionMinutes: 60,
    minFactor: 0,
    maxFactor: 2,
    smooth: false,
    ...overrides,
  };
}

describe("parseClock", () => {
  it("converts HH:MM to minutes", () => {
    expect(parseClock("00:00")).toBe(0);
    expect(parseClock("07:30")).toBe(450);
    expect(parseClock("23:59")).toBe(1439);
  });
});

describe("minuteOfDay", () => {
  const now = new Date("2026-06-15T12:30:00Z");

  it("reads the clock in the given timezone", () => {
    expect(minuteOfDay(now, "UTC")).toBe(750);
    expect(minuteOfDay(now, "Asia/Tokyo")).toBe(21 * 60 + 30);
  });

  it("falls back to the host clock for an unknown timezone", () => {
    expect(minuteOfDay(now, "Not/AZone")).toBe(now.getHours() * 60 + now.getMinutes());
  });
});

describe("quietHoursFactor", () => {
  it("is 0 inside a window that wraps midnight", () => {
    expect(quietHoursFactor(at("23:00"), QUIET)).toBe(0);
    expect(quietHoursFactor(at("02:00"), QUIET)).toBe(0);
    expect(quietHoursFactor(at("06:59"), QUIET)).toBe(0);
  });

  it("ramps down before the start", () => {
    expect(quietHoursFactor(at("22:45"), QUIET)).toBe(0.5);
    expect(quietHoursFactor(at("22:30"), QUIET)).toBe(1);
  });

  it("ramps up after the end", () => {
    expect(quietHoursFactor(at("07:00"), QUIET)).toBe(0);
    expect(quietHoursFactor(at("07:15"), QUIET)).toBe(0.5);
    expect(quietHoursFactor(at("07:30"), QUIET)).toBe(1);
  });

  it("is 1 well outside the window", () => {
    expect(quietHoursFactor(at("12:00"), QUIET)).toBe(1);
  });

  it("switches hard without a transition", () => {
    const hard = { ...QUIET, transitionMinutes: 0 };
    expect(quietHoursFactor(at("22:59"), hard)).toBe(1);
    expect(quietHoursFactor(at("23:00"), hard)).toBe(0);
  });

  it("is 1 when disabled", () => {
    expect(quietHoursFactor(at("02:00"), { ...QUIET, enabled: false })).toBe(1);
  });
});

describe("dynamicTimeFactor", () => {
  it("applies the period factor inside the period", () => {
    expect(dynamicTimeFactor(at("19:00"), periods())).toBe(2);
  });

  it("blends linearly across the transition", () => {
    expect(dynamicTimeFactor(at("17:30"), periods())).toBe(1.5);
    expect(dynamicTimeFactor(at("17:45"), periods())).toBe(1.75);
    expect(dynamicTimeFactor(at("22:30"), periods())).toBe(1.5);
  });

  it("eases the blend when smoothing", () => {
    expect(dynamicTimeFactor(at("17:45"), periods({ smooth: true }))).toBeCloseTo(1.84375, 10);
  });

  it("is neutral outside every period", () => {
    expect(dynamicTimeFactor(at("12:00"), periods())).toBe(1);
  });

  it("clamps to the configured range", () => {
    const steep = periods({ periods: [{ start: "18:00", end: "22:00", factor: 3 }] });
    expect(dynamicTimeFactor(at("19:00"), steep)).toBe(2);
    expect(dynamicTimeFactor(at("12:00"), periods({ minFactor: 1.2 }))).toBe(1.2);
  });

  it("lets the first matching period win", () => {
    const overlapping = periods({
      periods: [
        { start: "18:00", end: "22:00", factor: 0.5 },
        { start: "19:00", end: "21:00", factor: 2 },
      ],
    });
    expect(dynamicTimeFactor(at("20:00"), overlapping)).toBe(0.5);
  });

  it("handles periods across midnight", () => {
    const night = periods({ periods: [{ start: "22:00", end: "02:00", factor: 0.5 }] });
    expect(dynamicTimeFactor(at("01:00"), night)).toBe(0.5);
  });

  it("is 1 when disabled", () => {
    expect(dynamicTimeFactor(at("19:00"), periods({ enabled: false }))).toBe(1);
  });
});
