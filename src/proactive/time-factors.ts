import type { QuietHoursConfig, TimePeriod, TimePeriodsConfig } from "../config/types.js";
import { clamp } from "../utils/decay.js";

const MINUTES_PER_DAY = 1440;

/** Minute of the day (0..1439) in `timezone`, or host-local when absent or invalid. */
export function minuteOfDay(now: Date, timezone?: string): number {
  if (timezone) {
    try {
      const fmt = new Intl.DateTimeFormat("en-US", {
        timeZone: timezone,
        hour: "numeric",
        minute: "numeric",
        hourCycle: "h23",
      });
      const parts = fmt.formatToParts(now);
      const hour = parts.find((p) => p.type === "hour");
      const minute = parts.find((p) => p.type === "minute");
      if (hour && minute) {
        return (parseInt(hour.value, 10) % 24) * 60 + parseInt(minute.value, 10);
      }
    } catch {
      // Invalid timezone; use the host clock
    }
  }
  return now.getHours() * 60 + now.getMinutes();
}

export function parseClock(time: string): number {
  const [h = "0", m = "0"] = time.split(":");
  return (Number(h) * 60 + Number(m)) % MINUTES_PER_DAY;
}

/** Minutes from `from` forward to `to`, wrapping past midnight. */
function forwardDistance(from: number, to: number): number {
  return (((to - from) % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
}

function withinWindow(minute: number, start: number, end: number): boolean {
  if (start === end) return false;
  if (start < end) return minute >= start && minute < end;
  return minute >= start || minute < end;
}

/**
 * 0 inside the quiet window, 1 well outside it, with a linear ramp across
 * `transitionMinutes` on both edges (down before start, up after end).
 */
export function quietHoursFactor(minute: number, config: QuietHoursConfig): number {
  if (!config.enabled) return 1;

  const start = parseClock(config.start);
  const end = parseClock(config.end);
  if (withinWindow(minute, start, end)) return 0;

  const ramp = config.transitionMinutes;
  if (ramp <= 0) return 1;

  const untilStart = forwardDistance(minute, start);
  if (untilStart > 0 && untilStart <= ramp) return untilStart / ramp;

  const sinceEnd = forwardDistance(end, minute);
  if (sinceEnd < ramp) return sinceEnd / ramp;

  return 1;
}

function smoothstep(t: number): number {
  return t * t * (3 - 2 * t);
}

function periodWeight(minute: number, period: TimePeriod, ramp: number, smooth: boolean): number {
  const start = parseClock(period.start);
  const end = parseClock(period.end);
  if (withinWindow(minute, start, end)) return 1;
  if (ramp <= 0) return 0;

  const untilStart = forwardDistance(minute, start);
  const sinceEnd = forwardDistance(end, minute);
  let t = 0;
  if (untilStart > 0 && untilStart < ramp) {
    t = 1 - untilStart / ramp;
  } else if (sinceEnd < ramp) {
    t = 1 - sinceEnd / ramp;
  }
  return smooth ? smoothstep(t) : t;
}

/**
 * Multiplier from configured day periods. Outside every period the factor
 * is 1; it blends toward a period's factor across the transition window on
 * each side. The first period with any weight wins.
 */
export function dynamicTimeFactor(minute: number, config: TimePeriodsConfig): number {
  if (!config.enabled) return 1;

  for (const period of config.periods) {
    const weight = periodWeight(minute, period, config.transitionMinutes, config.smooth);
    if (weight > 0) {
      const factor = 1 + (period.factor - 1) * weight;
      return clamp(factor, config.minFactor, config.maxFactor);
    }
  }
  return clamp(1, config.minFactor, config.maxFactor);
}
