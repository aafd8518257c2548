import { ConfigurationError } from "../catalog/errors.js";
import type { ResolvedWindow, TimeWindowSpec } from "../catalog/types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

const WINDOW_DAYS: Record<string, number> = {
  last_7_days: 7,
  last_30_days: 30,
  last_90_days: 90,
  last_year: 365,
};

/**
 * Resolve a window spec to concrete [start, end) bounds relative to `now`.
 */
export function resolveWindow(
  spec: TimeWindowSpec,
  now: Date,
  field: string = "time_window"
): ResolvedWindow {
  if (typeof spec === "string") {
    const days = WINDOW_DAYS[spec];
    if (days === undefined) {
      throw new ConfigurationError(field, `unknown time window "${spec}"`);
    }
    return { label: spec, start: new Date(now.getTime() - days * DAY_MS), end: new Date(now.getTime()) };
  }

  const start = new Date(spec.start);
  const end = new Date(spec.end);
  if (Number.isNaN(start.getTime())) {
    throw new ConfigurationError(`${field}.start`, `not a valid timestamp: "${spec.start}"`);
  }
  if (Number.isNaN(end.getTime())) {
    throw new ConfigurationError(`${field}.end`, `not a valid timestamp: "${spec.end}"`);
  }
  if (start.getTime() >= end.getTime()) {
    throw new ConfigurationError(field, "start must be earlier than end");
  }
  return { label: `${start.toISOString()}/${end.toISOString()}`, start, end };
}

export function inWindow(timestamp: Date, window: ResolvedWindow): boolean {
  const t = timestamp.getTime();
  return t >= window.start.getTime() && t < window.end.getTime();
}

/**
 * Split a window into consecutive slices of at most `sliceDays` days,
 * for fetching event history in parallel.
 */
export function sliceWindow(window: ResolvedWindow, sliceDays: number): ResolvedWindow[] {
  const sliceMs = sliceDays * DAY_MS;
  const slices: ResolvedWindow[] = [];
  let cursor = window.start.getTime();
  const end = window.end.getTime();

  while (cursor < end) {
    const sliceEnd = Math.min(cursor + sliceMs, end);
    const start = new Date(cursor);
    const stop = new Date(sliceEnd);
    slices.push({ label: `${start.toISOString()}/${stop.toISOString()}`, start, end: stop });
    cursor = sliceEnd;
  }

  return slices;
}
