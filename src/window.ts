import { ConfigurationError } from './errors';
import { parseAcceptDate } from './parser';

const UNIT_MS: Record<string, number> = {
  d: 86_400_000,
  h: 3_600_000,
  m: 60_000,
  s: 1_000,
};

export interface TimeWindow {
  start?: Date;
  end?: Date;
}

/** Accepts `11/Dec/2013` or `11/Dec/2013:10:30:00`, both read as UTC. */
export function parseStartTime(text: string): Date {
  const trimmed = text.trim();
  const full = /^\d{2}\/[A-Za-z]{3}\/\d{4}$/.test(trimmed) ? `${trimmed}:00:00:00` : trimmed;
  const date = parseAcceptDate(full);
  if (!date) {
    throw new ConfigurationError(`invalid start time "${text}" (expected DD/Mon/YYYY[:HH:MM:SS])`);
  }
  return date;
}

/** `90s`, `15m`, `1h30m`, `2d` to milliseconds. */
export function parseDelta(text: string): number {
  const trimmed = text.trim();
  if (!/^(\d+[dhms])+$/.test(trimmed)) {
    throw new ConfigurationError(`invalid delta "${text}" (expected e.g. 30s, 15m, 1h30m, 2d)`);
  }
  let total = 0;
  for (const [, amount, unit] of trimmed.matchAll(/(\d+)([dhms])/g)) {
    total += Number(amount) * UNIT_MS[unit];
  }
  return total;
}

export function resolveWindow(startTime?: Date, deltaMs?: number): TimeWindow {
  if (!startTime) return {};
  if (deltaMs === undefined) return { start: startTime };
  return { start: startTime, end: new Date(startTime.getTime() + deltaMs) };
}

export function isInWindow(window: TimeWindow, date: Date): boolean {
  if (!window.start) return true;
  const ts = date.getTime();
  if (ts < window.start.getTime()) return false;
  if (window.end && ts > window.end.getTime()) return false;
  return true;
}
