// src/freshness.ts

export const FRESHNESS_WINDOW_SECONDS = 300;

const ISO_RE =
  /^(\d{4})-(\d{2})-(\d{2})[Tt ](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?([+-]\d{2}:\d{2})$/;

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Parses a wsu:Created value to epoch milliseconds.
 * A zone designator is required; "Z" is rewritten to "+00:00" first.
 * Surrounding whitespace is not stripped: the digest covers the text as sent.
 * Returns null for anything that does not parse.
 */
export function parseCreated(created: string): number | null {
  const normalized = created.replace(/[Zz]$/, "+00:00");
  const m = ISO_RE.exec(normalized);
  if (!m) return null;

  const [, y, mo, d, h, mi, s, frac, offset] = m;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);

  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  const offHours = Number(offset.slice(1, 3));
  const offMinutes = Number(offset.slice(4, 6));
  if (offHours > 23 || offMinutes > 59) return null;
  const offsetMs = (offHours * 60 + offMinutes) * 60_000 * (offset.startsWith("-") ? -1 : 1);

  const ms = frac ? Number(frac.padEnd(3, "0").slice(0, 3)) : 0;

  const local = Date.UTC(year, month - 1, day, hour, minute, second, ms);
  // Date.UTC maps years 0-99 onto 1900-1999
  const fixed = year < 100 ? new Date(local).setUTCFullYear(year) : local;
  return fixed - offsetMs;
}

/** |now - created| <= window, in either direction. Unparseable is never fresh. */
export function isFresh(
  created: string,
  now: Date,
  windowSeconds: number = FRESHNESS_WINDOW_SECONDS
): boolean {
  const t = parseCreated(created);
  if (t === null) return false;
  return Math.abs(now.getTime() - t) <= windowSeconds * 1000;
}
