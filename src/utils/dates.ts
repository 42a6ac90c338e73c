const DAY_MS = 24 * 60 * 60 * 1000;

export function isoDate(d: Date = new Date()): string {
  return d.toISOString().slice(0, 10);
}

export function addDays(date: string, days: number): string {
  const base = new Date(`${date}T00:00:00Z`);
  return isoDate(new Date(base.getTime() + days * DAY_MS));
}

/** Normalize a timestamp-ish string to its ISO date, or null when unparseable */
export function toIsoDate(value: string): string | null {
  if (/^\d{4}-\d{2}-\d{2}/.test(value)) return value.slice(0, 10);
  const d = new Date(value);
  return Number.isFinite(d.getTime()) ? isoDate(d) : null;
}
