/**
 * Formatting helpers shared by the leads index and the leads report.
 */

const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

const DAY_MS = 86_400_000;

const ISO_TIMESTAMP =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?))?(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

/** True when year-month-day names a real calendar day. */
function isCalendarDate(date: string): boolean {
  const [year, month, day] = date.split("-").map(Number);
  if (year === undefined || month === undefined || day === undefined) return false;
  const probe = new Date(Date.UTC(year, month - 1, day));
  return (
    probe.getUTCFullYear() === year &&
    probe.getUTCMonth() === month - 1 &&
    probe.getUTCDate() === day
  );
}

/**
 * Parse an ISO-8601 timestamp as PostgREST emits it.
 *
 * Accepts a space or "T" separator, any number of fractional digits and
 * offsets written as Z, +HH, +HHMM or +HH:MM. A timestamp without an offset
 * is read as UTC. Returns null when the value is not a timestamp, including
 * impossible dates such as Feb 30 and hour 24, which Date.parse would roll
 * over.
 */
export function parseTimestamp(value: string): Date | null {
  const match = ISO_TIMESTAMP.exec(value.trim());
  if (!match) return null;

  const [, date, time, zone] = match;
  if (!date || !isCalendarDate(date)) return null;
  let normalized = date;
  if (time) {
    if (Number(time.slice(0, 2)) > 23) return null;
    normalized += `T${time.replace(/(\.\d{3})\d+$/, "$1")}`;
    if (!zone || zone.toUpperCase() === "Z") {
      normalized += "Z";
    } else if (/^[+-]\d{2}$/.test(zone)) {
      normalized += `${zone}:00`;
    } else {
      normalized += zone.replace(/^([+-]\d{2}):?(\d{2})$/, "$1:$2");
    }
  }

  const ms = Date.parse(normalized);
  return Number.isNaN(ms) ? null : new Date(ms);
}

/** Whole days elapsed between two instants, rounded down. */
export function daysBetween(earlier: Date, later: Date): number {
  return Math.floor((later.getTime() - earlier.getTime()) / DAY_MS);
}

/**
 * Render an updated_at value as "<N>d ago".
 * Values that do not parse are returned unchanged.
 */
export function formatAge(value: string, now: Date): string {
  if (!value) return "";
  const parsed = parseTimestamp(value);
  if (!parsed) return value;
  return `${daysBetween(parsed, now)}d ago`;
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** e.g. "Oct 19, 2026 09:05 UTC" */
export function formatIndexStamp(now: Date): string {
  const month = MONTHS[now.getUTCMonth()] ?? "";
  return `${month} ${pad2(now.getUTCDate())}, ${now.getUTCFullYear()} ${pad2(now.getUTCHours())}:${pad2(now.getUTCMinutes())} UTC`;
}

/** e.g. "2026-10-19" */
export function formatReportDate(now: Date): string {
  return now.toISOString().slice(0, 10);
}

/** Keep at most `max` characters, counting code points rather than UTF-16 units. */
export function truncate(value: string, max: number): string {
  const chars = Array.from(value);
  return chars.length <= max ? value : chars.slice(0, max).join("");
}

/** Make a value safe to place inside a markdown table cell. */
export function tableCell(value: string): string {
  return value.replace(/\r?\n/g, " ").replace(/\|/g, "\\|");
}
