/**
 * Leads report: new, stale and site-visit leads in one Slack-flavoured
 * message. Printed by the `leads-report` command.
 */
import type { Lead } from "../shared/types.js";
import { daysBetween, formatReportDate, parseTimestamp, truncate } from "./format.js";

export const DEFAULT_DAYS_STALE = 7;
const MAX_STALE_LISTED = 20;
const NOTES_PREVIEW_CHARS = 60;
const DAY_MS = 86_400_000;

/** Parse a --days-stale value; anything but a plain integer means the default. */
export function parseDaysStale(value: string | number | undefined): number {
  if (typeof value === "number") {
    return Number.isInteger(value) && value >= 0 ? value : DEFAULT_DAYS_STALE;
  }
  const trimmed = value?.trim() ?? "";
  return /^\d+$/.test(trimmed) ? Number(trimmed) : DEFAULT_DAYS_STALE;
}

function summarize(lead: Lead): string {
  const parts = [
    lead.lead_name ?? "Unknown",
    lead.mobile_number ?? "N/A",
    lead.project ?? "N/A",
    lead.lead_source ?? "N/A",
    lead.lead_bucket ?? "N/A",
    lead.priority ?? "N/A",
  ];
  let summary = `• ${parts.join(" | ")}`;
  if (lead.notes) {
    summary += ` | ${truncate(lead.notes, NOTES_PREVIEW_CHARS)}`;
  }
  return summary;
}

function timestampOf(value: string | null | undefined): Date | null {
  return value ? parseTimestamp(value) : null;
}

export function buildLeadsReport(
  leads: Lead[],
  now: Date,
  daysStale: number = DEFAULT_DAYS_STALE,
): string {
  if (leads.length === 0) {
    return "No leads found in the database.";
  }

  const todayStart = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
  const staleCutoff = now.getTime() - daysStale * DAY_MS;

  const newToday: string[] = [];
  const stale: string[] = [];
  const siteVisits: string[] = [];

  for (const lead of leads) {
    const summary = summarize(lead);
    const createdAt = timestampOf(lead.created_at);
    const updatedAt = timestampOf(lead.updated_at);

    if (createdAt && createdAt.getTime() >= todayStart) {
      newToday.push(summary);
    }

    if (updatedAt && updatedAt.getTime() < staleCutoff) {
      stale.push(`${summary} (last updated ${daysBetween(updatedAt, now)}d ago)`);
    }

    if ((lead.status ?? "").toLowerCase().includes("site visit")) {
      siteVisits.push(`${summary} | site visit date: ${lead.site_visit_date ?? "N/A"}`);
    }
  }

  const report = [
    `📊 *Leads Report — ${formatReportDate(now)}*`,
    `Total leads in database: ${leads.length}`,
    "",
    `*🆕 New Leads Added Today (${newToday.length}):*`,
  ];
  if (newToday.length > 0) {
    report.push(...newToday);
  } else {
    report.push("  None today.");
  }

  report.push("", `*⏰ Stale Leads — Not Updated in ${daysStale}+ Days (${stale.length}):*`);
  if (stale.length > 0) {
    report.push(...stale.slice(0, MAX_STALE_LISTED));
    if (stale.length > MAX_STALE_LISTED) {
      report.push(`  ...and ${stale.length - MAX_STALE_LISTED} more`);
    }
  } else {
    report.push("  None — all leads are up to date!");
  }

  report.push("", `*🔥 Hot Leads — Site Visit Status (${siteVisits.length}):*`);
  if (siteVisits.length > 0) {
    report.push(...siteVisits);
  } else {
    report.push("  None with site visit status.");
  }

  return report.join("\n");
}
