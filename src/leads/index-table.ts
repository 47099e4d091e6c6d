/**
 * Leads index section appended to MEMORY.md.
 */
import type { Lead } from "../shared/types.js";
import { formatAge, formatIndexStamp, tableCell, truncate } from "./format.js";

export const MAX_CELL_CHARS = 20;

export interface LeadsIndexRow {
  name: string;
  phone: string;
  project: string;
  status: string;
  priority: string;
  updated: string;
}

export function toIndexRow(lead: Lead, now: Date): LeadsIndexRow {
  return {
    name: lead.lead_name ?? "?",
    phone: lead.mobile_number ?? "?",
    project: truncate(lead.project || "?", MAX_CELL_CHARS),
    status: truncate(lead.status || "?", MAX_CELL_CHARS),
    priority: lead.priority || "-",
    updated: formatAge(lead.updated_at ?? "", now),
  };
}

/**
 * Render the markdown section for a non-empty list of leads.
 * The result starts with a blank line and ends with a newline so it can be
 * appended straight after the seed content.
 */
export function renderLeadsIndex(leads: Lead[], now: Date): string {
  const lines = [
    "",
    "## Leads Index (auto-refreshed on deploy)",
    `Total: ${leads.length} leads | Updated: ${formatIndexStamp(now)}`,
    "Use this index for quick reference. For full details, use lead_lookup tool.",
    "",
    "| Name | Phone | Project | Status | Priority | Updated |",
    "|------|-------|---------|--------|----------|---------|",
  ];

  for (const lead of leads) {
    const row = toIndexRow(lead, now);
    const cells = [row.name, row.phone, row.project, row.status, row.priority, row.updated];
    lines.push(`| ${cells.map(tableCell).join(" | ")} |`);
  }

  return lines.join("\n") + "\n";
}
