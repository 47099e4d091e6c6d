import { describe, expect, it } from "vitest";
import type { Lead } from "../shared/types.js";
import { buildLeadsReport, parseDaysStale } from "./report.js";

const now = new Date("2026-10-19T12:00:00Z");

const asha: Lead = {
  lead_name: "Asha",
  mobile_number: "111",
  project: "Park",
  lead_source: "Web",
  lead_bucket: "A",
  priority: "hot",
  status: "Site Visit Scheduled",
  site_visit_date: "2026-10-21",
  notes: "Wants 2BHK",
  created_at: "2026-10-19T08:00:00Z",
  updated_at: "2026-10-19T08:00:00Z",
};

const ben: Lead = {
  lead_name: "Ben",
  mobile_number: "222",
  project: "Lake",
  status: "Contacted",
  created_at: "2026-09-01T00:00:00Z",
  updated_at: "2026-10-01T12:00:00Z",
};

describe("buildLeadsReport", () => {
  it("groups new, stale and site-visit leads", () => {
    expect(buildLeadsReport([asha, ben], now)).toBe(
      [
        "📊 *Leads Report — 2026-10-19*",
        "Total leads in database: 2",
        "",
        "*🆕 New Leads Added Today (1):*",
        "• Asha | 111 | Park | Web | A | hot | Wants 2BHK",
        "",
        "*⏰ Stale Leads — Not Updated in 7+ Days (1):*",
        "• Ben | 222 | Lake | N/A | N/A | N/A (last updated 18d ago)",
        "",
        "*🔥 Hot Leads — Site Visit Status (1):*",
        "• Asha | 111 | Park | Web | A | hot | Wants 2BHK | site visit date: 2026-10-21",
      ].join("\n"),
    );
  });

  it("prints placeholders for empty sections", () => {
    const report = buildLeadsReport([{ lead_name: "Quiet" }], now);
    expect(report.split("\n")).toEqual([
      "📊 *Leads Report — 2026-10-19*",
      "Total leads in database: 1",
      "",
      "*🆕 New Leads Added Today (0):*",
      "  None today.",
      "",
      "*⏰ Stale Leads — Not Updated in 7+ Days (0):*",
      "  None — all leads are up to date!",
      "",
      "*🔥 Hot Leads — Site Visit Status (0):*",
      "  None with site visit status.",
    ]);
  });

  it("honours a custom stale threshold", () => {
    const report = buildLeadsReport([ben], now, 30);
    expect(report).toContain("*⏰ Stale Leads — Not Updated in 30+ Days (0):*");
  });

  it("lists at most 20 stale leads", () => {
    const leads: Lead[] = Array.from({ length: 25 }, (_, i) => ({
      lead_name: `Lead ${i}`,
      updated_at: "2026-09-01T00:00:00Z",
    }));
    const lines = buildLeadsReport(leads, now).split("\n");
    expect(lines.filter((line) => line.includes("(last updated 48d ago)"))).toHaveLength(20);
    expect(lines).toContain("  ...and 5 more");
  });

  it("cuts notes to 60 characters", () => {
    const report = buildLeadsReport([{ lead_name: "N", notes: "x".repeat(80) }], now);
    expect(report).not.toContain("x".repeat(61));
    expect(report).toContain("x".repeat(60));
  });

  it("reports an empty table", () => {
    expect(buildLeadsReport([], now)).toBe("No leads found in the database.");
  });
});

describe("parseDaysStale", () => {
  it("parses integers", () => {
    expect(parseDaysStale("3")).toBe(3);
    expect(parseDaysStale(" 14 ")).toBe(14);
    expect(parseDaysStale(5)).toBe(5);
  });

  it("falls back to 7", () => {
    expect(parseDaysStale(undefined)).toBe(7);
    expect(parseDaysStale("soon")).toBe(7);
    expect(parseDaysStale("-2")).toBe(7);
    expect(parseDaysStale(2.5)).toBe(7);
  });
});
