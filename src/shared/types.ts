/**
 * Shared TypeScript types for the entrypoint.
 *
 * Defines the data structures passed between startup steps:
 * resolved paths, leads rows and log entries.
 */

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

export interface EntrypointPaths {
  /** Root of the gateway's state (e.g. /root/.nanobot). */
  stateDir: string;
  /** Generated gateway config file. */
  configFile: string;
  /** Agent workspace handed to the gateway. */
  workspaceDir: string;
  /** Directory holding the memory file. */
  memoryDir: string;
  /** Markdown memory file read by the agent. */
  memoryFile: string;
  /** Directory for JSON-lines log files. */
  logDir: string;
}

// ---------------------------------------------------------------------------
// Leads
// ---------------------------------------------------------------------------

/**
 * A row from the `leads` table. Every column is optional because the
 * index query selects a subset and older rows may have gaps.
 */
export interface Lead {
  lead_name?: string | null;
  mobile_number?: string | null;
  project?: string | null;
  status?: string | null;
  priority?: string | null;
  lead_bucket?: string | null;
  lead_source?: string | null;
  notes?: string | null;
  site_visit_date?: string | null;
  updated_at?: string | null;
  created_at?: string | null;
}

export interface SupabaseCredentials {
  url: string;
  key: string;
}

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace";

export const LOG_LEVELS: readonly LogLevel[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
] as const;

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface LogEntry {
  /** ISO-8601 timestamp. */
  ts: string;
  /** Severity level. */
  level: LogLevel;
  /** Startup step that emitted the log (e.g. "health"). */
  component: string;
  /** Human-readable message. */
  msg: string;
}
