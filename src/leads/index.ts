/**
 * Leads index step: fetch the leads table and append a snapshot to MEMORY.md.
 *
 * Failures here never stop the container from starting.
 */
import type { EntrypointPaths, Lead, SupabaseCredentials } from "../shared/types.js";
import type { Logger } from "../shared/logger.js";
import { appendToMemory } from "../memory/seed.js";
import { fetchLeads, type FetchLeadsOptions } from "./client.js";
import { renderLeadsIndex } from "./index-table.js";

export type LeadsIndexOutcome =
  | { status: "skipped"; reason: "no-credentials" }
  | { status: "empty" }
  | { status: "appended"; count: number }
  | { status: "failed"; error: string };

export interface RefreshLeadsIndexOptions extends Pick<FetchLeadsOptions, "fetch" | "timeoutMs"> {
  logger?: Logger;
  /** Clock override (for testing). */
  now?: () => Date;
}

export async function refreshLeadsIndex(
  paths: Pick<EntrypointPaths, "memoryDir" | "memoryFile">,
  credentials: SupabaseCredentials | null,
  options: RefreshLeadsIndexOptions = {},
): Promise<LeadsIndexOutcome> {
  const { logger } = options;

  if (!credentials) {
    logger?.debug("SUPABASE_URL/SUPABASE_KEY not set, skipping leads index");
    return { status: "skipped", reason: "no-credentials" };
  }

  let leads: Lead[];
  try {
    leads = await fetchLeads(credentials, { fetch: options.fetch, timeoutMs: options.timeoutMs });
  } catch (error: unknown) {
    const msg = error instanceof Error ? error.message : String(error);
    logger?.warn(`Failed to fetch leads index: ${msg}`);
    return { status: "failed", error: msg };
  }

  if (leads.length === 0) {
    logger?.debug("Leads table is empty, nothing to append");
    return { status: "empty" };
  }

  const now = options.now?.() ?? new Date();
  appendToMemory(paths, renderLeadsIndex(leads, now));
  logger?.info(`Leads index appended: ${leads.length} leads`);
  return { status: "appended", count: leads.length };
}
