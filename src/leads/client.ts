/**
 * Supabase leads client.
 *
 * Reads the `leads` table through Supabase's PostgREST endpoint with
 * @supabase/postgrest-js. One request per call, bounded by a timeout,
 * never retried.
 */
import { PostgrestClient } from "@supabase/postgrest-js";
import type { Lead, SupabaseCredentials } from "../shared/types.js";

export const LEADS_TABLE = "leads";

/** Columns the memory index needs; the report reads every column. */
export const LEADS_INDEX_COLUMNS =
  "lead_name,mobile_number,project,status,priority,lead_bucket,updated_at,created_at";

export const DEFAULT_FETCH_TIMEOUT_MS = 15_000;

/** `https://x.supabase.co/` → `https://x.supabase.co/rest/v1` */
export function restEndpoint(projectUrl: string): string {
  return `${projectUrl.replace(/\/+$/, "")}/rest/v1`;
}

const LEAD_FIELDS = [
  "lead_name",
  "mobile_number",
  "project",
  "status",
  "priority",
  "lead_bucket",
  "lead_source",
  "notes",
  "site_visit_date",
  "updated_at",
  "created_at",
] as const satisfies readonly (keyof Lead)[];

export class LeadsFetchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LeadsFetchError";
  }
}

export interface FetchLeadsOptions {
  /** PostgREST select list. Defaults to LEADS_INDEX_COLUMNS. */
  columns?: string;
  /** Defaults to 15 seconds. */
  timeoutMs?: number;
  /** Custom fetch implementation (for testing). */
  fetch?: typeof fetch;
}

function toCell(value: unknown): string | null | undefined {
  if (value === null) return null;
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return undefined;
}

/**
 * Narrow a decoded response body into lead rows.
 * Throws LeadsFetchError unless it is an array of objects.
 */
export function parseLeads(body: unknown): Lead[] {
  if (!Array.isArray(body)) {
    throw new LeadsFetchError("expected a JSON array of leads");
  }

  return body.map((row: unknown, index) => {
    if (typeof row !== "object" || row === null || Array.isArray(row)) {
      throw new LeadsFetchError(`lead at index ${index} is not an object`);
    }
    const lead: Lead = {};
    for (const field of LEAD_FIELDS) {
      if (!(field in row)) continue;
      const value = toCell(Reflect.get(row, field));
      if (value !== undefined) lead[field] = value;
    }
    return lead;
  });
}

/**
 * Fetch leads ordered by created_at, newest first.
 *
 * Sends `apikey` and `Authorization: Bearer` headers with the key.
 * Any failure (bad URL, network, timeout, HTTP error, unexpected body)
 * surfaces as LeadsFetchError.
 */
export async function fetchLeads(
  credentials: SupabaseCredentials,
  options: FetchLeadsOptions = {},
): Promise<Lead[]> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
  const signal = AbortSignal.timeout(timeoutMs);

  let data: unknown;
  try {
    const client = new PostgrestClient(restEndpoint(credentials.url), {
      headers: {
        apikey: credentials.key,
        Authorization: `Bearer ${credentials.key}`,
      },
      fetch: options.fetch,
    });

    const result = await client
      .from(LEADS_TABLE)
      .select(options.columns ?? LEADS_INDEX_COLUMNS)
      .order("created_at", { ascending: false })
      .abortSignal(signal);

    if (result.error) {
      throw new LeadsFetchError(result.error.message, { cause: result.error });
    }
    data = result.data;
  } catch (error: unknown) {
    if (signal.aborted) {
      throw new LeadsFetchError(`request timed out after ${timeoutMs}ms`, { cause: error });
    }
    if (error instanceof LeadsFetchError) throw error;
    const msg = error instanceof Error ? error.message : String(error);
    throw new LeadsFetchError(msg, { cause: error });
  }

  return parseLeads(data);
}
