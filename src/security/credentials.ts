/**
 * Credential handling for the entrypoint.
 *
 * Credentials only ever arrive through environment variables. This module
 * names them, reads the Supabase pair used by the leads index, and redacts
 * secret-looking values from anything that is logged.
 */

import type { SupabaseCredentials } from "../shared/types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type CredentialKey =
  | "openrouter"
  | "groq"
  | "slack-bot"
  | "slack-app"
  | "supabase-url"
  | "supabase-key";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/**
 * Mapping from credential key to environment variable name.
 */
const ENV_VAR_MAP: Record<CredentialKey, string> = {
  openrouter: "OPENROUTER_API_KEY",
  groq: "GROQ_API_KEY",
  "slack-bot": "SLACK_BOT_TOKEN",
  "slack-app": "SLACK_APP_TOKEN",
  "supabase-url": "SUPABASE_URL",
  "supabase-key": "SUPABASE_KEY",
};

/**
 * Redact credential values from a string.
 *
 * Replaces key=value patterns, bearer headers and known token formats
 * with ***REDACTED***. Used by the logger on every line it writes.
 */
export function redactCredentials(input: string): string {
  let result = input.replace(
    /(api.?key|apikey|token|password|secret)([=:])\s*\S+/gi,
    "$1$2***REDACTED***",
  );
  result = result.replace(/Bearer\s+[A-Za-z0-9._-]+/g, "Bearer ***REDACTED***");
  result = result.replace(/eyJ[A-Za-z0-9_-]+\.eyJ[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+/g, "***REDACTED***");
  result = result.replace(/sk-or-[A-Za-z0-9_-]+/g, "***REDACTED***");
  result = result.replace(/gsk_[A-Za-z0-9]+/g, "***REDACTED***");
  result = result.replace(/xox[abpr]-[A-Za-z0-9-]+/g, "***REDACTED***");
  result = result.replace(/xapp-[A-Za-z0-9-]+/g, "***REDACTED***");
  return result;
}

// ---------------------------------------------------------------------------
// Environment lookups
// ---------------------------------------------------------------------------

/**
 * Read a credential from the environment.
 * Unset and blank values both come back as "".
 */
export function readCredential(key: CredentialKey, env: NodeJS.ProcessEnv = process.env): string {
  return env[ENV_VAR_MAP[key]]?.trim() ?? "";
}

/**
 * Read the Supabase URL/key pair. Returns null unless both are non-empty,
 * which is the signal to skip the leads index entirely.
 */
export function readSupabaseCredentials(
  env: NodeJS.ProcessEnv = process.env,
): SupabaseCredentials | null {
  const url = readCredential("supabase-url", env);
  const key = readCredential("supabase-key", env);
  if (!url || !key) return null;
  return { url, key };
}
