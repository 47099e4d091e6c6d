/**
 * Startup sequence: config → memory seed → leads index → health → gateway.
 *
 * Every step runs once, in order. Local write failures propagate and abort
 * the run; the leads index and the health listener only log their failures.
 */
import fs from "node:fs";
import type { EntrypointSettings } from "../config/index.js";
import { writeGatewayConfig, resolvePort } from "../gateway/config.js";
import { startHealthServer, type HealthServerHandle } from "../gateway/health.js";
import { refreshLeadsIndex, type LeadsIndexOutcome } from "../leads/index.js";
import { seedMemory } from "../memory/seed.js";
import {
  buildGatewayCommand,
  handOff,
  type SignalSource,
  type SpawnGateway,
} from "../process/index.js";
import { readSupabaseCredentials } from "../security/credentials.js";
import type { Logger } from "../shared/logger.js";
import type { EntrypointPaths } from "../shared/types.js";

export interface PrepareOptions {
  paths: EntrypointPaths;
  settings: EntrypointSettings;
  logger: Logger;
  env?: NodeJS.ProcessEnv;
  /** Custom fetch for the leads index (for testing). */
  fetch?: typeof fetch;
  /** Leads request timeout override (for testing). */
  leadsTimeoutMs?: number;
  /** Clock override (for testing). */
  now?: () => Date;
}

export interface PrepareResult {
  /** Null when the leads step is switched off. */
  leads: LeadsIndexOutcome | null;
}

export interface StartupOptions extends PrepareOptions {
  /** Start the health listener. Defaults to true. */
  health?: boolean;
  /** Health bind address. Defaults to 0.0.0.0. */
  healthHost?: string;
  /** Health port override. Defaults to PORT, like the gateway. */
  healthPort?: number;
  /** Custom spawn for the gateway (for testing). */
  spawn?: SpawnGateway;
  /** Signal source forwarded to the gateway (for testing). */
  signals?: SignalSource;
}

export interface StartupResult extends PrepareResult {
  exitCode: number;
  /** Whether the health listener came up. */
  healthy: boolean;
}

/** Write every file the gateway reads: config.json and MEMORY.md. */
export async function prepareGateway(options: PrepareOptions): Promise<PrepareResult> {
  const { paths, settings, logger } = options;
  const env = options.env ?? process.env;

  writeGatewayConfig(env, settings, paths, logger.child("config"));

  if (settings.memory.seed) {
    seedMemory(paths, settings.memory.template, logger.child("memory"));
  } else {
    fs.mkdirSync(paths.memoryDir, { recursive: true });
  }

  if (!settings.memory.leadsIndex) {
    return { leads: null };
  }

  const leads = await refreshLeadsIndex(paths, readSupabaseCredentials(env), {
    fetch: options.fetch,
    timeoutMs: options.leadsTimeoutMs,
    now: options.now,
    logger: logger.child("leads"),
  });
  return { leads };
}

/**
 * Run the whole startup sequence and resolve with the gateway's exit status
 * once it has exited.
 */
export async function runStartup(options: StartupOptions): Promise<StartupResult> {
  const { settings, logger } = options;
  const env = options.env ?? process.env;

  const prepared = await prepareGateway(options);

  const { port } = resolvePort(env);
  let health: HealthServerHandle | null = null;
  if (options.health ?? true) {
    try {
      health = await startHealthServer({
        port: options.healthPort ?? port,
        host: options.healthHost,
        logger: logger.child("health"),
      });
    } catch (error: unknown) {
      const msg = error instanceof Error ? error.message : String(error);
      logger.child("health").error(`Health server failed to start: ${msg}`);
    }
  }

  const gateway = buildGatewayCommand(
    settings.gateway.command,
    settings.gateway.portFlag ? port : null,
  );
  const exitCode = await handOff(gateway, {
    env,
    logger: logger.child("gateway"),
    spawn: options.spawn,
    signals: options.signals,
  });

  await health?.close();
  return { ...prepared, exitCode, healthy: health !== null };
}
