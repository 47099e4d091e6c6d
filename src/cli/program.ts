/**
 * CLI program definition for the entrypoint.
 *
 * Uses Commander to define the command structure. `start` is the default
 * command, so a bare `nanobot-entrypoint` in a Dockerfile runs the whole
 * startup sequence.
 */
import { Command } from "commander";
import { VERSION } from "../version.js";
import {
  loadSettings,
  resolvePaths,
  resolveSettingsPath,
  resolveStateDir,
  type EntrypointSettings,
} from "../config/index.js";
import { writeGatewayConfig, resolvePort } from "../gateway/config.js";
import { startHealthServer } from "../gateway/health.js";
import { fetchLeads } from "../leads/client.js";
import { buildLeadsReport, parseDaysStale } from "../leads/report.js";
import { FORWARDED_SIGNALS, type SignalSource, type SpawnGateway } from "../process/index.js";
import { readSupabaseCredentials } from "../security/credentials.js";
import { createLogger, type Logger } from "../shared/logger.js";
import type { EntrypointPaths, Lead } from "../shared/types.js";
import { prepareGateway, runStartup } from "../startup/sequence.js";

/** Report requests read every column, so they get a longer budget than the index. */
const REPORT_TIMEOUT_MS = 30_000;

export interface CommandContext {
  env: NodeJS.ProcessEnv;
  paths: EntrypointPaths;
  settings: EntrypointSettings;
  logger: Logger;
}

/** Test seams; production leaves these unset. */
export interface CommandDeps {
  fetch?: typeof fetch;
  spawn?: SpawnGateway;
  signals?: SignalSource;
  now?: () => Date;
  healthHost?: string;
  healthPort?: number;
  /** Receives report output. Defaults to console.log. */
  print?: (text: string) => void;
}

export interface StartOptions {
  seed?: boolean;
  leads?: boolean;
  health?: boolean;
  portFlag?: boolean;
}

export interface SeedOptions {
  leads?: boolean;
}

export interface ReportOptions {
  daysStale?: string;
}

export function loadContext(env: NodeJS.ProcessEnv = process.env): CommandContext {
  const stateDir = resolveStateDir(env);
  const paths = resolvePaths(stateDir);
  const settings = loadSettings(resolveSettingsPath(stateDir, env), env);
  const logger = createLogger(
    {},
    {
      level: settings.logging.level,
      fileOutput: settings.logging.file,
      logDir: paths.logDir,
    },
  );
  return { env, paths, settings, logger };
}

/** Command-line switches can only turn optional steps off, or add --port. */
export function applyStartFlags(
  settings: EntrypointSettings,
  opts: StartOptions,
): EntrypointSettings {
  return {
    ...settings,
    memory: {
      ...settings.memory,
      seed: settings.memory.seed && opts.seed !== false,
      leadsIndex: settings.memory.leadsIndex && opts.leads !== false,
    },
    gateway: {
      ...settings.gateway,
      portFlag: settings.gateway.portFlag || opts.portFlag === true,
    },
  };
}

export async function handleStart(
  ctx: CommandContext,
  opts: StartOptions = {},
  deps: CommandDeps = {},
): Promise<number> {
  const result = await runStartup({
    paths: ctx.paths,
    settings: applyStartFlags(ctx.settings, opts),
    logger: ctx.logger,
    env: ctx.env,
    health: opts.health !== false,
    fetch: deps.fetch,
    spawn: deps.spawn,
    signals: deps.signals,
    now: deps.now,
    healthHost: deps.healthHost,
    healthPort: deps.healthPort,
  });
  return result.exitCode;
}

export function handleRenderConfig(ctx: CommandContext, deps: CommandDeps = {}): number {
  writeGatewayConfig(ctx.env, ctx.settings, ctx.paths, ctx.logger.child("config"));
  (deps.print ?? console.log)(ctx.paths.configFile);
  return 0;
}

export async function handleSeedMemory(
  ctx: CommandContext,
  opts: SeedOptions = {},
  deps: CommandDeps = {},
): Promise<number> {
  await prepareGateway({
    paths: ctx.paths,
    settings: applyStartFlags(
      { ...ctx.settings, memory: { ...ctx.settings.memory, seed: true } },
      { leads: opts.leads },
    ),
    logger: ctx.logger,
    env: ctx.env,
    fetch: deps.fetch,
    now: deps.now,
  });
  return 0;
}

/** Serve only the health endpoint until SIGINT/SIGTERM. */
export async function handleHealth(ctx: CommandContext, deps: CommandDeps = {}): Promise<number> {
  const signals = deps.signals ?? process;
  const server = await startHealthServer({
    port: deps.healthPort ?? resolvePort(ctx.env).port,
    host: deps.healthHost,
    logger: ctx.logger.child("health"),
  });

  await new Promise<void>((resolve) => {
    const stop = () => {
      for (const signal of FORWARDED_SIGNALS) signals.off(signal, stop);
      resolve();
    };
    for (const signal of FORWARDED_SIGNALS) signals.on(signal, stop);
  });

  await server.close();
  return 0;
}

export async function handleLeadsReport(
  ctx: CommandContext,
  opts: ReportOptions = {},
  deps: CommandDeps = {},
): Promise<number> {
  const print = deps.print ?? console.log;
  const credentials = readSupabaseCredentials(ctx.env);
  if (!credentials) {
    ctx.logger.error("SUPABASE_URL and SUPABASE_KEY must be set to build a leads report");
    return 1;
  }

  let leads: Lead[];
  try {
    leads = await fetchLeads(credentials, {
      columns: "*",
      timeoutMs: REPORT_TIMEOUT_MS,
      fetch: deps.fetch,
    });
  } catch (error: unknown) {
    const msg = error instanceof Error ? error.message : String(error);
    print(`Error fetching leads: ${msg}`);
    return 1;
  }

  const now = deps.now?.() ?? new Date();
  print(buildLeadsReport(leads, now, parseDaysStale(opts.daysStale)));
  return 0;
}

export function buildProgram(deps: CommandDeps = {}): Command {
  const program = new Command();

  const finish = (code: number) => {
    process.exitCode = code;
  };

  program
    .name("nanobot-entrypoint")
    .description("Render nanobot's config, seed its memory and launch the gateway")
    .version(VERSION);

  program
    .command("start", { isDefault: true })
    .description("run the full startup sequence and hand off to the gateway")
    .option("--no-seed", "do not overwrite MEMORY.md with the seed template")
    .option("--no-leads", "do not append the Supabase leads index")
    .option("--no-health", "do not start the health endpoint")
    .option("--port-flag", "pass --port to the gateway")
    .action(async (opts: StartOptions) => {
      finish(await handleStart(loadContext(), opts, deps));
    });

  program
    .command("render-config")
    .description("write the gateway config and print its path")
    .action(() => {
      finish(handleRenderConfig(loadContext(), deps));
    });

  program
    .command("seed-memory")
    .description("seed MEMORY.md and append the leads index")
    .option("--no-leads", "do not append the Supabase leads index")
    .action(async (opts: SeedOptions) => {
      finish(await handleSeedMemory(loadContext(), opts, deps));
    });

  program
    .command("health")
    .description("serve only the health endpoint")
    .action(async () => {
      finish(await handleHealth(loadContext(), deps));
    });

  program
    .command("leads-report")
    .description("print a report of new, stale and site-visit leads")
    .option("--days-stale <days>", "days without update before a lead counts as stale", "7")
    .action(async (opts: ReportOptions) => {
      finish(await handleLeadsReport(loadContext(), opts, deps));
    });

  return program;
}
