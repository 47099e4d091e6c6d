/**
 * Configuration system for the entrypoint.
 *
 * Resolves the gateway's state directory and loads the optional launcher
 * settings file (YAML). Settings only switch startup steps on and off and
 * pick defaults; credentials always come from the environment.
 */
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import type { EntrypointPaths, LogLevel } from "../shared/types.js";
import { isLogLevel } from "../shared/types.js";

const STATE_DIRNAME = ".nanobot";
const CONFIG_FILENAME = "config.json";
const SETTINGS_FILENAME = "entrypoint.yaml";

export const DEFAULT_MODEL = "arcee-ai/trinity-large-preview:free";
export const DEFAULT_GATEWAY_COMMAND = "nanobot";

export class SettingsError extends Error {
  /** Settings file that failed to load, if any. */
  readonly file: string | null;

  constructor(message: string, file: string | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SettingsError";
    this.file = file;
  }
}

export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.NANOBOT_HOME?.trim();
  if (override) {
    if (!path.isAbsolute(override)) {
      throw new SettingsError(
        `Invalid NANOBOT_HOME path '${override}': path must be absolute`,
      );
    }
    return path.resolve(override);
  }
  return path.join(os.homedir(), STATE_DIRNAME);
}

export function resolvePaths(stateDir: string = resolveStateDir()): EntrypointPaths {
  const workspaceDir = path.join(stateDir, "workspace");
  const memoryDir = path.join(workspaceDir, "memory");
  return {
    stateDir,
    configFile: path.join(stateDir, CONFIG_FILENAME),
    workspaceDir,
    memoryDir,
    memoryFile: path.join(memoryDir, "MEMORY.md"),
    logDir: path.join(stateDir, "logs"),
  };
}

export function resolveSettingsPath(
  stateDir: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const override = env.NANOBOT_ENTRYPOINT_CONFIG?.trim();
  return override ? path.resolve(override) : path.join(stateDir, SETTINGS_FILENAME);
}

export interface EntrypointSettings {
  /** Default model written to agents.defaults.model. */
  model: string;
  memory: {
    /** Overwrite MEMORY.md with the seed template on start. */
    seed: boolean;
    /** Append the Supabase leads index to MEMORY.md. */
    leadsIndex: boolean;
    /** Seed template path; null means the packaged templates/MEMORY.md. */
    template: string | null;
  };
  gateway: {
    /** Gateway binary, looked up on PATH. */
    command: string;
    /** Pass --port to the gateway explicitly. */
    portFlag: boolean;
  };
  channels: {
    slack: { enabled: boolean };
  };
  logging: {
    level: LogLevel;
    /** Also write JSON lines under <stateDir>/logs/. */
    file: boolean;
  };
}

export function defaultSettings(env: NodeJS.ProcessEnv = process.env): EntrypointSettings {
  const envLevel = env.LOG_LEVEL?.trim().toLowerCase();
  return {
    model: DEFAULT_MODEL,
    memory: { seed: true, leadsIndex: true, template: null },
    gateway: {
      command: env.NANOBOT_BIN?.trim() || DEFAULT_GATEWAY_COMMAND,
      portFlag: false,
    },
    channels: { slack: { enabled: true } },
    logging: {
      level: envLevel && isLogLevel(envLevel) ? envLevel : "info",
      file: false,
    },
  };
}

// ---------------------------------------------------------------------------
// Settings parsing
// ---------------------------------------------------------------------------

type Section = Record<string, unknown>;

function isSection(value: unknown): value is Section {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(parent: Section, key: string, where: string): Section {
  const value = parent[key];
  if (value === undefined || value === null) return {};
  if (!isSection(value)) {
    throw new SettingsError(`'${where}${key}' must be a mapping`);
  }
  return value;
}

function optionalBoolean(parent: Section, key: string, where: string, fallback: boolean): boolean {
  const value = parent[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== "boolean") {
    throw new SettingsError(`'${where}${key}' must be true or false`);
  }
  return value;
}

function optionalString(parent: Section, key: string, where: string): string | undefined {
  const value = parent[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string" || !value.trim()) {
    throw new SettingsError(`'${where}${key}' must be a non-empty string`);
  }
  return value.trim();
}

/**
 * Merge a parsed settings document over the defaults.
 * Unknown keys are ignored; known keys with the wrong type are rejected.
 */
export function parseSettings(
  raw: unknown,
  defaults: EntrypointSettings = defaultSettings(),
): EntrypointSettings {
  if (raw === undefined || raw === null) return defaults;
  if (!isSection(raw)) {
    throw new SettingsError("settings document must be a mapping");
  }

  const memory = section(raw, "memory", "");
  const gateway = section(raw, "gateway", "");
  const channels = section(raw, "channels", "");
  const slack = section(channels, "slack", "channels.");
  const logging = section(raw, "logging", "");

  const level = optionalString(logging, "level", "logging.");
  if (level !== undefined && !isLogLevel(level)) {
    throw new SettingsError(`'logging.level' must be one of fatal, error, warn, info, debug, trace`);
  }

  return {
    model: optionalString(raw, "model", "") ?? defaults.model,
    memory: {
      seed: optionalBoolean(memory, "seed", "memory.", defaults.memory.seed),
      leadsIndex: optionalBoolean(memory, "leadsIndex", "memory.", defaults.memory.leadsIndex),
      template: optionalString(memory, "template", "memory.") ?? defaults.memory.template,
    },
    gateway: {
      command: optionalString(gateway, "command", "gateway.") ?? defaults.gateway.command,
      portFlag: optionalBoolean(gateway, "portFlag", "gateway.", defaults.gateway.portFlag),
    },
    channels: {
      slack: {
        enabled: optionalBoolean(slack, "enabled", "channels.slack.", defaults.channels.slack.enabled),
      },
    },
    logging: {
      level: level ?? defaults.logging.level,
      file: optionalBoolean(logging, "file", "logging.", defaults.logging.file),
    },
  };
}

/**
 * Load launcher settings from disk.
 *
 * A missing file yields the defaults. A file that exists but does not
 * parse, or holds a mistyped key, raises SettingsError.
 */
export function loadSettings(
  settingsPath: string,
  env: NodeJS.ProcessEnv = process.env,
): EntrypointSettings {
  const defaults = defaultSettings(env);
  if (!fs.existsSync(settingsPath)) {
    return defaults;
  }

  const raw = fs.readFileSync(settingsPath, "utf-8");
  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (error: unknown) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new SettingsError(`Could not parse ${settingsPath}: ${msg}`, settingsPath, {
      cause: error,
    });
  }

  try {
    return parseSettings(parsed, defaults);
  } catch (error: unknown) {
    if (error instanceof SettingsError) {
      throw new SettingsError(`${settingsPath}: ${error.message}`, settingsPath, { cause: error });
    }
    throw error;
  }
}
