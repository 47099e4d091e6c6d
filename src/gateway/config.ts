/**
 * Gateway config materializer.
 *
 * Renders nanobot's config.json from the environment on every start.
 * The previous file is never read: the output depends only on the current
 * environment and launcher settings.
 */
import fs from "node:fs";
import path from "node:path";
import type { EntrypointSettings } from "../config/index.js";
import { readCredential } from "../security/credentials.js";
import type { EntrypointPaths } from "../shared/types.js";
import type { Logger } from "../shared/logger.js";

export const DEFAULT_PORT = 10000;
export const GATEWAY_HOST = "0.0.0.0";

export interface ProviderConfig {
  apiKey: string;
  apiBase: string | null;
  extraHeaders: Record<string, string> | null;
}

export interface SlackChannelConfig {
  enabled: boolean;
  mode: "socket";
  botToken: string;
  appToken: string;
  dm: {
    enabled: boolean;
    policy: "open";
    allowFrom: string[];
  };
}

export interface GatewayConfig {
  agents: {
    defaults: {
      workspace: string;
      model: string;
      maxTokens: number;
      temperature: number;
      maxToolIterations: number;
      memoryWindow: number;
    };
  };
  providers: {
    openrouter: ProviderConfig;
    groq: ProviderConfig;
  };
  gateway: {
    host: string;
    port: number;
  };
  channels: {
    slack: SlackChannelConfig;
  };
  tools: {
    web: { search: { apiKey: string; maxResults: number } };
    exec: { timeout: number };
    restrictToWorkspace: boolean;
  };
}

export interface PortResolution {
  port: number;
  /** The raw PORT value when it was set but unusable. */
  invalid: string | null;
}

/** Resolve PORT, falling back to 10000 when unset or not a valid TCP port. */
export function resolvePort(env: NodeJS.ProcessEnv = process.env): PortResolution {
  const raw = env.PORT?.trim();
  if (!raw) return { port: DEFAULT_PORT, invalid: null };
  if (!/^\d+$/.test(raw)) return { port: DEFAULT_PORT, invalid: raw };
  const port = Number(raw);
  if (port < 1 || port > 65535) return { port: DEFAULT_PORT, invalid: raw };
  return { port, invalid: null };
}

function provider(apiKey: string): ProviderConfig {
  return { apiKey, apiBase: null, extraHeaders: null };
}

/** Build the config document. Pure: no I/O, no validation of credentials. */
export function renderGatewayConfig(
  env: NodeJS.ProcessEnv,
  settings: Pick<EntrypointSettings, "model" | "channels">,
  paths: Pick<EntrypointPaths, "workspaceDir">,
): GatewayConfig {
  return {
    agents: {
      defaults: {
        workspace: paths.workspaceDir,
        model: settings.model,
        maxTokens: 8192,
        temperature: 0.7,
        maxToolIterations: 20,
        memoryWindow: 50,
      },
    },
    providers: {
      openrouter: provider(readCredential("openrouter", env)),
      groq: provider(readCredential("groq", env)),
    },
    gateway: {
      host: GATEWAY_HOST,
      port: resolvePort(env).port,
    },
    channels: {
      slack: {
        enabled: settings.channels.slack.enabled,
        mode: "socket",
        botToken: readCredential("slack-bot", env),
        appToken: readCredential("slack-app", env),
        dm: { enabled: true, policy: "open", allowFrom: [] },
      },
    },
    tools: {
      web: { search: { apiKey: "", maxResults: 5 } },
      exec: { timeout: 60 },
      restrictToWorkspace: false,
    },
  };
}

/**
 * Render and write config.json, creating the state and workspace
 * directories. Write errors propagate to the caller.
 */
export function writeGatewayConfig(
  env: NodeJS.ProcessEnv,
  settings: Pick<EntrypointSettings, "model" | "channels">,
  paths: Pick<EntrypointPaths, "configFile" | "workspaceDir">,
  logger?: Logger,
): GatewayConfig {
  const { invalid } = resolvePort(env);
  if (invalid !== null) {
    logger?.warn(`Ignoring invalid PORT '${invalid}', using ${DEFAULT_PORT}`);
  }

  const config = renderGatewayConfig(env, settings, paths);
  fs.mkdirSync(path.dirname(paths.configFile), { recursive: true });
  fs.mkdirSync(paths.workspaceDir, { recursive: true });
  fs.writeFileSync(paths.configFile, JSON.stringify(config, null, 2) + "\n");
  logger?.info(`Gateway config written to ${paths.configFile}`);
  return config;
}
