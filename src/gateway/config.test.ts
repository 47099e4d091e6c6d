import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { defaultSettings, resolvePaths } from "../config/index.js";
import { Logger } from "../shared/logger.js";
import { renderGatewayConfig, resolvePort, writeGatewayConfig } from "./config.js";

const settings = defaultSettings({});
const paths = resolvePaths("/root/.nanobot");

describe("resolvePort", () => {
  it("defaults to 10000", () => {
    expect(resolvePort({})).toEqual({ port: 10000, invalid: null });
    expect(resolvePort({ PORT: "" })).toEqual({ port: 10000, invalid: null });
  });

  it("uses a valid PORT", () => {
    expect(resolvePort({ PORT: "8080" })).toEqual({ port: 8080, invalid: null });
  });

  it("flags values that are not TCP ports", () => {
    expect(resolvePort({ PORT: "abc" })).toEqual({ port: 10000, invalid: "abc" });
    expect(resolvePort({ PORT: "70000" })).toEqual({ port: 10000, invalid: "70000" });
    expect(resolvePort({ PORT: "0" })).toEqual({ port: 10000, invalid: "0" });
  });
});

describe("renderGatewayConfig", () => {
  it("renders the full document from the environment", () => {
    const config = renderGatewayConfig(
      {
        OPENROUTER_API_KEY: "test-openrouter",
        GROQ_API_KEY: "test-groq",
        SLACK_BOT_TOKEN: "test-bot",
        SLACK_APP_TOKEN: "test-app",
        PORT: "12000",
      },
      settings,
      paths,
    );

    expect(config).toEqual({
      agents: {
        defaults: {
          workspace: "/root/.nanobot/workspace",
          model: "arcee-ai/trinity-large-preview:free",
          maxTokens: 8192,
          temperature: 0.7,
          maxToolIterations: 20,
          memoryWindow: 50,
        },
      },
      providers: {
        openrouter: { apiKey: "test-openrouter", apiBase: null, extraHeaders: null },
        groq: { apiKey: "test-groq", apiBase: null, extraHeaders: null },
      },
      gateway: { host: "0.0.0.0", port: 12000 },
      channels: {
        slack: {
          enabled: true,
          mode: "socket",
          botToken: "test-bot",
          appToken: "test-app",
          dm: { enabled: true, policy: "open", allowFrom: [] },
        },
      },
      tools: {
        web: { search: { apiKey: "", maxResults: 5 } },
        exec: { timeout: 60 },
        restrictToWorkspace: false,
      },
    });
  });

  it("substitutes empty strings when nothing is set", () => {
    const config = renderGatewayConfig({}, settings, paths);
    expect(config.providers.openrouter.apiKey).toBe("");
    expect(config.providers.groq.apiKey).toBe("");
    expect(config.channels.slack.botToken).toBe("");
    expect(config.channels.slack.appToken).toBe("");
    expect(config.gateway.port).toBe(10000);
  });

  it("keeps values with JSON-significant characters intact", () => {
    const config = renderGatewayConfig({ OPENROUTER_API_KEY: 'a"b\\c' }, settings, paths);
    expect(text).toContain('"apiKey":"a\\"b\\\\c"');
    expect(text).toContain('"apiKey": "a\\"b\\\\c"'.replace(": ", ":"));
    expect(JSON.parse(text)).toEqual(config);
  });

  it("follows the slack channel setting", () => {
    const config = renderGatewayConfig(
      {},
      { ...settings, channels: { slack: { enabled: false } } },
      paths,
    );
    expect(config.channels.slack.enabled).toBe(false);
  });
});

describe("writeGatewayConfig", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "entrypoint-gateway-config-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("writes valid JSON and creates the workspace", () => {
    const tmpPaths = resolvePaths(path.join(tmpDir, ".nanobot"));
    writeGatewayConfig({}, settings, tmpPaths);

    const written = JSON.parse(fs.readFileSync(tmpPaths.configFile, "utf-8"));
    expect(written.gateway).toEqual({ host: "0.0.0.0", port: 10000 });
    expect(written.agents.defaults.workspace).toBe(tmpPaths.workspaceDir);
    expect(fs.statSync(tmpPaths.workspaceDir).isDirectory()).toBe(true);
  });

  it("overwrites the previous file without reading it", () => {
    const tmpPaths = resolvePaths(path.join(tmpDir, ".nanobot"));
    fs.mkdirSync(tmpPaths.stateDir, { recursive: true });
    fs.writeFileSync(tmpPaths.configFile, "{ not json");

    writeGatewayConfig({ GROQ_API_KEY: "test-groq" }, settings, tmpPaths);
    const first = fs.readFileSync(tmpPaths.configFile, "utf-8");
    writeGatewayConfig({ GROQ_API_KEY: "test-groq" }, settings, tmpPaths);
    const second = fs.readFileSync(tmpPaths.configFile, "utf-8");

    expect(second).toBe(first);
    expect(JSON.parse(second).providers.groq.apiKey).toBe("test-groq");
  });

  it("warns about an invalid PORT and still writes valid JSON", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "log").mockImplementation(() => {});
    const tmpPaths = resolvePaths(path.join(tmpDir, ".nanobot"));

    writeGatewayConfig({ PORT: "web" }, settings, tmpPaths, new Logger({ component: "config" }));

    expect(warn).toHaveBeenCalledWith("[config] Ignoring invalid PORT 'web', using 10000");
    expect(JSON.parse(fs.readFileSync(tmpPaths.configFile, "utf-8")).gateway.port).toBe(10000);
  });

  it("propagates write failures", () => {
    const blocker = path.join(tmpDir, "file");
    fs.writeFileSync(blocker, "");
    const tmpPaths = resolvePaths(path.join(blocker, ".nanobot"));
    expect(() => writeGatewayConfig({}, settings, tmpPaths)).toThrow();
  });
});
