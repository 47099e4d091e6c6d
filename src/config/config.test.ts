import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import {
  DEFAULT_MODEL,
  SettingsError,
  defaultSettings,
  loadSettings,
  parseSettings,
  resolvePaths,
  resolveSettingsPath,
  resolveStateDir,
} from "./index.js";

function makeTmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "entrypoint-config-test-"));
}

describe("resolveStateDir", () => {
  it("returns ~/.nanobot by default", () => {
    expect(resolveStateDir({})).toBe(path.join(os.homedir(), ".nanobot"));
  });

  it("respects NANOBOT_HOME override", () => {
    expect(resolveStateDir({ NANOBOT_HOME: "/srv/nanobot" })).toBe("/srv/nanobot");
  });

  it("rejects a relative NANOBOT_HOME", () => {
    expect(() => resolveStateDir({ NANOBOT_HOME: "state" })).toThrow(SettingsError);
  });
});

describe("resolvePaths", () => {
  it("lays out config, workspace and memory under the state dir", () => {
    expect(resolvePaths("/root/.nanobot")).toEqual({
      stateDir: "/root/.nanobot",
      configFile: "/root/.nanobot/config.json",
      workspaceDir: "/root/.nanobot/workspace",
      memoryDir: "/root/.nanobot/workspace/memory",
      memoryFile: "/root/.nanobot/workspace/memory/MEMORY.md",
      logDir: "/root/.nanobot/logs",
    });
  });
});

describe("resolveSettingsPath", () => {
  it("defaults to entrypoint.yaml inside the state dir", () => {
    expect(resolveSettingsPath("/tmp/state", {})).toBe("/tmp/state/entrypoint.yaml");
  });

  it("respects NANOBOT_ENTRYPOINT_CONFIG", () => {
    expect(
      resolveSettingsPath("/tmp/state", { NANOBOT_ENTRYPOINT_CONFIG: "/etc/entrypoint.yaml" }),
    ).toBe("/etc/entrypoint.yaml");
  });
});

describe("defaultSettings", () => {
  it("enables every optional step", () => {
    const settings = defaultSettings({});
    expect(settings.model).toBe(DEFAULT_MODEL);
    expect(settings.memory).toEqual({ seed: true, leadsIndex: true, template: null });
    expect(settings.gateway).toEqual({ command: "nanobot", portFlag: false });
    expect(settings.channels.slack.enabled).toBe(true);
    expect(settings.logging).toEqual({ level: "info", file: false });
  });

  it("reads NANOBOT_BIN and LOG_LEVEL", () => {
    const settings = defaultSettings({ NANOBOT_BIN: "/opt/nanobot", LOG_LEVEL: "DEBUG" });
    expect(settings.gateway.command).toBe("/opt/nanobot");
    expect(settings.logging.level).toBe("debug");
  });

  it("ignores an unknown LOG_LEVEL", () => {
    expect(defaultSettings({ LOG_LEVEL: "loud" }).logging.level).toBe("info");
  });
});

describe("parseSettings", () => {
  const defaults = defaultSettings({});

  it("returns defaults for an empty document", () => {
    expect(parseSettings(null, defaults)).toEqual(defaults);
  });

  it("overrides individual keys", () => {
    const settings = parseSettings(
      {
        model: "openrouter/test-model",
        memory: { leadsIndex: false },
        gateway: { portFlag: true },
        channels: { slack: { enabled: false } },
      },
      defaults,
    );
    expect(settings.model).toBe("openrouter/test-model");
    expect(settings.memory).toEqual({ seed: true, leadsIndex: false, template: null });
    expect(settings.gateway).toEqual({ command: "nanobot", portFlag: true });
    expect(settings.channels.slack.enabled).toBe(false);
  });

  it("ignores unknown keys", () => {
    expect(parseSettings({ extra: 1, memory: { other: "x" } }, defaults)).toEqual(defaults);
  });

  it("rejects a mistyped boolean", () => {
    expect(() => parseSettings({ memory: { seed: "yes" } }, defaults)).toThrow(
      "'memory.seed' must be true or false",
    );
  });

  it("rejects a non-mapping section", () => {
    expect(() => parseSettings({ gateway: [] }, defaults)).toThrow("'gateway' must be a mapping");
  });

  it("rejects an unknown log level", () => {
    expect(() => parseSettings({ logging: { level: "loud" } }, defaults)).toThrow(SettingsError);
  });

  it("rejects a non-mapping document", () => {
    expect(() => parseSettings("model: x", defaults)).toThrow(
      "settings document must be a mapping",
    );
  });
});

describe("loadSettings", () => {
  let tmpDir: string | undefined;

  afterEach(() => {
    if (tmpDir) fs.rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = undefined;
  });

  it("returns defaults when the file does not exist", () => {
    tmpDir = makeTmpDir();
    expect(loadSettings(path.join(tmpDir, "entrypoint.yaml"), {})).toEqual(defaultSettings({}));
  });

  it("loads YAML from disk", () => {
    tmpDir = makeTmpDir();
    const file = path.join(tmpDir, "entrypoint.yaml");
    fs.writeFileSync(file, "memory:\n  seed: false\nlogging:\n  level: warn\n");
    const settings = loadSettings(file, {});
    expect(settings.memory.seed).toBe(false);
    expect(settings.logging.level).toBe("warn");
  });

  it("prefixes validation errors with the file path", () => {
    tmpDir = makeTmpDir();
    const file = path.join(tmpDir, "entrypoint.yaml");
    fs.writeFileSync(file, "gateway:\n  portFlag: 1\n");
    expect(() => loadSettings(file, {})).toThrow(
      `${file}: 'gateway.portFlag' must be true or false`,
    );
  });

  it("throws SettingsError for malformed YAML", () => {
    tmpDir = makeTmpDir();
    const file = path.join(tmpDir, "entrypoint.yaml");
    fs.writeFileSync(file, "memory: [unclosed\n");
    expect(() => loadSettings(file, {})).toThrow(SettingsError);
  });
});
