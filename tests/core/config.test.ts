import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "fs";
import path from "path";
import os from "os";
import { CONFIG_FILE, ConfigError, defineConfig, loadEngineConfig } from "../../src/core/config.js";

vi.mock("../../src/core/logger.js", () => ({
  log: { info: vi.fn(), debug: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

describe("engine config", () => {
  let testDir: string;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), "phaseloop-config-test-"));
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it("fills every default", () => {
    const config = defineConfig();
    expect(config.deliveryTimeoutMs).toBe(30_000);
    expect(config.gateway.defaultTimeoutMs).toBe(120_000);
    expect(config.gateway.defaultStrategies).toEqual([{ handler: "claude" }, { handler: "note" }]);
    expect(config.phases).toEqual({ timeoutMs: 600_000, pollIntervalMs: 250 });
    expect(config.evolution.intervalMs).toBe(1_800_000);
    expect(config.evolution.historyLimit).toBe(100);
    expect(config.runtime).toEqual({ handler: "claude", model: "sonnet", pollIntervalMs: 250 });
    expect(config.capabilities).toEqual({});
  });

  it("keeps defaults for fields a partial section leaves out", () => {
    const config = defineConfig({ evolution: { intervalMs: 60_000 } });
    expect(config.evolution.intervalMs).toBe(60_000);
    expect(config.evolution.timeoutMs).toBe(300_000);
    expect(config.evolution.enabled).toBe(true);
  });

  it("returns defaults when no config file exists", () => {
    expect(loadEngineConfig(testDir)).toEqual(defineConfig());
  });

  it("loads capability overrides from the workspace file", () => {
    fs.writeFileSync(
      path.join(testDir, CONFIG_FILE),
      JSON.stringify({ capabilities: { "market-research": [{ handler: "shell", command: "echo", args: ["{input}"] }] } }),
    );
    const config = loadEngineConfig(testDir);
    expect(config.capabilities["market-research"]).toEqual([{ handler: "shell", command: "echo", args: ["{input}"] }]);
  });

  it("rejects unknown handlers with the offending path", () => {
    fs.writeFileSync(
      path.join(testDir, CONFIG_FILE),
      JSON.stringify({ gateway: { defaultStrategies: [{ handler: "telepathy" }] } }),
    );
    expect(() => loadEngineConfig(testDir)).toThrow(ConfigError);
    try {
      loadEngineConfig(testDir);
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues[0]).toMatch(/^gateway\.defaultStrategies\.0/);
      }
    }
  });

  it("rejects a file that is not JSON", () => {
    fs.writeFileSync(path.join(testDir, CONFIG_FILE), "{ nope");
    expect(() => loadEngineConfig(testDir)).toThrow("file is not valid JSON");
  });
});
