import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

describe("loadConfig", () => {
  it("fills in defaults for a POSIX host", () => {
    const config = loadConfig({ argv: [], env: {}, platform: "linux", cwd: "/work" });

    expect(config).toEqual({
      tool: "scoop",
      shell: "direct",
      powershell: "powershell",
      logLevel: "info",
      logFile: "/work/logs/scoopui.log",
      searchCacheSize: 5,
      debug: false
    });
  });

  it("runs through PowerShell on Windows", () => {
    const config = loadConfig({ argv: [], env: {}, platform: "win32", cwd: "/work" });

    expect(config.shell).toBe("powershell");
  });

  it("prefers PowerShell 7 when pwsh is on PATH", () => {
    const findExecutable = (name: string) => (name === "pwsh" ? "C:/Program Files/PowerShell/7/pwsh.exe" : undefined);

    expect(loadConfig({ argv: [], env: {}, platform: "win32", cwd: "/work", findExecutable }).powershell).toBe("pwsh");
    expect(
      loadConfig({ argv: [], env: { SCOOPUI_POWERSHELL: "powershell" }, platform: "win32", cwd: "/work", findExecutable })
        .powershell
    ).toBe("powershell");
  });

  it("lets flags override environment variables", () => {
    const config = loadConfig({
      argv: ["--tool", "/opt/scoop", "--timeout", "2500"],
      env: { SCOOPUI_TOOL: "/usr/bin/scoop", SCOOPUI_TIMEOUT_MS: "1000", SCOOPUI_SEARCH_CACHE_SIZE: "8" },
      platform: "linux",
      cwd: "/work"
    });

    expect(config.tool).toBe("/opt/scoop");
    expect(config.timeoutMs).toBe(2500);
    expect(config.searchCacheSize).toBe(8);
  });

  it("raises the log level in debug mode unless the environment sets one", () => {
    expect(loadConfig({ argv: ["--debug"], env: {}, cwd: "/work" }).logLevel).toBe("debug");

    const pinned = loadConfig({ argv: ["--debug"], env: { SCOOPUI_LOG_LEVEL: "warn" }, cwd: "/work" });
    expect(pinned).toMatchObject({ debug: true, logLevel: "warn" });
  });

  it("resolves a relative log file against the working directory", () => {
    const config = loadConfig({ argv: ["--log-file", "tmp/ui.log"], env: {}, cwd: "/work" });

    expect(config.logFile).toBe("/work/tmp/ui.log");
  });

  it("rejects values outside the schema", () => {
    expect(() => loadConfig({ argv: ["--shell", "bash"], env: {} })).toThrow(ConfigError);
    expect(() => loadConfig({ argv: [], env: { SCOOPUI_TIMEOUT_MS: "soon" } })).toThrow(/timeoutMs/);
    expect(() => loadConfig({ argv: ["--timeout", "-5"], env: {} })).toThrow(ConfigError);
  });

  it("rejects unknown flags", () => {
    expect(() => loadConfig({ argv: ["--verbose"], env: {} })).toThrow("Unknown argument: --verbose");
  });
});
