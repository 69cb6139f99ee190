import { describe, expect, it } from "vitest";
import { buildCommand, displayCommand, quotePowerShell, type InvocationSettings } from "../src/services/scoopCommands.js";

const direct: InvocationSettings = { tool: "scoop", shell: "direct", powershell: "powershell" };
const wrapped: InvocationSettings = { tool: "scoop", shell: "powershell", powershell: "powershell" };

const POWERSHELL_PREFIX = ["-NoLogo", "-NoProfile", "-NonInteractive", "-ExecutionPolicy", "Bypass", "-Command"];

describe("buildCommand", () => {
  it("maps each kind to scoop arguments when spawning the tool directly", () => {
    expect(buildCommand("list", undefined, direct)).toEqual(["scoop", ["export"]]);
    expect(buildCommand("status", undefined, direct)).toEqual(["scoop", ["status"]]);
    expect(buildCommand("search", "python", direct)).toEqual(["scoop", ["search", "python"]]);
    expect(buildCommand("install", "extras/vscode", direct)).toEqual(["scoop", ["install", "extras/vscode"]]);
    expect(buildCommand("update", undefined, direct)).toEqual(["scoop", ["update"]]);
    expect(buildCommand("cleanup", "*", direct)).toEqual(["scoop", ["cleanup", "*"]]);
  });

  it("requires a package for package commands", () => {
    expect(() => buildCommand("uninstall", undefined, direct)).toThrow("uninstall requires an argument");
  });

  it("silences the information stream when listing through PowerShell", () => {
    expect(buildCommand("list", undefined, wrapped)).toEqual([
      "powershell",
      [...POWERSHELL_PREFIX, "$ErrorActionPreference='Stop'; & 'scoop' 'export' 6> $null; exit $LASTEXITCODE"]
    ]);
  });

  it("converts search results to JSON and quotes the query", () => {
    const [, args] = buildCommand("search", "it's", wrapped);

    expect(args.at(-1)).toBe(
      "$ErrorActionPreference='Stop'; & 'scoop' 'search' 'it''s' 6> $null " +
        "| Select-Object Name,Version,Source,Binaries | ConvertTo-Json -Depth 3 -Compress; exit $LASTEXITCODE"
    );
  });

  it("passes the exit code of package commands through PowerShell", () => {
    const [cmd, args] = buildCommand("install", "git", { ...wrapped, powershell: "pwsh" });

    expect(cmd).toBe("pwsh");
    expect(args.at(-1)).toBe("& 'scoop' 'install' 'git'; exit $LASTEXITCODE");
  });
});

describe("quotePowerShell", () => {
  it("doubles embedded single quotes", () => {
    expect(quotePowerShell("C:\\Users\\o'neil\\scoop")).toBe("'C:\\Users\\o''neil\\scoop'");
  });
});

describe("displayCommand", () => {
  it("shows the command as typed at a prompt", () => {
    expect(displayCommand("update", "*", "scoop")).toBe("scoop update *");
    expect(displayCommand("list", undefined, "scoop")).toBe("scoop export");
  });
});
