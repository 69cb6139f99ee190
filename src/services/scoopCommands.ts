import type { ShellMode } from "../config.js";
import type { CommandKind } from "../types.js";

export type ToolCommand = [string, string[]];

export interface InvocationSettings {
  tool: string;
  shell: ShellMode;
  powershell: string;
}

const POWERSHELL_FLAGS = ["-NoLogo", "-NoProfile", "-NonInteractive", "-ExecutionPolicy", "Bypass", "-Command"];

/**
 * Maps a command kind to the process to spawn. On Windows the tool is a
 * PowerShell script, so it runs inside `powershell -Command`; read-only
 * commands pipe through ConvertTo-Json there to get stable output.
 */
export function buildCommand(
  kind: CommandKind,
  argument: string | undefined,
  settings: InvocationSettings
): ToolCommand {
  const toolArgs = directArgs(kind, argument);

  if (settings.shell === "direct") {
    return [settings.tool, toolArgs];
  }

  return [settings.powershell, [...POWERSHELL_FLAGS, powershellScript(kind, toolArgs, settings.tool)]];
}

function directArgs(kind: CommandKind, argument: string | undefined): string[] {
  if (kind === "list") {
    return ["export"];
  }

  if (kind === "status") {
    return ["status"];
  }

  if (argument === undefined) {
    if (kind === "update") {
      return ["update"];
    }
    throw new Error(`${kind} requires an argument`);
  }

  return [kind, argument];
}

function powershellScript(kind: CommandKind, toolArgs: string[], tool: string): string {
  const call = ["&", quotePowerShell(tool), ...toolArgs.map(quotePowerShell)].join(" ");

  if (kind === "list") {
    return `$ErrorActionPreference='Stop'; ${call} 6> $null; exit $LASTEXITCODE`;
  }

  if (kind === "search") {
    return (
      `$ErrorActionPreference='Stop'; ${call} 6> $null ` +
      "| Select-Object Name,Version,Source,Binaries | ConvertTo-Json -Depth 3 -Compress; exit $LASTEXITCODE"
    );
  }

  if (kind === "status") {
    return `${call} 6> $null | ConvertTo-Json -Depth 3 -Compress; exit $LASTEXITCODE`;
  }

  return `${call}; exit $LASTEXITCODE`;
}

export function quotePowerShell(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function displayCommand(kind: CommandKind, argument: string | undefined, tool: string): string {
  return [tool, ...directArgs(kind, argument)].join(" ");
}
