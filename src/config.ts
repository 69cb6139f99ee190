import { resolve } from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { findOnPath } from "./services/executables.js";
import { DEFAULT_SEARCH_CACHE_SIZE } from "./services/packageCatalog.js";

export const ShellModeSchema = z.enum(["direct", "powershell"]);
export type ShellMode = z.infer<typeof ShellModeSchema>;

export const AppConfigSchema = z.object({
  tool: z.string().min(1),
  shell: ShellModeSchema,
  powershell: z.string().min(1),
  timeoutMs: z.number().int().positive().optional(),
  logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]),
  logFile: z.string().min(1),
  searchCacheSize: z.number().int().positive(),
  debug: z.boolean()
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

export interface LoadConfigInput {
  argv?: string[];
  env?: Record<string, string | undefined>;
  platform?: NodeJS.Platform;
  cwd?: string;
  findExecutable?: (name: string) => string | undefined;
}

type RawConfig = { [K in keyof AppConfig]?: unknown };

/**
 * Resolves the configuration from defaults, `SCOOPUI_*` environment variables
 * and command-line flags, in that order of precedence (flags win).
 */
export function loadConfig(input: LoadConfigInput = {}): AppConfig {
  const env = input.env ?? process.env;
  const platform = input.platform ?? process.platform;
  const cwd = input.cwd ?? process.cwd();
  const findExecutable = input.findExecutable ?? ((name: string) => findOnPath(name, env, platform));

  const defaults: RawConfig = {
    tool: "scoop",
    shell: platform === "win32" ? "powershell" : "direct",
    // PowerShell 7 when installed, Windows PowerShell otherwise.
    powershell: findExecutable("pwsh") ? "pwsh" : "powershell",
    logLevel: "info",
    logFile: "logs/scoopui.log",
    searchCacheSize: DEFAULT_SEARCH_CACHE_SIZE,
    debug: false
  };

  const merged: RawConfig = {
    ...defaults,
    ...fromEnv(env),
    ...parseArgs(input.argv ?? [])
  };

  if (merged.debug === true && !("logLevel" in fromEnv(env))) {
    merged.logLevel = "debug";
  }

  const parsed = AppConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(
      "Invalid configuration",
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  return { ...parsed.data, logFile: resolve(cwd, parsed.data.logFile) };
}

function fromEnv(env: Record<string, string | undefined>): RawConfig {
  const raw: RawConfig = {};
  assign(raw, "tool", env.SCOOPUI_TOOL);
  assign(raw, "shell", env.SCOOPUI_SHELL);
  assign(raw, "powershell", env.SCOOPUI_POWERSHELL);
  assign(raw, "timeoutMs", toNumber(env.SCOOPUI_TIMEOUT_MS));
  assign(raw, "logLevel", env.SCOOPUI_LOG_LEVEL);
  assign(raw, "logFile", env.SCOOPUI_LOG_FILE);
  assign(raw, "searchCacheSize", toNumber(env.SCOOPUI_SEARCH_CACHE_SIZE));
  return raw;
}

function parseArgs(args: string[]): RawConfig {
  const raw: RawConfig = {};

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];

    if (arg === "--debug") {
      raw.debug = true;
      continue;
    }

    const value = args[i + 1];
    switch (arg) {
      case "--tool":
        raw.tool = value;
        break;
      case "--shell":
        raw.shell = value;
        break;
      case "--powershell":
        raw.powershell = value;
        break;
      case "--timeout":
        raw.timeoutMs = toNumber(value);
        break;
      case "--log-file":
        raw.logFile = value;
        break;
      default:
        throw new ConfigError(`Unknown argument: ${arg}`);
    }
    i += 1;
  }

  return raw;
}

function assign(raw: RawConfig, key: keyof AppConfig, value: unknown): void {
  if (value !== undefined && value !== "") {
    raw[key] = value;
  }
}

function toNumber(value: string | undefined): number | string | undefined {
  if (value === undefined || value.trim() === "") {
    return value;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : value;
}
