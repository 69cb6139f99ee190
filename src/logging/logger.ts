import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import pino, { type Logger } from "pino";

export type { Logger } from "pino";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export interface LoggerOptions {
  level: LogLevel;
  file?: string;
}

export const silentLogger: Logger = pino({ level: "silent" });

export function createLogger(options: LoggerOptions): Logger {
  if (!options.file || options.level === "silent") {
    return silentLogger;
  }

  mkdirSync(dirname(options.file), { recursive: true });
  return pino(
    {
      name: "scoopui",
      level: options.level,
      serializers: {
        err: pino.stdSerializers.err
      }
    },
    pino.destination({ dest: options.file, sync: false })
  );
}
