import { statSync } from "node:fs";
import { join } from "node:path";

const DEFAULT_PATHEXT = ".COM;.EXE;.BAT;.CMD";

/**
 * Looks `name` up on PATH the way the shell would. On Windows every PATHEXT
 * extension is tried.
 */
export function findOnPath(
  name: string,
  env: Record<string, string | undefined>,
  platform: NodeJS.Platform
): string | undefined {
  const isWindows = platform === "win32";
  const dirs = (env.PATH ?? env.Path ?? "").split(isWindows ? ";" : ":").filter(Boolean);
  const extensions = isWindows ? (env.PATHEXT ?? DEFAULT_PATHEXT).split(";").filter(Boolean) : [""];

  for (const dir of dirs) {
    for (const extension of extensions) {
      const candidate = join(dir, name + extension);
      if (statSync(candidate, { throwIfNoEntry: false })?.isFile()) {
        return candidate;
      }
    }
  }
  return undefined;
}
