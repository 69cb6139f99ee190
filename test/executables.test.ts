import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { findOnPath } from "../src/services/executables.js";

describe("findOnPath", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "scoopui-path-"));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it.skipIf(process.platform === "win32")("finds a file in a later PATH entry", () => {
    const empty = join(root, "empty");
    const bin = join(root, "bin");
    mkdirSync(empty);
    mkdirSync(bin);
    writeFileSync(join(bin, "pwsh"), "");

    expect(findOnPath("pwsh", { PATH: `${empty}:${bin}` }, "linux")).toBe(join(bin, "pwsh"));
  });

  it("tries each PATHEXT extension on Windows", () => {
    writeFileSync(join(root, "pwsh.EXE"), "");

    expect(findOnPath("pwsh", { Path: root, PATHEXT: ".CMD;.EXE" }, "win32")).toBe(join(root, "pwsh.EXE"));
  });

  it("ignores directories and missing entries", () => {
    mkdirSync(join(root, "pwsh"));

    expect(findOnPath("pwsh", { PATH: root }, "linux")).toBeUndefined();
    expect(findOnPath("pwsh", {}, "linux")).toBeUndefined();
  });
});
