import { describe, expect, it } from "vitest";
import { decodeOutput } from "../src/services/decodeOutput.js";

const SHIFT_JIS_TEST = [0x83, 0x65, 0x83, 0x58, 0x83, 0x67];

describe("decodeOutput", () => {
  it("reads UTF-8 output as is", () => {
    expect(decodeOutput(Buffer.from("テスト héllo\n", "utf8"))).toBe("テスト héllo\n");
  });

  it("falls back to Shift_JIS for output in the Japanese OEM code page", () => {
    expect(decodeOutput(Buffer.from([...SHIFT_JIS_TEST, 0x0a]))).toBe("テスト\n");
  });

  it("replaces bytes no known encoding accepts", () => {
    expect(decodeOutput(Buffer.from([0x61, 0xff]))).toBe("a�");
  });
});
