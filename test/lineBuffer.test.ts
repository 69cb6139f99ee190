import { describe, expect, it } from "vitest";
import { LineBuffer } from "../src/services/lineBuffer.js";

describe("LineBuffer", () => {
  it("holds a partial line until its end arrives", () => {
    const buffer = new LineBuffer();

    expect(buffer.push("a\nb")).toEqual(["a"]);
    expect(buffer.push("c\n")).toEqual(["bc"]);
    expect(buffer.flush()).toEqual([]);
  });

  it("treats a CRLF split across chunks as one line break", () => {
    const buffer = new LineBuffer();

    expect(buffer.push("x\r")).toEqual(["x"]);
    expect(buffer.push("\ny\n")).toEqual(["y"]);
  });

  it("emits progress redraws ending in a lone carriage return", () => {
    const buffer = new LineBuffer();

    expect(buffer.push("10%\r20%\r")).toEqual(["10%", "20%"]);
  });

  it("decodes multi-byte characters split between chunks", () => {
    const buffer = new LineBuffer();
    const bytes = Buffer.from("héllo\n", "utf8");

    expect(buffer.push(bytes.subarray(0, 2))).toEqual([]);
    expect(buffer.push(bytes.subarray(2))).toEqual(["héllo"]);
  });

  it("decodes Shift_JIS lines that are not valid UTF-8", () => {
    const buffer = new LineBuffer();

    expect(buffer.push(Buffer.from([0x83, 0x65, 0x83]))).toEqual([]);
    expect(buffer.push(Buffer.from([0x58, 0x83, 0x67, 0x0d, 0x0a, 0x6f, 0x6b, 0x0a]))).toEqual(["テスト", "ok"]);
  });

  it("returns the unterminated tail on flush", () => {
    const buffer = new LineBuffer();

    expect(buffer.push("tail")).toEqual([]);
    expect(buffer.flush()).toEqual(["tail"]);
  });
});
