import { describe, expect, it } from "vitest";
import {
  CancelledError,
  ConfigError,
  describeError,
  LaunchError,
  ParseError,
  TimeoutError,
  ToolExecutionError
} from "../src/errors.js";

describe("describeError", () => {
  it("names the tool when it could not be started", () => {
    const error = new LaunchError("scoop", new Error("spawn scoop ENOENT"));

    expect(error.message).toBe("Unable to launch scoop: spawn scoop ENOENT");
    expect(describeError(error)).toBe("Tool not found or not executable (scoop): spawn scoop ENOENT");
  });

  it("shows the tool's own diagnostics for a failed command", () => {
    expect(describeError(new ToolExecutionError("scoop install nope", 1, "  Couldn't find manifest.\n"))).toBe(
      "Couldn't find manifest."
    );
    expect(describeError(new ToolExecutionError("scoop install nope", 3, ""))).toBe("Tool failed with exit code 3");
  });

  it("separates unreadable output from tool failures", () => {
    expect(describeError(new ParseError("no rows"))).toBe("Tool output could not be read: no rows");
  });

  it("describes deadlines and cancellation", () => {
    expect(describeError(new TimeoutError(1500))).toBe("Tool did not finish within 1500ms");
    expect(describeError(new CancelledError())).toBe("Cancelled");
  });

  it("falls back to the message of anything else", () => {
    expect(describeError(new ConfigError("Invalid configuration", ["shell: bad", "tool: empty"]))).toBe(
      "Invalid configuration: shell: bad; tool: empty"
    );
    expect(describeError("plain")).toBe("plain");
  });
});
