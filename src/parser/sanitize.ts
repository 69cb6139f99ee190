// PowerShell formatting can leave ANSI sequences in captured output.
const ANSI_OSC_RE = /\x1b\][^\x07]*(?:\x07|\x1b\\)/g;
const ANSI_CSI_RE = /\x1b\[[0-?]*[ -/]*[@-~]/g;
const ANSI_2CHAR_RE = /\x1b[@-Z\\-_]/g;

export function sanitizeOutput(text: string): string {
  if (!text) {
    return "";
  }

  return text
    .replace(/\r\n?/g, "\n")
    .replace(ANSI_OSC_RE, "")
    .replace(ANSI_CSI_RE, "")
    .replace(ANSI_2CHAR_RE, "");
}

/**
 * Finds the first JSON object or array embedded in noisy output (banner lines,
 * warnings) and returns it parsed. Candidates rejected by `accept` are skipped
 * and the scan continues after them.
 */
export function extractFirstJsonValue(
  text: string,
  accept: (value: unknown) => boolean = () => true
): unknown {
  for (let start = 0; start < text.length; start += 1) {
    const ch = text[start];
    if (ch !== "{" && ch !== "[") {
      continue;
    }

    const end = findClosingBracket(text, start);
    if (end < 0) {
      continue;
    }

    try {
      const value: unknown = JSON.parse(text.slice(start, end + 1));
      if (accept(value)) {
        return value;
      }
      start = end;
    } catch {
      // not JSON at this offset, keep scanning
    }
  }

  return undefined;
}

function findClosingBracket(text: string, start: number): number {
  const stack: string[] = [];
  let inString = false;

  for (let i = start; i < text.length; i += 1) {
    const ch = text[i];

    if (inString) {
      if (ch === "\\") {
        i += 1;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === "{") {
      stack.push("}");
    } else if (ch === "[") {
      stack.push("]");
    } else if (ch === "}" || ch === "]") {
      if (stack.pop() !== ch) {
        return -1;
      }
      if (stack.length === 0) {
        return i;
      }
    }
  }

  return -1;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Converts a JSON field into display text. Arrays are joined with a space and
 * objects (PowerShell serializes some values as `{ "ValueKind": n }`) become "".
 */
export function coerceText(value: unknown): string {
  if (value === null || value === undefined) {
    return "";
  }

  if (typeof value === "string") {
    return value.trim();
  }

  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }

  if (Array.isArray(value)) {
    return value
      .map((entry) => coerceText(entry))
      .filter((entry) => entry.length > 0)
      .join(" ");
  }

  return "";
}
