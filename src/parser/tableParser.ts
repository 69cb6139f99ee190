import type { RejectedLine } from "../types.js";

const VERSION_RE = /^v?\d/;
const SEPARATOR_RE = /^[-=─━_\s]+$/;
const CELL_SPLIT_RE = /\s{2,}/;
const BANNER_RES = [
  /^installed apps/i,
  /^results from/i,
  /^no matches? found/i,
  /^scoop is up to date/i,
  /^everything is ok/i,
  /^(warn|info)\s/i
];

export interface TableRow {
  lineNumber: number;
  text: string;
  name: string;
  version: string;
  source: string;
  extra: string[];
}

export interface ParsedTable {
  rows: TableRow[];
  rejected: RejectedLine[];
}

export interface ParseTableOptions {
  /** Rows sharing a key are duplicates. Defaults to the name. */
  keyOf?: (row: TableRow) => string;
}

export function isVersionLike(token: string): boolean {
  return VERSION_RE.test(token);
}

/**
 * Reads the column-aligned tables the tool prints. Rows must look like
 * "name, whitespace, version-like token"; headers, separators and banners are
 * skipped, anything else is rejected without stopping the parse.
 */
export function parseTable(text: string, options: ParseTableOptions = {}): ParsedTable {
  const keyOf = options.keyOf ?? ((row: TableRow) => row.name);
  const lines = text.split("\n");
  const rows: TableRow[] = [];
  const rejected: RejectedLine[] = [];
  const seen = new Set<string>();

  for (let i = 0; i < lines.length; i += 1) {
    const line = (lines[i] ?? "").trim();
    const lineNumber = i + 1;

    if (!line || isSkippable(line)) {
      continue;
    }

    const row = parseRow(line, lineNumber);
    if (!row) {
      rejected.push({ lineNumber, text: line, reason: "no version column" });
      continue;
    }

    const key = keyOf(row);
    if (seen.has(key)) {
      rejected.push({ lineNumber, text: line, reason: `duplicate package ${key}` });
      continue;
    }

    seen.add(key);
    rows.push(row);
  }

  return { rows, rejected };
}

function isSkippable(line: string): boolean {
  if (SEPARATOR_RE.test(line)) {
    return true;
  }

  const firstToken = line.split(/\s+/)[0] ?? "";
  if (firstToken.toLowerCase() === "name") {
    return true;
  }

  return BANNER_RES.some((re) => re.test(line));
}

function parseRow(line: string, lineNumber: number): TableRow | null {
  const cells = line.split(CELL_SPLIT_RE);
  const [first, second, ...rest] = cells;
  if (first && second && isVersionLike(second)) {
    return {
      lineNumber,
      text: line,
      name: first,
      version: second,
      source: rest[0] ?? "",
      extra: rest.slice(1)
    };
  }

  // Single-space separated: the last version-like token ends the name, so
  // names containing spaces keep all their words.
  const tokens = line.split(/\s+/);
  for (let i = tokens.length - 1; i >= 1; i -= 1) {
    const token = tokens[i] ?? "";
    if (!isVersionLike(token)) {
      continue;
    }

    const after = tokens.slice(i + 1);
    return {
      lineNumber,
      text: line,
      name: tokens.slice(0, i).join(" "),
      version: token,
      source: after[0] ?? "",
      extra: after.slice(1)
    };
  }

  return null;
}
