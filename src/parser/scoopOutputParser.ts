import type { PackageRecord, ParsedListing, RejectedLine } from "../types.js";
import { coerceText, extractFirstJsonValue, isRecord, sanitizeOutput } from "./sanitize.js";
import { isVersionLike, parseTable, type TableRow } from "./tableParser.js";

type KeyOf = (record: { name: string; source: string }) => string;

const byName: KeyOf = (record) => record.name;
// The same app is usually offered by several buckets.
const byBucketAndName: KeyOf = (record) => (record.source ? `${record.source}/${record.name}` : record.name);

export interface OutputParser {
  parseInstalledList(text: string): ParsedListing;
  parseSearchResults(text: string): ParsedListing;
  parseStatus(text: string): ParsedListing;
}

/**
 * Reads `scoop export`, `scoop search` and `scoop status` output. JSON emitted
 * by the PowerShell pipelines is preferred; the formatted tables are read as a
 * fallback.
 */
export class ScoopOutputParser implements OutputParser {
  parseInstalledList(text: string): ParsedListing {
    const clean = sanitizeOutput(text);
    const data = extractFirstJsonValue(clean, isExportDocument);
    if (isExportDocument(data)) {
      return fromJsonEntries(data.apps, installedFromJson, byName);
    }

    return fromTable(clean, installedFromRow, byName);
  }

  parseSearchResults(text: string): ParsedListing {
    const clean = sanitizeOutput(text);
    const data = extractFirstJsonValue(clean, isObjectOrObjectArray);
    if (isObjectOrObjectArray(data)) {
      return fromJsonEntries(Array.isArray(data) ? data : [data], searchFromJson, byBucketAndName);
    }

    return fromTable(clean, searchFromRow, byBucketAndName);
  }

  parseStatus(text: string): ParsedListing {
    const clean = sanitizeOutput(text);
    const data = extractFirstJsonValue(clean, isObjectOrObjectArray);
    if (isObjectOrObjectArray(data)) {
      return fromJsonEntries(Array.isArray(data) ? data : [data], statusFromJson, byName);
    }

    return fromTable(clean, statusFromRow, byName);
  }
}

function isExportDocument(value: unknown): value is { apps: unknown[] } {
  return isRecord(value) && Array.isArray(value.apps);
}

function isObjectOrObjectArray(value: unknown): value is Record<string, unknown> | unknown[] {
  if (Array.isArray(value)) {
    return value.every((entry) => isRecord(entry));
  }
  return isRecord(value);
}

function fromJsonEntries(
  entries: unknown[],
  convert: (entry: Record<string, unknown>) => PackageRecord | string,
  keyOf: KeyOf
): ParsedListing {
  const records: PackageRecord[] = [];
  const rejected: RejectedLine[] = [];
  const seen = new Set<string>();

  entries.forEach((entry, index) => {
    const lineNumber = index + 1;
    if (!isRecord(entry)) {
      rejected.push({ lineNumber, text: String(entry), reason: "entry is not an object" });
      return;
    }

    const converted = convert(entry);
    if (typeof converted === "string") {
      rejected.push({ lineNumber, text: JSON.stringify(entry), reason: converted });
      return;
    }

    const key = keyOf(converted);
    if (seen.has(key)) {
      rejected.push({ lineNumber, text: JSON.stringify(entry), reason: `duplicate package ${key}` });
      return;
    }

    seen.add(key);
    records.push(converted);
  });

  return { records, rejected, format: "json" };
}

function fromTable(text: string, convert: (row: TableRow) => PackageRecord, keyOf: KeyOf): ParsedListing {
  const table = parseTable(text, { keyOf });
  return {
    records: table.rows.map(convert),
    rejected: table.rejected,
    format: "table"
  };
}

function field(entry: Record<string, unknown>, ...keys: string[]): string {
  for (const key of keys) {
    const text = coerceText(entry[key]);
    if (text) {
      return text;
    }
  }
  return "";
}

function installedFromJson(entry: Record<string, unknown>): PackageRecord | string {
  const name = field(entry, "Name", "name");
  if (!name) {
    return "missing Name";
  }

  return makeRecord({
    name,
    version: field(entry, "Version", "version"),
    source: field(entry, "Source", "source"),
    updated: formatTimestamp(field(entry, "Updated", "updated")),
    info: field(entry, "Info", "info")
  });
}

function searchFromJson(entry: Record<string, unknown>): PackageRecord | string {
  const name = field(entry, "Name", "name");
  if (!name) {
    return "missing Name";
  }

  return makeRecord({
    name,
    version: field(entry, "Version", "version"),
    source: field(entry, "Source", "source"),
    binaries: field(entry, "Binaries", "binaries")
  });
}

function statusFromJson(entry: Record<string, unknown>): PackageRecord | string {
  const name = field(entry, "Name", "name");
  if (!name) {
    return "missing Name";
  }

  return makeRecord({
    name,
    version: field(entry, "Installed Version", "Version", "version"),
    source: field(entry, "Source", "source"),
    updatedVersion: field(entry, "Latest Version", "latestVersion"),
    info: field(entry, "Info", "info")
  });
}

function installedFromRow(row: TableRow): PackageRecord {
  return makeRecord({
    name: row.name,
    version: row.version,
    source: row.source,
    updated: row.extra[0] ?? "",
    info: row.extra.slice(1).join("  ")
  });
}

function searchFromRow(row: TableRow): PackageRecord {
  return makeRecord({
    name: row.name,
    version: row.version,
    source: row.source,
    binaries: row.extra.join("  ")
  });
}

// Status tables have no source column: Name, Installed Version, Latest Version, Info.
function statusFromRow(row: TableRow): PackageRecord {
  const latest = isVersionLike(row.source) ? row.source : "";
  const info = latest ? row.extra : [row.source, ...row.extra];
  return makeRecord({
    name: row.name,
    version: row.version,
    source: "",
    updatedVersion: latest,
    info: info.filter((cell) => cell.length > 0).join("  ")
  });
}

interface RecordFields {
  name: string;
  version: string;
  source: string;
  updatedVersion?: string;
  updated?: string;
  info?: string;
  binaries?: string;
}

export function makeRecord(fields: RecordFields): PackageRecord {
  const record: RecordFields = { name: fields.name, version: fields.version, source: fields.source };

  if (fields.updatedVersion) {
    record.updatedVersion = fields.updatedVersion;
  }
  if (fields.updated) {
    record.updated = fields.updated;
  }
  if (fields.info) {
    record.info = fields.info;
  }
  if (fields.binaries) {
    record.binaries = fields.binaries;
  }

  return Object.freeze(record);
}

function formatTimestamp(value: string): string {
  if (value.length >= 19) {
    return value.slice(0, 19).replace("T", " ");
  }
  return value;
}
