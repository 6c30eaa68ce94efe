import { mkdir, writeFile } from "node:fs/promises";
import { dirname, extname } from "node:path";
import { XMLBuilder } from "fast-xml-parser";
import type { FlatRecord, RecordValue } from "./types.js";

export type ExportFormat = "csv" | "json" | "xml";

const XML_DECLARATION = '<?xml version="1.0" encoding="utf-8"?>';

export function formatForPath(path: string): ExportFormat {
  const extension = extname(path).toLowerCase();
  switch (extension) {
    case ".csv":
      return "csv";
    case ".json":
      return "json";
    case ".xml":
      return "xml";
    default:
      throw new Error(
        `Unsupported export format "${extension || "(none)"}" for ${path}. Use .csv, .json or .xml.`,
      );
  }
}

export function collectColumns(records: readonly FlatRecord[]): string[] {
  const columns = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) columns.add(key);
  }
  return [...columns];
}

function flattenValue(value: RecordValue | undefined): string {
  if (value === null || value === undefined) return "";
  if (Array.isArray(value)) return value.join("; ");
  return String(value);
}

export function escapeCsvValue(value: string): string {
  if (value.length === 0) return "";
  const escaped = value.replace(/"/g, '""');
  return /[",\r\n]/.test(value) ? `"${escaped}"` : escaped;
}

export function toCsv(records: readonly FlatRecord[]): string {
  const columns = collectColumns(records);
  const lines = [columns.map(escapeCsvValue).join(",")];
  for (const record of records) {
    lines.push(columns.map((column) => escapeCsvValue(flattenValue(record[column]))).join(","));
  }
  return `${lines.join("\n")}\n`;
}

export function toJson(records: readonly FlatRecord[]): string {
  return `${JSON.stringify(records, null, 2)}\n`;
}

export function toXml(records: readonly FlatRecord[]): string {
  const builder = new XMLBuilder({ format: true, indentBy: "  " });
  const columns = collectColumns(records);
  const rows = records.map((record) =>
    Object.fromEntries(columns.map((column) => [column, flattenValue(record[column])])),
  );
  const body = builder.build({ Records: { Record: rows } });
  return `${XML_DECLARATION}\n${String(body).trim()}\n`;
}

export function renderRecords(records: readonly FlatRecord[], format: ExportFormat): string {
  switch (format) {
    case "csv":
      return toCsv(records);
    case "json":
      return toJson(records);
    case "xml":
      return toXml(records);
  }
}

export async function exportRecords(records: readonly FlatRecord[], path: string): Promise<ExportFormat> {
  const format = formatForPath(path);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, renderRecords(records, format), "utf8");
  return format;
}
