import Papa from "papaparse";
import * as XLSX from "xlsx";
import type { DatasetSchema, LoadResult, RowsResult } from "../types";
import { buildDataset, EMPTY_DATASET, type RawRow } from "./dataset";
import { DataLoadError } from "./errors";

export type FetchFn = (input: string) => Promise<Response>;

const isRow = (v: unknown): v is RawRow => typeof v === "object" && v !== null && !Array.isArray(v);

export function fileExtension(source: string): string {
  const path = source.split(/[?#]/)[0] ?? "";
  const dot = path.lastIndexOf(".");
  return dot === -1 ? "" : path.slice(dot + 1).toLowerCase();
}

export function parseCsv(text: string): RawRow[] {
  const res = Papa.parse<RawRow>(text, {
    header: true,
    dynamicTyping: true,
    skipEmptyLines: true,
  });
  const rows = (res.data || []).filter(isRow);
  if (res.errors.length > 0) {
    if (rows.length === 0) throw new DataLoadError(`CSV parse error: ${res.errors[0].message}`);
    res.errors.forEach((e) => console.warn(`CSV row ${e.row ?? "?"}: ${e.message}`));
  }
  return rows;
}

export function parseWorkbook(buffer: ArrayBuffer): RawRow[] {
  const wb = XLSX.read(buffer, { type: "array" });
  const first = wb.SheetNames[0];
  if (!first) throw new DataLoadError("workbook has no sheets");
  return XLSX.utils.sheet_to_json<RawRow>(wb.Sheets[first], { defval: "" }).filter(isRow);
}

export function parseJsonRows(body: unknown): RawRow[] {
  if (!Array.isArray(body)) throw new DataLoadError("JSON data must be an array of rows");
  return body.filter(isRow);
}

async function readRows(source: string, fetchFn: FetchFn): Promise<RawRow[]> {
  const ext = fileExtension(source);
  if (!["csv", "xlsx", "xls", "json"].includes(ext)) {
    throw new DataLoadError(`unsupported file type ".${ext}"`);
  }

  const res = await fetchFn(source);
  if (!res.ok) throw new DataLoadError(`HTTP ${res.status}`);

  if (ext === "csv") return parseCsv(await res.text());
  if (ext === "json") return parseJsonRows(await res.json());
  return parseWorkbook(await res.arrayBuffer());
}

const failure = (source: string, err: unknown) => {
  const reason = err instanceof Error ? err.message : String(err);
  const message = `Failed to load ${source}: ${reason}`;
  console.error(message);
  return message;
};

/** Fetches and parses the raw rows of a file. Never rejects. */
export async function loadRows(source: string, fetchFn: FetchFn = fetch): Promise<RowsResult> {
  try {
    return { rows: await readRows(source, fetchFn), error: null };
  } catch (err) {
    return { rows: [], error: failure(source, err) };
  }
}

/** Builds a dataset from loaded rows; a schema mismatch yields the empty dataset and its reason. */
export function toDataset(source: string, rows: readonly RawRow[], schema: DatasetSchema): LoadResult {
  try {
    const { dataset, dropped } = buildDataset(rows, schema);
    if (dropped > 0) {
      console.warn(`${source}: dropped ${dropped} row(s) with missing or non-numeric values`);
    }
    return { dataset, error: null, dropped };
  } catch (err) {
    return { dataset: EMPTY_DATASET, error: failure(source, err), dropped: 0 };
  }
}

/**
 * Fetches and parses a dataset. Never rejects: any failure yields the empty
 * dataset together with the reason, which is logged once.
 */
export async function loadDataset(
  source: string,
  schema: DatasetSchema,
  fetchFn: FetchFn = fetch
): Promise<LoadResult> {
  const { rows, error } = await loadRows(source, fetchFn);
  if (error !== null) return { dataset: EMPTY_DATASET, error, dropped: 0 };
  return toDataset(source, rows, schema);
}
