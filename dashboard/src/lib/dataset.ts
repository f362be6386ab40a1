import type { ColumnSpec, DataRecord, Dataset, DatasetSchema } from "../types";
import { DataLoadError } from "./errors";

export type RawRow = Record<string, unknown>;

export const EMPTY_DATASET: Dataset = { records: [], hasCost: false };

const DECIMAL = /^[-+]?(\d+\.?\d*|\.\d+)$/;

const normalizeHeader = (h: string) => h.trim().replace(/\s+/g, " ").toLowerCase();

/** Returns the header in `headers` matching one of the column aliases, if any. */
export function resolveColumn(headers: readonly string[], column: ColumnSpec): string | null {
  const wanted = new Set(column.aliases.map(normalizeHeader));
  return headers.find((h) => wanted.has(normalizeHeader(h))) ?? null;
}

export function coerceNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string") return null;
  const cleaned = value.trim().replace(/,/g, "").replace(/%$/, "").replace(/^[$€£]/, "");
  // Plain decimals only: Number() would also read hex, binary and exponent forms.
  if (!DECIMAL.test(cleaned)) return null;
  const n = Number(cleaned);
  return Number.isFinite(n) ? n : null;
}

export function coerceYear(value: unknown): number | null {
  const n = coerceNumber(value);
  return n !== null && Number.isInteger(n) ? n : null;
}

export function coerceLabel(value: unknown): string | null {
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  if (typeof value !== "string") return null;
  const label = value.trim();
  return label === "" ? null : label;
}

function requireColumn(headers: readonly string[], field: string, column: ColumnSpec): string {
  const header = resolveColumn(headers, column);
  if (!header) {
    throw new DataLoadError(
      `missing required column "${field}" (tried: ${column.aliases.join(", ")})`
    );
  }
  return header;
}

/**
 * Maps raw rows onto records. Rows whose label or numeric cells fail to
 * coerce are dropped and counted, never zero-filled.
 */
export function buildDataset(
  rows: readonly RawRow[],
  schema: DatasetSchema
): { dataset: Dataset; dropped: number } {
  if (rows.length === 0) return { dataset: EMPTY_DATASET, dropped: 0 };

  const headers = [...new Set(rows.flatMap((r) => Object.keys(r)))];
  const nameCol = requireColumn(headers, "name", schema.name);
  const primaryCol = requireColumn(headers, "primary", schema.primary);
  const categoryCol = requireColumn(headers, "category", schema.category);
  const optionalColumn = (field: string, column: ColumnSpec | undefined) => {
    if (!column) return null;
    return column.required ? requireColumn(headers, field, column) : resolveColumn(headers, column);
  };
  const costCol = optionalColumn("cost", schema.cost);
  const yearCol = optionalColumn("year", schema.year);

  const records: DataRecord[] = [];
  let dropped = 0;

  for (const row of rows) {
    const name = coerceLabel(row[nameCol]);
    const category = coerceLabel(row[categoryCol]);
    const primaryMetric = coerceNumber(row[primaryCol]);
    const costMetric = costCol ? coerceNumber(row[costCol]) : null;
    const year = yearCol ? coerceYear(row[yearCol]) : null;

    if (
      name === null ||
      category === null ||
      primaryMetric === null ||
      (costCol && costMetric === null) ||
      (yearCol && year === null)
    ) {
      dropped++;
      continue;
    }

    const record: DataRecord = { name, primaryMetric, category };
    if (costMetric !== null) record.costMetric = costMetric;
    if (year !== null) record.year = year;
    records.push(record);
  }

  const dataset: Dataset = { records, hasCost: costCol !== null };
  if (yearCol) dataset.hasYear = true;
  return { dataset, dropped };
}
