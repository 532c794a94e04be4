/**
 * Tabular reshape – long (one row per timestamp/parameter) to wide (one row
 * per timestamp, one column per parameter).
 */
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import { SchemaError } from "./exceptions.js";

export interface ColumnNames {
  timestamp: string;
  parameter: string;
  value: string;
  sensor: string;
}

export const DEFAULT_COLUMNS: ColumnNames = {
  timestamp: "datetime",
  parameter: "parameter",
  value: "value",
  sensor: "sensor",
};

/** A parsed CSV: header plus data rows, all cells as text. */
export interface Table {
  header: string[];
  rows: string[][];
}

export interface LongRow {
  timestamp: string;
  parameter: string;
  value: number | null;
}

const RecordsSchema = z.array(z.array(z.string()));

/** Cell texts read as missing values: the usual NA spellings of CSV exports. */
export const MISSING_VALUE_TOKENS: ReadonlySet<string> = new Set([
  "",
  "#N/A",
  "#N/A N/A",
  "#NA",
  "-1.#IND",
  "-1.#QNAN",
  "-NaN",
  "-nan",
  "1.#IND",
  "1.#QNAN",
  "<NA>",
  "N/A",
  "NA",
  "NULL",
  "NaN",
  "None",
  "n/a",
  "nan",
  "null",
]);

/**
 * Render a number as a float column would: integral values keep a `.0`,
 * magnitudes below 1e-4 or from 1e16 up use an exponent (`1e-05`, `1e+16`),
 * everything else is the shortest round-trip form.
 */
export function formatFloat(n: number): string {
  if (!Number.isFinite(n)) return Number.isNaN(n) ? "" : n > 0 ? "inf" : "-inf";
  if (n === 0) return Object.is(n, -0) ? "-0.0" : "0.0";

  const [mantissa, exponentText] = n.toExponential().split("e");
  const exponent = Number(exponentText);
  if (exponent < -4 || exponent >= 16) {
    const sign = exponent < 0 ? "-" : "+";
    return `${mantissa}e${sign}${String(Math.abs(exponent)).padStart(2, "0")}`;
  }
  const text = String(n);
  return text.includes(".") ? text : `${text}.0`;
}

// ---------------------------------------------------------------------------
// CSV in / out
// ---------------------------------------------------------------------------

export function parseTable(text: string): Table {
  const records = RecordsSchema.parse(
    parse(text, {
      bom: true,
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true,
    }),
  );
  const [header, ...rows] = records;
  return { header: header ?? [], rows };
}

export function toCsv(table: Table): string {
  return stringify([table.header, ...table.rows]);
}

// ---------------------------------------------------------------------------
// Long rows
// ---------------------------------------------------------------------------

function columnIndex(header: string[], name: string): number {
  const idx = header.indexOf(name);
  if (idx === -1) {
    throw new SchemaError(
      `missing column "${name}" (found: ${header.join(", ") || "none"})`,
    );
  }
  return idx;
}

function parseValue(raw: string, line: number): number | null {
  if (MISSING_VALUE_TOKENS.has(raw)) return null;
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    throw new SchemaError(`non-numeric value "${raw}" on data row ${line}`);
  }
  return n;
}

export function toLongRows(
  table: Table,
  columns: ColumnNames = DEFAULT_COLUMNS,
): LongRow[] {
  const ts = columnIndex(table.header, columns.timestamp);
  const param = columnIndex(table.header, columns.parameter);
  const val = columnIndex(table.header, columns.value);

  return table.rows.map((row, i) => ({
    timestamp: row[ts] ?? "",
    parameter: row[param] ?? "",
    value: parseValue(row[val] ?? "", i + 1),
  }));
}

// ---------------------------------------------------------------------------
// Pivot
// ---------------------------------------------------------------------------

interface Cell {
  sum: number;
  count: number;
}

/**
 * Pivot long rows to wide: rows sorted by timestamp, parameter columns in
 * first-appearance order, duplicate (timestamp, parameter) pairs averaged.
 * Rows with an empty timestamp, parameter or value are dropped.
 */
export function pivotWide(
  rows: LongRow[],
  sensor: string,
  columns: ColumnNames = DEFAULT_COLUMNS,
): Table {
  const parameters: string[] = [];
  const seenParameters = new Set<string>();
  const byTimestamp = new Map<string, Map<string, Cell>>();

  for (const row of rows) {
    if (!row.timestamp || !row.parameter || row.value === null) continue;

    if (!seenParameters.has(row.parameter)) {
      seenParameters.add(row.parameter);
      parameters.push(row.parameter);
    }

    let cells = byTimestamp.get(row.timestamp);
    if (!cells) {
      cells = new Map();
      byTimestamp.set(row.timestamp, cells);
    }
    const cell = cells.get(row.parameter);
    if (cell) {
      cell.sum += row.value;
      cell.count += 1;
    } else {
      cells.set(row.parameter, { sum: row.value, count: 1 });
    }
  }

  const timestamps = [...byTimestamp.keys()].sort();
  const out: string[][] = timestamps.map((timestamp) => {
    const cells = byTimestamp.get(timestamp) ?? new Map<string, Cell>();
    return [
      timestamp,
      sensor,
      ...parameters.map((p) => {
        const cell = cells.get(p);
        return cell ? formatFloat(cell.sum / cell.count) : "";
      }),
    ];
  });

  return {
    header: [columns.timestamp, columns.sensor, ...parameters],
    rows: out,
  };
}

/** True when the table already has the wide layout this module produces. */
export function isWide(table: Table, columns: ColumnNames = DEFAULT_COLUMNS): boolean {
  return (
    table.header[0] === columns.timestamp &&
    table.header[1] === columns.sensor &&
    !table.header.includes(columns.parameter) &&
    !table.header.includes(columns.value)
  );
}

/**
 * Reshape a parsed table to wide format. An already-wide table comes back
 * with its rows sorted by timestamp and is otherwise unchanged.
 */
export function reshapeToWide(
  table: Table,
  sensor: string,
  columns: ColumnNames = DEFAULT_COLUMNS,
): Table {
  if (isWide(table, columns)) {
    const rows = [...table.rows].sort((a, b) =>
      (a[0] ?? "") < (b[0] ?? "") ? -1 : (a[0] ?? "") > (b[0] ?? "") ? 1 : 0,
    );
    return { header: [...table.header], rows };
  }
  return pivotWide(toLongRows(table, columns), sensor, columns);
}
