/**
 * Parquet codec for trip artifacts.
 *
 * Raw artifacts are the Parquet files as published. Canonical artifacts are
 * Parquet bytes (written with hyparquet-writer) wrapped in gzip.
 */
import { gunzipSync, gzipSync } from "fflate";
import { parquetMetadata, parquetReadObjects } from "hyparquet";
import { compressors } from "hyparquet-compressors";
import { parquetWriteBuffer } from "hyparquet-writer";
import { SchemaDriftError } from "./exceptions.js";
import type { CanonicalTable, CellValue, ColumnSpec, ColumnType } from "./types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

type SchemaElement = ReturnType<typeof parquetMetadata>["schema"][number];

const INT32_MIN = -2_147_483_648;
const INT32_MAX = 2_147_483_647;

/** Copy into a fresh ArrayBuffer; hyparquet reads from an ArrayBuffer-like file. */
function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const out = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(out).set(bytes);
  return out;
}

function columnTypeOf(element: SchemaElement): ColumnType {
  if (
    element.logical_type?.type === "TIMESTAMP" ||
    element.logical_type?.type === "DATE" ||
    element.converted_type === "TIMESTAMP_MILLIS" ||
    element.converted_type === "TIMESTAMP_MICROS" ||
    element.converted_type === "DATE" ||
    element.type === "INT96"
  ) {
    return "timestamp";
  }
  if (element.converted_type === "DECIMAL") return "float";
  switch (element.type) {
    case "BOOLEAN":
      return "boolean";
    case "INT32":
    case "INT64":
      return "integer";
    case "FLOAT":
    case "DOUBLE":
      return "float";
    default:
      return "text";
  }
}

function toCell(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "bigint") {
    return value >= BigInt(Number.MIN_SAFE_INTEGER) &&
      value <= BigInt(Number.MAX_SAFE_INTEGER)
      ? Number(value)
      : value;
  }
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean" ||
    value instanceof Date
  ) {
    return value;
  }
  if (value instanceof Uint8Array) return new TextDecoder().decode(value);
  return JSON.stringify(value);
}

// ---------------------------------------------------------------------------
// Read
// ---------------------------------------------------------------------------

/** Decode Parquet bytes into a table typed from the file schema. */
export async function readParquet(bytes: Uint8Array): Promise<CanonicalTable> {
  const file = toArrayBuffer(bytes);
  const metadata = parquetMetadata(file);

  const [, ...fields] = metadata.schema;
  const nested = fields.filter((f) => (f.num_children ?? 0) > 0);
  if (nested.length > 0) {
    throw new SchemaDriftError(
      "nested columns are not supported",
      nested.map((f) => f.name),
    );
  }

  const columns: ColumnSpec[] = fields.map((f) => ({
    name: f.name,
    type: columnTypeOf(f),
  }));

  const objects = await parquetReadObjects({ file, metadata, compressors });
  const rows = objects.map((obj) => columns.map((c) => toCell(obj[c.name])));
  return { columns, rows };
}

// ---------------------------------------------------------------------------
// Write
// ---------------------------------------------------------------------------

type WriterType = "BOOLEAN" | "INT32" | "INT64" | "DOUBLE" | "STRING" | "TIMESTAMP";

function writerColumn(
  spec: ColumnSpec,
  values: CellValue[],
): { name: string; data: unknown[]; type: WriterType } {
  switch (spec.type) {
    case "integer": {
      const fitsInt32 = values.every(
        (v) => v === null || (typeof v === "number" && v >= INT32_MIN && v <= INT32_MAX),
      );
      if (fitsInt32) return { name: spec.name, data: values, type: "INT32" };
      return {
        name: spec.name,
        data: values.map((v) =>
          typeof v === "number" ? BigInt(Math.trunc(v)) : typeof v === "bigint" ? v : null,
        ),
        type: "INT64",
      };
    }
    case "float":
      return {
        name: spec.name,
        data: values.map((v) => (typeof v === "bigint" ? Number(v) : v)),
        type: "DOUBLE",
      };
    case "timestamp":
      return { name: spec.name, data: values, type: "TIMESTAMP" };
    case "boolean":
      return { name: spec.name, data: values, type: "BOOLEAN" };
    case "text":
      return {
        name: spec.name,
        data: values.map((v) => (v === null || typeof v === "string" ? v : String(v))),
        type: "STRING",
      };
  }
}

export function writeParquet(table: CanonicalTable): Uint8Array {
  const columnData = table.columns.map((spec, i) =>
    writerColumn(
      spec,
      table.rows.map((row) => row[i] ?? null),
    ),
  );
  return new Uint8Array(parquetWriteBuffer({ columnData }));
}

// ---------------------------------------------------------------------------
// Canonical artifact
// ---------------------------------------------------------------------------

export function encodeCanonical(table: CanonicalTable): Uint8Array {
  return gzipSync(writeParquet(table));
}

export async function decodeCanonical(bytes: Uint8Array): Promise<CanonicalTable> {
  return readParquet(gunzipSync(bytes));
}
