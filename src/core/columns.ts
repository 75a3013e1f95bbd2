/**
 * Column-name normalization across service-specific source schemas.
 *
 * Yellow files prefix their timestamps with `tpep_`, green files with `lpep_`,
 * and both abbreviate location ids (`PULocationID`). The canonical schema is the
 * one the staging models query: `pickup_datetime`, `pickup_locationid`, ...
 */
import { SchemaDriftError } from "./exceptions.js";
import type { CanonicalTable } from "./types.js";

/** Case-sensitive, applied before lower-casing. */
const ABBREVIATIONS: ReadonlyArray<readonly [string, string]> = [
  ["PUL", "pickup_l"],
  ["DOL", "dropoff_l"],
];

/** Stripped only at the start of a name; `fare_tpep_total` keeps its text. */
const PREFIXES = ["tpep_", "lpep_"];

export const REQUIRED_COLUMNS = ["pickup_datetime", "dropoff_datetime"];

export function canonicalColumnName(name: string): string {
  let out = name;
  for (const [short, long] of ABBREVIATIONS) {
    out = out.split(short).join(long);
  }
  out = out.toLowerCase();
  for (const prefix of PREFIXES) {
    if (out.startsWith(prefix)) {
      out = out.slice(prefix.length);
      break;
    }
  }
  return out;
}

/**
 * Rename every column of `table` to its canonical name. Rows are shared, not
 * copied.
 *
 * @throws SchemaDriftError when two columns collapse onto one name or a
 *   required column is missing.
 */
export function renameColumns(table: CanonicalTable): CanonicalTable {
  const seen = new Map<string, string>();
  const collisions: string[] = [];

  const columns = table.columns.map((col) => {
    const name = canonicalColumnName(col.name);
    const previous = seen.get(name);
    if (previous !== undefined) {
      collisions.push(previous, col.name);
    }
    seen.set(name, col.name);
    return { name, type: col.type };
  });

  if (collisions.length > 0) {
    throw new SchemaDriftError(
      `columns ${collisions.join(", ")} map to the same canonical name`,
      collisions,
    );
  }

  const missing = REQUIRED_COLUMNS.filter((c) => !seen.has(c));
  if (missing.length > 0) {
    throw new SchemaDriftError(
      `missing required columns ${missing.join(", ")}`,
      missing,
    );
  }

  return { columns, rows: table.rows };
}
