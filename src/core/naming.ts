/**
 * Partition naming policy: (service, year[, month]) → warehouse table.
 */
import { SERVICES } from "./types.js";
import type {
  Granularity,
  LoadPolicy,
  Service,
  TableTarget,
} from "./types.js";

const pad2 = (n: number): string => String(n).padStart(2, "0");
const pad4 = (n: number): string => String(n).padStart(4, "0");

export function tableNameFor(
  service: Service,
  year: number,
  month: number,
  granularity: Granularity,
): string {
  const base = `${service}_tripdata_${pad4(year)}`;
  return granularity === "yearly" ? base : `${base}_${pad2(month)}`;
}

export function partitionTarget(
  unit: { service: Service; year: number; month: number },
  granularity: Granularity,
  schema: string,
): TableTarget {
  return {
    schema,
    name: tableNameFor(unit.service, unit.year, unit.month, granularity),
  };
}

/** Monthly tables are exclusive to one unit; yearly tables are shared. */
export function loadPolicyFor(granularity: Granularity): LoadPolicy {
  return granularity === "monthly" ? "fail-if-exists" : "append-with-reset";
}

/** File name of a unit's raw artifact, also the last segment of its URL. */
export function artifactFileName(
  service: Service,
  year: number,
  month: number,
): string {
  return `${service}_tripdata_${pad4(year)}-${pad2(month)}.parquet`;
}

const ARTIFACT_NAME = /^([a-z]+)_tripdata_(\d{4})-(\d{2})\.parquet(\.gz)?$/;

/**
 * Inverse of {@link artifactFileName}. Accepts raw and canonical names.
 */
export function parseArtifactName(
  fileName: string,
): { service: Service; year: number; month: number; canonical: boolean } | null {
  const match = ARTIFACT_NAME.exec(fileName);
  if (!match) return null;
  const service = SERVICES.find((s) => s === match[1]);
  if (!service) return null;
  const month = Number(match[3]);
  if (month < 1 || month > 12) return null;
  return {
    service,
    year: Number(match[2]),
    month,
    canonical: match[4] !== undefined,
  };
}

export function qualifiedName(target: TableTarget): string {
  return `${target.schema}.${target.name}`;
}
