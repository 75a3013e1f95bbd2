/**
 * Unit planning: turn a coarse request, or the artifacts already on disk, into
 * an ordered list of units.
 */
import type { StorageBackend } from "../storage/backend.js";
import { InvalidUnitError } from "./exceptions.js";
import { parseArtifactName } from "./naming.js";
import { describeUnit } from "./unit.js";
import type { UnitOptions } from "./unit.js";
import { SERVICES } from "./types.js";
import type { IngestRequest, Service, UnitOfWork } from "./types.js";

const ALL_MONTHS = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12];

/**
 * Expand a request into units ordered by year, then month, then service, so
 * month 1 of every partition is dispatched first.
 */
export function expandRequest(
  request: IngestRequest,
  options: UnitOptions,
): UnitOfWork[] {
  if (request.years.length === 0) {
    throw new InvalidUnitError("At least one year is required");
  }
  const services = request.services?.length ? request.services : [...SERVICES];
  const months = request.months?.length ? request.months : ALL_MONTHS;

  const units: UnitOfWork[] = [];
  const seen = new Set<string>();
  for (const year of [...new Set(request.years)].sort((a, b) => a - b)) {
    for (const month of [...new Set(months)].sort((a, b) => a - b)) {
      for (const service of services) {
        const unit = describeUnit(service, year, month, options);
        if (seen.has(unit.key)) continue;
        seen.add(unit.key);
        units.push(unit);
      }
    }
  }
  return units;
}

export interface DiscoverFilter {
  services?: Service[];
  years?: number[];
}

/**
 * Find units whose raw or canonical artifact already exists in `storage`.
 * Files that do not sit where the configured layout would put them are ignored.
 */
export async function discoverUnits(
  storage: StorageBackend,
  filter: DiscoverFilter,
  options: UnitOptions,
): Promise<UnitOfWork[]> {
  const services = filter.services?.length ? filter.services : [...SERVICES];
  const years = filter.years?.length ? new Set(filter.years) : null;

  const found = new Map<string, UnitOfWork>();
  for (const service of services) {
    const keys = await storage.list(service);
    for (const key of keys) {
      const parsed = parseArtifactName(key.slice(key.lastIndexOf("/") + 1));
      if (!parsed || parsed.service !== service) continue;
      if (years && !years.has(parsed.year)) continue;

      const unit = describeUnit(parsed.service, parsed.year, parsed.month, options);
      if (key !== unit.artifactKey && key !== unit.canonicalKey) continue;
      found.set(unit.key, unit);
    }
  }

  return [...found.values()].sort(
    (a, b) =>
      a.year - b.year ||
      a.month - b.month ||
      SERVICES.indexOf(a.service) - SERVICES.indexOf(b.service),
  );
}
