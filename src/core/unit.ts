/**
 * Unit-of-work descriptor.
 *
 * A unit is one (service, year, month) job. Everything a stage needs to know
 * about where the unit's bytes come from and go to is derived here, without I/O.
 */
import { z } from "zod";
import { InvalidUnitError, UnsupportedServiceError } from "./exceptions.js";
import { artifactFileName, partitionTarget } from "./naming.js";
import { SERVICES } from "./types.js";
import type { ArtifactLayout, Granularity, Service, UnitOfWork } from "./types.js";

export const DEFAULT_SOURCE_URL =
  "https://d37ci6vzurychx.cloudfront.net/trip-data";

export interface UnitOptions {
  baseUrl: string;
  schema: string;
  granularity: Granularity;
  layout: ArtifactLayout;
}

const UnitInputSchema = z.object({
  year: z.number().int().min(2009).max(2100),
  month: z.number().int().min(1).max(12),
});

export function isService(value: string): value is Service {
  return SERVICES.some((s) => s === value);
}

export function describeUnit(
  service: string,
  year: number,
  month: number,
  options: UnitOptions,
): UnitOfWork {
  if (!isService(service)) throw new UnsupportedServiceError(service);

  const parsed = UnitInputSchema.safeParse({ year, month });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidUnitError(
      `Invalid unit ${service} ${year}-${month}: ${issue?.path.join(".")} ${issue?.message}`,
    );
  }

  const fileName = artifactFileName(service, year, month);
  const artifactKey =
    options.layout === "by-year"
      ? `${service}/${year}/${fileName}`
      : `${service}/${fileName}`;

  return Object.freeze({
    service,
    year,
    month,
    key: `${service}:${year}-${String(month).padStart(2, "0")}`,
    sourceLocation: `${options.baseUrl.replace(/\/+$/, "")}/${fileName}`,
    artifactKey,
    canonicalKey: `${artifactKey}.gz`,
    target: Object.freeze(
      partitionTarget({ service, year, month }, options.granularity, options.schema),
    ),
  });
}
