/**
 * Artifact probing shared by the fetch and transform stages.
 */
import type { ArtifactState, UnitOfWork } from "../core/types.js";
import type { StorageBackend } from "../storage/backend.js";

export async function artifactState(
  storage: StorageBackend,
  unit: UnitOfWork,
): Promise<ArtifactState> {
  const [raw, canonical] = await Promise.all([
    storage.exists(unit.artifactKey),
    storage.exists(unit.canonicalKey),
  ]);
  if (raw && canonical) return "both";
  if (canonical) return "canonical";
  if (raw) return "raw";
  return "absent";
}
