import { logger as defaultLogger, Logger } from "../../config/logger";
import { errorMessage } from "../../domain/errors";
import { LocationId } from "../../domain/types";
import { reconcile } from "../../ingest/idempotency";
import { ArchiveStore } from "../../integrations/archive/archive.repo";

export interface ReconcileLocationResult {
  locationId: LocationId;
  status: "reconciled" | "unchanged" | "missing" | "quarantined" | "failed";
  before: number;
  after: number;
  duplicatesRemoved: number;
  error?: string;
}

export interface ReconcileRunResult {
  locations: ReconcileLocationResult[];
  totalBefore: number;
  totalAfter: number;
  totalDuplicatesRemoved: number;
  failed: number;
}

export interface ReconcileOptions {
  archiveStore: ArchiveStore;
  // Defaults to every `location_<id>.json` in the data directory
  locations?: readonly LocationId[];
  logger?: Logger;
}

async function reconcileLocation(store: ArchiveStore, locationId: LocationId, logger: Logger): Promise<ReconcileLocationResult> {
  const base = { locationId, before: 0, after: 0, duplicatesRemoved: 0 };
  try {
    const archive = await store.load(locationId);
    if (archive.status !== "loaded") {
      logger.warn("reconcile:skip", { locationId, status: archive.status });
      return { ...base, status: archive.status };
    }
    const result = reconcile(archive.records);
    const before = archive.records.length;
    const after = result.records.length;
    const changed = result.duplicateCount > 0 || result.records.some((r, i) => r !== archive.records[i]);
    if (changed) await store.save(locationId, result.records, { backup: true });
    logger.info("reconcile:location", { locationId, before, after, duplicatesRemoved: result.duplicateCount, changed });
    return {
      locationId,
      status: changed ? "reconciled" : "unchanged",
      before,
      after,
      duplicatesRemoved: result.duplicateCount,
    };
  } catch (err) {
    const message = errorMessage(err);
    logger.error("reconcile:location:failed", { locationId, message });
    return { ...base, status: "failed", error: message };
  }
}

/** Dedup and time-order every archive in place, keeping a `.backup` of each rewritten file. */
export async function reconcileArchives(options: ReconcileOptions): Promise<ReconcileRunResult> {
  const logger = options.logger ?? defaultLogger;
  const locations = options.locations ?? (await options.archiveStore.listLocations());
  logger.info("reconcile:start", { locations: locations.length });

  const results: ReconcileLocationResult[] = [];
  for (const locationId of locations) {
    results.push(await reconcileLocation(options.archiveStore, locationId, logger));
  }

  const run: ReconcileRunResult = {
    locations: results,
    totalBefore: results.reduce((sum, r) => sum + r.before, 0),
    totalAfter: results.reduce((sum, r) => sum + r.after, 0),
    totalDuplicatesRemoved: results.reduce((sum, r) => sum + r.duplicatesRemoved, 0),
    failed: results.filter((r) => r.status === "failed").length,
  };
  logger.info("reconcile:done", {
    totalBefore: run.totalBefore,
    totalAfter: run.totalAfter,
    totalDuplicatesRemoved: run.totalDuplicatesRemoved,
    failed: run.failed,
  });
  return run;
}
