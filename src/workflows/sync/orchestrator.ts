import { logger as defaultLogger, Logger } from "../../config/logger";
import { errorMessage } from "../../domain/errors";
import { LocationId, LocationOutcome, LocationStage, MeasurementRecord, QualityReport, RunSummary } from "../../domain/types";
import { advanceCursor, mergeIncremental } from "../../ingest/idempotency";
import { ArchiveStore } from "../../integrations/archive/archive.repo";
import { RunHistoryStore } from "../../integrations/history/run-history.repo";
import { StateStore } from "../../integrations/state/state.repo";
import { AlertService } from "../../services/alerts.service";
import { Fetcher } from "../../services/fetcher.service";
import { DataValidator } from "../../services/validator.service";

export interface SyncDependencies {
  stateStore: StateStore;
  archiveStore: ArchiveStore;
  fetcher: Fetcher;
  alerts: AlertService;
  history: RunHistoryStore;
  // Absent when validation is disabled
  validator?: DataValidator;
}

export interface SyncSettings {
  pageSize: number;
  maxConsecutiveFailures: number;
  qualityThreshold: number;
  validationSampleSize?: number;
}

export interface SyncRunOptions {
  locations: readonly LocationId[];
  settings: SyncSettings;
  dependencies: SyncDependencies;
  logger?: Logger;
  // Checked between locations only; a location in flight always runs to completion
  signal?: AbortSignal;
  now?: () => Date;
}

function runIdFor(date: Date): string {
  return date.toISOString().replace(/[-:]/g, "").replace("T", "_").slice(0, 15);
}

export interface LocationContext {
  deps: SyncDependencies;
  settings: SyncSettings;
  logger: Logger;
  now: () => Date;
}

async function checkQuality(
  ctx: LocationContext,
  locationId: LocationId,
  validator: DataValidator,
  records: readonly MeasurementRecord[]
): Promise<QualityReport | undefined> {
  try {
    const quality = validator.validate(records, ctx.settings.validationSampleSize);
    ctx.logger.info("sync:validate", {
      locationId,
      qualityScore: quality.qualityScore,
      validRecords: quality.validRecords,
      invalidRecords: quality.invalidRecords,
      warnings: quality.warnings,
      sampled: quality.sampled,
    });
    if (quality.totalRecords > 0 && quality.qualityScore < ctx.settings.qualityThreshold) {
      await ctx.deps.alerts.send(
        "warning",
        `Low data quality: location ${locationId}`,
        `Data quality score ${quality.qualityScore.toFixed(2)}% is below ${ctx.settings.qualityThreshold}%`,
        { locationId, quality }
      );
    }
    return quality;
  } catch (err) {
    // Validation never fails a location
    ctx.logger.warn("sync:validate:error", { locationId, message: errorMessage(err) });
    return undefined;
  }
}

export async function syncLocation(ctx: LocationContext, locationId: LocationId): Promise<LocationOutcome> {
  const { deps, settings, logger } = ctx;
  const started = ctx.now().getTime();
  let stage: LocationStage = "LoadingState";
  const outcome: LocationOutcome = {
    locationId,
    status: "failed",
    stage,
    fetched: 0,
    newRecords: 0,
    duplicatesRemoved: 0,
    totalRecords: 0,
    lastFetchTime: null,
    strategy: null,
    incompleteSensors: [],
    elapsedMs: 0,
  };

  try {
    const states = await deps.stateStore.load();
    const stored = states[String(locationId)]?.lastFetchTime ?? null;
    const archive = await deps.archiveStore.load(locationId);
    // The cursor only vouches for a loaded archive; anything else is rebuilt from full history
    const since = archive.status === "loaded" ? stored : null;
    if (since !== stored) {
      logger.warn("sync:cursor:discarded", { locationId, cursor: stored, archive: archive.status });
    }
    outcome.lastFetchTime = since;
    logger.info("sync:location:start", { locationId, since, existing: archive.records.length, archive: archive.status });

    stage = "Fetching";
    const fetched = await deps.fetcher.fetchSince(locationId, since, settings.pageSize);
    outcome.fetched = fetched.records.length;
    outcome.strategy = fetched.strategy;
    outcome.incompleteSensors = fetched.incompleteSensors;

    stage = "Merging";
    const merge = mergeIncremental(archive.records, fetched.records);
    outcome.newRecords = merge.addedCount;
    outcome.duplicatesRemoved = merge.duplicateCount;
    outcome.totalRecords = merge.merged.length;
    if (merge.duplicateCount > 0) logger.debug("sync:dedup", { locationId, duplicates: merge.duplicateCount });

    stage = "Persisting";
    if (merge.addedCount > 0) await deps.archiveStore.save(locationId, merge.merged);

    stage = "StateUpdate";
    // An incomplete fetch leaves gaps after the failed pages, so only what was
    // already archived may move the cursor; the gap is refetched next run.
    const cursor =
      fetched.incompleteSensors.length > 0
        ? advanceCursor(since, archive.records)
        : advanceCursor(since, merge.merged);
    await deps.stateStore.recordSuccess(locationId, cursor, merge.addedCount);
    outcome.lastFetchTime = cursor;
    if (fetched.incompleteSensors.length > 0) {
      await deps.alerts.send(
        "warning",
        `Incomplete fetch: location ${locationId}`,
        `Sensors ${fetched.incompleteSensors.join(", ")} did not finish; cursor held at ${cursor ?? "full history"}`,
        { locationId, incompleteSensors: fetched.incompleteSensors, cursor }
      );
    }

    if (deps.validator) {
      stage = "Validating";
      outcome.quality = await checkQuality(ctx, locationId, deps.validator, merge.merged);
    }

    stage = "Done";
    outcome.status = "success";
  } catch (err) {
    outcome.error = errorMessage(err);
    logger.error("sync:location:failed", { locationId, stage, message: outcome.error });
  }

  outcome.stage = stage;
  outcome.elapsedMs = ctx.now().getTime() - started;
  if (outcome.status === "success") {
    logger.info("sync:location:done", {
      locationId,
      newRecords: outcome.newRecords,
      totalRecords: outcome.totalRecords,
      duplicatesRemoved: outcome.duplicatesRemoved,
      elapsedMs: outcome.elapsedMs,
    });
  }
  return outcome;
}

function skipped(locationId: LocationId): LocationOutcome {
  return {
    locationId,
    status: "skipped",
    stage: "LoadingState",
    fetched: 0,
    newRecords: 0,
    duplicatesRemoved: 0,
    totalRecords: 0,
    lastFetchTime: null,
    strategy: null,
    incompleteSensors: [],
    elapsedMs: 0,
    error: "run aborted before this location started",
  };
}

/**
 * One pass over the given locations, strictly one after another. A failing
 * location is recorded and the run moves on; the consecutive-failure counter
 * lives in the run history so it survives between processes.
 */
export async function runOnce(options: SyncRunOptions): Promise<RunSummary> {
  const { dependencies: deps, settings, signal } = options;
  const logger = options.logger ?? defaultLogger;
  const now = options.now ?? (() => new Date());
  const startedAt = now();
  const runId = runIdFor(startedAt);
  const ctx: LocationContext = { deps, settings, logger, now };

  logger.info("sync:run:start", { runId, locations: options.locations.length });
  const history = await deps.history.load();

  const outcomes: LocationOutcome[] = [];
  for (const locationId of options.locations) {
    if (signal?.aborted) {
      logger.warn("sync:location:skipped", { locationId, reason: "aborted" });
      outcomes.push(skipped(locationId));
      continue;
    }
    outcomes.push(await syncLocation(ctx, locationId));
  }

  const successful = outcomes.filter((o) => o.status === "success").length;
  const failed = outcomes.filter((o) => o.status === "failed").length;
  let consecutiveFailures = history.consecutiveFailures;
  if (failed > 0) {
    consecutiveFailures += 1;
  } else if (successful > 0) {
    if (consecutiveFailures > 0) logger.info("sync:run:recovered", { previousFailures: consecutiveFailures });
    consecutiveFailures = 0;
  }

  const finishedAt = now();
  const summary: RunSummary = {
    runId,
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    totalLocations: outcomes.length,
    successful,
    failed,
    skipped: outcomes.length - successful - failed,
    totalNewRecords: outcomes.reduce((sum, o) => sum + o.newRecords, 0),
    durationMs: finishedAt.getTime() - startedAt.getTime(),
    consecutiveFailures,
    locations: outcomes,
  };

  const incomplete = outcomes
    .filter((o) => o.incompleteSensors.length > 0)
    .map((o) => ({ locationId: o.locationId, incompleteSensors: o.incompleteSensors, cursor: o.lastFetchTime }));
  if (incomplete.length > 0) logger.warn("sync:run:incomplete", { runId, locations: incomplete });

  if (failed > 0) {
    logger.warn("sync:run:failures", { runId, failed, total: outcomes.length, consecutiveFailures });
    if (consecutiveFailures >= settings.maxConsecutiveFailures) {
      await deps.alerts.send(
        "critical",
        "Pipeline consecutive failures",
        `Pipeline has failed ${consecutiveFailures} times consecutively`,
        {
          runId,
          failedLocations: outcomes.filter((o) => o.status === "failed").map((o) => o.locationId),
          threshold: settings.maxConsecutiveFailures,
        }
      );
    }
  }

  await deps.history.append(summary);
  logger.info("sync:run:done", {
    runId,
    successful,
    failed,
    skipped: summary.skipped,
    totalNewRecords: summary.totalNewRecords,
    durationMs: summary.durationMs,
  });
  return summary;
}
