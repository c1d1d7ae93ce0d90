import { AppConfig, loadConfig } from "./config/config";
import { logger as defaultLogger, Logger } from "./config/logger";
import { RunSummary } from "./domain/types";
import { ArchiveStore } from "./integrations/archive/archive.repo";
import { FileRunHistoryStore } from "./integrations/history/run-history.repo";
import { FetchLike, OpenAqClient } from "./integrations/openaq/openaq.client";
import { createStrategies } from "./integrations/openaq/strategies";
import { documentClientTable, DynamoStateStore } from "./integrations/state/dynamo-state.repo";
import { getDynamoDocClient } from "./integrations/state/dynamo.sdk";
import { FileStateStore, StateStore } from "./integrations/state/state.repo";
import { AlertService, AlertSink, loggerAlertSink } from "./services/alerts.service";
import { StrategyFetcher } from "./services/fetcher.service";
import { DataValidator } from "./services/validator.service";
import { runOnce, SyncDependencies, SyncSettings } from "./workflows/sync/orchestrator";

export interface BuildOptions {
  logger?: Logger;
  fetchImpl?: FetchLike;
  alertSinks?: AlertSink[];
  stateStore?: StateStore;
}

export function createStateStore(config: AppConfig, logger: Logger): StateStore {
  if (config.state.backend === "dynamo") {
    const table = documentClientTable(getDynamoDocClient(config.state.dynamo), config.state.dynamo.tableName);
    return new DynamoStateStore(table, { logger });
  }
  return new FileStateStore(config.data.stateFile, { logger });
}

export function createSyncDependencies(config: AppConfig, options: BuildOptions = {}): SyncDependencies {
  const logger = options.logger ?? defaultLogger;
  const client = new OpenAqClient({
    baseUrl: config.api.baseUrl,
    apiKey: config.api.apiKey,
    timeoutMs: config.api.timeoutMs,
    fetchImpl: options.fetchImpl,
  });
  const strategies = createStrategies(config.fetch.strategies, {
    client,
    rateLimitDelayMs: config.fetch.rateLimitDelayMs,
    logger,
  });
  return {
    stateStore: options.stateStore ?? createStateStore(config, logger),
    archiveStore: new ArchiveStore(config.data.dir, { logger }),
    fetcher: new StrategyFetcher(strategies, { logger }),
    alerts: new AlertService(options.alertSinks ?? [loggerAlertSink(logger)], { logger }),
    history: new FileRunHistoryStore(config.data.metricsFile, { logger }),
    validator: config.validation.enabled
      ? new DataValidator({
          requiredFields: config.validation.requiredFields,
          parameterRanges: config.validation.parameterRanges,
        })
      : undefined,
  };
}

export function settingsFromConfig(config: AppConfig): SyncSettings {
  return {
    pageSize: config.fetch.pageSize,
    maxConsecutiveFailures: config.alerts.maxConsecutiveFailures,
    qualityThreshold: config.validation.qualityThreshold,
    validationSampleSize: config.validation.sampleSize,
  };
}

export interface SyncOptions extends BuildOptions {
  config?: AppConfig;
  locations?: number[];
  resetState?: boolean;
  signal?: AbortSignal;
}

export async function runSync(options: SyncOptions = {}): Promise<RunSummary> {
  const logger = options.logger ?? defaultLogger;
  const config = options.config ?? loadConfig();
  if (config.api.apiKeySource === "default") {
    logger.warn("config:api_key:default", { hint: "set OPENAQ_API_KEY or api.apiKey" });
  }
  const dependencies = createSyncDependencies(config, { ...options, logger });
  if (options.resetState) {
    logger.warn("sync:state:reset", { backend: config.state.backend });
    await dependencies.stateStore.reset();
  }
  return runOnce({
    locations: options.locations ?? config.locations,
    settings: settingsFromConfig(config),
    dependencies,
    logger,
    signal: options.signal,
  });
}

export default runSync;

export { loadConfig } from "./config/config";
export type { AppConfig } from "./config/config";
export { computeRecordKey, mergeIncremental, reconcile } from "./ingest/idempotency";
export { runOnce } from "./workflows/sync/orchestrator";
export type { SyncDependencies, SyncSettings } from "./workflows/sync/orchestrator";
export { DataValidator, formatReport } from "./services/validator.service";
export * from "./domain/types";
