import { logger as defaultLogger, Logger } from "../config/logger";
import { errorMessage } from "../domain/errors";
import { LocationId, MeasurementRecord } from "../domain/types";
import { FetchStrategy, StrategyResult } from "../integrations/openaq/strategies";

export interface FetchReport {
  records: MeasurementRecord[];
  strategy: string | null;
  incompleteSensors: number[];
  unavailable: Array<{ strategy: string; reason: string }>;
}

export interface Fetcher {
  fetchSince(locationId: LocationId, since: string | null, pageSize: number): Promise<FetchReport>;
}

/**
 * Tries each strategy in order. The first one that returns records wins; an
 * empty or unavailable strategy hands over to the next. Never throws.
 */
export class StrategyFetcher implements Fetcher {
  private readonly logger: Logger;

  constructor(private readonly strategies: readonly FetchStrategy[], options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? defaultLogger;
  }

  async fetchSince(locationId: LocationId, since: string | null, pageSize: number): Promise<FetchReport> {
    this.logger.info("fetch:start", { locationId, since: since ?? "full-history", pageSize });
    const unavailable: FetchReport["unavailable"] = [];
    let emptyFrom: string | null = null;

    for (const strategy of this.strategies) {
      let result: StrategyResult;
      try {
        result = await strategy.fetch({ locationId, since, pageSize });
      } catch (err) {
        result = { kind: "unavailable", reason: errorMessage(err) };
      }

      if (result.kind === "unavailable") {
        this.logger.warn("fetch:strategy:unavailable", { locationId, strategy: strategy.name, reason: result.reason });
        unavailable.push({ strategy: strategy.name, reason: result.reason });
        continue;
      }
      if (result.records.length === 0 && result.incompleteSensors.length === 0) {
        this.logger.debug("fetch:strategy:empty", { locationId, strategy: strategy.name });
        emptyFrom = emptyFrom ?? strategy.name;
        continue;
      }

      this.logger.info("fetch:done", {
        locationId,
        strategy: strategy.name,
        records: result.records.length,
        incompleteSensors: result.incompleteSensors,
      });
      return { records: result.records, strategy: strategy.name, incompleteSensors: result.incompleteSensors, unavailable };
    }

    this.logger.info("fetch:done", { locationId, strategy: emptyFrom, records: 0 });
    return { records: [], strategy: emptyFrom, incompleteSensors: [], unavailable };
  }
}
