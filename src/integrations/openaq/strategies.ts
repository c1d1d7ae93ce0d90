import { setTimeout as delay } from "timers/promises";
import type { FetchStrategyName } from "../../config/config";
import { logger as defaultLogger, Logger } from "../../config/logger";
import { HttpError, MalformedResponseError, errorMessage } from "../../domain/errors";
import { isMeasurementRecord, locationLookupSchema, SensorSummary } from "../../domain/schemas";
import { LocationId, MeasurementRecord } from "../../domain/types";
import { OpenAqClient, QueryValue } from "./openaq.client";

export interface FetchRequest {
  locationId: LocationId;
  since: string | null;
  pageSize: number;
}

export type StrategyResult =
  | { kind: "fetched"; records: MeasurementRecord[]; incompleteSensors: number[] }
  | { kind: "unavailable"; reason: string };

export interface FetchStrategy {
  readonly name: FetchStrategyName;
  fetch(request: FetchRequest): Promise<StrategyResult>;
}

export interface StrategyOptions {
  client: OpenAqClient;
  rateLimitDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

type DecodedPage =
  | { ok: true; records: MeasurementRecord[]; received: number; dropped: number }
  | { ok: false; reason: string };

export function decodePage(body: unknown): DecodedPage {
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    return { ok: false, reason: "body is not an object" };
  }
  const results: unknown = "results" in body ? body.results : undefined;
  if (results === undefined || results === null) return { ok: true, records: [], received: 0, dropped: 0 };
  if (!Array.isArray(results)) return { ok: false, reason: "results is not a list" };

  const records: MeasurementRecord[] = [];
  for (const entry of results) {
    if (isMeasurementRecord(entry)) records.push(entry);
  }
  return { ok: true, records, received: results.length, dropped: results.length - records.length };
}

/** Fills in the location and sensor a record was fetched for when the API leaves them out. */
export function stampProvenance(record: MeasurementRecord, locationId: LocationId, sensorId?: number): MeasurementRecord {
  const needsLocation = record.locationId === undefined;
  const needsSensor = sensorId !== undefined && record.sensors?.[0]?.id === undefined;
  if (!needsLocation && !needsSensor) return record;
  return {
    ...record,
    ...(needsLocation ? { locationId } : {}),
    ...(needsSensor ? { sensors: [{ id: sensorId }] } : {}),
  };
}

/**
 * Maps a record without a sensor id to the one sensor at the location that
 * measures its parameter. Undefined when no sensor, or more than one, matches.
 */
export function sensorAttribution(sensors: readonly SensorSummary[]): (record: MeasurementRecord) => number | undefined {
  const byParameterId = new Map<number, number[]>();
  const byParameterName = new Map<string, number[]>();
  for (const sensor of sensors) {
    if (sensor.id === undefined) continue;
    const parameterId = sensor.parameter?.id;
    const parameterName = sensor.parameter?.name;
    if (parameterId !== undefined) byParameterId.set(parameterId, [...(byParameterId.get(parameterId) ?? []), sensor.id]);
    if (parameterName !== undefined) byParameterName.set(parameterName, [...(byParameterName.get(parameterName) ?? []), sensor.id]);
  }
  return (record) => {
    const own = record.sensors?.[0]?.id;
    if (own !== undefined) return own;
    const parameterId = record.parameter?.id;
    const parameterName = record.parameter?.name;
    const candidates =
      parameterId !== undefined
        ? byParameterId.get(parameterId)
        : parameterName !== undefined
          ? byParameterName.get(parameterName)
          : undefined;
    return candidates?.length === 1 ? candidates[0] : undefined;
  };
}

type SensorLookup =
  | { kind: "found"; sensors: SensorSummary[] }
  | { kind: "not_found" }
  | { kind: "unavailable"; reason: string };

interface PaginationOutcome {
  records: MeasurementRecord[];
  pages: number;
  // Set when a request failed; records holds every page that completed before it
  failure?: unknown;
  // A malformed page ended pagination early
  truncated?: string;
}

abstract class PagingStrategy implements FetchStrategy {
  abstract readonly name: FetchStrategyName;
  protected readonly client: OpenAqClient;
  protected readonly logger: Logger;
  private readonly rateLimitDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: StrategyOptions) {
    this.client = options.client;
    this.rateLimitDelayMs = options.rateLimitDelayMs;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.logger = options.logger ?? defaultLogger;
  }

  abstract fetch(request: FetchRequest): Promise<StrategyResult>;

  protected async lookupSensors(locationId: LocationId): Promise<SensorLookup> {
    let body: unknown;
    try {
      body = await this.client.getJson(`/locations/${locationId}`);
    } catch (err) {
      if (err instanceof HttpError && err.status === 404) return { kind: "not_found" };
      return { kind: "unavailable", reason: `location lookup failed: ${errorMessage(err)}` };
    }
    const lookup = locationLookupSchema.safeParse(body);
    if (!lookup.success) return { kind: "unavailable", reason: "location lookup returned an unexpected shape" };
    const location = lookup.data.results?.[0];
    if (!location) return { kind: "not_found" };
    return { kind: "found", sensors: location.sensors ?? [] };
  }

  protected async paginate(
    pathname: string,
    query: Record<string, QueryValue>,
    request: FetchRequest,
    label: Record<string, unknown>
  ): Promise<PaginationOutcome> {
    const records: MeasurementRecord[] = [];
    let page = 1;
    for (;;) {
      let body: unknown;
      try {
        body = await this.client.getJson(pathname, {
          ...query,
          limit: request.pageSize,
          page,
          date_from: request.since,
        });
      } catch (err) {
        if (err instanceof MalformedResponseError) {
          this.logger.warn("fetch:page:malformed", { ...label, page, reason: err.message });
          return { records, pages: page - 1, truncated: err.message };
        }
        return { records, pages: page - 1, failure: err };
      }

      const decoded = decodePage(body);
      if (!decoded.ok) {
        this.logger.warn("fetch:page:malformed", { ...label, page, reason: decoded.reason });
        return { records, pages: page - 1, truncated: decoded.reason };
      }
      if (decoded.dropped > 0) {
        this.logger.warn("fetch:page:dropped_records", { ...label, page, dropped: decoded.dropped });
      }
      records.push(...decoded.records);
      this.logger.debug("fetch:page", { ...label, page, received: decoded.received });

      if (decoded.received === 0 || decoded.received < request.pageSize) return { records, pages: page };
      page += 1;
      await this.sleep(this.rateLimitDelayMs);
    }
  }
}

/**
 * One paginated query across the whole location. All-or-nothing: a failed or
 * malformed page discards the batch. Records that arrive without a sensor id
 * are attributed through the location's sensor list so they key the same way
 * as per-sensor results; if any record cannot be attributed, the batch is
 * handed to the next strategy.
 */
export class BulkStrategy extends PagingStrategy {
  readonly name = "bulk" as const;

  async fetch(request: FetchRequest): Promise<StrategyResult> {
    const { locationId } = request;
    const outcome = await this.paginate("/measurements", { location_id: locationId }, request, {
      strategy: this.name,
      locationId,
    });
    if (outcome.failure !== undefined) {
      return { kind: "unavailable", reason: errorMessage(outcome.failure) };
    }
    if (outcome.truncated !== undefined) {
      return { kind: "unavailable", reason: `malformed page after ${outcome.pages} page(s): ${outcome.truncated}` };
    }

    if (outcome.records.every((r) => r.sensors?.[0]?.id !== undefined)) {
      return { kind: "fetched", records: outcome.records.map((r) => stampProvenance(r, locationId)), incompleteSensors: [] };
    }

    const lookup = await this.lookupSensors(locationId);
    if (lookup.kind === "unavailable") return lookup;
    const attribute = sensorAttribution(lookup.kind === "found" ? lookup.sensors : []);
    const records: MeasurementRecord[] = [];
    let unattributed = 0;
    for (const record of outcome.records) {
      const sensorId = attribute(record);
      if (sensorId === undefined) unattributed++;
      else records.push(stampProvenance(record, locationId, sensorId));
    }
    if (unattributed > 0) {
      return { kind: "unavailable", reason: `${unattributed} record(s) cannot be attributed to a single sensor` };
    }
    return { kind: "fetched", records, incompleteSensors: [] };
  }
}

/** Location lookup, then each sensor paged on its own. A failing sensor only loses its remaining pages. */
export class PerSensorStrategy extends PagingStrategy {
  readonly name = "per-sensor" as const;

  async fetch(request: FetchRequest): Promise<StrategyResult> {
    const { locationId } = request;
    const lookup = await this.lookupSensors(locationId);
    if (lookup.kind === "unavailable") return lookup;
    if (lookup.kind === "not_found") {
      this.logger.info("fetch:location:not_found", { locationId });
      return { kind: "fetched", records: [], incompleteSensors: [] };
    }
    const { sensors } = lookup;
    if (sensors.length === 0) {
      this.logger.info("fetch:location:no_sensors", { locationId });
      return { kind: "fetched", records: [], incompleteSensors: [] };
    }
    this.logger.debug("fetch:location:sensors", { locationId, sensors: sensors.length });

    const records: MeasurementRecord[] = [];
    const incompleteSensors: number[] = [];
    for (const sensor of sensors) {
      const sensorId = sensor.id;
      if (sensorId === undefined) continue;
      const label = { strategy: this.name, locationId, sensorId, parameter: sensor.parameter?.name ?? "unknown" };
      const outcome = await this.paginate(`/sensors/${sensorId}/measurements`, {}, request, label);
      records.push(...outcome.records.map((r) => stampProvenance(r, locationId, sensorId)));
      if (outcome.failure !== undefined || outcome.truncated !== undefined) {
        incompleteSensors.push(sensorId);
        this.logger.warn("fetch:sensor:failed", {
          ...label,
          pagesCompleted: outcome.pages,
          kept: outcome.records.length,
          message: outcome.failure !== undefined ? errorMessage(outcome.failure) : outcome.truncated,
        });
      }
    }
    return { kind: "fetched", records, incompleteSensors };
  }
}

export function createStrategies(names: readonly FetchStrategyName[], options: StrategyOptions): FetchStrategy[] {
  return names.map((name) => (name === "bulk" ? new BulkStrategy(options) : new PerSensorStrategy(options)));
}
