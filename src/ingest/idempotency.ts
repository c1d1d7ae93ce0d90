import { MeasurementRecord, MergeResult, ReconcileResult } from "../domain/types";

function component(value: string | number | undefined | null): string {
  return value === undefined || value === null ? "" : String(value);
}

/**
 * Identity of one observation: location, parameter, sensor and time window.
 * Any other field (value corrections, units, coordinates) does not change it.
 */
export function computeRecordKey(record: MeasurementRecord): string {
  return [
    component(record.locationId),
    component(record.parameter?.id),
    component(record.sensors?.[0]?.id),
    component(record.period?.datetimeFrom?.utc),
    component(record.period?.datetimeTo?.utc),
  ].join("|");
}

export function mergeIncremental(
  existing: readonly MeasurementRecord[],
  incoming: readonly MeasurementRecord[]
): MergeResult {
  const seen = new Set<string>(existing.map(computeRecordKey));
  const admitted: MeasurementRecord[] = [];
  let duplicateCount = 0;
  for (const record of incoming) {
    const key = computeRecordKey(record);
    if (seen.has(key)) {
      duplicateCount++;
      continue;
    }
    seen.add(key);
    admitted.push(record);
  }
  return {
    merged: [...existing, ...admitted],
    addedCount: admitted.length,
    duplicateCount,
  };
}

/**
 * Numeric order when both sides parse as dates, lexical otherwise.
 * Missing timestamps sort first.
 */
export function compareTimestamps(a: string | undefined, b: string | undefined): number {
  if (a === b) return 0;
  if (a === undefined) return -1;
  if (b === undefined) return 1;
  const ta = Date.parse(a);
  const tb = Date.parse(b);
  if (Number.isFinite(ta) && Number.isFinite(tb) && ta !== tb) return ta - tb;
  return a < b ? -1 : a > b ? 1 : 0;
}

export function reconcile(records: readonly MeasurementRecord[]): ReconcileResult {
  const seen = new Set<string>();
  const unique: MeasurementRecord[] = [];
  for (const record of records) {
    const key = computeRecordKey(record);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(record);
  }
  // Array.prototype.sort is stable, so equal timestamps keep first-seen order
  unique.sort((a, b) => compareTimestamps(a.period?.datetimeFrom?.utc, b.period?.datetimeFrom?.utc));
  return { records: unique, duplicateCount: records.length - unique.length };
}

export function latestPeriodEnd(records: readonly MeasurementRecord[]): string | null {
  let latest: string | null = null;
  for (const record of records) {
    const end = record.period?.datetimeTo?.utc;
    if (end && (latest === null || compareTimestamps(end, latest) > 0)) latest = end;
  }
  return latest;
}

/** Next cursor value; never moves behind the previous one. */
export function advanceCursor(previous: string | null, records: readonly MeasurementRecord[]): string | null {
  const latest = latestPeriodEnd(records);
  if (latest === null) return previous;
  if (previous === null) return latest;
  return compareTimestamps(latest, previous) > 0 ? latest : previous;
}
