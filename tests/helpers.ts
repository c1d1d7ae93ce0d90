import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { MeasurementRecord } from "../src/domain/types";

export interface RecordOverrides {
  locationId?: number;
  parameterId?: number;
  parameterName?: string;
  sensorId?: number;
  from?: string;
  to?: string;
  value?: number | string | null;
}

export function measurement(overrides: RecordOverrides = {}): MeasurementRecord {
  const from = overrides.from ?? "2024-01-01T00:00:00Z";
  return {
    locationId: overrides.locationId ?? 3459,
    parameter: { id: overrides.parameterId ?? 2, name: overrides.parameterName ?? "pm25", units: "µg/m³" },
    value: overrides.value === undefined ? 12.5 : overrides.value,
    period: {
      datetimeFrom: { utc: from, local: from },
      datetimeTo: { utc: overrides.to ?? from.replace("T00:", "T01:"), local: overrides.to ?? from.replace("T00:", "T01:") },
    },
    sensors: [{ id: overrides.sensorId ?? 100 }],
  };
}

// Hourly records starting at 2024-01-01T00:00:00Z
export function hour(h: number, overrides: RecordOverrides = {}): MeasurementRecord {
  const from = new Date(Date.UTC(2024, 0, 1, h)).toISOString().replace(".000Z", "Z");
  const to = new Date(Date.UTC(2024, 0, 1, h + 1)).toISOString().replace(".000Z", "Z");
  return measurement({ ...overrides, from, to });
}

export async function makeTmpDir(prefix = "aq-sync-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

export const noSleep = async (_ms: number): Promise<void> => {};
