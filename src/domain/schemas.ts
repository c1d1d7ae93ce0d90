import { z } from "zod";

const timePointSchema = z
  .object({
    utc: z.string().optional(),
    local: z.string().optional(),
  })
  .passthrough();

const periodSchema = z
  .object({
    datetimeFrom: timePointSchema.optional(),
    datetimeTo: timePointSchema.optional(),
  })
  .passthrough();

const parameterSchema = z
  .object({
    id: z.number().optional(),
    name: z.string().optional(),
    units: z.string().optional(),
  })
  .passthrough();

const sensorRefSchema = z.object({ id: z.number().optional() }).passthrough();

// Known fields are type-checked, everything else rides along untouched.
export const measurementRecordSchema = z
  .object({
    locationId: z.number().int().optional(),
    parameter: parameterSchema.nullable().optional(),
    value: z.union([z.number(), z.string(), z.null()]).optional(),
    period: periodSchema.nullable().optional(),
    sensors: z.array(sensorRefSchema).nullable().optional(),
  })
  .passthrough();

export const locationStateSchema = z.object({
  lastFetchTime: z.string().nullable(),
  lastRecordCount: z.number().int().nonnegative(),
  lastSuccessfulRun: z.string(),
});

export const stateFileSchema = z.object({
  locations: z.record(z.string(), locationStateSchema).default({}),
});

const sensorSummarySchema = z
  .object({
    id: z.number().optional(),
    parameter: z.object({ id: z.number().optional(), name: z.string().optional() }).passthrough().nullable().optional(),
  })
  .passthrough();

export const locationLookupSchema = z
  .object({
    results: z
      .array(
        z
          .object({
            id: z.number(),
            sensors: z.array(sensorSummarySchema).nullable().optional(),
          })
          .passthrough()
      )
      .nullable()
      .optional(),
  })
  .passthrough();

export type MeasurementRecord = z.infer<typeof measurementRecordSchema>;
export type SensorSummary = z.infer<typeof sensorSummarySchema>;

export function isMeasurementRecord(value: unknown): value is MeasurementRecord {
  return measurementRecordSchema.safeParse(value).success;
}
