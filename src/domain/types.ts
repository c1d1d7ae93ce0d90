import type { MeasurementRecord } from "./schemas";

export type { MeasurementRecord, SensorSummary } from "./schemas";

export type LocationId = number;

export interface LocationState {
  lastFetchTime: string | null; // ISO 8601, null = fetch full history
  lastRecordCount: number;
  lastSuccessfulRun: string; // ISO 8601
}

export type LocationStateMap = Record<string, LocationState>;

export interface MergeResult {
  merged: MeasurementRecord[];
  addedCount: number;
  duplicateCount: number;
}

export interface ReconcileResult {
  records: MeasurementRecord[];
  duplicateCount: number;
}

export interface ValidationResult {
  index: number;
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export interface QualityReport {
  totalRecords: number;
  validatedRecords: number;
  validRecords: number;
  invalidRecords: number;
  warnings: number;
  qualityScore: number; // 0..100
  sampled: boolean;
  sampleSize?: number;
  sampleErrors: Array<{ index: number; errors: string[] }>;
}

export type LocationStage =
  | "LoadingState"
  | "Fetching"
  | "Merging"
  | "Persisting"
  | "StateUpdate"
  | "Validating"
  | "Done";

export interface LocationOutcome {
  locationId: LocationId;
  status: "success" | "failed" | "skipped";
  stage: LocationStage;
  fetched: number;
  newRecords: number;
  duplicatesRemoved: number;
  totalRecords: number;
  lastFetchTime: string | null;
  strategy: string | null;
  incompleteSensors: number[];
  elapsedMs: number;
  quality?: QualityReport;
  error?: string;
}

export interface RunSummary {
  runId: string;
  startedAt: string;
  finishedAt: string;
  totalLocations: number;
  successful: number;
  failed: number;
  skipped: number;
  totalNewRecords: number;
  durationMs: number;
  consecutiveFailures: number;
  locations: LocationOutcome[];
}

export type AlertLevel = "info" | "warning" | "error" | "critical";

export interface AlertEvent {
  level: AlertLevel;
  title: string;
  message: string;
  timestamp: string;
  context: Record<string, unknown>;
}
