import { MeasurementRecord, QualityReport, ValidationResult } from "../domain/types";

const DAY_MS = 86_400_000;
const MAX_AGE_DAYS = 5 * 365;
const MAX_SAMPLE_ERRORS = 10;

export interface ValidatorOptions {
  requiredFields: readonly string[];
  parameterRanges: Readonly<Record<string, readonly [number, number]>>;
  now?: () => Date;
  random?: () => number;
}

function hasOffset(ts: string): boolean {
  return /([zZ]|[+-]\d{2}:?\d{2})$/.test(ts);
}

function isCalendarDate(year: number, month: number, day: number): boolean {
  const candidate = new Date(Date.UTC(year, month - 1, day));
  return candidate.getUTCFullYear() === year && candidate.getUTCMonth() === month - 1 && candidate.getUTCDate() === day;
}

// `utc` fields without an explicit offset are read as UTC, not local time.
// Dates that do not exist (2024-02-30) are rejected instead of rolling over.
export function parseUtcTimestamp(ts: string): number | null {
  const date = /^(\d{4})-(\d{2})-(\d{2})/.exec(ts);
  if (!date || !isCalendarDate(Number(date[1]), Number(date[2]), Number(date[3]))) return null;
  const normalized = ts.includes("T") && !hasOffset(ts) ? `${ts}Z` : ts;
  const ms = Date.parse(normalized);
  return Number.isFinite(ms) ? ms : null;
}

/**
 * Three independent checks per record. Schema and timestamp problems are
 * errors and invalidate the record; range problems are warnings only.
 */
export class DataValidator {
  private readonly requiredFields: readonly string[];
  private readonly parameterRanges: Readonly<Record<string, readonly [number, number]>>;
  private readonly now: () => Date;
  private readonly random: () => number;

  constructor(options: ValidatorOptions) {
    this.requiredFields = options.requiredFields;
    this.parameterRanges = options.parameterRanges;
    this.now = options.now ?? (() => new Date());
    this.random = options.random ?? Math.random;
  }

  validateSchema(record: MeasurementRecord): string[] {
    const errors: string[] = [];
    for (const field of this.requiredFields) {
      if (!(field in record)) errors.push(`Missing required field: ${field}`);
    }
    const { parameter, period } = record;
    if (parameter !== undefined && (parameter === null || parameter.id === undefined || parameter.name === undefined)) {
      errors.push("'parameter' must have 'id' and 'name' fields");
    }
    if (period !== undefined && (period === null || period.datetimeFrom === undefined)) {
      errors.push("'period' must have 'datetimeFrom' field");
    }
    return errors;
  }

  validateRange(record: MeasurementRecord): string[] {
    const { value } = record;
    if (value === undefined || value === null) return [];
    const name = record.parameter?.name;
    if (!name) return [];
    const range = this.parameterRanges[name];
    if (!range) return [];

    const [min, max] = range;
    if (typeof value !== "number" || Number.isNaN(value)) return [`Value is not numeric: ${String(value)}`];
    if (value < min || value > max) return [`${name} value ${value} outside valid range [${min}, ${max}]`];
    return [];
  }

  validateTimestamp(record: MeasurementRecord): string[] {
    const utc = record.period?.datetimeFrom?.utc;
    if (!utc) return [];
    const ts = parseUtcTimestamp(utc);
    if (ts === null) return [`Invalid timestamp format: ${utc}`];

    const errors: string[] = [];
    const now = this.now().getTime();
    if (ts > now) errors.push(`Timestamp is in the future: ${utc}`);
    if (Math.floor((now - ts) / DAY_MS) > MAX_AGE_DAYS) errors.push(`Timestamp is older than 5 years: ${utc}`);
    return errors;
  }

  validateRecord(record: MeasurementRecord, index = 0): ValidationResult {
    const errors = [...this.validateSchema(record), ...this.validateTimestamp(record)];
    const warnings = this.validateRange(record);
    return { index, valid: errors.length === 0, errors, warnings };
  }

  validate(records: readonly MeasurementRecord[], sampleSize?: number): QualityReport {
    const totalRecords = records.length;
    const sampled = sampleSize !== undefined && sampleSize > 0 && sampleSize < totalRecords;
    const indices = sampled ? this.sampleIndices(totalRecords, sampleSize) : records.map((_, i) => i);

    let validRecords = 0;
    let warnings = 0;
    const sampleErrors: QualityReport["sampleErrors"] = [];
    for (const index of indices) {
      const result = this.validateRecord(records[index], index);
      if (result.valid) {
        validRecords++;
      } else if (sampleErrors.length < MAX_SAMPLE_ERRORS) {
        sampleErrors.push({ index, errors: result.errors });
      }
      warnings += result.warnings.length;
    }

    const validatedRecords = indices.length;
    return {
      totalRecords,
      validatedRecords,
      validRecords,
      invalidRecords: validatedRecords - validRecords,
      warnings,
      qualityScore: validatedRecords === 0 ? 0 : (validRecords * 100) / validatedRecords,
      sampled,
      ...(sampled ? { sampleSize } : {}),
      sampleErrors,
    };
  }

  // Partial Fisher-Yates: uniform, without replacement
  private sampleIndices(total: number, size: number): number[] {
    const pool = Array.from({ length: total }, (_, i) => i);
    for (let i = 0; i < size; i++) {
      const j = i + Math.floor(this.random() * (total - i));
      [pool[i], pool[j]] = [pool[j], pool[i]];
    }
    return pool.slice(0, size);
  }
}

export function formatReport(report: QualityReport, generatedAt: Date = new Date()): string {
  const rule = "=".repeat(60);
  const lines = [
    rule,
    "DATA VALIDATION REPORT",
    rule,
    `Timestamp: ${generatedAt.toISOString()}`,
    "",
    `Total Records: ${report.totalRecords}`,
    `Valid Records: ${report.validRecords}`,
    `Invalid Records: ${report.invalidRecords}`,
    `Warnings: ${report.warnings}`,
    `Quality Score: ${report.qualityScore.toFixed(2)}%`,
    "",
  ];
  if (report.sampled) {
    lines.push(`Note: Validated sample of ${report.validatedRecords} records`, "");
  }
  if (report.sampleErrors.length > 0) {
    lines.push("VALIDATION ERRORS:", "-".repeat(60));
    for (const entry of report.sampleErrors) {
      lines.push(`Record ${entry.index}:`, ...entry.errors.map((e) => `  - ${e}`));
    }
    if (report.invalidRecords > report.sampleErrors.length) {
      lines.push(`... and ${report.invalidRecords - report.sampleErrors.length} more invalid records`);
    }
    lines.push("");
  }
  lines.push(rule);
  return lines.join("\n");
}
