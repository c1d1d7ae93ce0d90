import dotenv from "dotenv";
import fs from "fs";
import path from "path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigError } from "../domain/errors";
import type { LogLevel } from "./logger";

// Load .env early for local runs; real environments provide variables directly
dotenv.config();

export type FetchStrategyName = "bulk" | "per-sensor";
export type StateBackend = "file" | "dynamo";

export type EnvSource = Record<string, string | undefined>;

// Development convenience only; deployments must set OPENAQ_API_KEY or api.apiKey
export const DEFAULT_API_KEY = "dev-placeholder-key";
export const DEFAULT_API_BASE = "https://api.openaq.org/v3";

export interface AppConfig {
  locations: number[];
  api: {
    baseUrl: string;
    apiKey: string;
    apiKeySource: "config" | "env" | "default";
    timeoutMs: number;
  };
  data: {
    dir: string;
    stateFile: string;
    metricsFile: string;
  };
  fetch: {
    pageSize: number;
    rateLimitDelayMs: number;
    strategies: FetchStrategyName[];
  };
  validation: {
    enabled: boolean;
    sampleSize?: number;
    requiredFields: string[];
    parameterRanges: Record<string, [number, number]>;
    qualityThreshold: number;
  };
  alerts: {
    maxConsecutiveFailures: number;
  };
  state: {
    backend: StateBackend;
    dynamo: {
      tableName: string;
      region?: string;
      endpoint?: string;
    };
  };
  logLevel: LogLevel;
  configPath: string | null;
}

const strategyNameSchema = z.enum(["bulk", "per-sensor"]);

const configFileSchema = z.object({
  locations: z.array(z.number().int().positive()).min(1).optional(),
  api: z
    .object({
      baseUrl: z.string().url().optional(),
      apiKey: z.string().min(1).optional(),
      timeoutMs: z.number().int().positive().optional(),
    })
    .optional(),
  data: z
    .object({
      dir: z.string().min(1).optional(),
      stateFile: z.string().min(1).optional(),
      metricsFile: z.string().min(1).optional(),
    })
    .optional(),
  fetch: z
    .object({
      pageSize: z.number().int().positive().optional(),
      rateLimitDelayMs: z.number().int().nonnegative().optional(),
      strategies: z.array(strategyNameSchema).min(1).optional(),
    })
    .optional(),
  validation: z
    .object({
      enabled: z.boolean().optional(),
      sampleSize: z.number().int().positive().optional(),
      requiredFields: z.array(z.string()).optional(),
      parameterRanges: z.record(z.string(), z.tuple([z.number(), z.number()])).optional(),
      qualityThreshold: z.number().min(0).max(100).optional(),
    })
    .optional(),
  alerts: z
    .object({
      maxConsecutiveFailures: z.number().int().positive().optional(),
    })
    .optional(),
  state: z
    .object({
      backend: z.enum(["file", "dynamo"]).optional(),
      dynamo: z
        .object({
          tableName: z.string().min(1).optional(),
          region: z.string().optional(),
          endpoint: z.string().optional(),
        })
        .optional(),
    })
    .optional(),
  logLevel: z.enum(["debug", "info", "warn", "error"]).optional(),
});

type ConfigFile = z.infer<typeof configFileSchema>;

const DEFAULT_REQUIRED_FIELDS = ["parameter", "value", "period"];

export interface LoadConfigOptions {
  env?: EnvSource;
  configPath?: string;
  cwd?: string;
}

function readConfigFile(filePath: string): ConfigFile {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new ConfigError(`Invalid YAML in ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const result = configFileSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `  - ${issue.path.length > 0 ? issue.path.join(".") : "<root>"}: ${issue.message}`)
      .join("\n");
    throw new ConfigError(`Invalid configuration in ${filePath}\n${details}`);
  }
  return result.data;
}

function parseLocationList(raw: string): number[] {
  const ids = raw
    .split(/[,\s]+/)
    .filter(Boolean)
    .map((part) => Number(part));
  if (ids.length === 0 || ids.some((id) => !Number.isInteger(id) || id <= 0)) {
    throw new ConfigError(`SYNC_LOCATIONS must be a list of positive integers, got "${raw}"`);
  }
  return ids;
}

function parseBackend(raw: string): StateBackend {
  if (raw === "file" || raw === "dynamo") return raw;
  throw new ConfigError(`STATE_BACKEND must be "file" or "dynamo", got "${raw}"`);
}

function parseLogLevel(raw: string): LogLevel {
  if (raw === "debug" || raw === "info" || raw === "warn" || raw === "error") return raw;
  throw new ConfigError(`LOG_LEVEL must be one of debug|info|warn|error, got "${raw}"`);
}

function resolveConfigPath(options: LoadConfigOptions, env: EnvSource, cwd: string): string | null {
  const explicit = options.configPath ?? env.PIPELINE_CONFIG;
  if (explicit) {
    const abs = path.resolve(cwd, explicit);
    if (!fs.existsSync(abs)) throw new ConfigError(`Config file not found: ${abs}`);
    return abs;
  }
  const fallback = path.resolve(cwd, "config.yaml");
  return fs.existsSync(fallback) ? fallback : null;
}

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const configPath = resolveConfigPath(options, env, cwd);
  const file: ConfigFile = configPath ? readConfigFile(configPath) : {};

  let apiKey = DEFAULT_API_KEY;
  let apiKeySource: AppConfig["api"]["apiKeySource"] = "default";
  if (file.api?.apiKey) {
    apiKey = file.api.apiKey;
    apiKeySource = "config";
  } else if (env.OPENAQ_API_KEY) {
    apiKey = env.OPENAQ_API_KEY;
    apiKeySource = "env";
  }

  const dataDir = path.resolve(cwd, env.DATA_DIR || file.data?.dir || "data");
  const stateFile = env.STATE_FILE || file.data?.stateFile;
  const metricsFile = env.METRICS_FILE || file.data?.metricsFile;

  return {
    locations: env.SYNC_LOCATIONS ? parseLocationList(env.SYNC_LOCATIONS) : file.locations ?? [3459],
    api: {
      baseUrl: (env.OPENAQ_API_BASE || file.api?.baseUrl || DEFAULT_API_BASE).replace(/\/+$/, ""),
      apiKey,
      apiKeySource,
      timeoutMs: file.api?.timeoutMs ?? 30_000,
    },
    data: {
      dir: dataDir,
      stateFile: stateFile ? path.resolve(cwd, stateFile) : path.join(dataDir, ".state.json"),
      metricsFile: metricsFile ? path.resolve(cwd, metricsFile) : path.join(dataDir, "metrics.json"),
    },
    fetch: {
      pageSize: file.fetch?.pageSize ?? 1000,
      rateLimitDelayMs: file.fetch?.rateLimitDelayMs ?? 200,
      strategies: file.fetch?.strategies ?? ["bulk", "per-sensor"],
    },
    validation: {
      enabled: file.validation?.enabled ?? false,
      sampleSize: file.validation?.sampleSize,
      requiredFields: file.validation?.requiredFields ?? DEFAULT_REQUIRED_FIELDS,
      parameterRanges: file.validation?.parameterRanges ?? {},
      qualityThreshold: file.validation?.qualityThreshold ?? 90,
    },
    alerts: {
      maxConsecutiveFailures: file.alerts?.maxConsecutiveFailures ?? 3,
    },
    state: {
      backend: env.STATE_BACKEND ? parseBackend(env.STATE_BACKEND) : file.state?.backend ?? "file",
      dynamo: {
        tableName: env.DYNAMO_TABLE_NAME || file.state?.dynamo?.tableName || "AqSyncState",
        region: env.DYNAMO_REGION || file.state?.dynamo?.region,
        endpoint: env.DYNAMO_ENDPOINT || file.state?.dynamo?.endpoint,
      },
    },
    logLevel: env.LOG_LEVEL ? parseLogLevel(env.LOG_LEVEL) : file.logLevel ?? "info",
    configPath,
  };
}
