import fs from "fs";
import path from "path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug: (msg: string, ctx?: Record<string, unknown>) => void;
  info: (msg: string, ctx?: Record<string, unknown>) => void;
  warn: (msg: string, ctx?: Record<string, unknown>) => void;
  error: (msg: string, ctx?: Record<string, unknown>) => void;
}

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(value: unknown): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

export interface LoggerOptions {
  level?: LogLevel;
  // When set, every line is also appended to <logDir>/run-<stamp>.log
  logDir?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const minIdx = LEVELS.indexOf(options.level ?? "info");

  let fileStream: fs.WriteStream | null = null;
  if (options.logDir) {
    const runStamp = new Date().toISOString().replace(/[:.]/g, "-");
    try {
      fs.mkdirSync(options.logDir, { recursive: true });
      fileStream = fs.createWriteStream(path.join(options.logDir, `run-${runStamp}.log`), { flags: "a" });
      fileStream.on("error", (err) => {
        console.error(`log file disabled: ${err.message}`);
        fileStream = null;
      });
    } catch (err) {
      console.error(`log file unavailable: ${err instanceof Error ? err.message : String(err)}`);
      fileStream = null;
    }
  }

  function log(lvl: LogLevel, msg: string, ctx?: Record<string, unknown>) {
    if (LEVELS.indexOf(lvl) < minIdx) return;
    const payload = ctx ? ` ${JSON.stringify(ctx)}` : "";
    const line = `${new Date().toISOString()} [${lvl}] ${msg}${payload}`;
    // eslint-disable-next-line no-console
    console[lvl === "debug" ? "log" : lvl](line);
    fileStream?.write(line + "\n");
  }

  return {
    debug: (msg, ctx) => log("debug", msg, ctx),
    info: (msg, ctx) => log("info", msg, ctx),
    warn: (msg, ctx) => log("warn", msg, ctx),
    error: (msg, ctx) => log("error", msg, ctx),
  };
}

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export default createLogger;

export const logger: Logger = createLogger({
  level: isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : "info",
  logDir: process.env.LOG_DIR || undefined,
});
