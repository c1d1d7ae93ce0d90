import { promises as fs } from "fs";
import path from "path";
import { z } from "zod";
import { logger as defaultLogger, Logger } from "../../config/logger";
import { errorMessage } from "../../domain/errors";
import { RunSummary } from "../../domain/types";
import { isMissingFile } from "../state/state.repo";

export const MAX_RUNS_KEPT = 100;

const historySchema = z.object({
  consecutiveFailures: z.number().int().nonnegative().default(0),
  // Older entries are kept verbatim, whatever version wrote them
  runs: z.array(z.unknown()).default([]),
});

export interface RunHistory {
  consecutiveFailures: number;
  runs: unknown[];
}

export interface RunHistoryStore {
  load(): Promise<RunHistory>;
  append(summary: RunSummary): Promise<void>;
}

/** `metrics.json`: the consecutive-failure counter plus the last 100 run summaries. */
export class FileRunHistoryStore implements RunHistoryStore {
  private readonly logger: Logger;

  constructor(private readonly filePath: string, options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? defaultLogger;
  }

  async load(): Promise<RunHistory> {
    try {
      const raw = await fs.readFile(this.filePath, "utf8");
      const parsed = historySchema.safeParse(JSON.parse(raw));
      if (parsed.success) return parsed.data;
      this.logger.warn("history:load:invalid_shape", { file: this.filePath });
    } catch (err) {
      if (!isMissingFile(err)) {
        this.logger.warn("history:load:unreadable", { file: this.filePath, message: errorMessage(err) });
      }
    }
    return { consecutiveFailures: 0, runs: [] };
  }

  // Failures only warn: losing a metrics entry must not fail the run that produced it
  async append(summary: RunSummary): Promise<void> {
    const history = await this.load();
    const runs = [...history.runs, summary].slice(-MAX_RUNS_KEPT);
    const doc = { consecutiveFailures: summary.consecutiveFailures, runs };
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, JSON.stringify(doc, null, 2) + "\n", "utf8");
    } catch (err) {
      this.logger.warn("history:save_failed", { file: this.filePath, message: errorMessage(err) });
    }
  }
}
