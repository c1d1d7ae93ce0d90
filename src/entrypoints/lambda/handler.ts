import { logger } from "../../config/logger";
import { errorMessage } from "../../domain/errors";
import { RunSummary } from "../../domain/types";
import { runSync, SyncOptions } from "../../index";

// Minimal local types to avoid an aws-lambda dependency
export interface ScheduledEventLike {
  "detail-type"?: string;
  time?: string;
  // Optional override, e.g. from a manual test invoke
  detail?: { locations?: unknown } | null;
}

export interface ScheduledResultLike {
  ok: boolean;
  summary?: RunSummary;
  error?: string;
}

function locationsFrom(event: ScheduledEventLike): number[] | undefined {
  const raw = event.detail?.locations;
  if (!Array.isArray(raw)) return undefined;
  const ids = raw.filter((v): v is number => typeof v === "number" && Number.isInteger(v) && v > 0);
  return ids.length > 0 ? ids : undefined;
}

export function createHandler(options: SyncOptions = {}) {
  const log = options.logger ?? logger;
  return async function handler(event: ScheduledEventLike = {}): Promise<ScheduledResultLike> {
    log.info("lambda:invoke", { detailType: event["detail-type"], time: event.time });
    try {
      const summary = await runSync({ ...options, locations: locationsFrom(event) ?? options.locations });
      return { ok: summary.failed === 0, summary };
    } catch (err) {
      const message = errorMessage(err);
      log.error("lambda:failed", { message });
      return { ok: false, error: message };
    }
  };
}

export const handler = createHandler();

export default handler;
