import { logger as defaultLogger, Logger } from "../config/logger";
import { errorMessage } from "../domain/errors";
import { AlertEvent, AlertLevel } from "../domain/types";

/** Delivery is someone else's job; a sink only receives structured events. */
export interface AlertSink {
  emit(event: AlertEvent): void | Promise<void>;
}

export function loggerAlertSink(logger: Logger): AlertSink {
  return {
    emit(event) {
      const ctx = { level: event.level, message: event.message, ...event.context };
      if (event.level === "critical" || event.level === "error") logger.error(`alert:${event.title}`, ctx);
      else if (event.level === "warning") logger.warn(`alert:${event.title}`, ctx);
      else logger.info(`alert:${event.title}`, ctx);
    },
  };
}

export class AlertService {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly sinks: readonly AlertSink[], options: { logger?: Logger; now?: () => Date } = {}) {
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => new Date());
  }

  async send(level: AlertLevel, title: string, message: string, context: Record<string, unknown> = {}): Promise<AlertEvent> {
    const event: AlertEvent = { level, title, message, timestamp: this.now().toISOString(), context };
    for (const sink of this.sinks) {
      try {
        await sink.emit(event);
      } catch (err) {
        // A broken sink must not turn an alert into a run failure
        this.logger.warn("alert:sink_failed", { title, message: errorMessage(err) });
      }
    }
    return event;
  }
}
