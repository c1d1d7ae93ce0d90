import { promises as fs } from "fs";
import path from "path";
import { logger as defaultLogger, Logger } from "../../config/logger";
import { StateWriteError, errorMessage } from "../../domain/errors";
import { stateFileSchema } from "../../domain/schemas";
import { LocationId, LocationState, LocationStateMap } from "../../domain/types";

export interface StateStore {
  /** Never throws: unreadable state is reported as empty. */
  load(): Promise<LocationStateMap>;
  /** Throws StateWriteError when the state cannot be persisted. */
  save(states: LocationStateMap): Promise<void>;
  recordSuccess(locationId: LocationId, fetchTime: string | null, recordsAdded: number): Promise<LocationState>;
  reset(): Promise<void>;
}

export interface StateStoreOptions {
  logger?: Logger;
  now?: () => Date;
}

export function withSuccess(
  states: LocationStateMap,
  locationId: LocationId,
  fetchTime: string | null,
  recordsAdded: number,
  now: Date
): LocationStateMap {
  return {
    ...states,
    [String(locationId)]: {
      lastFetchTime: fetchTime,
      lastRecordCount: recordsAdded,
      lastSuccessfulRun: now.toISOString(),
    },
  };
}

export function parseStateDocument(raw: unknown): LocationStateMap | null {
  const parsed = stateFileSchema.safeParse(raw);
  return parsed.success ? parsed.data.locations : null;
}

/**
 * JSON file backend: `{ "locations": { "<id>": LocationState } }`.
 * Writes go to a temp file first and are renamed into place.
 */
export class FileStateStore implements StateStore {
  private readonly logger: Logger;
  private readonly now: () => Date;
  private cache: LocationStateMap | null = null;

  constructor(private readonly filePath: string, options: StateStoreOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => new Date());
  }

  async load(): Promise<LocationStateMap> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (err) {
      if (isMissingFile(err)) {
        this.logger.debug("state:load:missing", { file: this.filePath });
      } else {
        this.logger.warn("state:load:unreadable", { file: this.filePath, message: errorMessage(err) });
      }
      this.cache = {};
      return {};
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      this.logger.warn("state:load:invalid_json", { file: this.filePath, message: errorMessage(err) });
      this.cache = {};
      return {};
    }

    const states = parseStateDocument(json);
    if (!states) {
      this.logger.warn("state:load:invalid_shape", { file: this.filePath });
      this.cache = {};
      return {};
    }
    this.cache = states;
    return { ...states };
  }

  async save(states: LocationStateMap): Promise<void> {
    const tmp = `${this.filePath}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tmp, JSON.stringify({ locations: states }, null, 2) + "\n", "utf8");
      await fs.rename(tmp, this.filePath);
    } catch (err) {
      throw new StateWriteError(`Could not save state file ${this.filePath}: ${errorMessage(err)}`, { cause: err });
    }
    this.cache = { ...states };
  }

  async recordSuccess(locationId: LocationId, fetchTime: string | null, recordsAdded: number): Promise<LocationState> {
    const current = this.cache ?? (await this.load());
    const next = withSuccess(current, locationId, fetchTime, recordsAdded, this.now());
    await this.save(next);
    return next[String(locationId)];
  }

  async reset(): Promise<void> {
    try {
      await fs.unlink(this.filePath);
      this.logger.info("state:reset", { file: this.filePath });
    } catch (err) {
      if (!isMissingFile(err)) throw new StateWriteError(`Could not delete state file ${this.filePath}: ${errorMessage(err)}`, { cause: err });
    }
    this.cache = {};
  }
}

export function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
