import { promises as fs } from "fs";
import path from "path";
import { logger as defaultLogger, Logger } from "../../config/logger";
import { ArchiveWriteError, errorMessage } from "../../domain/errors";
import { isMeasurementRecord } from "../../domain/schemas";
import { LocationId, MeasurementRecord } from "../../domain/types";
import { isMissingFile } from "../state/state.repo";

export type ArchiveLoadStatus = "loaded" | "missing" | "quarantined";

export interface ArchiveLoadResult {
  records: MeasurementRecord[];
  status: ArchiveLoadStatus;
  quarantinedTo?: string;
}

export interface ArchiveSaveOptions {
  // Copy the current file to `<file>.backup` before replacing it
  backup?: boolean;
}

export interface ArchiveStoreOptions {
  logger?: Logger;
  now?: () => Date;
}

type ParsedArchive = { ok: true; records: MeasurementRecord[] } | { ok: false; reason: string };

function parseArchive(raw: string): ParsedArchive {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    return { ok: false, reason: `invalid JSON: ${errorMessage(err)}` };
  }
  if (!Array.isArray(json)) return { ok: false, reason: "not a JSON array" };
  const records: MeasurementRecord[] = [];
  for (let i = 0; i < json.length; i++) {
    const entry: unknown = json[i];
    if (!isMeasurementRecord(entry)) return { ok: false, reason: `entry ${i} is not a measurement record` };
    records.push(entry);
  }
  return { ok: true, records };
}

/** One pretty-printed JSON array per location: `<dir>/location_<id>.json`. */
export class ArchiveStore {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly dataDir: string, options: ArchiveStoreOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => new Date());
  }

  pathFor(locationId: LocationId): string {
    return path.join(this.dataDir, `location_${locationId}.json`);
  }

  // Location ids with an archive file in the data directory, ascending
  async listLocations(): Promise<LocationId[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.dataDir);
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }
    const ids: LocationId[] = [];
    for (const name of names) {
      const match = /^location_(\d+)\.json$/.exec(name);
      if (match) ids.push(Number(match[1]));
    }
    return ids.sort((a, b) => a - b);
  }

  async exists(locationId: LocationId): Promise<boolean> {
    try {
      await fs.access(this.pathFor(locationId));
      return true;
    } catch {
      return false;
    }
  }

  /**
   * A missing file is an empty archive. A file that cannot be parsed is moved
   * aside to `<file>.corrupt-<stamp>` and reported empty, so the next save
   * does not overwrite it.
   */
  async load(locationId: LocationId): Promise<ArchiveLoadResult> {
    const file = this.pathFor(locationId);
    let raw: string;
    try {
      raw = await fs.readFile(file, "utf8");
    } catch (err) {
      if (isMissingFile(err)) {
        this.logger.debug("archive:load:missing", { locationId, file });
        return { records: [], status: "missing" };
      }
      this.logger.warn("archive:load:unreadable", { locationId, file, message: errorMessage(err) });
      return { records: [], status: "quarantined", quarantinedTo: await this.quarantine(locationId, file) };
    }

    const parsed = parseArchive(raw);
    if (parsed.ok) {
      this.logger.debug("archive:load", { locationId, records: parsed.records.length });
      return { records: parsed.records, status: "loaded" };
    }

    this.logger.warn("archive:load:corrupt", { locationId, file, reason: parsed.reason });
    return { records: [], status: "quarantined", quarantinedTo: await this.quarantine(locationId, file) };
  }

  async save(locationId: LocationId, records: readonly MeasurementRecord[], options: ArchiveSaveOptions = {}): Promise<void> {
    const file = this.pathFor(locationId);
    const tmp = `${file}.tmp`;
    try {
      await fs.mkdir(this.dataDir, { recursive: true });
      if (options.backup && (await this.exists(locationId))) {
        await fs.copyFile(file, `${file}.backup`);
        this.logger.info("archive:backup", { locationId, backup: `${file}.backup` });
      }
      await fs.writeFile(tmp, JSON.stringify(records, null, 2) + "\n", "utf8");
      await fs.rename(tmp, file);
    } catch (err) {
      throw new ArchiveWriteError(locationId, `Could not save archive ${file}: ${errorMessage(err)}`, { cause: err });
    }
    this.logger.debug("archive:saved", { locationId, records: records.length });
  }

  private async quarantine(locationId: LocationId, file: string): Promise<string> {
    const target = `${file}.corrupt-${this.now().toISOString().replace(/[:.]/g, "-")}`;
    try {
      await fs.rename(file, target);
    } catch (err) {
      throw new ArchiveWriteError(locationId, `Could not move unreadable archive ${file} aside: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    this.logger.warn("archive:quarantined", { locationId, file: target });
    return target;
  }
}
