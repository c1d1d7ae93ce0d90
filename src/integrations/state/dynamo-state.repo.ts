import { DeleteCommand, DynamoDBDocumentClient, GetCommand, PutCommand } from "@aws-sdk/lib-dynamodb";
import { logger as defaultLogger, Logger } from "../../config/logger";
import { StateWriteError, errorMessage } from "../../domain/errors";
import { LocationId, LocationState, LocationStateMap } from "../../domain/types";
import { parseStateDocument, StateStore, StateStoreOptions, withSuccess } from "./state.repo";

export const STATE_ITEM_KEY = "sync-state";

/** The single state item, behind the three calls the store needs. */
export interface StateItemTable {
  readonly tableName: string;
  get(): Promise<Record<string, unknown> | undefined>;
  put(item: Record<string, unknown>): Promise<void>;
  remove(): Promise<void>;
}

export function documentClientTable(doc: DynamoDBDocumentClient, tableName: string): StateItemTable {
  return {
    tableName,
    async get() {
      const out = await doc.send(new GetCommand({ TableName: tableName, Key: { pk: STATE_ITEM_KEY } }));
      return out.Item;
    },
    async put(item) {
      await doc.send(new PutCommand({ TableName: tableName, Item: { ...item, pk: STATE_ITEM_KEY } }));
    },
    async remove() {
      await doc.send(new DeleteCommand({ TableName: tableName, Key: { pk: STATE_ITEM_KEY } }));
    },
  };
}

/**
 * Keeps the whole location map in one item (`pk = "sync-state"`), mirroring the
 * file layout so both backends can be swapped without migration.
 */
export class DynamoStateStore implements StateStore {
  private readonly logger: Logger;
  private readonly now: () => Date;
  private cache: LocationStateMap | null = null;

  constructor(private readonly table: StateItemTable, options: StateStoreOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => new Date());
  }

  async load(): Promise<LocationStateMap> {
    let item: Record<string, unknown> | undefined;
    try {
      item = await this.table.get();
    } catch (err) {
      this.logger.warn("state:dynamo:load_failed", { table: this.table.tableName, message: errorMessage(err) });
      this.cache = {};
      return {};
    }
    if (!item) {
      this.cache = {};
      return {};
    }
    const states = parseStateDocument({ locations: item.locations });
    if (!states) {
      this.logger.warn("state:dynamo:invalid_shape", { table: this.table.tableName });
      this.cache = {};
      return {};
    }
    this.cache = states;
    return { ...states };
  }

  async save(states: LocationStateMap): Promise<void> {
    try {
      await this.table.put({ locations: states, updatedAt: this.now().toISOString() });
    } catch (err) {
      throw new StateWriteError(`Could not save state to ${this.table.tableName}: ${errorMessage(err)}`, { cause: err });
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
      await this.table.remove();
    } catch (err) {
      throw new StateWriteError(`Could not reset state in ${this.table.tableName}: ${errorMessage(err)}`, { cause: err });
    }
    this.logger.info("state:reset", { table: this.table.tableName });
    this.cache = {};
  }
}
