#!/usr/bin/env node
/*
  Incremental sync, one pass over the configured locations.
  Usage:
    npx tsx src/entrypoints/cli/sync.ts
    npx tsx src/entrypoints/cli/sync.ts --locations 3459 2178 --config ./config.yaml
    npx tsx src/entrypoints/cli/sync.ts --reset-state
*/

import { loadConfig } from "../../config/config";
import { logger } from "../../config/logger";
import { errorMessage } from "../../domain/errors";
import { runSync } from "../../index";

export interface CliArgs {
  locations?: number[];
  configPath?: string;
  resetState: boolean;
}

// `--locations` takes every following value up to the next flag
export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { resetState: false };
  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    if (flag === "--reset-state") {
      args.resetState = true;
    } else if (flag === "--config") {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) throw new Error("--config needs a path");
      args.configPath = value;
      i++;
    } else if (flag === "--locations") {
      const ids: number[] = [];
      while (i + 1 < argv.length && !argv[i + 1].startsWith("--")) {
        for (const part of argv[++i].split(",")) {
          if (!part) continue;
          const id = Number(part);
          if (!Number.isInteger(id) || id <= 0) throw new Error(`invalid location id: ${part}`);
          ids.push(id);
        }
      }
      if (ids.length === 0) throw new Error("--locations needs at least one id");
      args.locations = ids;
    } else {
      throw new Error(`unknown argument: ${flag}`);
    }
  }
  return args;
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const config = loadConfig({ configPath: args.configPath });

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.warn("sync:signal", { signal, note: "finishing current location" });
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  const summary = await runSync({
    config,
    locations: args.locations,
    resetState: args.resetState,
    signal: controller.signal,
  });

  console.log(
    `[sync] ${summary.successful}/${summary.totalLocations} locations ok, ` +
      `${summary.failed} failed, ${summary.skipped} skipped, ${summary.totalNewRecords} new records`
  );
  process.exitCode = summary.successful === summary.totalLocations ? 0 : 1;
}

if (require.main === module) {
  main().catch((err) => {
    console.error("[sync] error:", errorMessage(err));
    process.exitCode = 1;
  });
}
