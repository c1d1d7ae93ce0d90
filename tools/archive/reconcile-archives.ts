/*
  Dedup and time-sort archived location files in place (a .backup is written first).
  Usage:
    npx tsx tools/archive/reconcile-archives.ts
    npx tsx tools/archive/reconcile-archives.ts --data-dir ./data --locations 3459,2178
*/

import { loadConfig } from "../../src/config/config";
import { logger } from "../../src/config/logger";
import { errorMessage } from "../../src/domain/errors";
import { ArchiveStore } from "../../src/integrations/archive/archive.repo";
import { reconcileArchives } from "../../src/workflows/reconcile/orchestrator";

function getArg(flag: string): string | undefined {
  const i = process.argv.indexOf(flag);
  return i >= 0 ? process.argv[i + 1] : undefined;
}

function parseIds(raw: string | undefined): number[] | undefined {
  if (!raw) return undefined;
  return raw
    .split(",")
    .filter(Boolean)
    .map((part) => {
      const id = Number(part);
      if (!Number.isInteger(id) || id <= 0) throw new Error(`invalid location id: ${part}`);
      return id;
    });
}

async function main() {
  const config = loadConfig({ configPath: getArg("--config") });
  const dataDir = getArg("--data-dir") ?? config.data.dir;
  console.log(`[reconcile] data dir: ${dataDir}`);

  const result = await reconcileArchives({
    archiveStore: new ArchiveStore(dataDir, { logger }),
    locations: parseIds(getArg("--locations")),
    logger,
  });

  for (const loc of result.locations) {
    const suffix = loc.error ? ` (${loc.error})` : "";
    console.log(`  location ${loc.locationId}: ${loc.status} ${loc.before} -> ${loc.after}, removed ${loc.duplicatesRemoved}${suffix}`);
  }
  console.log(
    `[reconcile] total ${result.totalBefore} -> ${result.totalAfter} records, ${result.totalDuplicatesRemoved} duplicates removed`
  );
  if (result.failed > 0) process.exitCode = 1;
}

main().catch((e) => {
  console.error("[reconcile] error:", errorMessage(e));
  process.exitCode = 1;
});
