/*
  Quality report for one archive file.
  Usage:
    npx tsx tools/archive/validate-archive.ts --file ./data/location_3459.json
    npx tsx tools/archive/validate-archive.ts --file ./data/location_3459.json --sample 500 --output ./reports/3459.txt
  Exits 1 when the quality score is below validation.qualityThreshold.
*/

import { promises as fs } from "fs";
import path from "path";
import { loadConfig } from "../../src/config/config";
import { errorMessage } from "../../src/domain/errors";
import { isMeasurementRecord } from "../../src/domain/schemas";
import { MeasurementRecord } from "../../src/domain/types";
import { DataValidator, formatReport } from "../../src/services/validator.service";

function getArg(flag: string): string | undefined {
  const i = process.argv.indexOf(flag);
  return i >= 0 ? process.argv[i + 1] : undefined;
}

async function readRecords(file: string): Promise<MeasurementRecord[]> {
  const json: unknown = JSON.parse(await fs.readFile(file, "utf8"));
  if (!Array.isArray(json)) throw new Error(`${file} is not a JSON array`);
  const records: MeasurementRecord[] = [];
  json.forEach((entry: unknown, i) => {
    if (!isMeasurementRecord(entry)) throw new Error(`${file}: entry ${i} is not a measurement record`);
    records.push(entry);
  });
  return records;
}

async function main() {
  const file = getArg("--file");
  if (!file) throw new Error("--file is required");
  const sampleRaw = getArg("--sample");
  const sampleSize = sampleRaw === undefined ? undefined : Number(sampleRaw);
  if (sampleSize !== undefined && (!Number.isInteger(sampleSize) || sampleSize <= 0)) {
    throw new Error(`invalid --sample: ${sampleRaw}`);
  }

  const config = loadConfig({ configPath: getArg("--config") });
  const validator = new DataValidator({
    requiredFields: config.validation.requiredFields,
    parameterRanges: config.validation.parameterRanges,
  });

  const records = await readRecords(file);
  const report = validator.validate(records, sampleSize ?? config.validation.sampleSize);
  const text = formatReport(report);
  console.log(text);

  const output = getArg("--output");
  if (output) {
    await fs.mkdir(path.dirname(output), { recursive: true });
    await fs.writeFile(output, text, "utf8");
    const metricsFile = output.replace(/\.[^./\\]+$/, "") + ".metrics.json";
    await fs.writeFile(metricsFile, JSON.stringify({ file, generatedAt: new Date().toISOString(), ...report }, null, 2) + "\n", "utf8");
    console.log(`[validate] report written to ${output} and ${metricsFile}`);
  }

  if (report.qualityScore < config.validation.qualityThreshold) {
    console.error(
      `[validate] quality score ${report.qualityScore.toFixed(2)}% below threshold ${config.validation.qualityThreshold}%`
    );
    process.exitCode = 1;
  }
}

main().catch((e) => {
  console.error("[validate] error:", errorMessage(e));
  process.exitCode = 1;
});
