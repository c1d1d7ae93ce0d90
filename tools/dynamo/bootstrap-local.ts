/*
  Prepare the DynamoDB state backend (state.backend: dynamo).
  - Creates the state table (hash key "pk") when it does not exist yet
  - Checks the "sync-state" item and seeds an empty one when absent
  - --show prints the cursor stored for every location
  Usage:
    DYNAMO_ENDPOINT=http://localhost:8000 npx tsx tools/dynamo/bootstrap-local.ts
    npx tsx tools/dynamo/bootstrap-local.ts --config ./config.yaml --show
*/

import {
  CreateTableCommand,
  DescribeTableCommand,
  DynamoDBClient,
  ResourceNotFoundException,
  waitUntilTableExists,
} from "@aws-sdk/client-dynamodb";
import { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";
import { loadConfig } from "../../src/config/config";
import { logger } from "../../src/config/logger";
import { errorMessage } from "../../src/domain/errors";
import { documentClientTable, DynamoStateStore, STATE_ITEM_KEY } from "../../src/integrations/state/dynamo-state.repo";
import { dynamoClientConfig } from "../../src/integrations/state/dynamo.sdk";

function getArg(flag: string): string | undefined {
  const i = process.argv.indexOf(flag);
  return i >= 0 ? process.argv[i + 1] : undefined;
}

async function tableStatus(client: DynamoDBClient, tableName: string): Promise<string | null> {
  try {
    const out = await client.send(new DescribeTableCommand({ TableName: tableName }));
    return out.Table?.TableStatus ?? "UNKNOWN";
  } catch (err) {
    if (err instanceof ResourceNotFoundException) return null;
    throw err;
  }
}

async function main() {
  const config = loadConfig({ configPath: getArg("--config") });
  const { tableName } = config.state.dynamo;
  const client = new DynamoDBClient(dynamoClientConfig(config.state.dynamo));
  console.log(`[state] table ${tableName} at ${config.state.dynamo.endpoint ?? "AWS default endpoint"}`);

  const status = await tableStatus(client, tableName);
  if (status === null) {
    await client.send(
      new CreateTableCommand({
        TableName: tableName,
        AttributeDefinitions: [{ AttributeName: "pk", AttributeType: "S" }],
        KeySchema: [{ AttributeName: "pk", KeyType: "HASH" }],
        BillingMode: "PAY_PER_REQUEST",
      })
    );
    await waitUntilTableExists({ client, maxWaitTime: 60 }, { TableName: tableName });
    console.log(`[state] created ${tableName}`);
  } else {
    console.log(`[state] ${tableName} exists (${status})`);
  }

  const table = documentClientTable(DynamoDBDocumentClient.from(client), tableName);
  const store = new DynamoStateStore(table, { logger });
  if ((await table.get()) === undefined) {
    await store.save({});
    console.log(`[state] seeded empty item pk=${STATE_ITEM_KEY}`);
  }

  const states = await store.load();
  const ids = Object.keys(states);
  console.log(`[state] item pk=${STATE_ITEM_KEY} tracks ${ids.length} location(s)`);
  if (process.argv.includes("--show")) {
    for (const id of ids) {
      const state = states[id];
      console.log(`  ${id}: cursor ${state.lastFetchTime ?? "full history"}, last run ${state.lastSuccessfulRun}`);
    }
  }
}

main().catch((e) => {
  console.error("[state] error:", errorMessage(e));
  process.exitCode = 1;
});
