import { DynamoDBClient, DynamoDBClientConfig } from "@aws-sdk/client-dynamodb";
import { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";
import type { AppConfig } from "../../config/config";

export type DynamoSettings = AppConfig["state"]["dynamo"];

export function dynamoClientConfig(cfg: DynamoSettings): DynamoDBClientConfig {
  const clientConfig: DynamoDBClientConfig = {
    region: cfg.region || process.env.AWS_REGION || "us-west-2",
  };
  if (cfg.endpoint) {
    // DynamoDB Local accepts any credentials
    clientConfig.endpoint = cfg.endpoint;
    clientConfig.credentials = {
      accessKeyId: process.env.AWS_ACCESS_KEY_ID || "local",
      secretAccessKey: process.env.AWS_SECRET_ACCESS_KEY || "local",
    };
  }
  return clientConfig;
}

let cachedDoc: DynamoDBDocumentClient | null = null;

export function getDynamoDocClient(cfg: DynamoSettings): DynamoDBDocumentClient {
  if (cachedDoc) return cachedDoc;
  cachedDoc = DynamoDBDocumentClient.from(new DynamoDBClient(dynamoClientConfig(cfg)));
  return cachedDoc;
}
