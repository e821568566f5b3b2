/**
 * DynamoDB document client for the service registry table
 *
 * Created on first use, so the Lambda environment is read at call time.
 * DYNAMODB_ENDPOINT points it at DynamoDB Local.
 */

import { DynamoDBClient, type DynamoDBClientConfig } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';

export function createClientConfig(env: NodeJS.ProcessEnv = process.env): DynamoDBClientConfig {
  const region = env.AWS_REGION || 'us-east-1';
  const endpoint = env.DYNAMODB_ENDPOINT;
  if (!endpoint) {
    return { region };
  }
  // DynamoDB Local accepts any static credential
  return { region, endpoint, credentials: { accessKeyId: 'local', secretAccessKey: 'local' } };
}

let docClient: DynamoDBDocumentClient | null = null;

export function getDocClient(): DynamoDBDocumentClient {
  if (!docClient) {
    const config = createClientConfig();
    if (config.endpoint) {
      console.log('[DynamoDB] Using local endpoint', { endpoint: config.endpoint, table: getTableName() });
    }
    docClient = DynamoDBDocumentClient.from(new DynamoDBClient(config), {
      marshallOptions: { removeUndefinedValues: true },
    });
  }
  return docClient;
}

export function getTableName(): string {
  return process.env.S3BRIDGE_TABLE || 's3bridge-services';
}
