/**
 * DynamoDB-backed Service Registry
 *
 * Item layout (written by provisioning tooling):
 *   pk = SERVICE#<serviceId>, sk = #META
 *   serviceId, bucketPatterns, permissionTier, roleArn
 */

import { GetCommand, type DynamoDBDocumentClient, type GetCommandInput } from '@aws-sdk/lib-dynamodb';
import { getDocClient, getTableName } from '../db/client';
import { serviceKeys } from '../db/keys';
import { toServiceDefinition } from './service-record';
import { found, notFound, type RegistryLookup, type ServiceRegistry } from './types';

export interface DynamoServiceRegistryOptions {
  /** Defaults to the shared lazily-created document client */
  client?: DynamoDBDocumentClient;
  /** Defaults to S3BRIDGE_TABLE */
  tableName?: string;
}

export class DynamoServiceRegistry implements ServiceRegistry {
  private readonly client?: DynamoDBDocumentClient;
  private readonly tableName?: string;

  constructor(options: DynamoServiceRegistryOptions = {}) {
    this.client = options.client;
    this.tableName = options.tableName;
  }

  async lookup(serviceId: string): Promise<RegistryLookup> {
    if (!serviceId) {
      return notFound(serviceId);
    }

    const docClient = this.client ?? getDocClient();

    const params: GetCommandInput = {
      TableName: this.tableName ?? getTableName(),
      Key: serviceKeys(serviceId),
      // Authorization reads must see the latest provisioning write
      ConsistentRead: true,
    };

    const result = await docClient.send(new GetCommand(params));

    if (!result.Item) {
      return notFound(serviceId);
    }

    const item = result.Item;
    const definition = toServiceDefinition(
      serviceId,
      { role: item.roleArn, buckets: item.bucketPatterns, permissions: item.permissionTier },
      'read-only'
    );

    if (!definition.valid) {
      console.warn('[Registry] Ignoring malformed service item', {
        serviceId,
        reason: definition.reason,
      });
      return notFound(serviceId);
    }

    return found(definition.service);
  }
}
