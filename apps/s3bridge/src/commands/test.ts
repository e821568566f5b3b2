/**
 * test command
 * End-to-end connectivity check: issue a credential, then optionally list a bucket with it
 */

import { createBridgeClient } from '@s3bridge/bridge-client';
import { Command, InvalidArgumentError } from 'commander';
import { requireApiSettings } from '../utils/options';
import { error, getOutputFormat, info, printData, printJson, success, verbose } from '../utils/output';

export interface ConnectivityReport {
  service: string;
  credentialMs: number;
  permissions: string;
  bucketPatterns: string[];
  expiresAt: string;
  bucket?: string;
  objectCount?: number;
  listMs?: number;
}

function limitOption(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive whole number');
  }
  return parsed;
}

export function createTestCommand(): Command {
  return new Command('test')
    .description('Test credential issuance and, optionally, bucket access for a service')
    .argument('<service>', 'Service name')
    .argument('[bucket]', 'Bucket to list with the issued credential')
    .option('--prefix <prefix>', 'Key prefix to list')
    .option('--limit <n>', 'Number of keys to print', limitOption, 10)
    .action(
      async (
        service: string,
        bucket: string | undefined,
        options: { prefix?: string; limit: number },
        command: Command
      ) => {
        try {
          const settings = requireApiSettings(command);
          const { credentials, storage } = createBridgeClient({
            apiUrl: settings.url,
            apiKey: settings.key,
            serviceId: service,
            region: settings.region,
          });

          const started = Date.now();
          const bundle = await credentials.getCredentials(service);
          const report: ConnectivityReport = {
            service,
            credentialMs: Date.now() - started,
            permissions: bundle.permissionTier,
            bucketPatterns: bundle.bucketPatterns,
            expiresAt: new Date(bundle.expiresAt).toISOString(),
          };
          verbose(`Credential issued in ${report.credentialMs}ms, state ${credentials.getState(service)}`);

          let keys: string[] = [];
          if (bucket) {
            const listStarted = Date.now();
            const objects = await storage.listObjects(bucket, options.prefix);
            report.bucket = bucket;
            report.objectCount = objects.length;
            report.listMs = Date.now() - listStarted;
            keys = objects.slice(0, options.limit).map((object) => object.key);
          }

          if (getOutputFormat() === 'json') {
            printJson({ ...report, keys });
            return;
          }

          success(`Credentials issued for ${service} (${report.permissions}, ${report.credentialMs}ms)`);
          info(`Bucket patterns: ${report.bucketPatterns.join(', ')}`);
          info(`Expires: ${report.expiresAt}`);
          if (report.bucket) {
            success(`Listed ${report.objectCount ?? 0} objects in ${report.bucket} (${report.listMs ?? 0}ms)`);
            printData<{ key: string }>(
              keys.map((key) => ({ key })),
              { headers: ['KEY'], getRow: (row) => [row.key] }
            );
          }
        } catch (err) {
          error(err instanceof Error ? err.message : 'Connectivity test failed');
          process.exit(1);
        }
      }
    );
}
