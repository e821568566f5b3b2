/**
 * credentials command
 * Fetch a credential bundle for a service and print it
 */

import { IssuerClient } from '@s3bridge/bridge-client';
import { TIER_ACTIONS, type CredentialBundle } from '@s3bridge/bridge-core';
import { Command, InvalidArgumentError } from 'commander';
import { requireApiSettings, parseSeconds } from '../utils/options';
import { error, getOutputFormat, mask, printData, printJson, verbose } from '../utils/output';

export interface CredentialSummary {
  service: string;
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken: string;
  issuedAt: string;
  expiresAt: string;
  expiresInSeconds: number;
  permissions: string;
  /** S3 actions the tier's role grants */
  actions: readonly string[];
  bucketPatterns: string[];
}

export function summarizeCredentials(
  bundle: CredentialBundle,
  now: number,
  showSecrets: boolean
): CredentialSummary {
  return {
    service: bundle.serviceId,
    accessKeyId: bundle.accessKey,
    secretAccessKey: showSecrets ? bundle.secretKey : mask(bundle.secretKey),
    sessionToken: showSecrets ? bundle.sessionToken : mask(bundle.sessionToken),
    issuedAt: new Date(bundle.issuedAt).toISOString(),
    expiresAt: new Date(bundle.expiresAt).toISOString(),
    expiresInSeconds: Math.max(0, Math.floor((bundle.expiresAt - now) / 1000)),
    permissions: bundle.permissionTier,
    actions: TIER_ACTIONS[bundle.permissionTier],
    bucketPatterns: bundle.bucketPatterns,
  };
}

function durationOption(value: string): number {
  try {
    return parseSeconds(value);
  } catch (err) {
    throw new InvalidArgumentError(err instanceof Error ? err.message : String(err));
  }
}

export function createCredentialsCommand(): Command {
  return new Command('credentials')
    .description('Request temporary credentials for a service')
    .argument('<service>', 'Service name')
    .option('-d, --duration <seconds>', 'Requested session length (clamped by the server)', durationOption)
    .option('--show-secrets', 'Print the secret key and session token in full')
    .option('--env', 'Print as shell export statements')
    .action(async (service: string, options: { duration?: number; showSecrets?: boolean; env?: boolean }, command: Command) => {
      try {
        const settings = requireApiSettings(command);
        verbose(`Requesting credentials for ${service} from ${settings.url}`);

        const client = new IssuerClient({
          baseUrl: settings.url,
          apiKey: settings.key,
          durationSeconds: options.duration,
        });
        const bundle = await client.fetchCredentials(service);

        if (options.env) {
          console.log(`export AWS_ACCESS_KEY_ID=${bundle.accessKey}`);
          console.log(`export AWS_SECRET_ACCESS_KEY=${bundle.secretKey}`);
          console.log(`export AWS_SESSION_TOKEN=${bundle.sessionToken}`);
          return;
        }

        const summary = summarizeCredentials(bundle, Date.now(), options.showSecrets === true);
        if (getOutputFormat() === 'json') {
          printJson(summary);
          return;
        }
        printData(summary, {
          headers: ['SERVICE', 'ACCESS KEY', 'PERMISSIONS', 'EXPIRES', 'BUCKETS'],
          getRow: (s) => [s.service, s.accessKeyId, s.permissions, s.expiresAt, s.bucketPatterns.join(', ')],
        });
      } catch (err) {
        error(err instanceof Error ? err.message : 'Failed to get credentials');
        process.exit(1);
      }
    });
}
