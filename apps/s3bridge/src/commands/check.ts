/**
 * check command
 * Show whether a service may use a bucket, and which pattern allows it
 */

import { IssuerClient } from '@s3bridge/bridge-client';
import { matchBucket, type AuthorizationDecision } from '@s3bridge/bridge-core';
import chalk from 'chalk';
import { Command } from 'commander';
import { parsePatterns, requireApiSettings } from '../utils/options';
import { error, getOutputFormat, printJson, success, verbose, warn } from '../utils/output';

export interface BucketCheckResult extends AuthorizationDecision {
  service: string;
  bucket: string;
  patterns: string[];
  source: 'local' | 'issued';
}

export function checkBucket(
  service: string,
  bucket: string,
  patterns: string[],
  source: BucketCheckResult['source']
): BucketCheckResult {
  return { service, bucket, patterns, source, ...matchBucket(bucket, patterns) };
}

export function createCheckCommand(): Command {
  return new Command('check')
    .description('Check whether a service is authorized for a bucket')
    .argument('<service>', 'Service name')
    .argument('<bucket>', 'Bucket name')
    .option('-p, --patterns <list>', 'Check against these comma-separated patterns without contacting the API', parsePatterns)
    .action(async (service: string, bucket: string, options: { patterns?: string[] }, command: Command) => {
      try {
        let result: BucketCheckResult;
        if (options.patterns && options.patterns.length > 0) {
          result = checkBucket(service, bucket, options.patterns, 'local');
        } else {
          const settings = requireApiSettings(command);
          verbose(`Fetching bucket patterns for ${service} from ${settings.url}`);
          const client = new IssuerClient({ baseUrl: settings.url, apiKey: settings.key });
          const bundle = await client.fetchCredentials(service);
          result = checkBucket(service, bucket, bundle.bucketPatterns, 'issued');
        }

        if (getOutputFormat() === 'json') {
          printJson(result);
        } else if (result.allowed) {
          success(`${bucket} is authorized for ${service} (pattern ${chalk.cyan(result.matchedPattern ?? '')})`);
        } else {
          warn(`${bucket} is not authorized for ${service}`);
          verbose(`Patterns: ${result.patterns.join(', ') || '(none)'}`);
        }

        if (!result.allowed) {
          process.exitCode = 1;
        }
      } catch (err) {
        error(err instanceof Error ? err.message : 'Failed to check bucket');
        process.exit(1);
      }
    });
}
