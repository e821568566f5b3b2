/**
 * Typed access to the global CLI options
 */

import type { Command } from 'commander';
import { resolveApiSettings } from '../config/config-manager';

export interface GlobalOptions {
  apiUrl?: string;
  apiKey?: string;
}

function stringOption(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function getGlobalOptions(command: Command): GlobalOptions {
  const opts = command.optsWithGlobals();
  return {
    apiUrl: stringOption(opts.apiUrl),
    apiKey: stringOption(opts.apiKey),
  };
}

/**
 * API URL and key for a command, or an error naming what is missing
 */
export interface ResolvedApiSettings {
  url: string;
  key: string;
  region?: string;
}

export function requireApiSettings(command: Command): ResolvedApiSettings {
  const settings = resolveApiSettings(getGlobalOptions(command));
  if (!settings.url) {
    throw new Error('API URL is not configured. Use --api-url, S3BRIDGE_API_URL or: s3bridge config set api.url <url>');
  }
  if (!settings.key) {
    throw new Error('API key is not configured. Use --api-key, S3BRIDGE_API_KEY or: s3bridge config set api.key <key>');
  }
  return { url: settings.url, key: settings.key, region: settings.region };
}

/**
 * Parse a positive whole number option
 */
export function parseSeconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Expected a whole number of seconds, got "${value}"`);
  }
  return parsed;
}

export function parsePatterns(value: string): string[] {
  return value
    .split(',')
    .map((pattern) => pattern.trim())
    .filter((pattern) => pattern.length > 0);
}
