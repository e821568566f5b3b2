/**
 * Global Configuration Manager
 * Manages ~/.s3bridge/config.json
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { isRecord } from '@s3bridge/bridge-core';
import { CONFIG_KEYS, type ApiSettings, type ConfigKey, type GlobalConfig } from './types';

export function getConfigDir(): string {
  return process.env.S3BRIDGE_CONFIG_DIR || join(homedir(), '.s3bridge');
}

export function getConfigPath(): string {
  return join(getConfigDir(), 'config.json');
}

function ensureConfigDir(): void {
  const dir = getConfigDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Keep only the fields we know; anything else in the file is ignored
 */
function toGlobalConfig(value: unknown): GlobalConfig {
  if (!isRecord(value)) {
    return {};
  }
  const config: GlobalConfig = {};
  if (isRecord(value.api)) {
    config.api = { url: optionalString(value.api.url), key: optionalString(value.api.key) };
  }
  const region = optionalString(value.region);
  if (region) {
    config.region = region;
  }
  return config;
}

export function loadConfig(): GlobalConfig {
  const file = getConfigPath();
  if (!existsSync(file)) {
    return {};
  }

  try {
    return toGlobalConfig(JSON.parse(readFileSync(file, 'utf-8')));
  } catch (err) {
    console.warn(`Ignoring unreadable config file ${file}:`, err instanceof Error ? err.message : err);
    return {};
  }
}

export function saveConfig(config: GlobalConfig): void {
  ensureConfigDir();
  writeFileSync(getConfigPath(), JSON.stringify(config, null, 2), { mode: 0o600 });
}

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((known) => known === key);
}

export function getConfigValue(key: ConfigKey): string | undefined {
  const config = loadConfig();
  switch (key) {
    case 'api.url':
      return config.api?.url;
    case 'api.key':
      return config.api?.key;
    case 'region':
      return config.region;
  }
}

export function setConfigValue(key: ConfigKey, value: string): void {
  const config = loadConfig();
  switch (key) {
    case 'api.url':
      config.api = { ...config.api, url: value };
      break;
    case 'api.key':
      config.api = { ...config.api, key: value };
      break;
    case 'region':
      config.region = value;
      break;
  }
  saveConfig(config);
}

/**
 * Flags win over environment variables, which win over the config file
 */
export function resolveApiSettings(flags: { apiUrl?: string; apiKey?: string }): ApiSettings {
  const config = loadConfig();
  return {
    url: flags.apiUrl || process.env.S3BRIDGE_API_URL || config.api?.url,
    key: flags.apiKey || process.env.S3BRIDGE_API_KEY || config.api?.key,
    region: process.env.AWS_REGION || config.region,
  };
}
