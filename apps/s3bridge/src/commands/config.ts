/**
 * config command
 */

import { Command } from 'commander';
import {
  getConfigPath,
  getConfigValue,
  isConfigKey,
  loadConfig,
  setConfigValue,
} from '../config/config-manager';
import { CONFIG_KEYS } from '../config/types';
import { error, info, mask, printJson, success } from '../utils/output';

function requireKey(key: string): (typeof CONFIG_KEYS)[number] {
  if (!isConfigKey(key)) {
    error(`Unknown config key "${key}". Known keys: ${CONFIG_KEYS.join(', ')}`);
    process.exit(1);
  }
  return key;
}

export function createConfigCommand(): Command {
  const config = new Command('config').description('Manage CLI configuration');

  config
    .command('get <key>')
    .description('Print a configuration value')
    .action((key: string) => {
      const value = getConfigValue(requireKey(key));
      if (value === undefined) {
        info(`${key} is not set`);
        return;
      }
      console.log(value);
    });

  config
    .command('set <key> <value>')
    .description('Set a configuration value')
    .action((key: string, value: string) => {
      setConfigValue(requireKey(key), value);
      success(`${key} updated`);
    });

  config
    .command('list')
    .description('Print the whole configuration (API key masked)')
    .action(() => {
      const current = loadConfig();
      printJson({
        ...current,
        api: current.api && {
          ...current.api,
          key: current.api.key === undefined ? undefined : mask(current.api.key),
        },
      });
    });

  config
    .command('path')
    .description('Print the configuration file path')
    .action(() => {
      console.log(getConfigPath());
    });

  return config;
}
