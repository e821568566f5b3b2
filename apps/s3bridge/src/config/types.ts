/**
 * Global configuration types
 */

export interface GlobalConfig {
  api?: {
    url?: string;
    key?: string;
  };
  region?: string;
}

export const CONFIG_KEYS = ['api.url', 'api.key', 'region'] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

export interface ApiSettings {
  url?: string;
  key?: string;
  region?: string;
}
