/**
 * CLI Configuration
 *
 * Settings come from, in order of priority:
 * - WPFLEET_* environment variables
 * - ~/.wpfleet/config.json
 * - built-in defaults
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

export interface FleetConfig {
  /** Base URL of the WordPress.com REST API */
  apiUrl: string;
  /** Bearer token sent with every request */
  apiToken: string | null;
  /** Request timeout in milliseconds */
  timeout: number;
  /** URL substrings of sites left out when targeting the whole fleet */
  excludedDomains: string[];
}

type ConfigFile = Partial<FleetConfig>;

export const DEFAULT_API_URL = 'https://public-api.wordpress.com';
export const DEFAULT_TIMEOUT = 30000;

/** Staging and non-production hosts */
export const DEFAULT_EXCLUDED_DOMAINS: readonly string[] = [
  'mystagingwebsite.com',
  'go-vip.co',
  'wpcomstaging.com',
  'wpengine.com',
  'jurassic.ninja',
  'atomicsites.blog',
  'woocommerce.com',
  'woo.com',
];

/** Get CLI config path */
export function getConfigPath(home: string = os.homedir()): string {
  return path.join(home, '.wpfleet', 'config.json');
}

function parseTimeout(value: unknown): number | undefined {
  const timeout = typeof value === 'string' ? Number(value) : value;
  if (typeof timeout === 'number' && Number.isFinite(timeout) && timeout > 0) {
    return timeout;
  }
  return undefined;
}

/**
 * Read the config file, keeping only well-formed fields
 */
export function readConfigFile(configPath: string): ConfigFile {
  if (!fs.existsSync(configPath)) {
    return {};
  }

  const raw: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error(`Invalid config file: ${configPath}`);
  }

  const config: ConfigFile = {};
  if ('apiUrl' in raw && typeof raw.apiUrl === 'string') config.apiUrl = raw.apiUrl;
  if ('apiToken' in raw && typeof raw.apiToken === 'string') config.apiToken = raw.apiToken;
  if ('timeout' in raw) config.timeout = parseTimeout(raw.timeout);
  if ('excludedDomains' in raw && Array.isArray(raw.excludedDomains)) {
    config.excludedDomains = raw.excludedDomains.filter((d: unknown): d is string => typeof d === 'string');
  }
  return config;
}

export function loadConfig(
  options: { env?: NodeJS.ProcessEnv; configPath?: string } = {}
): FleetConfig {
  const env = options.env ?? process.env;
  const file = readConfigFile(options.configPath ?? getConfigPath());

  return {
    apiUrl: env.WPFLEET_API_URL || file.apiUrl || DEFAULT_API_URL,
    apiToken: env.WPFLEET_API_TOKEN || file.apiToken || null,
    timeout: parseTimeout(env.WPFLEET_TIMEOUT) ?? file.timeout ?? DEFAULT_TIMEOUT,
    excludedDomains: file.excludedDomains ?? [...DEFAULT_EXCLUDED_DOMAINS],
  };
}
