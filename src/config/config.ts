import * as fs from 'fs';
import * as path from 'path';
import { DEFAULT_OUTPUT_TEMPLATE } from '../utils/output-path';

export const CONFIG_FILE_NAME = 'spotify-ogg-dl.config.json';

export interface AppConfig {
  // Catalog gateway
  apiBaseUrl: string;
  authUrl: string;
  requestsPerMinute: number;
  requestTimeoutMs: number;

  // Output
  outputTemplate: string;
  logLevel: string;
}

const defaultConfig: AppConfig = {
  // No default gateway; both must come from the config file
  apiBaseUrl: '',
  authUrl: '',
  requestsPerMinute: 120,
  requestTimeoutMs: 30000,

  outputTemplate: DEFAULT_OUTPUT_TEMPLATE,
  logLevel: 'info'
};

/**
 * Load config from file if it exists, otherwise use defaults.
 * Keys with a value of the wrong type are reported through `warn` and ignored.
 */
export function loadConfig(
  configPath?: string,
  warn: (message: string) => void = console.warn
): AppConfig {
  const configFilePath = configPath || path.join(process.cwd(), CONFIG_FILE_NAME);
  const config: AppConfig = { ...defaultConfig };

  if (!fs.existsSync(configFilePath)) {
    return config;
  }

  let fileConfig: unknown;
  try {
    fileConfig = JSON.parse(fs.readFileSync(configFilePath, 'utf8'));
  } catch (error) {
    warn(`Error loading config from ${configFilePath}, using defaults`);
    return config;
  }

  if (typeof fileConfig !== 'object' || fileConfig === null || Array.isArray(fileConfig)) {
    warn(`Config file ${configFilePath} must contain a JSON object, using defaults`);
    return config;
  }

  for (const [key, value] of Object.entries(fileConfig)) {
    if (!applyOption(config, key, value)) {
      warn(`Ignoring config key "${key}" in ${configFilePath}`);
    }
  }

  return config;
}

/**
 * Names of the gateway keys still unset after loading
 */
export function missingGatewayKeys(config: AppConfig): string[] {
  const missing: string[] = [];
  if (!config.apiBaseUrl) missing.push('apiBaseUrl');
  if (!config.authUrl) missing.push('authUrl');
  return missing;
}

function applyOption(config: AppConfig, key: string, value: unknown): boolean {
  switch (key) {
    case 'apiBaseUrl':
    case 'authUrl':
    case 'outputTemplate':
    case 'logLevel':
      if (typeof value !== 'string') return false;
      config[key] = value;
      return true;
    case 'requestsPerMinute':
    case 'requestTimeoutMs':
      if (typeof value !== 'number' || !(value > 0)) return false;
      config[key] = value;
      return true;
    default:
      return false;
  }
}
