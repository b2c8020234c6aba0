import { config as dotenvConfig } from 'dotenv';
import { Config, ConfigSchema } from '../types/index.js';

dotenvConfig();

function getEnvString(key: string, defaultValue?: string): string {
  const value = process.env[key];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getEnvNumber(key: string, defaultValue?: number): number {
  const value = process.env[key];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a number`);
  }
  return parsed;
}

function getEnvBoolean(key: string, defaultValue?: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value.toLowerCase() === 'true';
}

export function loadConfig(): Config {
  const rawConfig = {
    dataDir: getEnvString('DATA_DIR', 'data'),
    ecfr: {
      baseUrl: getEnvString('ECFR_BASE_URL', 'https://www.ecfr.gov'),
      timeoutMs: getEnvNumber('ECFR_TIMEOUT_MS', 60000),
      retries: getEnvNumber('ECFR_RETRIES', 3),
      retryDelayMs: getEnvNumber('ECFR_RETRY_DELAY_MS', 1000),
      userAgent: getEnvString('ECFR_USER_AGENT', 'regulatory-metrics/1.0'),
    },
    analysis: {
      defaultDate: getEnvString('DEFAULT_DATE', '2024-07-01'),
    },
    server: {
      port: getEnvNumber('PORT', 3000),
    },
    logLevel: getEnvString('LOG_LEVEL', 'info'),
    logPretty: getEnvBoolean('LOG_PRETTY', true),
  };

  return ConfigSchema.parse(rawConfig);
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

export function resetConfig(): void {
  configInstance = null;
}
