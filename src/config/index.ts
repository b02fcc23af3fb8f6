/**
 * Application Configuration
 * Centralized configuration management with environment variable support
 */

import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

export interface AppConfig {
  env: string;
  port: number;
  host: string;
  corsOrigin: string;
  jsonLimit: string;
  totp: {
    maxWindow: number;
    defaultSecretLength: number;
  };
}

function parseInteger(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isSafeInteger(value)) {
    throw new Error(`Environment variable ${name} must be an integer, got "${raw}"`);
  }
  return value;
}

/**
 * Load and validate configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = parseInteger(env, 'PORT', 3000);
  if (port < 1 || port > 65535) {
    throw new Error(`PORT must be between 1 and 65535, got ${port}`);
  }

  const maxWindow = parseInteger(env, 'TOTP_MAX_WINDOW', 10);
  if (maxWindow < 0) {
    throw new Error(`TOTP_MAX_WINDOW must not be negative, got ${maxWindow}`);
  }

  const defaultSecretLength = parseInteger(env, 'TOTP_DEFAULT_SECRET_LENGTH', 32);
  if (defaultSecretLength < 16 || defaultSecretLength > 64) {
    throw new Error(`TOTP_DEFAULT_SECRET_LENGTH must be between 16 and 64, got ${defaultSecretLength}`);
  }

  return {
    env: env['NODE_ENV'] || 'development',
    port,
    host: env['HOST'] || '0.0.0.0',
    corsOrigin: env['CORS_ORIGIN'] || '*',
    jsonLimit: env['JSON_BODY_LIMIT'] || '10kb',
    totp: {
      maxWindow,
      defaultSecretLength,
    },
  };
}

/**
 * Get configuration instance (singleton)
 */
let configInstance: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}
