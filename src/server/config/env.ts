/**
 * Environment Variable Validation
 *
 * Centralized parsing of all environment variables.
 * Values are validated once, collected errors are reported together,
 * and the result is cached until resetEnv() is called.
 */

// Load dotenv early so variables are available before the first getEnv() call
import * as dotenv from 'dotenv';
dotenv.config();

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

export const SERVICE_MODES = ['text', 'sheets'] as const;
export type ServiceMode = (typeof SERVICE_MODES)[number];

const NODE_ENVS = ['development', 'production', 'test'] as const;
type NodeEnv = (typeof NODE_ENVS)[number];

function isNodeEnv(value: string): value is NodeEnv {
  return NODE_ENVS.some(env => env === value);
}

function isServiceMode(value: string): value is ServiceMode {
  return SERVICE_MODES.some(mode => mode === value);
}

/**
 * Environment configuration type
 */
export interface Env {
  // Server Configuration
  NODE_ENV: NodeEnv;
  PORT: number;
  HOST: string;
  SERVICE_MODE: ServiceMode;

  // Security Configuration
  API_TOKEN: string;
  CORS_ORIGINS: string[];

  // Request limits
  MAX_REQUEST_SIZE: number;
  MAX_BODY_SIZE: string;

  // Rate limiting
  RATE_LIMIT_REQUESTS: number;
  RATE_LIMIT_WINDOW: number;

  // Logging Configuration
  LOG_LEVEL?: string;
}

let validatedEnv: Env | null = null;

/**
 * Validate and return environment variables
 * @throws {Error} If any variable holds an invalid value
 */
export function validateEnv(): Env {
  if (validatedEnv) {
    return validatedEnv;
  }

  const errors: string[] = [];

  const nodeEnvRaw = process.env.NODE_ENV || 'development';
  let nodeEnv: NodeEnv = 'development';
  if (isNodeEnv(nodeEnvRaw)) {
    nodeEnv = nodeEnvRaw;
  } else {
    errors.push(`NODE_ENV: Invalid value "${nodeEnvRaw}". Must be development, production, or test.`);
  }

  const port = parseNumericEnv(process.env.PORT, 8000);
  if (port < 1 || port > 65535) {
    errors.push(`PORT: Invalid value "${process.env.PORT}". Must be between 1 and 65535.`);
  }

  const serviceModeRaw = (process.env.SERVICE_MODE || 'text').trim().toLowerCase();
  let serviceMode: ServiceMode = 'text';
  if (isServiceMode(serviceModeRaw)) {
    serviceMode = serviceModeRaw;
  } else {
    errors.push(`SERVICE_MODE: Invalid value "${process.env.SERVICE_MODE}". Must be text or sheets.`);
  }

  // In test environment, provide a default if missing to avoid breaking tests
  let apiToken = process.env.API_TOKEN;
  if (nodeEnv === 'test' && !apiToken) {
    apiToken = 'test-api-token';
  }
  if (!apiToken) {
    apiToken = '';
    errors.push('API_TOKEN: Environment variable is required.');
  }

  const maxRequestSize = parseNumericEnv(process.env.MAX_REQUEST_SIZE, 1048576);
  if (maxRequestSize < 1) {
    errors.push(`MAX_REQUEST_SIZE: Invalid value "${process.env.MAX_REQUEST_SIZE}". Must be a positive integer.`);
  }

  const rateLimitRequests = parseNumericEnv(process.env.RATE_LIMIT_REQUESTS, 100);
  if (rateLimitRequests < 1) {
    errors.push(`RATE_LIMIT_REQUESTS: Invalid value "${process.env.RATE_LIMIT_REQUESTS}". Must be a positive integer.`);
  }

  const rateLimitWindow = parseNumericEnv(process.env.RATE_LIMIT_WINDOW, 3600);
  if (rateLimitWindow < 1) {
    errors.push(`RATE_LIMIT_WINDOW: Invalid value "${process.env.RATE_LIMIT_WINDOW}". Must be a positive number of seconds.`);
  }

  const corsOrigins = (process.env.CORS_ORIGINS || '*')
    .split(',')
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);

  if (errors.length > 0) {
    throw new Error(`Environment validation failed:\n  ${errors.join('\n  ')}`);
  }

  validatedEnv = {
    NODE_ENV: nodeEnv,
    PORT: port,
    HOST: process.env.HOST || '0.0.0.0',
    SERVICE_MODE: serviceMode,
    API_TOKEN: apiToken,
    CORS_ORIGINS: corsOrigins.length > 0 ? corsOrigins : ['*'],
    MAX_REQUEST_SIZE: maxRequestSize,
    MAX_BODY_SIZE: process.env.MAX_BODY_SIZE || '5mb',
    RATE_LIMIT_REQUESTS: rateLimitRequests,
    RATE_LIMIT_WINDOW: rateLimitWindow,
    LOG_LEVEL: process.env.LOG_LEVEL,
  };

  return validatedEnv;
}

/**
 * Get validated environment variables
 * Validates on first call, then returns cached result
 */
export function getEnv(): Env {
  return validateEnv();
}

/**
 * Reset validated environment cache
 * Used for testing to allow re-validation after env vars change
 */
export function resetEnv(): void {
  validatedEnv = null;
}
