/**
 * Configuration management for the Biolink Resolver MCP Server
 */

import 'dotenv/config';

export const TRANSPORTS = ['stdio', 'http'] as const;
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type TransportKind = (typeof TRANSPORTS)[number];
export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_MODEL_URL_TEMPLATE =
  'https://raw.githubusercontent.com/biolink/biolink-model/v{version}/biolink-model.yaml';

export interface Config {
  server: {
    transport: TransportKind;
    port: number;
    host: string;
  };
  taxonomy: {
    /** Explicit model file path or URL; wins over `version` */
    source?: string;
    /** Biolink release selector, e.g. "4.2.1" */
    version?: string;
    modelUrlTemplate: string;
    /** Returned when there is nothing to reduce */
    rootType: string;
  };
  services: {
    nameResolverUrl: string;
    nodeNormalizerUrl: string;
    userAgent: string;
  };
  cache: {
    ttlMs: number;
    maxSize: number;
  };
  security: {
    allowedOrigins: string[];
  };
  rateLimit: {
    windowMs: number;
    maxRequests: number;
  };
  logging: {
    level: LogLevel;
  };
}

type Env = Record<string, string | undefined>;

function getEnvOrDefault(env: Env, key: string, defaultValue: string): string {
  return env[key] || defaultValue;
}

function getEnvOptional(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function getEnvInt(env: Env, key: string, defaultValue: number): number {
  const raw = env[key];
  if (!raw) {
    return defaultValue;
  }
  const value = parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new Error(`Environment variable ${key} must be an integer, got '${raw}'`);
  }
  return value;
}

function getEnvChoice<T extends string>(
  env: Env,
  key: string,
  choices: readonly T[],
  defaultValue: T
): T {
  const raw = env[key];
  if (!raw) {
    return defaultValue;
  }
  const match = choices.find((choice) => choice === raw.toLowerCase());
  if (!match) {
    throw new Error(`Environment variable ${key} must be one of ${choices.join(', ')}, got '${raw}'`);
  }
  return match;
}

export function loadConfig(env: Env = process.env): Config {
  return {
    server: {
      transport: getEnvChoice(env, 'TRANSPORT', TRANSPORTS, 'stdio'),
      port: getEnvInt(env, 'PORT', 3000),
      host: getEnvOrDefault(env, 'HOST', 'localhost'),
    },
    taxonomy: {
      source: getEnvOptional(env, 'TAXONOMY_SOURCE'),
      version: getEnvOptional(env, 'BIOLINK_VERSION'),
      modelUrlTemplate: getEnvOrDefault(env, 'BIOLINK_MODEL_URL_TEMPLATE', DEFAULT_MODEL_URL_TEMPLATE),
      rootType: getEnvOrDefault(env, 'TAXONOMY_ROOT_TYPE', 'biolink:NamedThing'),
    },
    services: {
      nameResolverUrl: getEnvOrDefault(env, 'NAME_RESOLVER_URL', 'https://name-resolution-sri.renci.org'),
      nodeNormalizerUrl: getEnvOrDefault(env, 'NODE_NORMALIZER_URL', 'https://nodenormalization-sri.renci.org'),
      userAgent: getEnvOrDefault(env, 'USER_AGENT', 'BiolinkResolverMCP/0.1.0'),
    },
    cache: {
      ttlMs: getEnvInt(env, 'CACHE_TTL_MS', 300000), // 5 minutes
      maxSize: getEnvInt(env, 'CACHE_MAX_SIZE', 500),
    },
    security: {
      allowedOrigins: getEnvOrDefault(env, 'ALLOWED_ORIGINS', 'http://localhost:3000').split(','),
    },
    rateLimit: {
      windowMs: getEnvInt(env, 'RATE_LIMIT_WINDOW_MS', 900000), // 15 minutes
      maxRequests: getEnvInt(env, 'RATE_LIMIT_MAX', 1000),
    },
    logging: {
      level: getEnvChoice(env, 'LOG_LEVEL', LOG_LEVELS, 'info'),
    },
  };
}
