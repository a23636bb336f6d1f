import { configSchema } from './types.js';
import type { SearchGatewayConfig } from './types.js';

function parseInteger(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  return value ? value.toLowerCase() === 'true' : undefined;
}

function parseList(value: string | undefined): string[] | undefined {
  if (!value) {
    return undefined;
  }
  return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

/**
 * Load configuration from environment variables
 * Following 12-factor app methodology
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SearchGatewayConfig {
  const envConfig = {
    server: {
      host: env.SEARCH_GATEWAY_HOST,
      port: parseInteger(env.SEARCH_GATEWAY_PORT),
      clientIpHeader: env.SEARCH_GATEWAY_CLIENT_IP_HEADER,
      bodyLimit: env.SEARCH_GATEWAY_BODY_LIMIT,
    },
    cache: {
      provider: env.SEARCH_GATEWAY_CACHE_PROVIDER,
      connectionString: env.SEARCH_GATEWAY_CACHE_CONNECTION_STRING,
      ttlSeconds: parseInteger(env.SEARCH_GATEWAY_CACHE_TTL),
      redis: env.SEARCH_GATEWAY_CACHE_PROVIDER === 'redis'
        ? {
            database: parseInteger(env.SEARCH_GATEWAY_REDIS_DATABASE),
            keyPrefix: env.SEARCH_GATEWAY_REDIS_KEY_PREFIX,
          }
        : undefined,
    },
    logging: {
      level: env.SEARCH_GATEWAY_LOG_LEVEL,
      pretty: parseBoolean(env.SEARCH_GATEWAY_LOG_PRETTY),
    },
    security: {
      adminToken: env.SEARCH_GATEWAY_ADMIN_TOKEN,
      rateLimit: {
        windowMs: parseInteger(env.SEARCH_GATEWAY_RATE_LIMIT_WINDOW),
        max: parseInteger(env.SEARCH_GATEWAY_RATE_LIMIT_MAX),
      },
    },
    tasks: {
      maxPerClient: parseInteger(env.SEARCH_GATEWAY_MAX_TASKS_PER_CLIENT),
      maxGlobal: parseInteger(env.SEARCH_GATEWAY_MAX_TASKS_GLOBAL),
      failureTtlSeconds: parseInteger(env.SEARCH_GATEWAY_FAILURE_TTL),
    },
    batch: {
      maxQueries: parseInteger(env.SEARCH_GATEWAY_BATCH_MAX_QUERIES),
    },
    scraper: {
      upstreamUrl: env.SEARCH_GATEWAY_UPSTREAM_URL,
      timeoutMs: parseInteger(env.SEARCH_GATEWAY_UPSTREAM_TIMEOUT),
    },
    maintenance: {
      regions: parseList(env.SEARCH_GATEWAY_MAINTENANCE_REGIONS),
    },
  };

  // Remove undefined values to let Joi apply defaults
  const cleanConfig = removeUndefined(envConfig);

  // Validate and apply defaults
  const { error, value } = configSchema.validate(cleanConfig, {
    allowUnknown: false,
    stripUnknown: true,
  });

  if (error) {
    throw new Error(`Configuration validation failed: ${error.message}`);
  }

  return value;
}

/**
 * Recursively remove undefined values from an object
 */
function removeUndefined(obj: unknown): unknown {
  if (obj === null || typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map(removeUndefined);
  }

  const cleaned: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (value !== undefined) {
      cleaned[key] = removeUndefined(value);
    }
  }
  return cleaned;
}

/**
 * Get environment-specific configuration examples
 */
export function getConfigExamples(): Record<string, Record<string, string>> {
  return {
    development: {
      SEARCH_GATEWAY_CACHE_PROVIDER: 'memory',
      SEARCH_GATEWAY_LOG_LEVEL: 'debug',
      SEARCH_GATEWAY_LOG_PRETTY: 'true',
      SEARCH_GATEWAY_UPSTREAM_URL: 'http://localhost:9000',
    },
    production: {
      SEARCH_GATEWAY_HOST: '0.0.0.0',
      SEARCH_GATEWAY_PORT: '8001',
      SEARCH_GATEWAY_CACHE_PROVIDER: 'redis',
      SEARCH_GATEWAY_CACHE_CONNECTION_STRING: 'redis://localhost:6379',
      SEARCH_GATEWAY_LOG_LEVEL: 'info',
      SEARCH_GATEWAY_LOG_PRETTY: 'false',
      SEARCH_GATEWAY_MAX_TASKS_PER_CLIENT: '10',
    },
  };
}

export * from './types.js';
