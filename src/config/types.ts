import Joi from 'joi';

export interface SearchGatewayConfig {
  // Server configuration
  server: {
    host: string;
    port: number;
    clientIpHeader: string;
    bodyLimit: string;
  };

  // Profile cache configuration
  cache: {
    provider: 'memory' | 'redis';
    connectionString?: string;
    ttlSeconds: number;
    redis?: {
      database: number;
      keyPrefix: string;
    };
  };

  // Logging configuration
  logging: {
    level: 'debug' | 'info' | 'warn' | 'error';
    pretty: boolean;
  };

  // Security configuration
  security: {
    adminToken?: string;
    rateLimit: {
      windowMs: number;
      max: number;
    };
  };

  // Search task admission
  tasks: {
    maxPerClient: number;
    maxGlobal: number;
    failureTtlSeconds: number;
  };

  batch: {
    maxQueries: number;
  };

  // Upstream profile source
  scraper: {
    upstreamUrl?: string;
    timeoutMs: number;
  };

  maintenance: {
    regions: string[];
  };
}

export const configSchema = Joi.object<SearchGatewayConfig>({
  server: Joi.object({
    host: Joi.string().default('localhost'),
    port: Joi.number().port().default(8001),
    clientIpHeader: Joi.string().lowercase().default('cf-connecting-ip'),
    bodyLimit: Joi.string().default('1mb'),
  }).default(),

  cache: Joi.object({
    provider: Joi.string().valid('memory', 'redis').default('memory'),
    connectionString: Joi.string().when('provider', {
      is: 'redis',
      then: Joi.required(),
      otherwise: Joi.optional(),
    }),
    ttlSeconds: Joi.number().integer().min(1).default(3 * 60 * 60), // 3 hours
    redis: Joi.object({
      database: Joi.number().integer().min(0).default(0),
      keyPrefix: Joi.string().default('adventurers:'),
    }).when('provider', {
      is: 'redis',
      then: Joi.required(),
      otherwise: Joi.optional(),
    }),
  }).default(),

  logging: Joi.object({
    level: Joi.string().valid('debug', 'info', 'warn', 'error').default('info'),
    pretty: Joi.boolean().default(process.env.NODE_ENV !== 'production'),
  }).default(),

  security: Joi.object({
    adminToken: Joi.string().min(8).optional(),
    rateLimit: Joi.object({
      windowMs: Joi.number().integer().min(1000).default(60 * 1000),
      max: Joi.number().integer().min(1).default(300),
    }).default(),
  }).default(),

  tasks: Joi.object({
    maxPerClient: Joi.number().integer().min(1).default(10),
    maxGlobal: Joi.number().integer().min(1).default(100),
    failureTtlSeconds: Joi.number().integer().min(1).default(5 * 60),
  }).default(),

  batch: Joi.object({
    maxQueries: Joi.number().integer().min(1).max(200).default(200),
  }).default(),

  scraper: Joi.object({
    upstreamUrl: Joi.string().uri({ scheme: ['http', 'https'] }).optional(),
    timeoutMs: Joi.number().integer().min(100).default(30000),
  }).default(),

  maintenance: Joi.object({
    regions: Joi.array().items(Joi.string().lowercase().trim()).default([]),
  }).default(),
}).default();
