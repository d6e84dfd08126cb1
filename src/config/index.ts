import * as dotenv from 'dotenv';
import * as Joi from 'joi';

// Load environment variables silently
dotenv.config({ debug: false });

interface EnvVars {
  PORT: number;
  NODE_ENV: 'development' | 'production' | 'test';
  ENABLE_SECURITY_MIDDLEWARE: boolean;
  BYPASS_IPS: string;
  LOCAL_ONLY: boolean;
  RATE_LIMIT_WINDOW_MS: number;
  RATE_LIMIT_MAX_REQUESTS: number;
  CORS_ALLOWED_ORIGINS: string;
  LOG_LEVEL: 'error' | 'warn' | 'info' | 'debug';
  ZONES_FILE: string;
  STREETS_FILE: string;
  RULES_DB_PATH: string;
  STREET_MAX_DISTANCE_M: number;
  INDEX_CACHE_SIZE: number;
  MAX_BATCH_SIZE: number;
}

// Define validation schema
const envSchema = Joi.object<EnvVars>({
  // Server
  PORT: Joi.number().default(3712),
  NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),

  // Security
  ENABLE_SECURITY_MIDDLEWARE: Joi.boolean().default(false),
  BYPASS_IPS: Joi.string().default('127.0.0.1,::1,localhost'),
  LOCAL_ONLY: Joi.boolean().default(true),

  // Rate Limiting
  RATE_LIMIT_WINDOW_MS: Joi.number().default(60000),
  RATE_LIMIT_MAX_REQUESTS: Joi.number().default(100),

  // CORS
  CORS_ALLOWED_ORIGINS: Joi.string().default('*'),

  // Logging
  LOG_LEVEL: Joi.string().valid('error', 'warn', 'info', 'debug').default('info'),

  // Datasets
  ZONES_FILE: Joi.string().default('data/zoning.geojson'),
  STREETS_FILE: Joi.string().default('data/streets.geojson'),
  RULES_DB_PATH: Joi.string().default('data/rules.db'),

  // Spatial lookups
  STREET_MAX_DISTANCE_M: Joi.number().min(0).default(120),

  // Caching
  INDEX_CACHE_SIZE: Joi.number().min(1).max(32).default(4),

  // API Limits
  MAX_BATCH_SIZE: Joi.number().min(1).max(100).default(50),
}).unknown();

// Validate environment variables
const { error, value: envVars } = envSchema.validate(process.env);

if (error || !envVars) {
  throw new Error(`Config validation error: ${error ? error.message : 'no values'}`);
}

// Export configuration
export const config = {
  port: envVars.PORT,
  nodeEnv: envVars.NODE_ENV,
  isProduction: envVars.NODE_ENV === 'production',
  isDevelopment: envVars.NODE_ENV === 'development',
  isTest: envVars.NODE_ENV === 'test',

  security: {
    enableMiddleware: envVars.ENABLE_SECURITY_MIDDLEWARE,
    bypassIPs: envVars.BYPASS_IPS.split(',').map(ip => ip.trim()),
    localOnly: envVars.LOCAL_ONLY,
  },

  rateLimit: {
    windowMs: envVars.RATE_LIMIT_WINDOW_MS,
    maxRequests: envVars.RATE_LIMIT_MAX_REQUESTS,
  },

  cors: {
    allowedOrigins: envVars.CORS_ALLOWED_ORIGINS.split(',').map(origin => origin.trim()),
  },

  logging: {
    level: envVars.LOG_LEVEL,
  },

  datasets: {
    zonesFile: envVars.ZONES_FILE,
    streetsFile: envVars.STREETS_FILE,
    rulesDbPath: envVars.RULES_DB_PATH,
  },

  spatial: {
    streetMaxDistanceM: envVars.STREET_MAX_DISTANCE_M,
  },

  api: {
    maxBatchSize: envVars.MAX_BATCH_SIZE,
  },

  cache: {
    indexCacheSize: envVars.INDEX_CACHE_SIZE,
  },
};

export type AppConfig = typeof config;
