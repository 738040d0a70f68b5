import * as Joi from 'joi';

export const validationSchema = Joi.object({
  // Shared
  NODE_ENV: Joi.string()
    .valid('development', 'production', 'test')
    .default('development'),
  REDIS_HOST: Joi.string().default('localhost'),
  REDIS_PORT: Joi.number().default(6379),
  DATABASE_URL: Joi.string()
    .uri({ scheme: ['postgres', 'postgresql'] })
    .required(),
  DATABASE_POOL_MAX: Joi.number().min(1).max(100).default(10),

  // API
  API_PORT: Joi.number().default(3000),
  API_KEY: Joi.string().required(),
  POLL_RATE_LIMIT: Joi.number().min(1).default(60),
  POLL_RATE_WINDOW_MS: Joi.number().min(1000).default(60_000),

  // Worker
  WORKER_CONCURRENCY: Joi.number().min(1).max(20).default(4),
  STEAM_PROFILE_BASE_URL: Joi.string()
    .uri()
    .default('https://steamcommunity.com/profiles'),
  CHECK_REQUEST_TIMEOUT_MS: Joi.number().min(1000).max(120_000).default(25_000),
  TASK_TIMEOUT_MS: Joi.number().min(10_000).default(30 * 60_000),
  STALE_TASK_AFTER_MS: Joi.number().min(60_000).default(60 * 60_000),
  RATE_LIMIT_COOLDOWN_MS: Joi.number().min(0).default(30_000),
  PERSIST_MAX_RETRIES: Joi.number().min(0).max(10).default(5),
  PERSIST_RETRY_BASE_MS: Joi.number().min(0).default(200),

  // Proxy
  PROXY_LIST_FILE: Joi.string().optional(),
  PROXY_REQUIRED: Joi.boolean().default(false),
  PROXY_DIRECT_FALLBACK: Joi.boolean().default(true),
  PROXY_FAILURE_THRESHOLD: Joi.number().min(1).max(20).default(3),
  PROXY_COOLDOWN_MS: Joi.number().min(0).default(60_000),
});
