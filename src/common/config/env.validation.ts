import * as Joi from 'joi';

export const envValidationSchema = Joi.object({
  ENVIRONMENT: Joi.string()
    .valid('development', 'production')
    .default('development'),

  // Database
  DB_TYPE: Joi.string().valid('sqlite', 'postgres').default('sqlite'),
  DB_NAME: Joi.string().default('app.db'),
  DB_USER: Joi.string().default('user'),
  DB_PASSWORD: Joi.string().default('changeme'),
  DB_HOST: Joi.string().default('localhost'),
  DB_PORT: Joi.number().port().default(5432),
  DATABASE_URL: Joi.string()
    .pattern(/^(postgres|postgresql|sqlite):\/\//)
    .optional(),
  DB_SYNC: Joi.boolean().default(false),

  // Connection pool (postgres only)
  DB_POOL_SIZE: Joi.number().integer().min(1).default(83),
  WEB_CONCURRENCY: Joi.number().integer().min(1).default(9),
  DB_MAX_OVERFLOW: Joi.number().integer().min(0).default(64),
  DB_POOL_TIMEOUT: Joi.number().integer().min(0).default(30000),
});
