import * as Joi from 'joi';

export const regionSchema = Joi.object({
  prefixes: Joi.array()
    .items(
      Joi.string()
        .uppercase()
        .pattern(/^[A-Z0-9]{1,4}$/)
        .message('region.prefixes entries must be 1-4 alphanumeric characters'),
    )
    .unique()
    .required(),
}).required();

export const configValidationSchema = Joi.object({
  api: Joi.object({
    enabled: Joi.boolean().required(),
    port: Joi.number().port().default(3000),
  }).required(),
  database: Joi.object({
    path: Joi.string()
      .required()
      .pattern(/^(:memory:|(\.\/|\/)?[\w\-\/\.]+)$/)
      .message('database.path must be a valid absolute or relative Unix path'),
  }).required(),
  region: regionSchema,
  collector: Joi.object({
    enabled: Joi.boolean().default(true),
    url: Joi.string().uri().required(),
    timeout_ms: Joi.number().integer().min(1000).default(20000),
  }).required(),
  metar: Joi.object({
    url: Joi.string().uri().default('https://avwx.rest/api/metar'),
    station: Joi.string().uppercase().length(4).required(),
    token: Joi.string().allow('').default(''),
    refresh_seconds: Joi.number().integer().min(1).default(300),
  }).required(),
  retention: Joi.object({
    enabled: Joi.boolean().default(true),
    short_window_hours: Joi.number().integer().min(1).default(36),
  }).default(),
  sessions: Joi.object({
    lookback_hours: Joi.number().integer().min(1).default(24),
  }).default(),
  charts: Joi.object({
    cache_ttl_seconds: Joi.number().integer().min(1).default(60),
    sweep_interval_seconds: Joi.number().integer().min(1).default(300),
    output_dir: Joi.string().default('./charts'),
  }).default(),
});
