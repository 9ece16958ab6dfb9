import * as Joi from "joi";

export const configValidationSchema = Joi.object({
  // Optional with defaults
  PORT: Joi.number().default(8888),
  NODE_ENV: Joi.string().valid("development", "production", "test").default("development"),

  // Profiles
  PROFILES_DIR: Joi.string().default("profiles"),

  // Primary filtering instance (reconciliation target)
  PRIMARY_CONTAINER: Joi.string().default("pihole_primary"),
  PIHOLE_PRIMARY_IP: Joi.string().default("192.168.8.251"),
  PIHOLE_SECONDARY_IP: Joi.string().default("192.168.8.252"),
  PRIMARY_ADMIN_URL: Joi.string().uri().allow("").optional(),

  // Resolvers
  UNBOUND_PRIMARY_IP: Joi.string().allow("").optional(),
  UNBOUND_SECONDARY_IP: Joi.string().allow("").optional(),
  UNBOUND_PORT: Joi.number().port().default(5335),

  // Gateway timeouts
  MUTATION_TIMEOUT_MS: Joi.number().integer().min(100).default(10_000),
  PROBE_TIMEOUT_MS: Joi.number().integer().min(100).default(5_000),
  CONNECTIVITY_TIMEOUT_MS: Joi.number().integer().min(100).default(5_000),
  REBUILD_TIMEOUT_MS: Joi.number().integer().min(1_000).default(300_000),
  IDEMPOTENCY_MARKERS: Joi.string().default("already exists,already"),

  // Health registry
  HEALTH_TEST_DOMAIN: Joi.string().hostname().default("google.com"),
  HEALTH_CHECKS: Joi.string().allow("").optional(),
  HEALTH_OPTIONAL_ROLES: Joi.string().allow("").default(""),

  // Auto-heal
  WATCHDOG_ENABLED: Joi.boolean().default(false),
  WATCHDOG_FAIL_THRESHOLD: Joi.number().integer().min(1).default(2),
  WATCHDOG_MAX_RESTART_ATTEMPTS: Joi.number().integer().min(1).default(3),
  WATCHDOG_RESTART_COOLDOWN_MS: Joi.number().integer().min(1).default(300_000),
  NOTIFICATION_WEBHOOK: Joi.string().uri().allow("").optional(),
});
