export { buildServer } from "./server/server.js";
export type { ServerOptions } from "./server/server.js";
export { createApiKeyGuard, API_KEY_HEADER } from "./server/auth.js";
export { SlidingWindowRateLimiter } from "./server/rateLimiter.js";
export type { RateLimiterOptions } from "./server/rateLimiter.js";
export {
    ConfigError,
    configFromEnv,
    loadConfig,
    resolveConfig,
    DEFAULT_CONFIG_FILE,
    DEFAULTS,
    DEV_API_KEY,
} from "./config/config.js";
export type { AppConfig, CliOverrides, ConfigSource, PartialConfig } from "./config/config.js";
export { createLogger, LOG_LEVELS } from "./logging/logger.js";
export type { LogLevel, LoggerOptions } from "./logging/logger.js";
