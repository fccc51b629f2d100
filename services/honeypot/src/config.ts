import { HoneypotConfig } from "./types";
import { ConfigError } from "./errors";

function optional(name: string): string | null {
  const value = process.env[name];
  return value && value.trim() !== "" ? value.trim() : null;
}

/**
 * Load configuration from environment variables with production defaults.
 * All values are validated and typed correctly.
 */
export function loadConfig(): HoneypotConfig {
  const config: HoneypotConfig = {
    port: parseInt(process.env.PORT || "8000", 10),
    api_key: optional("API_KEY"),
    openai_api_key: optional("OPENAI_API_KEY"),
    openai_model: process.env.OPENAI_MODEL || "gpt-4o-mini",
    openai_base_url: optional("OPENAI_BASE_URL"),
    scam_threshold: parseFloat(process.env.SCAM_THRESHOLD || "0.5"),
    assist_band: parseFloat(process.env.ASSIST_BAND || "0.15"),
    high_confidence_threshold: parseFloat(
      process.env.HIGH_CONFIDENCE_THRESHOLD || "0.8"
    ),
    inactivity_window_ms: parseInt(
      process.env.INACTIVITY_WINDOW_MS || "300000",
      10
    ),
    sweep_interval_ms: parseInt(process.env.SWEEP_INTERVAL_MS || "60000", 10),
    generation_timeout_ms: parseInt(
      process.env.GENERATION_TIMEOUT_MS || "8000",
      10
    ),
    history_window: parseInt(process.env.HISTORY_WINDOW || "12", 10),
    callback_url: optional("CALLBACK_URL"),
    callback_timeout_ms: parseInt(
      process.env.CALLBACK_TIMEOUT_MS || "10000",
      10
    ),
    callback_max_attempts: parseInt(
      process.env.CALLBACK_MAX_ATTEMPTS || "3",
      10
    ),
    redis_host: optional("REDIS_HOST"),
    redis_port: parseInt(process.env.REDIS_PORT || "6379", 10),
    circuit_breaker_threshold: parseInt(
      process.env.CIRCUIT_BREAKER_THRESHOLD || "5",
      10
    ),
    circuit_breaker_reset_ms: parseInt(
      process.env.CIRCUIT_BREAKER_RESET_MS || "30000",
      10
    ),
    max_message_length: parseInt(
      process.env.MAX_MESSAGE_LENGTH || "5000",
      10
    ),
  };

  // Validation
  if (!(config.port >= 0 && config.port <= 65535)) {
    throw new ConfigError(`Invalid port: ${config.port}`);
  }

  for (const key of [
    "scam_threshold",
    "high_confidence_threshold",
  ] as const) {
    const value = config[key];
    if (!(value >= 0 && value <= 1)) {
      throw new ConfigError(
        `Invalid ${key}: ${value}. Must be between 0 and 1.`
      );
    }
  }

  if (!(config.assist_band >= 0 && config.assist_band <= 0.5)) {
    throw new ConfigError(
      `Invalid assist_band: ${config.assist_band}. Must be between 0 and 0.5.`
    );
  }

  if (config.high_confidence_threshold < config.scam_threshold) {
    throw new ConfigError(
      `Invalid high_confidence_threshold: ${config.high_confidence_threshold}. Must not be below scam_threshold (${config.scam_threshold}).`
    );
  }

  if (!(config.inactivity_window_ms >= 1000)) {
    throw new ConfigError(
      `Invalid inactivity_window_ms: ${config.inactivity_window_ms}. Must be at least 1000ms.`
    );
  }

  if (!(config.sweep_interval_ms >= 0)) {
    throw new ConfigError(
      `Invalid sweep_interval_ms: ${config.sweep_interval_ms}`
    );
  }

  if (!(config.generation_timeout_ms >= 100)) {
    throw new ConfigError(
      `Invalid generation_timeout_ms: ${config.generation_timeout_ms}. Must be at least 100ms.`
    );
  }

  if (!(config.history_window >= 1)) {
    throw new ConfigError(`Invalid history_window: ${config.history_window}`);
  }

  if (!(config.callback_timeout_ms >= 100)) {
    throw new ConfigError(
      `Invalid callback_timeout_ms: ${config.callback_timeout_ms}`
    );
  }

  if (!(config.callback_max_attempts >= 1 && config.callback_max_attempts <= 10)) {
    throw new ConfigError(
      `Invalid callback_max_attempts: ${config.callback_max_attempts}`
    );
  }

  if (!(config.redis_port >= 1 && config.redis_port <= 65535)) {
    throw new ConfigError(`Invalid redis_port: ${config.redis_port}`);
  }

  if (!(config.circuit_breaker_threshold >= 1)) {
    throw new ConfigError(
      `Invalid circuit_breaker_threshold: ${config.circuit_breaker_threshold}`
    );
  }

  if (!(config.circuit_breaker_reset_ms >= 1000)) {
    throw new ConfigError(
      `Invalid circuit_breaker_reset_ms: ${config.circuit_breaker_reset_ms}. Must be at least 1000ms.`
    );
  }

  if (!(config.max_message_length >= 1)) {
    throw new ConfigError(
      `Invalid max_message_length: ${config.max_message_length}`
    );
  }

  if (config.callback_url !== null && !/^https?:\/\//i.test(config.callback_url)) {
    throw new ConfigError(`Invalid callback_url: ${config.callback_url}`);
  }

  return config;
}

/**
 * Get current configuration instance.
 * Cached after first load.
 */
let cachedConfig: HoneypotConfig | null = null;

export function getConfig(): HoneypotConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/**
 * Reset cached config (useful for testing).
 */
export function resetConfig(): void {
  cachedConfig = null;
}
