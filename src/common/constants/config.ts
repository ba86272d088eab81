/**
 * Centralized configuration constants for the application
 */

// Feature flags
export const FEATURE_FLAGS = {
  ENABLE_FILE_LOGGING: 'ENABLE_FILE_LOGGING',
  ENABLE_BACKGROUND_POLLING: 'ENABLE_BACKGROUND_POLLING',
} as const;

// Environment variable names
export const ENV_VARS = {
  // General
  NODE_ENV: 'NODE_ENV',
  LOG_LEVEL: 'LOG_LEVEL',
  PORT: 'PORT',

  // GMP connection
  GMP_CONNECTION_TYPE: 'GMP_CONNECTION_TYPE',
  GMP_SOCKET_PATH: 'GMP_SOCKET_PATH',
  GMP_HOST: 'GMP_HOST',
  GMP_PORT: 'GMP_PORT',
  GMP_TLS_REJECT_UNAUTHORIZED: 'GMP_TLS_REJECT_UNAUTHORIZED',
  GMP_USERNAME: 'GMP_USERNAME',
  GMP_PASSWORD: 'GMP_PASSWORD',
  GMP_TIMEOUT_MS: 'GMP_TIMEOUT_MS',
  GMP_MAX_RETRIES: 'GMP_MAX_RETRIES',
  GMP_RETRY_DELAY_MS: 'GMP_RETRY_DELAY_MS',

  // Scan defaults
  GMP_PORT_LIST_ID: 'GMP_PORT_LIST_ID',
  GMP_SCAN_CONFIG_ID: 'GMP_SCAN_CONFIG_ID',
  GMP_SCAN_CONFIG_NAME: 'GMP_SCAN_CONFIG_NAME',
  GMP_SCANNER_ID: 'GMP_SCANNER_ID',
  GMP_SCANNER_NAME: 'GMP_SCANNER_NAME',
  GMP_REPORT_FILTER: 'GMP_REPORT_FILTER',

  // Background polling
  POLL_INTERVAL_SECONDS: 'POLL_INTERVAL_SECONDS',
} as const;

// Default values for configuration
export const DEFAULTS = {
  // General defaults
  PORT: 3000,
  LOG_LEVEL: 'info',
  NODE_ENV: 'development',

  // GMP connection defaults
  GMP_CONNECTION_TYPE: 'unix',
  GMP_SOCKET_PATH: '/var/run/gvmd.sock',
  GMP_HOST: '127.0.0.1',
  GMP_PORT: 9390,
  GMP_USERNAME: 'admin',
  GMP_TIMEOUT_MS: 30000, // 30 seconds
  GMP_MAX_RETRIES: 3,
  GMP_RETRY_DELAY_MS: 1000,

  // Background polling
  POLL_INTERVAL_SECONDS: 60,
} as const;
