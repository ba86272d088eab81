import { DEFAULTS, ENV_VARS, FEATURE_FLAGS } from '@common/constants/config';
import {
  DEFAULT_PORT_LIST_ID,
  DEFAULT_REPORT_FILTER,
  DEFAULT_SCANNER_NAME,
  DEFAULT_SCAN_CONFIG_NAME,
} from '@common/constants/gmp';
import { ConfigurationError, describeError } from '@common/utils/error-handler';
import { Injectable, Logger } from '@nestjs/common';
import {
  GmpConnectionConfig,
  GmpConnectionType,
  GmpCredentials,
  PollingConfig,
  RetryConfig,
  ScanDefaultsConfig,
} from '@types';
import * as dotenv from 'dotenv';
import * as fs from 'fs';
import { join } from 'path';

/**
 * Configuration service with strict typing and validation
 */
@Injectable()
export class ConfigService {
  private readonly logger = new Logger(ConfigService.name);
  private readonly env: Record<string, string | undefined>;

  // Cached config values
  private gmpConnectionConfig: GmpConnectionConfig | null = null;
  private scanDefaultsConfig: ScanDefaultsConfig | null = null;

  /**
   * @param overrides values that take precedence over .env and the process environment
   */
  constructor(overrides: Record<string, string> = {}) {
    // Load .env file if it exists
    let fileEnv: Record<string, string> = {};
    try {
      const envPath = join(process.cwd(), '.env');
      if (fs.existsSync(envPath)) {
        fileEnv = dotenv.parse(fs.readFileSync(envPath));
        this.logger.log(`Loaded environment variables from ${envPath}`);
      } else {
        this.logger.log('No .env file found, using process environment variables');
      }
    } catch (error) {
      this.logger.error(`Failed to load environment variables: ${describeError(error)}`);
    }

    this.env = { ...process.env, ...fileEnv, ...overrides };

    this.validateRequiredEnvVars();
  }

  /**
   * Get a value from environment variables with type conversion
   */
  get<T = string>(key: string, defaultValue?: T, transform?: (value: string) => T): T {
    const value = this.env[key];

    if (value === undefined || value === '') {
      if (defaultValue !== undefined) {
        return defaultValue;
      }
      throw new ConfigurationError(`Missing required environment variable: ${key}`, key);
    }

    if (transform) {
      try {
        return transform(value);
      } catch (error) {
        throw new ConfigurationError(`Failed to transform environment variable ${key}: ${describeError(error)}`, key);
      }
    }

    return value as unknown as T;
  }

  /**
   * Get an optional string value, undefined when unset
   */
  getOptional(key: string): string | undefined {
    const value = this.env[key];
    return value === undefined || value === '' ? undefined : value;
  }

  /**
   * Get a numeric value from environment variables
   */
  getNumber(key: string, defaultValue?: number): number {
    return this.get<number>(key, defaultValue, value => {
      const num = Number(value);
      if (isNaN(num)) {
        throw new Error(`Cannot convert "${value}" to a number`);
      }
      return num;
    });
  }

  /**
   * Get a boolean value from environment variables
   */
  getBoolean(key: string, defaultValue?: boolean): boolean {
    return this.get<boolean>(key, defaultValue, value => {
      if (value.toLowerCase() === 'true' || value === '1') return true;
      if (value.toLowerCase() === 'false' || value === '0') return false;
      throw new Error(`Cannot convert "${value}" to a boolean`);
    });
  }

  /**
   * Get feature flag status
   */
  isFeatureEnabled(featureFlag: string, defaultValue = false): boolean {
    return this.getBoolean(featureFlag, defaultValue);
  }

  /**
   * Get the application port
   */
  getPort(): number {
    return this.getNumber(ENV_VARS.PORT, DEFAULTS.PORT);
  }

  /**
   * Get the log level
   */
  getLogLevel(): string {
    return this.get(ENV_VARS.LOG_LEVEL, DEFAULTS.LOG_LEVEL);
  }

  getEnvironment(): string {
    return this.get(ENV_VARS.NODE_ENV, DEFAULTS.NODE_ENV);
  }

  get enableFileLogging(): boolean {
    return this.isFeatureEnabled(FEATURE_FLAGS.ENABLE_FILE_LOGGING, true);
  }

  /**
   * Get the GMP transport configuration
   */
  getGmpConnectionConfig(): GmpConnectionConfig {
    if (!this.gmpConnectionConfig) {
      this.gmpConnectionConfig = {
        type: this.get<GmpConnectionType>(ENV_VARS.GMP_CONNECTION_TYPE, DEFAULTS.GMP_CONNECTION_TYPE, value => {
          if (value !== 'unix' && value !== 'tls') {
            throw new Error(`Unsupported connection type "${value}", expected unix or tls`);
          }
          return value;
        }),
        socketPath: this.get(ENV_VARS.GMP_SOCKET_PATH, DEFAULTS.GMP_SOCKET_PATH),
        host: this.get(ENV_VARS.GMP_HOST, DEFAULTS.GMP_HOST),
        port: this.getNumber(ENV_VARS.GMP_PORT, DEFAULTS.GMP_PORT),
        // gvmd ships a self-signed certificate by default
        rejectUnauthorized: this.getBoolean(ENV_VARS.GMP_TLS_REJECT_UNAUTHORIZED, false),
        timeoutMs: this.getNumber(ENV_VARS.GMP_TIMEOUT_MS, DEFAULTS.GMP_TIMEOUT_MS),
      };
    }

    return this.gmpConnectionConfig;
  }

  /**
   * Get the credentials used for the GMP authenticate command
   */
  getGmpCredentials(): GmpCredentials {
    return {
      username: this.get(ENV_VARS.GMP_USERNAME, DEFAULTS.GMP_USERNAME),
      password: this.get(ENV_VARS.GMP_PASSWORD),
    };
  }

  /**
   * Get retry settings for engine round-trips
   */
  getRetryConfig(): RetryConfig {
    return {
      maxAttempts: this.getNumber(ENV_VARS.GMP_MAX_RETRIES, DEFAULTS.GMP_MAX_RETRIES),
      retryDelayMs: this.getNumber(ENV_VARS.GMP_RETRY_DELAY_MS, DEFAULTS.GMP_RETRY_DELAY_MS),
    };
  }

  /**
   * Get the port list, scan config, scanner and report filter defaults
   */
  getScanDefaults(): ScanDefaultsConfig {
    if (!this.scanDefaultsConfig) {
      this.scanDefaultsConfig = {
        portListId: this.get(ENV_VARS.GMP_PORT_LIST_ID, DEFAULT_PORT_LIST_ID),
        scanConfigId: this.getOptional(ENV_VARS.GMP_SCAN_CONFIG_ID),
        scanConfigName: this.get(ENV_VARS.GMP_SCAN_CONFIG_NAME, DEFAULT_SCAN_CONFIG_NAME),
        scannerId: this.getOptional(ENV_VARS.GMP_SCANNER_ID),
        scannerName: this.get(ENV_VARS.GMP_SCANNER_NAME, DEFAULT_SCANNER_NAME),
        reportFilter: this.get(ENV_VARS.GMP_REPORT_FILTER, DEFAULT_REPORT_FILTER),
      };
    }

    return this.scanDefaultsConfig;
  }

  /**
   * Get background polling settings
   */
  getPollingConfig(): PollingConfig {
    return {
      enabled: this.isFeatureEnabled(FEATURE_FLAGS.ENABLE_BACKGROUND_POLLING, false),
      intervalMs: this.getNumber(ENV_VARS.POLL_INTERVAL_SECONDS, DEFAULTS.POLL_INTERVAL_SECONDS) * 1000,
    };
  }

  /**
   * Validate that required environment variables are present
   */
  private validateRequiredEnvVars(): void {
    const requiredVars: string[] = [ENV_VARS.GMP_PASSWORD];

    // If any are missing, log warnings
    const missingVars = requiredVars.filter(key => !this.env[key]);
    if (missingVars.length > 0) {
      this.logger.warn(`Missing required environment variables: ${missingVars.join(', ')}`);
    }
  }
}
