/**
 * Configuration types
 */

export type GmpConnectionType = 'unix' | 'tls';

export interface GmpConnectionConfig {
  type: GmpConnectionType;
  socketPath: string;
  host: string;
  port: number;
  rejectUnauthorized: boolean;
  timeoutMs: number;
}

export interface GmpCredentials {
  username: string;
  password: string;
}

export interface RetryConfig {
  maxAttempts: number;
  retryDelayMs: number;
}

// Values used when a request does not override them
export interface ScanDefaultsConfig {
  portListId: string;
  scanConfigId?: string;
  scanConfigName: string;
  scannerId?: string;
  scannerName: string;
  reportFilter: string;
}

export interface PollingConfig {
  enabled: boolean;
  intervalMs: number;
}
