/**
 * Request and response shapes of the HTTP API
 */
import { ObservedScanStatus, ScanResult, ScanStatus } from './scan';

export interface TriggerScanBody {
  scan_name?: unknown;
  targets?: unknown;
  config_id?: unknown;
  port_list_id?: unknown;
}

export interface TriggerScanResponse {
  message: string;
  scan_name: string;
  targets: string;
  scan_id: string;
}

export interface ScanResultsResponse extends ScanResult {
  status: ObservedScanStatus;
  progress: number;
}

export interface ScanListEntry {
  scan_id: string;
  scan_name: string;
  targets: string[];
  status: ScanStatus;
  progress: number;
  created_at: string;
  last_polled_at: string | null;
}
