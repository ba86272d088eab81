/**
 * Types for scan records and translated results
 */

export type ScanStatus = 'Pending' | 'Running' | 'Done' | 'Failed';

// Unknown is only ever observed (a poll that failed), never stored
export type ObservedScanStatus = ScanStatus | 'Unknown';

export interface CvssVector {
  AV: string;
  AC: string;
  PR: string;
  UI: string;
  S: string;
  C: string;
  I: string;
  A: string;
}

/**
 * One finding of a report
 */
export interface ResultDetail {
  id: string;
  name: string;
  host: string;
  port: string;
  severity: number;
  threat: string;
  description: string;
  cve: string;
  score: string;
  cvss_vector: CvssVector;
  creation_time: string;
  modification_time: string;
}

export interface ResultSummaryEntry {
  category: string;
  count: number;
}

export interface ScanResult {
  scan_name: string;
  targets: string[];
  result_details: ResultDetail[];
  result_summary: ResultSummaryEntry[];
}

/**
 * Local view of one scan request
 */
export interface ScanRecord {
  scanId: string;
  taskId: string;
  targetId: string;
  reportId: string;
  name: string;
  targets: string[];
  status: ScanStatus;
  progress: number;
  createdAt: Date;
  lastPolledAt: Date | null;
  result: ScanResult | null;
}

export type CreateOutcome = { kind: 'Created'; id: string } | { kind: 'AlreadyExists'; id: string };

export interface PollResult {
  scanId: string;
  status: ObservedScanStatus;
  progress: number;
  // false when the engine answered with a state we cannot map
  authoritative: boolean;
}
