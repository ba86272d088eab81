/**
 * GMP protocol constants and scan defaults
 */

// "All IANA assigned TCP" port list shipped with every feed
export const DEFAULT_PORT_LIST_ID = '33d0cd82-57c6-11e1-8ed1-406186ea4fc5';

export const DEFAULT_SCAN_CONFIG_NAME = 'Full and fast';

export const DEFAULT_SCANNER_NAME = 'OpenVAS Default';

export const DEFAULT_REPORT_FILTER = 'levels=hml rows=100 min_qod=70 first=1 sort-reverse=severity';

// Prefix of the comment stamped on every target and task this service creates
export const REQUEST_MARKER_PREFIX = 'scan-broker-request:';

// Response paths parsed as lists, even with a single child
export const GMP_LIST_PATHS = [
  'get_targets_response.target',
  'get_tasks_response.task',
  'get_configs_response.config',
  'get_scanners_response.scanner',
  'get_reports_response.report.report.results.result',
  'get_reports_response.report.report.results.result.nvt.refs.ref',
] as const;

// Task states as reported by gvmd, grouped by the scan status they map to
export const GMP_TASK_STATES = {
  PENDING: ['New', 'Requested', 'Queued'],
  RUNNING: ['Running', 'Processing', 'Stop Requested', 'Delete Requested'],
  DONE: ['Done'],
  FAILED: ['Stopped', 'Interrupted'],
} as const;

// Threat levels in the order they appear in a result summary
export const THREAT_LEVELS = ['High', 'Medium', 'Low', 'Log'] as const;
