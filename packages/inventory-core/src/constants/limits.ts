/**
 * System limits and thresholds
 */

// Intake
export const MAX_FILE_SIZE_MB = 50;
export const FILE_SETTLE_DELAY_MS = 2000;

// Job processing
export const JOB_BATCH_SIZE = 10;
export const PROCESSING_INTERVAL_MINUTES = 5;
export const CLEANUP_INTERVAL_HOURS = 24;
export const RETENTION_DAYS = 30;
export const STARTUP_SCAN_DELAY_MS = 10_000;

// Export
export const SPREADSHEET_MAX_COLUMN_WIDTH = 50;
export const SUMMARY_TOP_GUEST_OS = 10;
export const DATA_SOURCE = 'ansible_vcenter';
