/**
 * Application constants
 */

// Source formats markitdown can read; overridable via SUPPORTED_EXTENSIONS
export const DEFAULT_SUPPORTED_EXTENSIONS = ['pdf', 'docx', 'pptx', 'txt', 'md'] as const;

// Derived files are written next to the source with this extension
export const OUTPUT_EXTENSION = 'md';

// Suffix used when the source already carries the output extension
export const CONVERTED_SUFFIX = '.converted';

export const JOB_STATUSES = ['Queued', 'Processing', 'Completed', 'Error'] as const;

export const TERMINAL_STATUSES = ['Completed', 'Error'] as const;

export const QUEUED_MESSAGE = 'Waiting to be processed';

// Characters that turn a path into a wildcard pattern
export const GLOB_MAGIC = /[*?[]/;

// TypeScript types
export type JobStatus = typeof JOB_STATUSES[number];
export type TerminalStatus = typeof TERMINAL_STATUSES[number];

/**
 * Check if a status is terminal (no transition leaves it except a re-registration)
 */
export function isTerminalStatus(status: JobStatus): status is TerminalStatus {
  return TERMINAL_STATUSES.some(terminal => terminal === status);
}
