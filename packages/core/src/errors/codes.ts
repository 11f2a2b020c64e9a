/**
 * Error codes for all incgraph-specific errors.
 * Used to identify error types programmatically.
 */
export enum IncgraphErrorCode {
  // Configuration
  CONFIG_INVALID = 'CONFIG_INVALID',
  ROOT_NOT_FOUND = 'ROOT_NOT_FOUND',
  UNSUPPORTED_FORMAT = 'UNSUPPORTED_FORMAT',

  // File System
  SCAN_FAILED = 'SCAN_FAILED',
  FILE_NOT_READABLE = 'FILE_NOT_READABLE',

  // Rendering
  RENDER_FAILED = 'RENDER_FAILED',

  // System
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}
