/**
 * Shared type definitions for test utilities
 */

import type { Logger } from '@ensemble/client';

/**
 * Call log entry for tracking calls made to a double
 */
export interface CallLogEntry {
  method: string;
  args: unknown[];
  timestamp: number;
}

/**
 * Options shared by every double
 */
export interface MockDoubleOptions {
  /** Receives one debug line per call, e.g. a console logger while debugging a test */
  logger?: Logger;
}
