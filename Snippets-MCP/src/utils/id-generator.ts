/**
 * Execution ids: `run_`, the start time in base 36 (zero-padded, so ids
 * sort by start time in the execution log), then 8 random hex chars.
 */

import { randomBytes } from 'node:crypto';

export function generateExecutionId(startedAt: number = Date.now()): string {
  return `run_${startedAt.toString(36).padStart(9, '0')}${randomBytes(4).toString('hex')}`;
}
