/**
 * JSONL log entry for one sandbox execution (daily rotation).
 */

import type { ErrorKind } from '../executor/types.js';

export interface ExecutionLogEntry {
  type: 'execution';
  execution_id: string;
  code: string;
  success: boolean;
  error_kind: ErrorKind | null;
  output: string;
  value: string | null;
  exit_code: number | null;
  signal: string | null;
  stderr: string;
  timed_out: boolean;
  duration_ms: number;
  executed_at: string;
}
