import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { logger as rootLogger } from '../../../Shared/Utils/logger.js';
import type { ExecutionLogEntry } from './types.js';

const logger = rootLogger.child('log');

export function executionLogPath(logDir: string, at: Date = new Date()): string {
  const date = at.toISOString().slice(0, 10); // YYYY-MM-DD
  return join(logDir, `executions-${date}.jsonl`);
}

/**
 * Append an execution log entry to the daily JSONL file.
 * A failed write is logged and otherwise ignored.
 */
export async function logExecution(logDir: string, entry: ExecutionLogEntry): Promise<void> {
  const filepath = executionLogPath(logDir, new Date(entry.executed_at));
  try {
    await mkdir(logDir, { recursive: true });
    await appendFile(filepath, JSON.stringify(entry) + '\n', 'utf-8');
  } catch (err) {
    logger.error('Failed to write execution log', { filepath, error: err });
  }
}
