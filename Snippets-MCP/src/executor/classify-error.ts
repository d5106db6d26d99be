/**
 * Turning runtime exits into user-facing results.
 */

import { z } from 'zod';
import type { ErrorKind } from './types.js';

export type ScriptFailureKind = Extract<ErrorKind, 'memory' | 'syntax' | 'runtime'>;

const successRecordSchema = z.object({
  output: z.string(),
  value: z.string().optional(),
});

export type SuccessRecord = z.infer<typeof successRecordSchema>;

/** The script engine stopped the snippet at its deadline. */
export function isInterrupted(stderr: string): boolean {
  return stderr.startsWith('InternalError: interrupted');
}

/** Memory markers are checked before syntax markers. */
export function classifyStderr(stderr: string): ScriptFailureKind {
  const lower = stderr.toLowerCase();
  if (lower.includes('memory') || lower.includes('out of memory')) return 'memory';
  if (lower.includes('syntaxerror') || lower.includes('syntax error')) return 'syntax';
  return 'runtime';
}

export function formatFailure(kind: ScriptFailureKind, stderr: string): string {
  switch (kind) {
    case 'memory':
      return 'Script exceeded memory limits';
    case 'syntax':
      return `Script syntax error: ${stderr}`;
    case 'runtime':
      return stderr ? `Script runtime error: ${stderr}` : 'Unknown execution error';
  }
}

export function formatTimeout(timeoutMs: number): string {
  return `Script execution timed out (${timeoutMs / 1000}s limit)`;
}

/**
 * @returns the record, or null when stdout is not exactly one valid record
 */
export function parseSuccessRecord(stdout: string): SuccessRecord | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout.trim());
  } catch {
    return null;
  }
  const result = successRecordSchema.safeParse(parsed);
  return result.success ? result.data : null;
}
