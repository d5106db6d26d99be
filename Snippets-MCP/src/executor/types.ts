/**
 * Core types for sandbox execution.
 */

import type { CommandCatalogEntry, ExecutionContext } from '../context/types.js';

export type ErrorKind = 'timeout' | 'memory' | 'syntax' | 'runtime' | 'unexpected';

interface ExecutionResultBase {
  executionId: string;
  /** Captured console output on success, a user-facing message on failure. */
  output: string;
  durationMs: number;
}

export interface ExecutionSuccess extends ExecutionResultBase {
  success: true;
  /** The script's return value rendered as text, when it returned one. */
  value?: string;
}

export interface ExecutionFailure extends ExecutionResultBase {
  success: false;
  errorKind: ErrorKind;
}

export type ExecutionResult = ExecutionSuccess | ExecutionFailure;

/** Where the external runtime lives and how to start it. */
export interface RuntimeDescriptor {
  /** Node binary, absolute or looked up on PATH. */
  executable: string;
  /** Runtime entry script passed to the executable. */
  entry: string;
  /** Directory the runtime may read (its code and node_modules). */
  installDir: string;
}

export interface SandboxEngineOptions {
  timeoutMs?: number;
  killGraceMs?: number;
  /** Heap cap for the runtime process. */
  maxMemoryMb?: number;
  /** Memory limit of the script engine inside the runtime. */
  scriptMemoryMb?: number;
  /** Hosts snippets may import modules from; empty disables imports. */
  importHosts?: readonly string[];
  tempRoot?: string;
  /** Leave per-call temp directories behind for inspection. */
  keepTempDirs?: boolean;
  runtime?: Partial<RuntimeDescriptor>;
  envAllowlist?: readonly string[];
  /** Append a JSONL record per execution here; omitted = no execution log. */
  logDir?: string;
}

export interface ExecuteOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

/** What tools need from the engine. */
export interface ScriptRunner {
  execute(
    code: string,
    ctx: ExecutionContext,
    catalog: readonly CommandCatalogEntry[],
    options?: ExecuteOptions,
  ): Promise<ExecutionResult>;
}

/** How the runtime process ended. */
export interface ProcessOutcome {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  cancelled: boolean;
  spawnError: Error | null;
}
