/**
 * Sandbox execution engine.
 *
 * One runtime process per call, each with its own temp directory holding
 * the serialized context and catalog:
 * - Stripped environment (allowlisted diagnostics vars only)
 * - Timeout enforcement (SIGTERM → grace → SIGKILL), backed by the script
 *   engine's own interrupt at the same deadline
 * - Caller cancellation through an AbortSignal, with the same kill sequence
 * - Failures classified from stderr into timeout/memory/syntax/runtime
 */

import { spawn } from 'node:child_process';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { ConfigurationError } from '../../../Shared/Types/errors.js';
import { logger as rootLogger } from '../../../Shared/Utils/logger.js';
import { getConfig, getStrippedEnv } from '../config.js';
import { toWireCatalog, toWirePayload } from '../context/builder.js';
import type { CommandCatalogEntry, ExecutionContext } from '../context/types.js';
import { logExecution } from '../logging/writer.js';
import { generateExecutionId } from '../utils/id-generator.js';
import {
  classifyStderr,
  formatFailure,
  isInterrupted,
  formatTimeout,
  parseSuccessRecord,
} from './classify-error.js';
import { ExecutionCancelledError } from './errors.js';
import { buildLaunchArgs, isReadableFile, resolveExecutable } from './launch.js';
import type {
  ExecuteOptions,
  ExecutionResult,
  ProcessOutcome,
  RuntimeDescriptor,
  SandboxEngineOptions,
  ScriptRunner,
} from './types.js';

const logger = rootLogger.child('engine');

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export class SandboxEngine implements ScriptRunner {
  readonly timeoutMs: number;
  readonly killGraceMs: number;
  readonly maxMemoryMb: number;
  readonly scriptMemoryMb: number;
  readonly importHosts: readonly string[];
  readonly tempRoot: string;
  readonly keepTempDirs: boolean;
  readonly runtime: RuntimeDescriptor;
  private readonly env: Record<string, string>;
  private readonly logDir: string | undefined;

  /**
   * Unset options come from the environment config.
   *
   * @throws ConfigurationError when the runtime executable or entry is missing
   */
  constructor(options: SandboxEngineOptions = {}) {
    const config = getConfig();
    this.timeoutMs = options.timeoutMs ?? config.timeoutMs;
    this.killGraceMs = options.killGraceMs ?? config.killGraceMs;
    this.maxMemoryMb = options.maxMemoryMb ?? config.maxMemoryMb;
    this.scriptMemoryMb = options.scriptMemoryMb ?? config.scriptMemoryMb;
    this.importHosts = options.importHosts ?? config.importHosts;
    this.tempRoot = options.tempRoot ?? config.tempRoot;
    this.keepTempDirs = options.keepTempDirs ?? config.debug;
    this.env = getStrippedEnv(options.envAllowlist);
    this.logDir = options.logDir;

    const requested = options.runtime?.executable ?? config.runtimeExecutable;
    const executable = resolveExecutable(requested);
    if (executable === null) {
      throw new ConfigurationError(`Script runtime executable not found: ${requested}`, {
        executable: requested,
      });
    }

    const entry = resolve(options.runtime?.entry ?? config.runtimeEntry);
    if (!isReadableFile(entry)) {
      throw new ConfigurationError(`Script runtime entry not found: ${entry}`, { entry });
    }

    this.runtime = {
      executable,
      entry,
      installDir: resolve(options.runtime?.installDir ?? config.installDir),
    };
  }

  /**
   * Run `code` against `ctx` and `catalog` in a fresh runtime process.
   *
   * Script failures come back as results; only cancellation rejects.
   *
   * @throws ExecutionCancelledError when `options.signal` aborts
   */
  async execute(
    code: string,
    ctx: ExecutionContext,
    catalog: readonly CommandCatalogEntry[],
    options: ExecuteOptions = {},
  ): Promise<ExecutionResult> {
    const startTime = Date.now();
    const executionId = generateExecutionId(startTime);
    if (options.signal?.aborted) {
      throw new ExecutionCancelledError(executionId);
    }

    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const tempDir = await mkdtemp(join(this.tempRoot, `snippets-${executionId}-`));
    logger.debug('Created temp directory', { executionId, tempDir });

    let outcome: ProcessOutcome;
    try {
      const fieldsFile = join(tempDir, 'fields.json');
      const commandsFile = join(tempDir, 'commands.json');
      await writeFile(fieldsFile, JSON.stringify(toWirePayload(ctx)), 'utf-8');
      await writeFile(commandsFile, JSON.stringify(toWireCatalog(catalog)), 'utf-8');

      const args = buildLaunchArgs({
        entry: this.runtime.entry,
        installDir: this.runtime.installDir,
        tempDir,
        maxMemoryMb: this.maxMemoryMb,
        scriptMemoryMb: this.scriptMemoryMb,
        timeoutMs,
        importHosts: this.importHosts,
        fieldsFile,
        commandsFile,
        code,
      });
      outcome = await this.runProcess(executionId, args, tempDir, timeoutMs, options.signal);
    } finally {
      await this.cleanup(executionId, tempDir);
    }

    if (outcome.cancelled) {
      logger.info('Script execution cancelled', { executionId });
      throw new ExecutionCancelledError(executionId);
    }

    const result = this.interpret(executionId, outcome, timeoutMs, Date.now() - startTime);
    logger.info('Script executed', {
      executionId,
      success: result.success,
      errorKind: result.success ? undefined : result.errorKind,
      durationMs: result.durationMs,
    });

    if (this.logDir !== undefined) {
      await logExecution(this.logDir, {
        type: 'execution',
        execution_id: executionId,
        code,
        success: result.success,
        error_kind: result.success ? null : result.errorKind,
        output: result.output,
        value: result.success && result.value !== undefined ? result.value : null,
        exit_code: outcome.exitCode,
        signal: outcome.signal,
        stderr: outcome.stderr,
        timed_out: outcome.timedOut,
        duration_ms: result.durationMs,
        executed_at: new Date(startTime).toISOString(),
      });
    }

    return result;
  }

  private interpret(
    executionId: string,
    outcome: ProcessOutcome,
    timeoutMs: number,
    durationMs: number,
  ): ExecutionResult {
    const base = { executionId, durationMs };

    if (outcome.timedOut || (outcome.exitCode !== 0 && isInterrupted(outcome.stderr))) {
      return { ...base, success: false, errorKind: 'timeout', output: formatTimeout(timeoutMs) };
    }

    if (outcome.spawnError) {
      return {
        ...base,
        success: false,
        errorKind: 'unexpected',
        output: `Failed to start script runtime: ${outcome.spawnError.message}`,
      };
    }

    if (outcome.exitCode === 0) {
      const record = parseSuccessRecord(outcome.stdout);
      if (record === null) {
        logger.error('Malformed result from script runtime', {
          executionId,
          stdout: outcome.stdout.slice(0, 500),
        });
        return {
          ...base,
          success: false,
          errorKind: 'unexpected',
          output: 'Script runtime returned a malformed result',
        };
      }
      return record.value === undefined
        ? { ...base, success: true, output: record.output }
        : { ...base, success: true, output: record.output, value: record.value };
    }

    const stderr = outcome.stderr.trim();
    const kind = classifyStderr(stderr);
    logger.debug('Script failed', {
      executionId,
      exitCode: outcome.exitCode,
      signal: outcome.signal,
      kind,
    });
    return { ...base, success: false, errorKind: kind, output: formatFailure(kind, stderr) };
  }

  private runProcess(
    executionId: string,
    args: string[],
    cwd: string,
    timeoutMs: number,
    signal: AbortSignal | undefined,
  ): Promise<ProcessOutcome> {
    return new Promise<ProcessOutcome>((settle) => {
      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      let timedOut = false;
      let cancelled = false;
      let killTimer: ReturnType<typeof setTimeout> | null = null;
      let settled = false;

      const child = spawn(this.runtime.executable, args, {
        cwd,
        env: this.env,
        stdio: ['ignore', 'pipe', 'pipe'],
        shell: false,
      });
      logger.debug('Spawned script runtime', { executionId, pid: child.pid });

      child.stdout.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

      const sendSignal = (sig: NodeJS.Signals): void => {
        try {
          child.kill(sig);
        } catch (error) {
          if (isErrnoException(error) && error.code === 'ESRCH') return;
          logger.warn('Failed to signal script runtime', { executionId, signal: sig, error });
        }
      };

      const terminate = (): void => {
        if (killTimer !== null || child.exitCode !== null || child.signalCode !== null) return;
        sendSignal('SIGTERM');
        killTimer = setTimeout(() => sendSignal('SIGKILL'), this.killGraceMs);
      };

      const timeoutTimer = setTimeout(() => {
        timedOut = true;
        logger.debug('Script runtime timed out, terminating', { executionId, timeoutMs });
        terminate();
      }, timeoutMs);

      const onAbort = (): void => {
        cancelled = true;
        terminate();
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      const finish = (outcome: Omit<ProcessOutcome, 'timedOut' | 'cancelled'>): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutTimer);
        if (killTimer !== null) clearTimeout(killTimer);
        signal?.removeEventListener('abort', onAbort);
        settle({ ...outcome, timedOut: timedOut && !cancelled, cancelled });
      };

      // Spawn failures (e.g. the executable vanished after construction)
      child.on('error', (error) => {
        finish({ exitCode: null, signal: null, stdout: '', stderr: '', spawnError: error });
      });

      // 'close' fires after the process exited and its stdio drained
      child.on('close', (exitCode, exitSignal) => {
        finish({
          exitCode,
          signal: exitSignal,
          stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
          stderr: Buffer.concat(stderrChunks).toString('utf-8'),
          spawnError: null,
        });
      });
    });
  }

  private async cleanup(executionId: string, tempDir: string): Promise<void> {
    if (this.keepTempDirs) {
      logger.info('Keeping temp directory', { executionId, tempDir });
      return;
    }
    try {
      await rm(tempDir, { recursive: true, force: true });
    } catch (error) {
      logger.warn('Failed to remove temp directory', { executionId, tempDir, error });
    }
  }
}
