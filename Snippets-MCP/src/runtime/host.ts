/**
 * Runs one snippet in a fresh QuickJS engine.
 *
 * The engine sees only what is put into it here: a capturing `console`,
 * `lib`, the wire fields and the catalog (through the prelude). Functions
 * handed in are created inside the engine, so their constructors are the
 * engine's own; there is no path back to `process`, timers or the network.
 * Imports resolve only to modules fetched beforehand from allowed hosts.
 *
 * Every run gets its own WASM module with a memory limit and an interrupt
 * at the deadline.
 */

import { inspect } from 'node:util';
import { newQuickJSWASMModule, shouldInterruptAfterDeadline } from 'quickjs-emscripten';
import type { QuickJSContext, QuickJSHandle, QuickJSRuntime } from 'quickjs-emscripten';
import { logger as rootLogger } from '../../../Shared/Utils/logger.js';
import type { WireCatalogEntry, WirePayload } from '../context/types.js';
import {
  assertImportAllowed,
  fetchModuleGraph,
  ModuleImportError,
  resolveSpecifier,
  SNIPPET_URL,
} from './imports.js';
import type { ModuleFetcher } from './imports.js';
import { lib } from './lib.js';
import { PRELUDE } from './prelude.js';
import { rewriteSnippet, wrapSnippet } from './rewrite.js';

const logger = rootLogger.child('runtime');

const INSPECT_OPTIONS = { depth: 10, colors: false, compact: true, breakLength: 100 } as const;
const CONSOLE_METHODS = ['log', 'info', 'warn', 'error', 'debug'] as const;
const MAX_STACK_BYTES = 512 * 1024;

export interface SnippetInput {
  code: string;
  fields: WirePayload;
  commands: readonly WireCatalogEntry[];
  timeoutMs: number;
  memoryLimitMb: number;
  /** Hosts imports may come from; empty disables imports. */
  importHosts: readonly string[];
  fetchModule?: ModuleFetcher;
}

export type SnippetOutcome =
  | { success: true; output: string; value?: string }
  | { success: false; error: string };

const PENDING = Symbol('pending');

function renderArg(arg: unknown): string {
  return typeof arg === 'object' && arg !== null ? inspect(arg, INSPECT_OPTIONS) : String(arg);
}

/**
 * `Name: message` for anything error-shaped, including errors dumped out
 * of the engine as plain objects.
 */
export function describeError(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error) {
    const name = 'name' in error && typeof error.name === 'string' ? error.name : 'Error';
    return `${name}: ${String(error.message)}`;
  }
  return `Uncaught ${inspect(error, INSPECT_OPTIONS)}`;
}

/** Dump a handle the engine owns into a host value and release it. */
function take(vm: QuickJSContext, handle: QuickJSHandle): unknown {
  const value: unknown = vm.dump(handle);
  handle.dispose();
  return value;
}

function failWith(error: unknown): SnippetOutcome {
  return { success: false, error: describeError(error) };
}

function exposeConsole(vm: QuickJSContext, output: string[]): void {
  const consoleHandle = vm.newObject();
  for (const method of CONSOLE_METHODS) {
    const fn = vm.newFunction(method, (...args: QuickJSHandle[]) => {
      output.push(args.map((arg) => renderArg(vm.dump(arg))).join(' '));
    });
    vm.setProp(consoleHandle, method, fn);
    fn.dispose();
  }
  vm.setProp(vm.global, 'console', consoleHandle);
  consoleHandle.dispose();
}

function exposeLib(vm: QuickJSContext): void {
  const libHandle = vm.newObject();
  const random = vm.newFunction('random', (...args: QuickJSHandle[]) => {
    const [min = Number.NaN, max = Number.NaN] = args.map((arg) => Number(vm.dump(arg)));
    return vm.newNumber(lib.random(min, max));
  });
  vm.setProp(libHandle, 'random', random);
  random.dispose();
  vm.setProp(vm.global, 'lib', libHandle);
  libHandle.dispose();
}

function exposeInit(vm: QuickJSContext, input: SnippetInput): void {
  const init = vm.newString(JSON.stringify({ fields: input.fields, commands: input.commands }));
  vm.setProp(vm.global, '__snippetInit', init);
  init.dispose();
}

function installModuleLoader(
  runtime: QuickJSRuntime,
  modules: ReadonlyMap<string, string>,
  allowedHosts: readonly string[],
): void {
  runtime.setModuleLoader(
    (url) => {
      const source = modules.get(url);
      if (source !== undefined) return source;
      try {
        assertImportAllowed(url, allowedHosts);
      } catch (error) {
        if (error instanceof ModuleImportError) return { error };
        throw error;
      }
      return { error: new ModuleImportError(`Module ${url} was not fetched: import it with a literal URL`) };
    },
    (base, requested) => {
      try {
        return resolveSpecifier(requested, base);
      } catch (error) {
        if (error instanceof ModuleImportError) return { error };
        throw error;
      }
    },
  );
}

/** Settles with PENDING when the promise is still open after the current macrotask. */
function afterJobs<T>(promise: Promise<T>): Promise<T | typeof PENDING> {
  return Promise.race([promise, new Promise<typeof PENDING>((resolve) => setImmediate(() => resolve(PENDING)))]);
}

export async function runSnippet(input: SnippetInput): Promise<SnippetOutcome> {
  const deadline = Date.now() + input.timeoutMs;
  const rewritten = rewriteSnippet(input.code);

  let modules: Map<string, string>;
  try {
    modules = await fetchModuleGraph(rewritten.imports, {
      allowedHosts: input.importHosts,
      fetchModule: input.fetchModule,
    });
  } catch (error) {
    logger.debug('Snippet imports failed', { error });
    return failWith(error);
  }

  const engine = await newQuickJSWASMModule();
  const runtime = engine.newRuntime();
  runtime.setMemoryLimit(input.memoryLimitMb * 1024 * 1024);
  runtime.setMaxStackSize(MAX_STACK_BYTES);
  runtime.setInterruptHandler(shouldInterruptAfterDeadline(deadline));
  installModuleLoader(runtime, modules, input.importHosts);

  // Only a settled run disposes: QuickJS aborts when a runtime is disposed
  // with live handles, so early exits leave the module to the GC.
  const vm = runtime.newContext();
  const output: string[] = [];
  exposeConsole(vm, output);
  exposeLib(vm);
  exposeInit(vm, input);

  const prelude = vm.evalCode(PRELUDE, 'prelude.js');
  if (prelude.error) {
    return failWith(take(vm, prelude.error));
  }
  prelude.value.dispose();

  const evaluated = vm.evalCode(wrapSnippet(rewritten.body), SNIPPET_URL);
  if (evaluated.error) {
    const error = take(vm, evaluated.error);
    logger.debug('Snippet failed to compile', { error });
    return failWith(error);
  }

  const settled = vm.resolvePromise(evaluated.value);
  evaluated.value.dispose();

  const jobs = runtime.executePendingJobs();
  if (jobs.error) {
    return failWith(take(vm, jobs.error));
  }

  const result = await afterJobs(settled);
  if (result === PENDING) {
    return { success: false, error: 'Error: Script did not finish (it awaits a promise that never settles)' };
  }

  let outcome: SnippetOutcome;
  if (result.error) {
    const error = take(vm, result.error);
    logger.debug('Snippet threw', { error });
    outcome = failWith(error);
  } else {
    const value = take(vm, result.value);
    outcome = value === undefined
      ? { success: true, output: output.join('\n') }
      : { success: true, output: output.join('\n'), value: inspect(value, INSPECT_OPTIONS) };
  }

  vm.dispose();
  runtime.dispose();
  return outcome;
}
