/**
 * Script runtime entry point, started by the execution engine once per
 * snippet under Node's permission model. The snippet itself runs in
 * QuickJS (see host.ts).
 *
 * stdout carries exactly one JSON record on success; stderr carries the
 * diagnostic on failure (exit code 1).
 */

import { describeError, runSnippet } from './host.js';
import { loadRuntimeInput } from './input.js';

let settled = false;

function fail(message: string): void {
  settled = true;
  process.stderr.write(`${message}\n`);
  process.exitCode = 1;
}

// A snippet awaiting a promise that never settles leaves nothing on the
// event loop; report it instead of exiting 0 without a record.
process.once('beforeExit', () => {
  if (!settled) fail('Error: Script did not finish (it awaits a promise that never settles)');
});

async function main(): Promise<void> {
  const input = await loadRuntimeInput(process.argv.slice(2));
  const outcome = await runSnippet(input);
  if (!outcome.success) {
    fail(outcome.error);
    return;
  }
  settled = true;
  const record = outcome.value === undefined
    ? { output: outcome.output }
    : { output: outcome.output, value: outcome.value };
  process.stdout.write(`${JSON.stringify(record)}\n`);
}

main().catch((error: unknown) => {
  fail(describeError(error));
});
