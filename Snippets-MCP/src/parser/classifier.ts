/**
 * Message classifier.
 *
 * Decides what a prefixed chat message asks for, in this order:
 *
 *   1. command invocation  `$foo.bar a "b c"`  → run `foo/bar` with args
 *   2. list children       `$foo.` / `$foo/`   → list entries under `foo`
 *   3. script snippet      `$ 1 + 1`, `$x;`    → run the text as code
 *   4. unhandled           anything else       → ignore the message
 *
 * A name-shaped message is never run as code. Script snippets only come
 * from the script prefix; command-only prefixes fall through to unhandled.
 * After whitespace or a fence the prefix is dropped; otherwise it stays
 * part of the code, so `$foo()` calls the `$foo` global.
 * classify() is pure and never throws.
 */

import { ArgumentParsingError } from './errors.js';
import { startsWithFence, stripFence } from './fence.js';
import { isTrailingSlashPath, splitListChildren, validatePath } from './path.js';
import { isWhitespace, StringView } from './string-view.js';
import { UNHANDLED } from './types.js';
import type { CommandInvocation, ParsedMessage, PrefixConfig } from './types.js';

interface PrefixMatch {
  prefix: string;
  scriptCapable: boolean;
}

/**
 * Longest configured prefix at the start of `text`.
 */
export function matchPrefix(text: string, prefixes: PrefixConfig): PrefixMatch | null {
  const candidates: PrefixMatch[] = [
    { prefix: prefixes.script, scriptCapable: true },
    ...prefixes.commandOnly.map((prefix) => ({ prefix, scriptCapable: false })),
  ];

  let best: PrefixMatch | null = null;
  for (const candidate of candidates) {
    if (!candidate.prefix || !text.startsWith(candidate.prefix)) continue;
    if (best === null || candidate.prefix.length > best.prefix.length) {
      best = candidate;
    }
  }
  return best;
}

/**
 * Split the text after a command name into arguments.
 *
 * @throws ArgumentParsingError on unbalanced or misplaced quotes
 */
export function parseArguments(view: StringView): string[] {
  const args: string[] = [];
  view.skipWhitespace();
  while (!view.eof) {
    const arg = view.getQuotedWord();
    if (arg === null) break;
    args.push(arg);
    view.skipWhitespace();
  }
  return args;
}

function parseInvocation(remainder: string): CommandInvocation | null {
  const view = new StringView(remainder);
  const word = view.getWord();
  if (!word) return null;

  let name: string;
  try {
    name = validatePath(word, { allowTrailingSlash: true, normalizeDots: true });
  } catch {
    return null;
  }
  if (isTrailingSlashPath(name)) return null;

  try {
    return { kind: 'command', name, args: parseArguments(view) };
  } catch (error) {
    if (error instanceof ArgumentParsingError) return null;
    throw error;
  }
}

function scriptBody(text: string, remainder: string): string {
  if (isWhitespace(remainder[0]) || startsWithFence(remainder)) {
    return stripFence(remainder);
  }
  return text;
}

export function classify(text: string, prefixes: PrefixConfig): ParsedMessage {
  const match = matchPrefix(text, prefixes);
  if (!match) return UNHANDLED;

  const remainder = text.slice(match.prefix.length);
  if (!remainder.trim()) return UNHANDLED;

  const invocation = parseInvocation(remainder);
  if (invocation) return invocation;

  const parent = splitListChildren(remainder.trimEnd());
  if (parent !== null) return { kind: 'list-children', parent };

  if (!match.scriptCapable) return UNHANDLED;

  const code = scriptBody(text, remainder);
  return code ? { kind: 'script', code } : UNHANDLED;
}
