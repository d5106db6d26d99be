/**
 * Result of classifying a chat message.
 */

export interface CommandInvocation {
  kind: 'command';
  /** Normalized name, dots folded to slashes. */
  name: string;
  args: string[];
}

export interface ScriptSnippet {
  kind: 'script';
  code: string;
}

export interface ListChildrenRequest {
  kind: 'list-children';
  parent: string;
}

export interface Unhandled {
  kind: 'unhandled';
}

export type ParsedMessage = CommandInvocation | ScriptSnippet | ListChildrenRequest | Unhandled;

export interface PrefixConfig {
  /** Prefix that may also introduce a raw script, e.g. "$". */
  script: string;
  /** Prefixes that only ever introduce commands, e.g. ".". */
  commandOnly: readonly string[];
}

export const UNHANDLED: Unhandled = Object.freeze({ kind: 'unhandled' });
