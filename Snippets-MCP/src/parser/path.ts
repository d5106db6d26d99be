/**
 * Command name grammar.
 *
 * Names are `/`-separated segments of letters, digits, `_` and `-`, where a
 * segment never starts with `-`. Dots fold into slashes (`foo.bar` is
 * `foo/bar`), which lets users write nested names the way they would
 * access them from a script.
 */

import { ValidationError } from '../../../Shared/Types/errors.js';

const SEGMENT = '[A-Za-z0-9_][A-Za-z0-9_-]*';
const PATH_PATTERN = new RegExp(`^${SEGMENT}(?:/${SEGMENT})*$`);
const DIR_PATTERN = new RegExp(`^${SEGMENT}(?:/${SEGMENT})*/$`);
const LIST_CHILDREN_PATTERN = /^(.*?)[./]+$/;

export interface ValidatePathOptions {
  /** Accept `foo/` (a directory-style lookup). */
  allowTrailingSlash?: boolean;
  /** Fold `.` into `/` before checking. */
  normalizeDots?: boolean;
}

/**
 * @returns the normalized path
 * @throws ValidationError when the name does not fit the grammar
 */
export function validatePath(path: string, options: ValidatePathOptions = {}): string {
  const normalized = options.normalizeDots ? path.replace(/\./g, '/') : path;

  if (!normalized) {
    throw new ValidationError('Command name cannot be empty');
  }
  if (PATH_PATTERN.test(normalized)) {
    return normalized;
  }
  if (options.allowTrailingSlash && DIR_PATTERN.test(normalized)) {
    return normalized;
  }
  throw new ValidationError(
    `Invalid command name '${path}': use letters, digits, _ and - in /-separated parts`,
    { path },
  );
}

export function isValidPath(path: string, options: ValidatePathOptions = {}): boolean {
  try {
    validatePath(path, options);
    return true;
  } catch {
    return false;
  }
}

export function isTrailingSlashPath(path: string): boolean {
  return path.endsWith('/');
}

/**
 * Parent of a list-children request: a valid name followed by a run of
 * dots and/or slashes, e.g. `foo.`, `foo..`, `foo/bar/` or `foo.bar.`.
 *
 * @returns the normalized parent, or null when `content` is not of that form
 */
export function splitListChildren(content: string): string | null {
  const match = LIST_CHILDREN_PATTERN.exec(content);
  if (!match || !match[1]) return null;

  try {
    return validatePath(match[1], { normalizeDots: true });
  } catch {
    return null;
  }
}

/** True when `name` sits somewhere below `parent` (`a/b/c` is below `a`). */
export function isDescendantOf(name: string, parent: string): boolean {
  return name.startsWith(`${parent}/`);
}
