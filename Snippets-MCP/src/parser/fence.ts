/**
 * Markdown code fences around script snippets.
 */

const FENCE_CHARS = ['`', '~'] as const;

/** ``` or ~~~, optionally followed by a bare language tag. */
const FENCE_OPENER = /^(`{3}|~{3})([^\s`~]*)$/;

export function startsWithFence(text: string): boolean {
  return FENCE_CHARS.some((char) => text.startsWith(char.repeat(3)));
}

/**
 * @returns the fence marker when `line` opens a block, e.g. "```" for "```js"
 */
function openingFence(line: string): string | null {
  const match = FENCE_OPENER.exec(line.trim());
  return match ? match[1] : null;
}

/**
 * Remove a surrounding code fence.
 *
 * The opening line must be a bare fence with at most a language tag:
 * "```js" opens a block, "```js some words" does not, and then the text is
 * returned as-is (trimmed). The closing line must be the same bare fence.
 * Lines between them are returned verbatim, inner blank lines included.
 */
export function stripFence(raw: string): string {
  const code = raw.trim();
  if (!code) return '';

  if (!code.includes('\n')) {
    if (code.length >= 6 && code.startsWith('```') && code.endsWith('```')) {
      return code.slice(3, -3).trim();
    }
    return code;
  }

  const lines = code.split('\n');
  const marker = openingFence(lines[0]);
  if (marker === null) return code;

  lines.shift();
  if (lines.length > 0 && lines[lines.length - 1].trim() === marker) {
    lines.pop();
  }

  return lines.join('\n').replace(/^(?:[ \t]*\r?\n)+/, '').replace(/(?:\r?\n[ \t]*)+$/, '');
}

/** Wrap code in a fenced block. */
export function fence(code: string, language: string = ''): string {
  return `\`\`\`${language}\n${code}\n\`\`\``;
}
