/**
 * Managed sections: marker-delimited blocks inside a shared text file.
 *
 * A block looks like:
 *
 *   <!-- BEGIN git-tools.commit-helper -->
 *   ...content...
 *   <!-- END git-tools.commit-helper -->
 *
 * Everything outside a block is opaque and kept byte-for-byte.
 */

import { ValidationError } from '../errors.js';

/** First line of a shared file created by skillport. */
export const MANAGED_PREAMBLE =
  '<!-- Sections between BEGIN and END markers are managed by skillport. Content outside them is left untouched. -->';

/** Opening marker line for a key. */
export function beginMarker(key: string): string {
  return `<!-- BEGIN ${key} -->`;
}

/** Closing marker line for a key. */
export function endMarker(key: string): string {
  return `<!-- END ${key} -->`;
}

const MARKER_LINE = /^<!-- (BEGIN|END) (\S+) -->$/;

function markerMatch(line: string): RegExpExecArray | null {
  return MARKER_LINE.exec(line.endsWith('\r') ? line.slice(0, -1) : line);
}

/** Whether any line of the text would be read as a BEGIN or END marker. */
export function containsMarkerLine(text: string): boolean {
  return text.split('\n').some((line) => markerMatch(line) !== null);
}

/** Location of one block inside a file, as character offsets. */
export interface SectionSpan {
  key: string;
  /** Offset of the first character of the BEGIN marker. */
  start: number;
  /** Offset just past the last character of the END marker. */
  end: number;
}

/**
 * Find every managed block in a file.
 * Markers must sit on their own line.
 * @throws {ValidationError} On an unterminated block, a stray END, a nested
 *   BEGIN, or a key that appears twice.
 */
export function scanSections(text: string): SectionSpan[] {
  const spans: SectionSpan[] = [];
  const seen = new Set<string>();
  let open: { key: string; start: number } | undefined;
  let offset = 0;

  for (const line of text.split('\n')) {
    const lineStart = offset;
    offset += line.length + 1;
    const match = markerMatch(line);
    if (!match) {
      continue;
    }
    const [, kind, key] = match;

    if (kind === 'BEGIN') {
      if (open) {
        throw new ValidationError(`Managed section "${open.key}" is not terminated before "${key}" begins`);
      }
      if (seen.has(key)) {
        throw new ValidationError(`Managed section "${key}" appears more than once`);
      }
      open = { key, start: lineStart };
      continue;
    }

    if (!open || open.key !== key) {
      throw new ValidationError(`Found END marker for "${key}" without a matching BEGIN`);
    }
    spans.push({ key, start: open.start, end: lineStart + endMarker(key).length });
    seen.add(key);
    open = undefined;
  }

  if (open) {
    throw new ValidationError(`Managed section "${open.key}" has no END marker`);
  }
  return spans;
}

/**
 * Render a complete block for a key. Trailing newlines of the content are dropped.
 * @throws {ValidationError} When the content has a line that parses as a marker.
 */
export function renderSection(key: string, content: string): string {
  if (containsMarkerLine(content)) {
    throw new ValidationError(`Content for managed section "${key}" contains a marker line`);
  }
  return `${beginMarker(key)}\n${content.replace(/\n+$/, '')}\n${endMarker(key)}`;
}

/**
 * Insert or replace the block for a key.
 *
 * - existing block: its span (markers included) is replaced in place
 * - no block: a new one is appended after a blank line, or directly on the
 *   next line when the file does not end with a newline
 * - no file (`undefined`): a new file with the preamble and this block
 *
 * @returns The new file content.
 */
export function upsertSection(text: string | undefined, key: string, content: string): string {
  const block = renderSection(key, content);
  if (text === undefined) {
    return `${MANAGED_PREAMBLE}\n\n${block}\n`;
  }

  const existing = scanSections(text).find((span) => span.key === key);
  if (existing) {
    return text.slice(0, existing.start) + block + text.slice(existing.end);
  }

  if (text.length === 0) {
    return `${block}\n`;
  }
  return `${text}\n${block}\n`;
}

/**
 * Remove the block for a key, along with the newline that ends it and the
 * separator it was appended after. A block at the end of the file that
 * follows a single newline takes that newline with it, so a file that had
 * no trailing newline gets none back.
 *
 * @returns The new content, or undefined when nothing but the preamble
 *   (or nothing at all) would remain. Returns the input unchanged when
 *   there is no block for the key.
 */
export function removeSection(text: string, key: string): string | undefined {
  const span = scanSections(text).find((candidate) => candidate.key === key);
  if (!span) {
    return text;
  }

  let start = span.start;
  let end = span.end;
  if (text[end] === '\n') {
    end += 1;
  }
  if (start >= 2 && text.slice(start - 2, start) === '\n\n') {
    start -= 1;
  } else if (start >= 1 && text[start - 1] === '\n') {
    // Appended without a blank line: the separator is the newline before, or
    // the blank line after when another block follows.
    if (end === text.length) {
      start -= 1;
    } else if (text[end] === '\n') {
      end += 1;
    }
  }

  const result = text.slice(0, start) + text.slice(end);
  const remaining = result.trim();
  if (remaining.length === 0 || remaining === MANAGED_PREAMBLE) {
    return undefined;
  }
  return result;
}

/** Keys of every block in a file, in file order. */
export function listSectionKeys(text: string): string[] {
  return scanSections(text).map((span) => span.key);
}
