import { readFileSync } from 'node:fs';
import { DraftIOError } from './errors.js';
import type { ParsedMessage } from './types.js';

type ParseState = 'IN_TITLE' | 'IN_BODY';

/**
 * Split edited draft lines into a title and a body, git-commit style.
 *
 * The first line starting with `#` ends parsing; nothing after it counts,
 * even plain text further down. The title is the first run of non-blank
 * lines joined by spaces. The first blank line switches to the body, which
 * keeps every following line verbatim. Both parts are trimmed.
 */
export function parseTitleAndBody(lines: Iterable<string>): ParsedMessage {
  const titleParts: string[] = [];
  const bodyParts: string[] = [];
  let state: ParseState = 'IN_TITLE';

  for (const line of lines) {
    if (line.startsWith('#')) break;

    if (state === 'IN_TITLE' && /\S/.test(line)) {
      titleParts.push(line);
    } else {
      state = 'IN_BODY';
      bodyParts.push(line);
    }
  }

  return {
    title: titleParts.join(' ').trim(),
    body: bodyParts.join('\n').trim(),
  };
}

/** Split file content into lines, accepting both LF and CRLF endings. */
export function splitLines(content: string): string[] {
  return content.split('\n').map((line) => line.replace(/\r$/, ''));
}

/**
 * Read the edited draft back and parse it.
 * Read failures surface as DraftIOError; the file itself is left in place.
 */
export function readTitleAndBodyFromFile(path: string): ParsedMessage {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error: unknown) {
    throw new DraftIOError(path, error);
  }
  return parseTitleAndBody(splitLines(content));
}
