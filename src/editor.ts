import { execFileSync } from 'node:child_process';
import { basename } from 'node:path';
import { EditorError, sanitizeError } from './errors.js';

/** Editors that understand `-c "set ft=gitcommit"` */
const VIM_FAMILY = new Set(['vim', 'gvim', 'mvim']);

/** Runs a command in the foreground and returns once it exits successfully. */
export type InteractiveRunner = (argv: string[]) => void;

/** Characters that make git hand the editor setting to the shell */
const SHELL_SYNTAX = /[|&;<>()$`\\"'*?[#~=%]/;

/** First word of a shell command line, with surrounding quotes removed */
export function editorProgram(editor: string): string {
  const trimmed = editor.trim();
  const quote = trimmed[0];
  if (quote === '"' || quote === "'") {
    const end = trimmed.indexOf(quote, 1);
    return end === -1 ? trimmed.slice(1) : trimmed.slice(1, end);
  }
  return trimmed.split(/\s+/)[0];
}

/**
 * Build the argv used to open `path` in the configured editor.
 *
 * A plain setting (`vim`, `code --wait`) is split on whitespace and run
 * directly. Anything with quoting or other shell syntax runs through
 * `sh -c '<editor> "$@"'`, as git does, so quoted paths with spaces survive.
 * Vim variants get the gitcommit filetype for comment highlighting. The file
 * path is always last.
 */
export function buildEditorCommand(editor: string, path: string): string[] {
  const trimmed = editor.trim();
  if (trimmed.length === 0) {
    throw new EditorError('No editor configured', 'Set core.editor, VISUAL or EDITOR');
  }

  const extra = VIM_FAMILY.has(basename(editorProgram(trimmed)))
    ? ['-c', 'set ft=gitcommit', path]
    : [path];

  if (SHELL_SYNTAX.test(trimmed)) {
    return ['sh', '-c', `${trimmed} "$@"`, trimmed, ...extra];
  }
  return [...trimmed.split(/\s+/), ...extra];
}

/**
 * Run a command with the terminal attached and block until it exits.
 * A missing binary or non-zero exit becomes an EditorError.
 */
export const runInteractive: InteractiveRunner = (argv) => {
  const [command, ...args] = argv;
  if (!command) {
    throw new EditorError('Empty editor command');
  }

  try {
    execFileSync(command, args, { stdio: 'inherit' });
  } catch (error: unknown) {
    const status = (error as { status?: number | null }).status;
    if (typeof status === 'number') {
      throw new EditorError(`Editor '${command}' exited with status ${status}`);
    }
    throw new EditorError(`Could not start editor '${command}': ${sanitizeError(error)}`);
  }
};
