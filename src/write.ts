import { writeFile, stat } from 'node:fs/promises';
import { relative, isAbsolute, resolve } from 'node:path';
import type { WriteGate } from './gate.js';
import type { EditorHost, SaveOutcome, SaveRequest } from './types.js';
import { debug, errorMessage } from './log.js';

export interface SaveOptions {
  /** Evaluate the gate before saving (event-driven mode). */
  evaluate: boolean;
}

export const formatWriteSummary = (path: string, lines: number, bytes: number) =>
  `"${path}" ${lines}L, ${bytes}B`;

// An emptied buffer still holds one empty line; the editor writes that as an empty file.
export const bufferContents = (lines: string[]) =>
  lines.length === 0 || (lines.length === 1 && lines[0] === '') ? '' : lines.join('\n') + '\n';

const displayPath = (cwd: string, file: string) => {
  const rel = relative(cwd, file);
  return rel && !rel.startsWith('..') && !isAbsolute(rel) ? rel : file;
};

/**
 * Replaces the editor's own write. Write autocommands still fire so
 * formatters and linters behave; the file is only touched when the gate
 * allows it.
 */
export async function interceptSave(
  host: EditorHost,
  gate: WriteGate,
  req: SaveRequest,
  opts: SaveOptions,
): Promise<SaveOutcome> {
  const { buf, force = false, target } = req;
  if (opts.evaluate) await gate.tick('save');

  await host.runAutocmds('BufWritePre', buf);

  if (gate.blocksWrites()) {
    await host.runAutocmds('BufWritePost', buf);
    debug('write', `blocked write of buffer ${buf}`);
    return { status: 'blocked', message: gate.message() };
  }

  const cwd = await host.cwd();
  const name = await host.bufferName(buf);
  const filename = target ? resolve(cwd, target) : name;
  // Writing to another file leaves the buffer's own state alone.
  const own = !target || (name !== '' && resolve(cwd, name) === filename);

  if (own && !force && !(await host.isModified(buf))) return { status: 'unchanged' };
  if (!filename) {
    await host.notify('Failed to write file: buffer has no name', 'error');
    return { status: 'failed', path: '', error: 'buffer has no name' };
  }

  const lines = await host.getLines(buf);
  try {
    await writeFile(filename, bufferContents(lines), 'utf8');
  } catch (e) {
    await host.notify(`Failed to write file: ${filename}`, 'error');
    return { status: 'failed', path: filename, error: errorMessage(e) };
  }

  if (own) await host.setModified(buf, false);
  const { size } = await stat(filename);
  const path = displayPath(cwd, filename);
  await host.notify(formatWriteSummary(path, lines.length, size), 'info');
  await host.runAutocmds('BufWritePost', buf);
  return { status: 'written', path, lines: lines.length, bytes: size };
}
