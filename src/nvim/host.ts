import { z } from 'zod';
import type { EditorHost, NotifyLevel, WriteEvent } from '../types.js';

/** The one RPC call the host needs; a `NeovimClient` satisfies it. */
export interface NvimRequester {
  request(method: string, args: unknown[]): Promise<unknown>;
}

const LEVELS: Record<NotifyLevel, string> = {
  info: 'INFO',
  warn: 'WARN',
  error: 'ERROR',
};

/**
 * `EditorHost` over msgpack-RPC. Every call is a small Lua chunk run with
 * `nvim_exec_lua`; results are validated before they reach the core.
 */
export class NeovimHost implements EditorHost {
  constructor(
    private nvim: NvimRequester,
    private title = 'commitment',
  ) {}

  lua(code: string, args: unknown[] = []): Promise<unknown> {
    return this.nvim.request('nvim_exec_lua', [code, args]);
  }

  async cwd(): Promise<string> {
    return z.string().parse(await this.lua('return vim.fn.getcwd()'));
  }

  async bufferName(buf: number): Promise<string> {
    return z.string().parse(await this.lua('return vim.api.nvim_buf_get_name(...)', [buf]));
  }

  async getLines(buf: number): Promise<string[]> {
    const raw = await this.lua('return vim.api.nvim_buf_get_lines(..., 0, -1, false)', [buf]);
    return z.array(z.string()).parse(raw);
  }

  async isModified(buf: number): Promise<boolean> {
    const raw = await this.lua('return vim.bo[...].modified', [buf]);
    return z.boolean().parse(raw);
  }

  async setModified(buf: number, modified: boolean): Promise<void> {
    await this.lua('local buf, value = ...; vim.bo[buf].modified = value', [buf, modified]);
  }

  async runAutocmds(event: WriteEvent, buf: number): Promise<void> {
    await this.lua(
      'local event, buf = ...; vim.api.nvim_exec_autocmds(event, { buffer = buf, modeline = false })',
      [event, buf],
    );
  }

  async notify(message: string, level: NotifyLevel): Promise<void> {
    await this.lua(
      'local msg, level, title = ...; vim.notify(msg, vim.log.levels[level], { title = title })',
      [message, LEVELS[level], this.title],
    );
  }

  /** `vim.g.commitment`, the editor-side config overrides. */
  async overrides(): Promise<unknown> {
    return this.lua('return vim.g.commitment or vim.empty_dict()');
  }
}
