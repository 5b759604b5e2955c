import { createConnection } from 'node:net';
import { once } from 'node:events';
import { attach } from 'neovim';
import { z } from 'zod';
import { loadConfig } from '../config.js';
import { setup, type CommitmentSession } from '../session.js';
import { NeovimHost } from './host.js';
import { debug, error, errorMessage } from '../log.js';

export const WRITE_METHOD = 'commitment:write';
export const TICK_METHOD = 'commitment:tick';

// If the companion process is gone, drop the group so writes fall back to Neovim's own.
const AUTOCMDS_LUA = `
local chan, intercept, watch, write_method, tick_method = ...
local group = vim.api.nvim_create_augroup('commitment', { clear = true })
local function call(method, ...)
  local ok, err = pcall(vim.rpcrequest, chan, method, ...)
  if not ok then
    pcall(vim.api.nvim_del_augroup_by_id, group)
    vim.notify('commitment: ' .. tostring(err), vim.log.levels.ERROR)
  end
end
if intercept then
  vim.api.nvim_create_autocmd('BufWriteCmd', {
    group = group,
    callback = function(args)
      call(write_method, args.buf, vim.v.cmdbang == 1, vim.fn.fnamemodify(args.match, ':p'))
    end,
  })
end
if watch then
  vim.api.nvim_create_autocmd('BufWritePre', {
    group = group,
    callback = function() call(tick_method) end,
  })
end
`;

interface RpcResponse {
  send(value: unknown, isError?: boolean): void;
}

const WriteArgs = z.tuple([z.number().int(), z.boolean(), z.string()]);
const ApiInfo = z.tuple([z.number().int(), z.unknown()]);

export async function handleRequest(
  session: CommitmentSession,
  method: string,
  args: unknown,
): Promise<unknown> {
  switch (method) {
    case WRITE_METHOD: {
      const [buf, force, target] = WriteArgs.parse(args);
      const outcome = await session.save({ buf, force, target: target || undefined });
      return outcome.status;
    }
    case TICK_METHOD: {
      const result = await session.beforeWrite();
      return result.state.locked;
    }
    default:
      throw new Error(`Unknown method: ${method}`);
  }
}

export interface BridgeOptions {
  socket: string;
}

/**
 * Attaches to a running Neovim, installs the autocommands and serves their
 * requests until the editor goes away.
 */
export async function runBridge(opts: BridgeOptions): Promise<void> {
  const socket = createConnection(opts.socket);
  await once(socket, 'connect');
  socket.on('error', (e) => error('bridge', 'socket error:', errorMessage(e)));
  const closed = new Promise<void>((resolve) => socket.once('close', () => resolve()));
  const nvim = attach({ reader: socket, writer: socket });

  const probe = new NeovimHost(nvim);
  const cwd = await probe.cwd();
  let host: NeovimHost;
  let started: CommitmentSession | null;
  try {
    const config = await loadConfig(cwd, await probe.overrides());
    host = new NeovimHost(nvim, config.notify.title);
    started = await setup(host, config);
  } catch (e) {
    await probe.notify(`commitment: ${errorMessage(e)}`, 'error');
    socket.end();
    throw e;
  }
  if (!started) {
    socket.end();
    await closed;
    return;
  }
  const session = started;

  nvim.on('request', (method: string, args: unknown, resp: RpcResponse) => {
    void handleRequest(session, method, args).then(
      (value) => resp.send(value),
      (e) => {
        error('rpc', `${method} failed:`, errorMessage(e));
        resp.send(errorMessage(e), true);
      },
    );
  });

  const [channel] = ApiInfo.parse(await nvim.request('nvim_get_api_info', []));
  const watch = session.mode === 'event' && !session.intercepting;
  await host.lua(AUTOCMDS_LUA, [channel, session.intercepting, watch, WRITE_METHOD, TICK_METHOD]);
  debug('bridge', `attached on channel ${channel}`, { cwd, mode: session.mode });

  await closed;
  session.dispose();
  debug('bridge', 'editor disconnected');
}
