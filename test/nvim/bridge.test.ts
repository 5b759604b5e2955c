import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, readFileSync, existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { handleRequest, WRITE_METHOD, TICK_METHOD } from '../../src/nvim/bridge.js';
import { setup, type CommitmentSession } from '../../src/session.js';
import { cfg, FakeHost, FakeInspector, steppingClock } from '../helpers.js';

let dir: string;
let host: FakeHost;
let session: CommitmentSession;

beforeEach(async () => {
  dir = mkdtempSync(join(tmpdir(), 'commitment-bridge-'));
  host = new FakeHost(dir);
  const started = await setup(host, cfg({ writes_number: 1, prevent_write: true }), {
    inspector: new FakeInspector(),
    now: steppingClock(),
  });
  if (!started) throw new Error('expected a session');
  session = started;
});
afterEach(() => {
  session.dispose();
  rmSync(dir, { recursive: true, force: true });
});

describe('handleRequest', () => {
  it('answers a write request with the save outcome', async () => {
    host.addBuffer(1, join(dir, 'a.txt'), ['x']);
    expect(await handleRequest(session, WRITE_METHOD, [1, false, join(dir, 'a.txt')])).toBe('written');
    host.addBuffer(1, join(dir, 'a.txt'), ['y']);
    expect(await handleRequest(session, WRITE_METHOD, [1, true, join(dir, 'a.txt')])).toBe('blocked');
  });

  it('answers a tick with the lock state', async () => {
    expect(await handleRequest(session, TICK_METHOD, [])).toBe(false);
    expect(await handleRequest(session, TICK_METHOD, [])).toBe(true);
  });

  it('writes to the buffer name when the command names no file', async () => {
    host.addBuffer(2, join(dir, 'b.txt'), ['b']);
    expect(await handleRequest(session, WRITE_METHOD, [2, false, ''])).toBe('written');
    expect(readFileSync(join(dir, 'b.txt'), 'utf8')).toBe('b\n');
  });

  it('writes to the file the command names', async () => {
    host.addBuffer(2, join(dir, 'b.txt'), ['b']);
    expect(await handleRequest(session, WRITE_METHOD, [2, false, join(dir, 'c.txt')])).toBe('written');
    expect(existsSync(join(dir, 'b.txt'))).toBe(false);
    expect(readFileSync(join(dir, 'c.txt'), 'utf8')).toBe('b\n');
  });

  it('rejects malformed write arguments', async () => {
    await expect(handleRequest(session, WRITE_METHOD, ['1'])).rejects.toThrow();
  });

  it('rejects unknown methods', async () => {
    await expect(handleRequest(session, 'commitment:nope', [])).rejects.toThrow(
      'Unknown method: commitment:nope',
    );
  });
});
