import { mergeConfig, type CommitmentConfig } from '../src/config.js';
import type { EditorHost, NotifyLevel, RepositoryInspector, WriteEvent } from '../src/types.js';

export function cfg(overrides: Partial<CommitmentConfig> = {}): CommitmentConfig {
  return mergeConfig(overrides);
}

export class FakeInspector implements RepositoryInspector {
  repository = true;
  clean = false;
  subject = 'implement retry backoff for flaky uploads';
  pending = new Set<string>();
  statusCalls = 0;

  async isRepository() {
    return this.repository;
  }
  async treeIsClean() {
    this.statusCalls++;
    return this.clean;
  }
  async lastCommitSubject() {
    return this.subject;
  }
  async fileHasPendingChanges(path: string) {
    return this.pending.has(path);
  }
}

export interface Notification {
  message: string;
  level: NotifyLevel;
}

export class RecordingSink {
  notifications: Notification[] = [];
  async notify(message: string, level: NotifyLevel) {
    this.notifications.push({ message, level });
  }
  messages(level?: NotifyLevel) {
    return this.notifications.filter((n) => !level || n.level === level).map((n) => n.message);
  }
}

interface FakeBuffer {
  name: string;
  lines: string[];
  modified: boolean;
}

export class FakeHost extends RecordingSink implements EditorHost {
  buffers = new Map<number, FakeBuffer>();
  events: Array<{ event: WriteEvent; buf: number }> = [];

  constructor(private dir: string) {
    super();
  }

  addBuffer(buf: number, name: string, lines: string[], modified = true) {
    this.buffers.set(buf, { name, lines, modified });
  }

  private buffer(buf: number): FakeBuffer {
    const b = this.buffers.get(buf);
    if (!b) throw new Error(`no buffer ${buf}`);
    return b;
  }

  async cwd() {
    return this.dir;
  }
  async bufferName(buf: number) {
    return this.buffer(buf).name;
  }
  async getLines(buf: number) {
    return this.buffer(buf).lines;
  }
  async isModified(buf: number) {
    return this.buffer(buf).modified;
  }
  async setModified(buf: number, modified: boolean) {
    this.buffer(buf).modified = modified;
  }
  async runAutocmds(event: WriteEvent, buf: number) {
    this.events.push({ event, buf });
  }
}

/** A clock that moves a full second per reading, so the debounce never bites. */
export const steppingClock = (step = 1000) => {
  let t = 0;
  return () => (t += step);
};
