export type NotifyLevel = 'info' | 'warn' | 'error';

/** Autocommands the save interceptor replays so other plugins still see the write. */
export type WriteEvent = 'BufWritePre' | 'BufWritePost';

export interface NotificationSink {
  notify(message: string, level: NotifyLevel): Promise<void>;
}

/**
 * What the plugin needs from the editor. Buffers are addressed by handle,
 * `0` meaning the current one.
 */
export interface EditorHost extends NotificationSink {
  cwd(): Promise<string>;
  bufferName(buf: number): Promise<string>;
  getLines(buf: number): Promise<string[]>;
  isModified(buf: number): Promise<boolean>;
  setModified(buf: number, modified: boolean): Promise<void>;
  runAutocmds(event: WriteEvent, buf: number): Promise<void>;
}

export interface RepositoryInspector {
  isRepository(): Promise<boolean>;
  treeIsClean(): Promise<boolean>;
  lastCommitSubject(): Promise<string>;
  fileHasPendingChanges(path: string): Promise<boolean>;
}

export type LockReason = 'writes' | 'useless_commit';

export interface GateState {
  writesCount: number;
  locked: boolean;
  reason: LockReason | null;
}

export type TickTrigger = 'save' | 'interval';

export interface TickResult {
  clean: boolean;
  useless: boolean;
  subject: string;
  state: GateState;
  /** Message handed to the notifier, whether or not the debounce let it through. */
  message?: string;
}

export interface SaveRequest {
  buf: number;
  force?: boolean;
  /** File named by the write command (`:w other.txt`); defaults to the buffer's own name. */
  target?: string;
}

export type SaveOutcome =
  | { status: 'written'; path: string; lines: number; bytes: number }
  | { status: 'blocked'; message: string }
  | { status: 'unchanged' }
  | { status: 'failed'; path: string; error: string };
