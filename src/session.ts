import type { CommitmentConfig } from './config.js';
import { GitInspector } from './git.js';
import { WriteGate } from './gate.js';
import { DebouncedNotifier } from './notifier.js';
import { type ScheduleHandle, minutesToMs, startInterval } from './scheduler.js';
import { interceptSave } from './write.js';
import type {
  EditorHost,
  NotificationSink,
  RepositoryInspector,
  SaveOutcome,
  SaveRequest,
  TickResult,
} from './types.js';
import { debug } from './log.js';

export type SessionMode = 'event' | 'interval';

export interface SetupDeps {
  inspector?: RepositoryInspector;
  /** Where warnings go; defaults to the host itself. */
  sink?: NotificationSink;
  now?: () => number;
}

export interface CommitmentSession {
  readonly mode: SessionMode;
  /** Saves must be routed through `save` instead of the editor's own write. */
  readonly intercepting: boolean;
  readonly gate: WriteGate;
  save(req: SaveRequest): Promise<SaveOutcome>;
  /** Hook for the editor's pre-write event when saves are not intercepted. */
  beforeWrite(): Promise<TickResult>;
  dispose(): void;
}

export async function setup(
  host: EditorHost,
  config: CommitmentConfig,
  deps: SetupDeps = {},
): Promise<CommitmentSession | null> {
  const inspector = deps.inspector ?? GitInspector.forDirectory(await host.cwd());
  if (!(await inspector.isRepository())) {
    debug('session', 'not inside a git repository, staying idle');
    return null;
  }

  const notifier = new DebouncedNotifier(deps.sink ?? host, {
    level: config.notify.level,
    now: deps.now,
  });
  const gate = new WriteGate(config, inspector, notifier);
  const mode: SessionMode = config.check_interval === -1 ? 'event' : 'interval';
  const intercepting = config.prevent_write;

  let schedule: ScheduleHandle | null = null;
  if (mode === 'interval') {
    schedule = startInterval(() => gate.tick('interval'), minutesToMs(config.check_interval));
  }
  debug('session', `started in ${mode} mode`, { intercepting });

  return {
    mode,
    intercepting,
    gate,
    save: (req) => interceptSave(host, gate, req, { evaluate: mode === 'event' }),
    beforeWrite: () => gate.tick('save'),
    dispose() {
      schedule?.stop();
      schedule = null;
    },
  };
}
