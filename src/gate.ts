import type { CommitmentConfig } from './config.js';
import type { DebouncedNotifier } from './notifier.js';
import { isUselessCommitMessage } from './useless.js';
import type { GateState, LockReason, RepositoryInspector, TickResult, TickTrigger } from './types.js';
import { debug } from './log.js';

export const WRITE_DISABLED_SUFFIX = '\n(writing to file disabled)';

type GateConfig = Pick<
  CommitmentConfig,
  | 'message'
  | 'message_write_prevent'
  | 'message_useless_commit'
  | 'prevent_write'
  | 'writes_number'
>;

/**
 * Owns the write counter and the lock. Every tick asks git whether the tree
 * is clean and whether the last commit message is any good, then either
 * unlocks, locks and warns, or leaves things as they are.
 */
export class WriteGate {
  private writesCount = 0;
  private locked = false;
  private reason: LockReason | null = null;

  constructor(
    private config: GateConfig,
    private inspector: RepositoryInspector,
    private notifier: DebouncedNotifier,
  ) {}

  get state(): GateState {
    return { writesCount: this.writesCount, locked: this.locked, reason: this.reason };
  }

  /** Whether a save attempted right now must be skipped. Only hardcore mode ever blocks. */
  blocksWrites(): boolean {
    return this.locked && this.config.prevent_write;
  }

  message(): string {
    const c = this.config;
    let main = c.prevent_write ? c.message_write_prevent : c.message;
    if (this.reason === 'useless_commit') main = c.message_useless_commit;
    return this.blocksWrites() ? main + WRITE_DISABLED_SUFFIX : main;
  }

  async tick(trigger: TickTrigger = 'save'): Promise<TickResult> {
    const clean = await this.inspector.treeIsClean();
    const subject = await this.inspector.lastCommitSubject();
    const useless = isUselessCommitMessage(subject);
    // The write being attempted is number writesCount + 1; an elapsed interval always counts as over.
    const exceeded = trigger === 'interval' || this.writesCount + 1 > this.config.writes_number;

    let message: string | undefined;
    if (clean && !useless) {
      this.locked = false;
      this.reason = null;
      this.writesCount = 0;
    } else if ((!clean && exceeded) || (clean && useless)) {
      this.locked = true;
      this.reason = useless ? 'useless_commit' : 'writes';
      message = this.message();
      await this.notifier.notify(message);
    }
    this.writesCount++;

    debug('gate', trigger, { clean, useless, subject, ...this.state });
    return { clean, useless, subject, state: this.state, message };
  }
}
