import type { NotificationSink, NotifyLevel } from './types.js';
import { performance } from 'node:perf_hooks';

export const DEBOUNCE_INTERVAL_MS = 500;

export interface NotifierOptions {
  level?: NotifyLevel;
  intervalMs?: number;
  /** Monotonic clock in milliseconds. */
  now?: () => number;
}

/**
 * Sliding debounce in front of a sink: a message is delivered only if more
 * than `intervalMs` passed since the previous call, delivered or not. A burst
 * of calls keeps pushing the window forward.
 */
export class DebouncedNotifier {
  private lastCallAt: number | undefined;
  private readonly level: NotifyLevel;
  private readonly intervalMs: number;
  private readonly now: () => number;

  constructor(
    private sink: NotificationSink,
    opts: NotifierOptions = {},
  ) {
    this.level = opts.level ?? 'warn';
    this.intervalMs = opts.intervalMs ?? DEBOUNCE_INTERVAL_MS;
    this.now = opts.now ?? (() => performance.now());
  }

  /** Resolves to whether the message reached the sink. */
  async notify(message: string): Promise<boolean> {
    const current = this.now();
    const deliver =
      this.lastCallAt === undefined || current - this.lastCallAt > this.intervalMs;
    this.lastCallAt = current;
    if (!deliver) return false;
    await this.sink.notify(message, this.level);
    return true;
  }
}
