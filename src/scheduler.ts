import { error, errorMessage } from './log.js';

export interface ScheduleHandle {
  readonly running: boolean;
  stop(): void;
}

export const minutesToMs = (minutes: number) => minutes * 60 * 1000;

/**
 * Runs `task` every `intervalMs`. The next run is armed only after the
 * previous one settles, so runs never overlap and drift by the task's own
 * duration. A failing run is logged and the chain continues.
 */
export function startInterval(task: () => Promise<unknown>, intervalMs: number): ScheduleHandle {
  let timer: ReturnType<typeof setTimeout> | null = null;
  let running = true;

  const arm = () => {
    if (!running) return;
    timer = setTimeout(() => {
      timer = null;
      void run();
    }, intervalMs);
  };

  const run = async () => {
    try {
      await task();
    } catch (e) {
      error('scheduler', 'scheduled check failed:', errorMessage(e));
    }
    arm();
  };

  arm();

  return {
    get running() {
      return running;
    },
    stop() {
      running = false;
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
    },
  };
}
