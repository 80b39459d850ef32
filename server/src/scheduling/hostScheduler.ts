export interface TimerHandle {
  cancel(): void;
}

/** Primitives de planification fournies par l'hôte. */
export interface HostScheduler {
  runAt(at: number, task: () => void): TimerHandle;
  every(intervalMs: number, task: () => void): TimerHandle;
}

// setTimeout déborde au-delà de 2^31 - 1 ms (~24,8 jours) et se déclenche tout de suite.
export const MAX_TIMEOUT_MS = 2_147_483_647;

export function createTimerScheduler(now: () => number = Date.now): HostScheduler {
  return {
    runAt(at, task) {
      let timer: NodeJS.Timeout | null = null;
      let cancelled = false;

      const arm = () => {
        const delay = Math.max(0, at - now());
        if (delay > MAX_TIMEOUT_MS) {
          timer = setTimeout(arm, MAX_TIMEOUT_MS);
          return;
        }
        timer = setTimeout(() => {
          timer = null;
          if (!cancelled) task();
        }, delay);
      };
      arm();

      return {
        cancel() {
          cancelled = true;
          if (timer) clearTimeout(timer);
          timer = null;
        }
      };
    },

    every(intervalMs, task) {
      const timer = setInterval(task, intervalMs);
      return {
        cancel() {
          clearInterval(timer);
        }
      };
    }
  };
}
