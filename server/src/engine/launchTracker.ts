import {
  applyDisplayPatch,
  type DisplayOptions,
  type DisplayOptionsPatch,
  type StatusRetrySettings
} from '../config/launchConfig';
import { buildDisplay, type LaunchDisplay } from '../display/launchDisplay';
import type { AttributeSink } from '../display/launchBoard';
import type { Launch, LatestAndNext } from '../launches/launch';
import type { LaunchSource } from '../launches/launchSource';
import { UpstreamError } from '../launches/upstreamError';
import {
  errorMessage,
  logDebug,
  logError,
  logInfo,
  logWarn,
  setDebugLogging
} from '../observability/logger';
import {
  recordArmedWakeups,
  recordStatusRetry,
  recordWakeupFired,
  type StatusRetryOutcome
} from '../observability/metrics';
import type { HostScheduler, TimerHandle } from '../scheduling/hostScheduler';
import { planWakeups, wakeupKey, type Wakeup } from '../scheduling/wakeupPlanner';
import type { LaunchStateStore } from '../state/launchStateStore';
import { ONE_MINUTE_MS } from '../time/durations';

export interface LaunchTrackerOptions {
  source: LaunchSource;
  store: LaunchStateStore;
  sink: AttributeSink;
  scheduler: HostScheduler;
  timeZone: string;
  display: DisplayOptions;
  statusRetry: StatusRetrySettings;
  now?: () => number;
}

export interface TrackerSnapshot {
  latest: Launch | null;
  next: Launch | null;
  statusRetryAttempts: number;
  wakeups: Wakeup[];
  lastRefreshAt: number | null;
  lastError: string | null;
  display: DisplayOptions;
}

interface ArmedWakeup {
  wakeup: Wakeup;
  handle: TimerHandle;
}

/**
 * Possède l'état (dernier / prochain lancement, compteur de relances) et le
 * seul ensemble de timers. Chaque cycle passe par une file sérielle :
 * fetch → sélection → publication → replanification.
 */
export function createLaunchTracker(options: LaunchTrackerOptions) {
  const now = options.now ?? Date.now;
  const { source, store, sink, scheduler, timeZone, statusRetry } = options;

  let display = options.display;
  let latest: Launch | null = null;
  let next: Launch | null = null;
  let statusRetryAttempts = 0;
  let lastRefreshAt: number | null = null;
  let lastError: string | null = null;

  const armed = new Map<string, ArmedWakeup>();
  let refreshTimer: TimerHandle | null = null;
  let queue: Promise<void> = Promise.resolve();

  setDebugLogging(display.debugLogging);

  const enqueue = (cycle: string, job: () => Promise<void>): Promise<void> => {
    const run = queue.then(job).catch((err: unknown) => {
      logError('launch_cycle_failed', { cycle, error: errorMessage(err) });
    });
    queue = run;
    return run;
  };

  const evaluate = (): LaunchDisplay => {
    const result = buildDisplay(latest, next, {
      now: now(),
      timeZone,
      hoursInactive: display.hoursInactive,
      clearWhenInactive: display.clearWhenInactive,
      tile: display
    });
    sink.publish(result.attributes);
    logDebug('launch_display_updated', {
      showing: result.selected === null ? 'none' : result.selected === next ? 'next' : 'latest',
      inactive: result.inactive,
      timeStr: result.attributes.timeStr
    });
    return result;
  };

  // Un stockage en panne ne doit pas bloquer le cycle.
  const persist = async () => {
    try {
      await store.save({ latest, next, statusRetryAttempts, updatedAt: now() });
    } catch (err) {
      logWarn('launch_state_save_failed', { backend: store.backend, error: errorMessage(err) });
    }
  };

  const disarm = (key: string) => {
    const entry = armed.get(key);
    if (!entry) return;
    entry.handle.cancel();
    armed.delete(key);
  };

  const arm = (wakeup: Wakeup) => {
    const key = wakeupKey(wakeup);
    disarm(key);
    const handle = scheduler.runAt(wakeup.at, () => onWakeup(key, wakeup));
    armed.set(key, { wakeup, handle });
  };

  const disarmAll = () => {
    for (const key of [...armed.keys()]) disarm(key);
    recordArmedWakeups(0);
  };

  const replan = () => {
    const plan = planWakeups(latest, next, now(), display.hoursInactive, {
      ...statusRetry,
      attempts: statusRetryAttempts
    });
    const wanted = new Map(plan.map((wakeup) => [wakeupKey(wakeup), wakeup]));

    for (const key of [...armed.keys()]) {
      if (!wanted.has(key)) disarm(key);
    }
    for (const [key, wakeup] of wanted) {
      if (!armed.has(key)) arm(wakeup);
    }

    recordArmedWakeups(armed.size);
    logDebug('launch_wakeups_planned', {
      wakeups: [...armed.values()].map(({ wakeup }) => ({
        kind: wakeup.kind,
        at: new Date(wakeup.at).toISOString()
      }))
    });
  };

  const fetchState = async (reason: string): Promise<LatestAndNext | null> => {
    try {
      return await source.fetchLatestAndNext(now());
    } catch (err) {
      lastError = errorMessage(err);
      if (err instanceof UpstreamError) {
        logWarn('launch_refresh_failed', {
          reason,
          source: err.source,
          endpoint: err.endpoint,
          status: err.status,
          error: err.message
        });
      } else {
        logError('launch_refresh_failed', { reason, source: source.kind, error: lastError });
      }
      return null;
    }
  };

  const adopt = (fetched: LatestAndNext) => {
    if (fetched.latest?.time !== latest?.time) {
      statusRetryAttempts = 0;
    }
    latest = fetched.latest;
    next = fetched.next;
    lastRefreshAt = now();
    lastError = null;
  };

  const refreshCycle = async (reason: string) => {
    const fetched = await fetchState(reason);
    // En cas d'échec on garde l'état précédent et les réveils déjà armés.
    if (!fetched) return;

    adopt(fetched);
    evaluate();
    replan();
    await persist();

    logInfo('launch_refresh', {
      reason,
      latest: latest ? new Date(latest.time).toISOString() : null,
      next: next ? new Date(next.time).toISOString() : null,
      wakeups: armed.size
    });
  };

  const statusCheckCycle = async () => {
    statusRetryAttempts += 1;
    const previous = latest;
    const previousNext = next;
    const fetched = await fetchState('statusRetry');

    if (fetched) adopt(fetched);

    const changed =
      fetched !== null &&
      (latest?.time !== previous?.time || latest?.status !== previous?.status);
    const nextMoved = fetched !== null && next?.time !== previousNext?.time;

    let outcome: StatusRetryOutcome;
    if (changed) {
      outcome = 'resolved';
      statusRetryAttempts = 0;
      evaluate();
      replan();
    } else {
      // Prochain lancement reporté : les réveils qui en dépendent suivent.
      if (nextMoved) {
        evaluate();
        replan();
      }
      if (statusRetryAttempts < statusRetry.maxAttempts) {
        outcome = fetched ? 'unchanged' : 'failed';
        arm({ kind: 'statusRetry', action: 'statusCheck', at: now() + statusRetry.intervalMs });
        recordArmedWakeups(armed.size);
      } else {
        outcome = 'exhausted';
        logDebug('launch_status_retry_exhausted', { attempts: statusRetryAttempts });
        statusRetryAttempts = 0;
      }
    }

    recordStatusRetry(outcome);
    await persist();
  };

  function onWakeup(key: string, wakeup: Wakeup): void {
    armed.delete(key);
    recordArmedWakeups(armed.size);
    recordWakeupFired(wakeup.kind);
    logDebug('wakeup_fired', { kind: wakeup.kind, at: new Date(wakeup.at).toISOString() });

    switch (wakeup.action) {
      case 'select':
        void enqueue(wakeup.kind, async () => {
          evaluate();
          replan();
        });
        return;
      case 'refetch':
        void enqueue(wakeup.kind, () => refreshCycle(wakeup.kind));
        return;
      case 'statusCheck':
        void enqueue(wakeup.kind, statusCheckCycle);
        return;
    }
  }

  const startRefreshTimer = () => {
    refreshTimer?.cancel();
    refreshTimer = scheduler.every(display.refreshIntervalMinutes * ONE_MINUTE_MS, () => {
      void enqueue('interval', () => refreshCycle('interval'));
    });
  };

  return {
    /** Republie l'état sauvegardé puis lance le premier rafraîchissement. */
    start(): Promise<void> {
      startRefreshTimer();
      return enqueue('startup', async () => {
        const saved = await store.load().catch((err: unknown) => {
          logWarn('launch_state_load_failed', { backend: store.backend, error: errorMessage(err) });
          return null;
        });
        if (saved) {
          latest = saved.latest;
          next = saved.next;
          statusRetryAttempts = saved.statusRetryAttempts;
          logInfo('launch_state_restored', { backend: store.backend, updatedAt: saved.updatedAt });
        }
        // Publie tout de suite, « No Launch Data » compris.
        evaluate();
        replan();
        await refreshCycle('startup');
      });
    },

    refresh(reason = 'manual'): Promise<void> {
      return enqueue('refresh', () => refreshCycle(reason));
    },

    /** Applique les options, oublie l'état et les réveils, puis rafraîchit. */
    configure(patch: DisplayOptionsPatch = {}): Promise<void> {
      return enqueue('configure', async () => {
        display = applyDisplayPatch(display, patch);
        setDebugLogging(display.debugLogging);
        logInfo('launch_configured', { ...patch });

        disarmAll();
        latest = null;
        next = null;
        statusRetryAttempts = 0;
        lastRefreshAt = null;
        await store.clear().catch((err: unknown) => {
          logWarn('launch_state_clear_failed', { backend: store.backend, error: errorMessage(err) });
        });
        evaluate();
        startRefreshTimer();
        await refreshCycle('configure');
      });
    },

    stop(): void {
      refreshTimer?.cancel();
      refreshTimer = null;
      disarmAll();
    },

    snapshot(): TrackerSnapshot {
      return {
        latest,
        next,
        statusRetryAttempts,
        wakeups: [...armed.values()].map(({ wakeup }) => wakeup).sort((a, b) => a.at - b.at),
        lastRefreshAt,
        lastError,
        display
      };
    },

    /** Attend la fin des cycles déjà en file. */
    idle(): Promise<void> {
      return queue;
    }
  };
}

export type LaunchTracker = ReturnType<typeof createLaunchTracker>;
