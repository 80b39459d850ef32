import { isStatusResolved, type Launch } from '../launches/launch';
import { ONE_HOUR_MS, ONE_MINUTE_MS } from '../time/durations';
import { computeSwitchInstant } from './displaySelector';

export type WakeupKind =
  | 'switchDisplay'
  | 'postLaunchRefresh'
  | 'statusRetry'
  | 'inactivityStart'
  | 'inactivityEnd';

/**
 * - `select` : recalcule l'affichage sans appeler l'API
 * - `refetch` : cycle complet
 * - `statusCheck` : relit l'API pour voir si le statut du dernier lancement a bougé
 */
export type WakeupAction = 'select' | 'refetch' | 'statusCheck';

export interface Wakeup {
  kind: WakeupKind;
  action: WakeupAction;
  at: number;
}

export interface StatusRetryState {
  intervalMs: number;
  maxAttempts: number;
  attempts: number;
}

// Délai laissé à l'API pour publier le résultat d'un lancement.
export const POST_LAUNCH_SETTLE_MS = 10 * ONE_MINUTE_MS;
export const STATUS_RETRY_WINDOW_MS = 3 * ONE_HOUR_MS;

const ACTIONS: Record<WakeupKind, WakeupAction> = {
  switchDisplay: 'select',
  postLaunchRefresh: 'refetch',
  statusRetry: 'statusCheck',
  inactivityStart: 'refetch',
  inactivityEnd: 'refetch'
};

// Une relance de statut déjà armée garde sa date d'origine d'un plan à l'autre.
export function wakeupKey(wakeup: Wakeup): string {
  return wakeup.kind === 'statusRetry' ? wakeup.kind : `${wakeup.kind}@${wakeup.at}`;
}

export function shouldRetryStatus(
  latest: Launch | null,
  now: number,
  retry: StatusRetryState
): boolean {
  if (!latest || isStatusResolved(latest.status)) return false;
  if (retry.attempts >= retry.maxAttempts) return false;
  return now - latest.time < STATUS_RETRY_WINDOW_MS;
}

/**
 * Liste des réveils à armer pour l'état courant, triée par date. Fonction
 * pure : le tracker compare le résultat aux timers déjà armés.
 */
export function planWakeups(
  latest: Launch | null,
  next: Launch | null,
  now: number,
  hoursInactive: number | null,
  retry: StatusRetryState
): Wakeup[] {
  const candidates: Array<[WakeupKind, number | null]> = [];

  candidates.push(['switchDisplay', computeSwitchInstant(latest, next, now)]);

  if (next) {
    candidates.push(['postLaunchRefresh', next.time + POST_LAUNCH_SETTLE_MS]);
  }

  if (shouldRetryStatus(latest, now, retry)) {
    candidates.push(['statusRetry', now + retry.intervalMs]);
  }

  if (hoursInactive !== null) {
    const offsetMs = hoursInactive * ONE_HOUR_MS;
    if (latest) candidates.push(['inactivityStart', latest.time + offsetMs]);
    if (next) candidates.push(['inactivityEnd', next.time - offsetMs]);
  }

  return candidates
    .filter((entry): entry is [WakeupKind, number] => entry[1] !== null && entry[1] > now)
    .map(([kind, at]) => ({ kind, action: ACTIONS[kind], at }))
    .sort((a, b) => a.at - b.at);
}
