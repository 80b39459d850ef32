import type { Launch, TimePrecision } from '../launches/launch';
import { ONE_HOUR_MS } from '../time/durations';

export interface InactivityWindow {
  /** Début de la période creuse : `hoursInactive` après le dernier lancement. */
  start: number | null;
  /** Fin : `hoursInactive` avant le prochain, si son horaire est assez précis. */
  end: number | null;
}

const PRECISIONS_WITH_END: ReadonlySet<TimePrecision> = new Set(['exact', 'hour', 'day']);

export function inactivityWindow(
  latest: Launch | null,
  next: Launch | null,
  hoursInactive: number | null
): InactivityWindow {
  if (hoursInactive === null) return { start: null, end: null };

  const offsetMs = hoursInactive * ONE_HOUR_MS;
  return {
    start: latest ? latest.time + offsetMs : null,
    end: next && PRECISIONS_WITH_END.has(next.timePrecision) ? next.time - offsetMs : null
  };
}

export function isInactive(
  latest: Launch | null,
  next: Launch | null,
  now: number,
  hoursInactive: number | null
): boolean {
  const { start, end } = inactivityWindow(latest, next, hoursInactive);

  if (start !== null && end !== null) return now > start && now < end;
  if (end !== null) return now < end;
  if (start !== null) return now > start;
  return false;
}
