import type { Launch } from '../launches/launch';
import { MINUTES_PER_DAY, ONE_DAY_MS, ONE_MINUTE_MS, ONE_SECOND_MS } from '../time/durations';

/**
 * Instant à partir duquel on affiche le prochain lancement plutôt que le dernier.
 *
 * Moins de 24 h entre les deux : mi-chemin entre `now` et le prochain
 * lancement, compté depuis le dernier. Le résultat dépend de `now` et bouge
 * à chaque réévaluation. Sinon : 24 h après le dernier lancement.
 */
export function computeSwitchInstant(
  latest: Launch | null,
  next: Launch | null,
  now: number
): number | null {
  if (!latest || !next) return null;

  const minutesBetween = Math.round((next.time - latest.time) / ONE_MINUTE_MS);
  if (minutesBetween >= MINUTES_PER_DAY) {
    return latest.time + ONE_DAY_MS;
  }

  if (now > next.time) return now;
  const halfSecondsToNext = Math.round((next.time - now) / ONE_SECOND_MS / 2);
  return latest.time + halfSecondsToNext * ONE_SECOND_MS;
}

export function selectLaunch(latest: Launch | null, next: Launch | null, now: number): Launch | null {
  if (!latest) return next;
  if (!next) return latest;

  const switchAt = computeSwitchInstant(latest, next, now);
  return switchAt !== null && now >= switchAt ? next : latest;
}
