import { CORE_RECOVERY_LABELS, type Launch } from '../launches/launch';
import { isInactive } from '../scheduling/activityWindow';
import { selectLaunch } from '../scheduling/displaySelector';
import { formatRelative, isSameCalendarDay } from '../time/timeFormatter';
import { LOCATION_PLACEHOLDER, NAME_PLACEHOLDER, renderTile, type TileOptions } from './tileRenderer';

export type SwitchValue = 'on' | 'off';

/** Attributs publiés vers le dashboard. */
export interface LaunchAttributes {
  time: number | string;
  timeStr: string;
  name: string;
  location: string;
  rocket: string;
  description: string;
  status: string;
  coreRecovery: string;
  switch: SwitchValue;
  tile: string;
}

export interface DisplayContext {
  now: number;
  timeZone: string;
  hoursInactive: number | null;
  clearWhenInactive: boolean;
  tile: TileOptions;
}

export interface LaunchDisplay {
  selected: Launch | null;
  inactive: boolean;
  attributes: LaunchAttributes;
}

export const NO_LAUNCH_DATA = 'No Launch Data';
export const ROCKET_PLACEHOLDER = 'Rocket Unavailable';
export const DESCRIPTION_PLACEHOLDER = 'No Description Available';

export function switchValue(
  latest: Launch | null,
  next: Launch | null,
  now: number,
  timeZone: string
): SwitchValue {
  const launchToday = [latest, next].some(
    (launch) => launch !== null && isSameCalendarDay(launch.time, now, timeZone)
  );
  return launchToday ? 'on' : 'off';
}

export function buildDisplay(
  latest: Launch | null,
  next: Launch | null,
  context: DisplayContext
): LaunchDisplay {
  const selected = selectLaunch(latest, next, context.now);
  const inactive = isInactive(latest, next, context.now, context.hoursInactive);
  const hidden = context.clearWhenInactive && inactive;
  const timeStr = selected
    ? formatRelative(selected.time, selected.timePrecision, context)
    : NO_LAUNCH_DATA;

  const tile = renderTile(selected && !hidden ? { launch: selected, timeStr } : null, context.tile);
  const value = switchValue(latest, next, context.now, context.timeZone);

  if (!selected) {
    return {
      selected,
      inactive,
      attributes: {
        time: NO_LAUNCH_DATA,
        timeStr: NO_LAUNCH_DATA,
        name: NO_LAUNCH_DATA,
        location: NO_LAUNCH_DATA,
        rocket: NO_LAUNCH_DATA,
        description: NO_LAUNCH_DATA,
        status: NO_LAUNCH_DATA,
        coreRecovery: NO_LAUNCH_DATA,
        switch: value,
        tile
      }
    };
  }

  return {
    selected,
    inactive,
    attributes: {
      time: selected.time,
      timeStr,
      name: selected.name ?? NAME_PLACEHOLDER,
      location: selected.locality ?? LOCATION_PLACEHOLDER,
      rocket: selected.rocketName ?? ROCKET_PLACEHOLDER,
      description: selected.description ?? DESCRIPTION_PLACEHOLDER,
      status: selected.status,
      coreRecovery: CORE_RECOVERY_LABELS[selected.coreRecovery],
      switch: value,
      tile
    }
  };
}
