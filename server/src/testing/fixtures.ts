import type { DisplayOptions, SourceSettings } from '../config/launchConfig';
import type { Launch } from '../launches/launch';
import { ONE_HOUR_MS } from '../time/durations';

// Mercredi 21 octobre 2026, 15:05 UTC.
export const T = Date.UTC(2026, 9, 21, 15, 5);

export const hours = (count: number): number => count * ONE_HOUR_MS;

export const DEFAULT_PATCH = '/assets/default-patch.svg';

export function makeLaunch(overrides: Partial<Launch> = {}): Launch {
  return {
    time: T,
    timePrecision: 'exact',
    name: 'Test Mission',
    locality: 'Test Coast',
    rocketName: 'Test Rocket',
    description: 'A test payload.',
    patchUrl: 'https://img.example/patch.png',
    status: 'Scheduled',
    coreRecovery: 'NotApplicable',
    ...overrides
  };
}

export function makeDisplayOptions(overrides: Partial<DisplayOptions> = {}): DisplayOptions {
  return {
    clearWhenInactive: false,
    hoursInactive: 24,
    refreshIntervalMinutes: 120,
    showName: false,
    showLocality: false,
    dashboardLayout: 'compact',
    textColor: '#000000',
    debugLogging: false,
    ...overrides
  };
}

export function makeSourceSettings(overrides: Partial<SourceSettings> = {}): SourceSettings {
  return {
    kind: 'spacex-v4',
    spacexApiUrl: 'https://spacex.example/v4/',
    launchLibraryApiUrl: 'https://ll.example/2.2.0/',
    launchLibraryMaxPages: 5,
    timeoutMs: 1000,
    defaultPatchUrl: DEFAULT_PATCH,
    ...overrides
  };
}
