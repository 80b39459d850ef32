import { describe, expect, it, vi } from 'vitest';

import { DEFAULT_PATCH, T, hours, makeLaunch, makeSourceSettings } from '../testing/fixtures';
import {
  LaunchLibrarySource,
  normalizeLibraryLaunch,
  toLaunchStatus,
  toTimePrecision
} from './launchLibraryClient';

const SECOND_PAGE = 'https://ll.example/2.2.0/launch/upcoming/?limit=25&mode=detailed&offset=25';

const at = (instant: number) => new Date(instant).toISOString();

function fakeHttp(pages: Record<string, unknown>) {
  return {
    get: vi.fn(async (url: string, _config?: { params?: Record<string, string | number> }) => {
      if (!(url in pages)) throw new Error(`unexpected ${url}`);
      return { data: pages[url] };
    })
  };
}

const pages = {
  'launch/upcoming/': {
    next: SECOND_PAGE,
    results: [
      {
        name: 'Early Rocket | Early Mission',
        net: at(T - hours(5)),
        status: { abbrev: 'Success' },
        rocket: { launcher_stage: [{ landing: { attempt: true, success: true } }] }
      }
    ]
  },
  [SECOND_PAGE]: {
    next: null,
    results: [
      { name: 'Late Rocket | Late Mission', net: at(T - hours(1)), status: { abbrev: 'Failure' } },
      { name: 'Next Rocket | Next Mission', net: at(T + hours(3)), status: { abbrev: 'Go' } },
      { name: 'Far Rocket | Far Mission', net: at(T + hours(10)), status: { abbrev: 'TBD' } }
    ]
  }
};

describe('LaunchLibrarySource', () => {
  it('walks the upcoming list until it finds a launch after now', async () => {
    const http = fakeHttp(pages);
    const source = new LaunchLibrarySource(makeSourceSettings({ kind: 'launch-library' }), http);

    const { latest, next } = await source.fetchLatestAndNext(T);

    expect(latest?.name).toBe('Late Rocket | Late Mission');
    expect(latest?.time).toBe(T - hours(1));
    expect(latest?.status).toBe('Failed');
    expect(next?.name).toBe('Next Rocket | Next Mission');
    expect(next?.status).toBe('Go');
    expect(http.get.mock.calls).toEqual([
      ['launch/upcoming/', { params: { limit: 25, mode: 'detailed', ordering: 'net' } }],
      [SECOND_PAGE, undefined]
    ]);
  });

  it('treats a launch at exactly now as the next one', async () => {
    const source = new LaunchLibrarySource(makeSourceSettings(), fakeHttp(pages));

    const { latest, next } = await source.fetchLatestAndNext(T + hours(3));

    expect(latest?.name).toBe('Late Rocket | Late Mission');
    expect(next?.time).toBe(T + hours(3));
  });

  it('stops after the configured number of pages', async () => {
    const http = fakeHttp(pages);
    const source = new LaunchLibrarySource(makeSourceSettings({ launchLibraryMaxPages: 1 }), http);

    const { latest, next } = await source.fetchLatestAndNext(T);

    expect(latest?.name).toBe('Early Rocket | Early Mission');
    expect(latest?.coreRecovery).toBe('Success');
    expect(next).toBeNull();
    expect(http.get).toHaveBeenCalledTimes(1);
  });

  it('returns nothing for an empty list', async () => {
    const source = new LaunchLibrarySource(
      makeSourceSettings(),
      fakeHttp({ 'launch/upcoming/': { next: null, results: [] } })
    );

    expect(await source.fetchLatestAndNext(T)).toEqual({ latest: null, next: null });
  });

  it('rejects a launch with an unreadable date', async () => {
    const source = new LaunchLibrarySource(
      makeSourceSettings(),
      fakeHttp({ 'launch/upcoming/': { next: null, results: [{ net: 'soon' }] } })
    );

    await expect(source.fetchLatestAndNext(T)).rejects.toThrow(
      /^launch-library launch\/upcoming\/ returned an invalid payload/
    );
  });
});

describe('normalizeLibraryLaunch', () => {
  it('reads mission, pad and rocket details', () => {
    const launch = normalizeLibraryLaunch(
      {
        name: 'Test Rocket | Test Mission',
        net: at(T),
        net_precision: { abbrev: 'MON', name: 'Month' },
        status: { abbrev: 'TBD', name: 'To Be Determined' },
        image: 'https://img.example/image.png',
        mission: { name: 'Test Mission', description: 'A test payload.' },
        pad: { name: 'Pad 1', location: { name: 'Test Coast' } },
        rocket: { configuration: { name: 'Test', full_name: 'Test Rocket' } },
        mission_patches: [{ image_url: ' ' }, { image_url: 'https://img.example/patch.png' }]
      },
      DEFAULT_PATCH
    );

    expect(launch).toEqual(makeLaunch({ timePrecision: 'month', status: 'TBD' }));
  });

  it('falls back on the launch name, pad name and image', () => {
    const launch = normalizeLibraryLaunch(
      {
        name: 'Test Rocket | Test Mission',
        net: at(T),
        image: 'https://img.example/image.png',
        pad: { name: 'Pad 1' },
        rocket: { configuration: { name: 'Test' } }
      },
      DEFAULT_PATCH
    );

    expect(launch.name).toBe('Test Rocket | Test Mission');
    expect(launch.locality).toBe('Pad 1');
    expect(launch.rocketName).toBe('Test');
    expect(launch.patchUrl).toBe('https://img.example/image.png');
    expect(launch.status).toBe('Scheduled');
  });

  it('uses the default patch without any image', () => {
    expect(normalizeLibraryLaunch({ net: at(T) }, DEFAULT_PATCH).patchUrl).toBe(DEFAULT_PATCH);
  });

  it('only aggregates landings once the outcome is known', () => {
    const rocket = { launcher_stage: [{ landing: { attempt: true, success: false } }] };
    const pending = normalizeLibraryLaunch({ net: at(T), status: { abbrev: 'Go' }, rocket }, DEFAULT_PATCH);
    const done = normalizeLibraryLaunch({ net: at(T), status: { abbrev: 'Success' }, rocket }, DEFAULT_PATCH);

    expect(pending.coreRecovery).toBe('NotApplicable');
    expect(done.coreRecovery).toBe('Failure');
  });
});

describe('toTimePrecision', () => {
  it.each([
    ['SEC', 'exact'],
    ['MIN', 'exact'],
    ['HR', 'hour'],
    ['DAY', 'day'],
    ['MON', 'month'],
    ['Q3', 'quarter'],
    ['H2', 'half'],
    ['Y', 'year'],
    ['FY', 'year'],
    [null, 'exact']
  ])('maps %s to %s', (abbrev, precision) => {
    expect(toTimePrecision(abbrev)).toBe(precision);
  });
});

describe('toLaunchStatus', () => {
  it('maps outcomes onto the canonical statuses', () => {
    expect(toLaunchStatus({ abbrev: 'Success' })).toBe('Launched');
    expect(toLaunchStatus({ abbrev: null, name: 'Launch Failure' })).toBe('Failed');
    expect(toLaunchStatus({ abbrev: 'Hold' })).toBe('Hold');
    expect(toLaunchStatus(undefined)).toBe('Scheduled');
  });
});
