import type { Server } from 'http';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createApp } from '../app';
import { LaunchBoard } from '../display/launchBoard';
import { EMPTY_TILE } from '../display/tileRenderer';
import { createLaunchTracker, type LaunchTracker } from '../engine/launchTracker';
import type { LatestAndNext } from '../launches/launch';
import { createTimerScheduler } from '../scheduling/hostScheduler';
import { MemoryStateStore } from '../state/launchStateStore';
import { hours, makeDisplayOptions, makeLaunch } from '../testing/fixtures';

describe('launch routes', () => {
  let server: Server;
  let baseUrl: string;
  let tracker: LaunchTracker;
  const fetchLatestAndNext = vi.fn<(now: number) => Promise<LatestAndNext>>();

  beforeEach(async () => {
    fetchLatestAndNext.mockReset();
    const board = new LaunchBoard();
    tracker = createLaunchTracker({
      source: { kind: 'spacex-v4', fetchLatestAndNext },
      store: new MemoryStateStore(),
      sink: board,
      scheduler: createTimerScheduler(),
      timeZone: 'UTC',
      display: makeDisplayOptions({ refreshIntervalMinutes: 10_000 }),
      statusRetry: { intervalMs: 600_000, maxAttempts: 3 }
    });

    server = createApp(tracker, board).listen(0, '127.0.0.1');
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('server is not listening');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    tracker.stop();
    await new Promise<void>((resolve, reject) =>
      server.close((err) => (err ? reject(err) : resolve()))
    );
  });

  const withLaunches = () => {
    const now = Date.now();
    fetchLatestAndNext.mockResolvedValue({
      latest: makeLaunch({ time: now - hours(2), status: 'Launched' }),
      next: makeLaunch({ time: now + hours(40), name: 'Next Mission' })
    });
  };

  it('answers 503 until launches are loaded', async () => {
    const response = await fetch(`${baseUrl}/api/launch`);

    expect(response.status).toBe(503);
    expect(await response.json()).toEqual({ error: 'Launch data not loaded yet' });
  });

  it('serves the published attributes', async () => {
    withLaunches();
    await tracker.refresh();

    const response = await fetch(`${baseUrl}/api/launch`);
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(response.headers.get('x-launch-published-at')).not.toBeNull();
    expect(body).toMatchObject({ name: 'Test Mission', status: 'Launched' });
  });

  it('serves an empty tile before the first refresh', async () => {
    const response = await fetch(`${baseUrl}/api/launch/tile`);

    expect(response.headers.get('content-type')).toBe('text/html; charset=utf-8');
    expect(await response.text()).toBe(EMPTY_TILE);
  });

  it('echoes the request id', async () => {
    const response = await fetch(`${baseUrl}/api/launch/state`, {
      headers: { 'X-Request-Id': 'test-request' }
    });

    expect(response.headers.get('x-request-id')).toBe('test-request');
    expect(await response.json()).toMatchObject({ latest: null, next: null, wakeups: [] });
  });

  it('reports a failed manual refresh', async () => {
    fetchLatestAndNext.mockRejectedValue(new Error('offline'));

    const response = await fetch(`${baseUrl}/api/launch/refresh`, { method: 'POST' });

    expect(response.status).toBe(502);
    expect(await response.json()).toMatchObject({ refreshed: false, error: 'offline' });
  });

  it('rejects unknown options', async () => {
    const response = await fetch(`${baseUrl}/api/launch/configure`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ theme: 'dark' })
    });

    expect(response.status).toBe(400);
  });

  it('applies new options', async () => {
    withLaunches();

    const response = await fetch(`${baseUrl}/api/launch/configure`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ showName: true, hoursInactive: null })
    });
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body).toMatchObject({
      display: { showName: true, hoursInactive: null },
      attributes: { tile: expect.stringContaining('<b>Test Mission</b>') }
    });
  });

  it('serves the default patch', async () => {
    const response = await fetch(`${baseUrl}/assets/default-patch.svg`);

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toContain('image/svg+xml');
  });
});
