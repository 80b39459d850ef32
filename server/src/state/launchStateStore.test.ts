import { beforeEach, describe, expect, it, vi } from 'vitest';

import { T, hours, makeLaunch } from '../testing/fixtures';
import {
  createLaunchStateStore,
  decodeState,
  MemoryStateStore,
  RedisStateStore,
  STATE_KEY,
  type PersistedLaunchState
} from './launchStateStore';

const redis = vi.hoisted(() => {
  const entries = new Map<string, string>();
  const client = {
    on: vi.fn(),
    connect: vi.fn(async () => undefined),
    get: vi.fn(async (key: string) => entries.get(key) ?? null),
    set: vi.fn(async (key: string, value: string) => {
      entries.set(key, value);
      return 'OK';
    }),
    del: vi.fn(async (key: string) => (entries.delete(key) ? 1 : 0)),
    quit: vi.fn(async () => 'OK')
  };
  return { entries, client };
});

vi.mock('redis', () => ({ createClient: vi.fn(() => redis.client) }));

const nextLaunch = makeLaunch({ time: T + hours(20), timePrecision: 'day' });

const state: PersistedLaunchState = {
  latest: makeLaunch({ time: T - hours(2), status: 'Launched', coreRecovery: 'Success' }),
  next: nextLaunch,
  statusRetryAttempts: 2,
  updatedAt: T
};

describe('decodeState', () => {
  it('reads a serialized state', () => {
    expect(decodeState(JSON.stringify(state))).toEqual(state);
  });

  it('ignores unreadable content', () => {
    expect(decodeState('{not json')).toBeNull();
  });

  it('ignores a state with an unknown precision', () => {
    const stale = { ...state, next: { ...nextLaunch, timePrecision: 'week' } };
    expect(decodeState(JSON.stringify(stale))).toBeNull();
  });
});

describe('MemoryStateStore', () => {
  it('saves, loads and clears', async () => {
    const store = new MemoryStateStore();

    expect(await store.load()).toBeNull();
    await store.save(state);
    expect(await store.load()).toEqual(state);
    await store.clear();
    expect(await store.load()).toBeNull();
  });
});

describe('RedisStateStore', () => {
  beforeEach(() => {
    redis.entries.clear();
    vi.clearAllMocks();
  });

  it('writes the state under a single key', async () => {
    const store = new RedisStateStore('redis://localhost:6379');

    await store.save(state);

    expect(redis.client.set).toHaveBeenCalledWith(STATE_KEY, JSON.stringify(state));
    expect(await new RedisStateStore('redis://localhost:6379').load()).toEqual(state);
  });

  it('deletes the key on clear', async () => {
    const store = new RedisStateStore('redis://localhost:6379');
    await store.save(state);

    await store.clear();

    expect(redis.entries.has(STATE_KEY)).toBe(false);
    expect(await store.load()).toBeNull();
  });

  it('falls back on memory when Redis is unreachable', async () => {
    redis.client.connect.mockRejectedValueOnce(new Error('connection refused'));
    const store = new RedisStateStore('redis://localhost:6379');

    await store.save(state);

    expect(await store.load()).toEqual(state);
    expect(redis.client.set).not.toHaveBeenCalled();
  });

  it('falls back on memory when a read fails', async () => {
    const store = new RedisStateStore('redis://localhost:6379');
    await store.save(state);
    redis.client.get.mockRejectedValueOnce(new Error('socket closed'));

    expect(await store.load()).toEqual(state);
  });

  it('closes the connection', async () => {
    const store = new RedisStateStore('redis://localhost:6379');
    await store.close();
    expect(redis.client.quit).toHaveBeenCalledTimes(1);
  });
});

describe('createLaunchStateStore', () => {
  it('picks a backend from the Redis URL', () => {
    expect(createLaunchStateStore().backend).toBe('memory');
    expect(createLaunchStateStore('redis://localhost:6379').backend).toBe('redis');
  });
});
