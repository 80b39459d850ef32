import { ONE_DAY_MS } from '../time/durations';

interface CacheRecord<T> {
  value: T;
  cachedAt: number;
  expiresAt: number;
}

/**
 * Petit cache mémoire à TTL pour les référentiels qui bougent peu
 * (pas de tir, fusées). Une requête en vol est partagée entre appelants.
 */
export class LookupCache<T> {
  private readonly records = new Map<string, CacheRecord<T>>();
  private readonly inflight = new Map<string, Promise<T>>();

  constructor(
    private readonly ttlMs: number = ONE_DAY_MS,
    private readonly now: () => number = Date.now
  ) {}

  async get(key: string, load: () => Promise<T>): Promise<T> {
    const cached = this.records.get(key);
    if (cached && this.now() < cached.expiresAt) {
      return cached.value;
    }

    const pending = this.inflight.get(key);
    if (pending) {
      return pending;
    }

    const request = load()
      .then((value) => {
        const cachedAt = this.now();
        this.records.set(key, { value, cachedAt, expiresAt: cachedAt + this.ttlMs });
        return value;
      })
      .finally(() => {
        this.inflight.delete(key);
      });
    this.inflight.set(key, request);
    return request;
  }
}
