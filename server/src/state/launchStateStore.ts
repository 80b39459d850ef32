import { createClient } from 'redis';
import { z } from 'zod';

import { CORE_RECOVERY_STATUSES, TIME_PRECISIONS, type Launch } from '../launches/launch';
import { errorMessage, logInfo, logWarn } from '../observability/logger';

export type StoreBackend = 'memory' | 'redis';

export interface PersistedLaunchState {
  latest: Launch | null;
  next: Launch | null;
  statusRetryAttempts: number;
  updatedAt: number;
}

export interface LaunchStateStore {
  readonly backend: StoreBackend;
  load(): Promise<PersistedLaunchState | null>;
  save(state: PersistedLaunchState): Promise<void>;
  clear(): Promise<void>;
  close(): Promise<void>;
}

export const STATE_KEY = 'launch:tracker:v1';

const StoredLaunchSchema = z.object({
  time: z.number(),
  timePrecision: z.enum(TIME_PRECISIONS),
  name: z.string().optional(),
  locality: z.string().optional(),
  rocketName: z.string().optional(),
  description: z.string().optional(),
  patchUrl: z.string(),
  status: z.string(),
  coreRecovery: z.enum(CORE_RECOVERY_STATUSES)
});

const PersistedStateSchema = z.object({
  latest: StoredLaunchSchema.nullable(),
  next: StoredLaunchSchema.nullable(),
  statusRetryAttempts: z.number().int().nonnegative(),
  updatedAt: z.number()
});

/** Relit un état sérialisé ; un contenu illisible est ignoré plutôt que propagé. */
export function decodeState(raw: string): PersistedLaunchState | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    logWarn('launch_state_unreadable', { error: errorMessage(err) });
    return null;
  }
  const parsed = PersistedStateSchema.safeParse(json);
  if (!parsed.success) {
    logWarn('launch_state_invalid', { issues: parsed.error.issues.length });
    return null;
  }
  return parsed.data;
}

export class MemoryStateStore implements LaunchStateStore {
  readonly backend = 'memory' as const;
  private state: PersistedLaunchState | null = null;

  async load(): Promise<PersistedLaunchState | null> {
    return this.state;
  }

  async save(state: PersistedLaunchState): Promise<void> {
    this.state = state;
  }

  async clear(): Promise<void> {
    this.state = null;
  }

  async close(): Promise<void> {
    this.state = null;
  }
}

type RedisClient = ReturnType<typeof createClient>;

export interface RedisStoreOptions {
  /** Nouvelles tentatives de connexion avant de basculer sur la mémoire. */
  connectRetries?: number;
  /** Délai max d'une commande Redis. */
  commandTimeoutMs?: number;
}

const DEFAULT_CONNECT_RETRIES = 3;
const DEFAULT_COMMAND_TIMEOUT_MS = 2000;

function withTimeout<T>(task: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${timeoutMs} ms`)), timeoutMs);
  });
  return Promise.race([task, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Redis si REDIS_URL est défini et joignable, avec une copie mémoire qui
 * sert de repli. Aucune commande n'attend une connexion absente : pas de
 * file hors ligne, reconnexion bornée, délai max par commande.
 */
export class RedisStateStore implements LaunchStateStore {
  readonly backend = 'redis' as const;
  private readonly memory = new MemoryStateStore();
  private readonly ready: Promise<RedisClient | null>;
  private readonly commandTimeoutMs: number;

  constructor(url: string, options: RedisStoreOptions = {}) {
    const connectRetries = options.connectRetries ?? DEFAULT_CONNECT_RETRIES;
    this.commandTimeoutMs = options.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;

    const client = createClient({
      url,
      disableOfflineQueue: true,
      socket: {
        connectTimeout: this.commandTimeoutMs,
        reconnectStrategy: (retries: number) =>
          retries >= connectRetries
            ? new Error(`redis unreachable after ${retries} retries`)
            : Math.min(100 * (retries + 1), 1000)
      }
    });

    client.on('error', (err: unknown) => {
      logWarn('redis_error', { error: errorMessage(err) });
    });

    this.ready = client
      .connect()
      .then(() => {
        logInfo('redis_connected', { url });
        return client;
      })
      .catch((err: unknown) => {
        logWarn('redis_connect_failed', { error: errorMessage(err) });
        return null;
      });
  }

  private command<T>(label: string, run: (client: RedisClient) => Promise<T>): Promise<T | null> {
    return this.ready.then(async (client) => {
      if (!client) return null;
      try {
        return await withTimeout(run(client), this.commandTimeoutMs, label);
      } catch (err) {
        logWarn(`redis_${label}_failed`, { error: errorMessage(err) });
        return null;
      }
    });
  }

  async load(): Promise<PersistedLaunchState | null> {
    const raw = await this.command('read', (client) => client.get(STATE_KEY));
    if (raw) {
      const state = decodeState(raw);
      if (state) {
        await this.memory.save(state);
        return state;
      }
    }
    return this.memory.load();
  }

  async save(state: PersistedLaunchState): Promise<void> {
    await this.memory.save(state);
    await this.command('write', (client) => client.set(STATE_KEY, JSON.stringify(state)));
  }

  async clear(): Promise<void> {
    await this.memory.clear();
    await this.command('delete', (client) => client.del(STATE_KEY));
  }

  async close(): Promise<void> {
    await this.command('quit', (client) => client.quit());
  }
}

export function createLaunchStateStore(redisUrl?: string): LaunchStateStore {
  return redisUrl ? new RedisStateStore(redisUrl) : new MemoryStateStore();
}
