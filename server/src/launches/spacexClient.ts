import axios from 'axios';
import { z } from 'zod';

import type { SourceSettings } from '../config/launchConfig';
import { errorMessage, logInfo, logWarn } from '../observability/logger';
import { recordUpstreamLatency } from '../observability/metrics';
import { ONE_SECOND_MS } from '../time/durations';
import { aggregateCoreRecovery, type Launch, type LatestAndNext } from './launch';
import { getValidated, presentText, type JsonHttpClient, type LaunchSource } from './launchSource';
import { LookupCache } from './lookupCache';

const SpacexLaunchSchema = z.object({
  name: z.string().nullish(),
  details: z.string().nullish(),
  date_unix: z.number(),
  date_precision: z.enum(['half', 'quarter', 'year', 'month', 'day', 'hour']).nullish(),
  success: z.boolean().nullish(),
  launchpad: z.string().nullish(),
  rocket: z.string().nullish(),
  cores: z
    .array(
      z.object({
        landing_attempt: z.boolean().nullish(),
        landing_success: z.boolean().nullish()
      })
    )
    .nullish(),
  links: z
    .object({
      patch: z
        .object({
          small: z.string().nullish(),
          large: z.string().nullish()
        })
        .nullish()
    })
    .nullish()
});

export type SpacexLaunch = z.infer<typeof SpacexLaunchSchema>;

const LaunchpadSchema = z.object({ locality: z.string().nullish() });
const RocketSchema = z.object({ name: z.string().nullish() });

interface LaunchContext {
  role: 'latest' | 'next';
  locality?: string;
  rocketName?: string;
  defaultPatchUrl: string;
}

export function normalizeSpacexLaunch(raw: SpacexLaunch, context: LaunchContext): Launch {
  const isNext = context.role === 'next';
  let status = 'Scheduled';
  if (!isNext && raw.success === true) status = 'Launched';
  else if (!isNext && raw.success === false) status = 'Failed';

  return {
    time: raw.date_unix * ONE_SECOND_MS,
    // Un lancement passé est connu à la minute près, quelle que soit la précision annoncée.
    timePrecision: isNext ? raw.date_precision ?? 'exact' : 'exact',
    name: presentText(raw.name),
    description: presentText(raw.details),
    locality: context.locality,
    rocketName: context.rocketName,
    patchUrl:
      presentText(raw.links?.patch?.large) ??
      presentText(raw.links?.patch?.small) ??
      context.defaultPatchUrl,
    status,
    coreRecovery: isNext
      ? 'NotApplicable'
      : aggregateCoreRecovery(
          raw.cores?.map((core) => ({
            attempted: core.landing_attempt ?? null,
            success: core.landing_success ?? null
          }))
        )
  };
}

/**
 * Client de l'API SpaceX v4 : deux endpoints « latest » / « next », puis
 * résolution du pas de tir et de la fusée à partir de leurs identifiants.
 */
export class SpacexLaunchSource implements LaunchSource {
  readonly kind = 'spacex-v4' as const;

  private readonly http: JsonHttpClient;
  private readonly localities: LookupCache<string | undefined>;
  private readonly rocketNames: LookupCache<string | undefined>;

  constructor(
    private readonly settings: SourceSettings,
    http?: JsonHttpClient,
    now: () => number = Date.now
  ) {
    this.http =
      http ?? axios.create({ baseURL: settings.spacexApiUrl, timeout: settings.timeoutMs });
    this.localities = new LookupCache(undefined, now);
    this.rocketNames = new LookupCache(undefined, now);
  }

  async fetchLatestAndNext(): Promise<LatestAndNext> {
    const started = Date.now();
    const [latest, next] = await Promise.all([
      this.fetchLaunch('launches/latest', 'latest'),
      this.fetchLaunch('launches/next', 'next')
    ]);
    const latencyMs = Date.now() - started;

    recordUpstreamLatency(this.kind, latencyMs);
    logInfo('launch_fetch', { source: this.kind, latencyMs });

    return { latest, next };
  }

  private async fetchLaunch(endpoint: string, role: LaunchContext['role']): Promise<Launch> {
    const raw = await getValidated(this.http, this.kind, endpoint, SpacexLaunchSchema);
    const [locality, rocketName] = await Promise.all([
      this.lookupLocality(raw.launchpad),
      this.lookupRocketName(raw.rocket)
    ]);
    return normalizeSpacexLaunch(raw, {
      role,
      locality,
      rocketName,
      defaultPatchUrl: this.settings.defaultPatchUrl
    });
  }

  private lookupLocality(launchpadId: string | null | undefined): Promise<string | undefined> {
    if (!launchpadId) return Promise.resolve(undefined);
    return this.lookup(this.localities, `launchpads/${launchpadId}`, async (endpoint) => {
      const pad = await getValidated(this.http, this.kind, endpoint, LaunchpadSchema);
      return presentText(pad.locality);
    });
  }

  private lookupRocketName(rocketId: string | null | undefined): Promise<string | undefined> {
    if (!rocketId) return Promise.resolve(undefined);
    return this.lookup(this.rocketNames, `rockets/${rocketId}`, async (endpoint) => {
      const rocket = await getValidated(this.http, this.kind, endpoint, RocketSchema);
      return presentText(rocket.name);
    });
  }

  // Un référentiel indisponible n'empêche pas d'afficher le lancement.
  private async lookup(
    cache: LookupCache<string | undefined>,
    endpoint: string,
    load: (endpoint: string) => Promise<string | undefined>
  ): Promise<string | undefined> {
    try {
      return await cache.get(endpoint, () => load(endpoint));
    } catch (err) {
      logWarn('launch_lookup_failed', { source: this.kind, endpoint, error: errorMessage(err) });
      return undefined;
    }
  }
}
