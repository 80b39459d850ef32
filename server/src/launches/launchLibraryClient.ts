import axios from 'axios';
import { z } from 'zod';

import type { SourceSettings } from '../config/launchConfig';
import { logDebug, logInfo } from '../observability/logger';
import { recordUpstreamLatency } from '../observability/metrics';
import {
  aggregateCoreRecovery,
  isStatusResolved,
  type Launch,
  type LatestAndNext,
  type LaunchStatus,
  type TimePrecision
} from './launch';
import {
  getValidated,
  presentText,
  type JsonHttpClient,
  type LaunchSource,
  type QueryParams
} from './launchSource';

const text = z.string().nullish();

const LibraryLaunchSchema = z.object({
  name: text,
  net: z.string().refine((value) => Number.isFinite(Date.parse(value)), {
    message: 'net is not a valid date'
  }),
  net_precision: z.object({ abbrev: text, name: text }).nullish(),
  status: z.object({ abbrev: text, name: text }).nullish(),
  image: text,
  mission: z.object({ name: text, description: text }).nullish(),
  pad: z
    .object({
      name: text,
      location: z.object({ name: text }).nullish()
    })
    .nullish(),
  rocket: z
    .object({
      configuration: z.object({ name: text, full_name: text }).nullish(),
      launcher_stage: z
        .array(
          z.object({
            landing: z
              .object({
                attempt: z.boolean().nullish(),
                success: z.boolean().nullish()
              })
              .nullish()
          })
        )
        .nullish()
    })
    .nullish(),
  mission_patches: z.array(z.object({ image_url: text })).nullish()
});

export type LibraryLaunch = z.infer<typeof LibraryLaunchSchema>;

const LaunchPageSchema = z.object({
  next: text,
  results: z.array(LibraryLaunchSchema)
});

const UPCOMING_ENDPOINT = 'launch/upcoming/';
const PAGE_SIZE = 25;

export function toTimePrecision(abbrev: string | null | undefined): TimePrecision {
  const code = abbrev?.trim().toUpperCase() ?? '';
  if (code === 'HR') return 'hour';
  if (code === 'DAY') return 'day';
  if (code === 'MON') return 'month';
  if (code.startsWith('Q')) return 'quarter';
  if (code.startsWith('H')) return 'half';
  if (code === 'Y' || code === 'FY') return 'year';
  // SEC, MIN ou absent
  return 'exact';
}

export function toLaunchStatus(
  status: { abbrev?: string | null; name?: string | null } | null | undefined
): LaunchStatus {
  const abbrev = presentText(status?.abbrev) ?? presentText(status?.name);
  if (!abbrev) return 'Scheduled';
  if (abbrev === 'Success' || abbrev === 'Launch Successful') return 'Launched';
  if (abbrev === 'Failure' || abbrev === 'Launch Failure') return 'Failed';
  return abbrev;
}

export function normalizeLibraryLaunch(raw: LibraryLaunch, defaultPatchUrl: string): Launch {
  const status = toLaunchStatus(raw.status);
  const landings = raw.rocket?.launcher_stage?.map((stage) => ({
    attempted: stage.landing?.attempt ?? null,
    success: stage.landing?.success ?? null
  }));

  return {
    time: Date.parse(raw.net),
    timePrecision: toTimePrecision(raw.net_precision?.abbrev),
    name: presentText(raw.mission?.name) ?? presentText(raw.name),
    description: presentText(raw.mission?.description),
    locality: presentText(raw.pad?.location?.name) ?? presentText(raw.pad?.name),
    rocketName:
      presentText(raw.rocket?.configuration?.full_name) ??
      presentText(raw.rocket?.configuration?.name),
    patchUrl:
      raw.mission_patches
        ?.map((patch) => presentText(patch.image_url))
        .find((url): url is string => url !== undefined) ??
      presentText(raw.image) ??
      defaultPatchUrl,
    status,
    coreRecovery: isStatusResolved(status) ? aggregateCoreRecovery(landings) : 'NotApplicable'
  };
}

/**
 * Client Launch Library 2 : une seule liste paginée « upcoming », triée par
 * `net` croissant, qui contient encore les lancements des dernières heures.
 */
export class LaunchLibrarySource implements LaunchSource {
  readonly kind = 'launch-library' as const;

  private readonly http: JsonHttpClient;

  constructor(private readonly settings: SourceSettings, http?: JsonHttpClient) {
    this.http =
      http ??
      axios.create({ baseURL: settings.launchLibraryApiUrl, timeout: settings.timeoutMs });
  }

  async fetchLatestAndNext(now: number): Promise<LatestAndNext> {
    const started = Date.now();
    let latest: Launch | null = null;
    let next: Launch | null = null;
    let endpoint: string | null = UPCOMING_ENDPOINT;
    let params: QueryParams | undefined = {
      limit: PAGE_SIZE,
      mode: 'detailed',
      ordering: 'net'
    };
    let pages = 0;

    while (endpoint && !next && pages < this.settings.launchLibraryMaxPages) {
      const page: z.infer<typeof LaunchPageSchema> = await getValidated(this.http, this.kind, endpoint, LaunchPageSchema, params);
      pages += 1;

      for (const raw of page.results) {
        const launch = normalizeLibraryLaunch(raw, this.settings.defaultPatchUrl);
        if (launch.time >= now) {
          next = launch;
          break;
        }
        latest = launch;
      }

      // `next` est une URL absolue qui porte déjà les paramètres de requête.
      endpoint = presentText(page.next) ?? null;
      params = undefined;
    }

    if (!next) {
      logDebug('launch_library_next_not_found', { pages });
    }

    const latencyMs = Date.now() - started;
    recordUpstreamLatency(this.kind, latencyMs);
    logInfo('launch_fetch', { source: this.kind, latencyMs, pages });

    return { latest, next };
  }
}
