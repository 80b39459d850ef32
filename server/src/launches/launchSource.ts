import { z } from 'zod';

import { formatIssues, type LaunchSourceKind } from '../config/launchConfig';
import { recordUpstreamFailure } from '../observability/metrics';
import type { LatestAndNext } from './launch';
import { UpstreamError } from './upstreamError';

/**
 * Une API de lancements capable de donner le dernier lancement passé et le
 * prochain. Les deux implémentations produisent le même `Launch` canonique.
 */
export interface LaunchSource {
  readonly kind: LaunchSourceKind;
  fetchLatestAndNext(now: number): Promise<LatestAndNext>;
}

export type QueryParams = Record<string, string | number>;

/** Sous-ensemble d'AxiosInstance utilisé par les clients. */
export interface JsonHttpClient {
  get(url: string, config?: { params?: QueryParams }): Promise<{ data: unknown }>;
}

export async function getValidated<T>(
  http: JsonHttpClient,
  source: LaunchSourceKind,
  endpoint: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  params?: QueryParams
): Promise<T> {
  let data: unknown;
  try {
    const response = await http.get(endpoint, params ? { params } : undefined);
    data = response.data;
  } catch (err) {
    recordUpstreamFailure(source, endpoint);
    throw UpstreamError.fromRequestFailure(err, source, endpoint);
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    recordUpstreamFailure(source, endpoint);
    throw new UpstreamError(
      `${source} ${endpoint} returned an invalid payload: ${formatIssues(parsed.error)}`,
      { source, endpoint, cause: parsed.error }
    );
  }
  return parsed.data;
}

export function presentText(value: string | null | undefined): string | undefined {
  if (value === null || value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}
