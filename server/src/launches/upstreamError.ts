import { isAxiosError } from 'axios';

import type { LaunchSourceKind } from '../config/launchConfig';

export interface UpstreamErrorDetails {
  source: LaunchSourceKind;
  endpoint: string;
  status?: number;
  cause?: unknown;
}

/**
 * Échec d'un appel à l'API de lancements (réseau, HTTP ou payload invalide).
 * Le tracker le traite comme « pas de mise à jour ce cycle ».
 */
export class UpstreamError extends Error {
  readonly source: LaunchSourceKind;
  readonly endpoint: string;
  readonly status?: number;

  constructor(message: string, details: UpstreamErrorDetails) {
    super(message, { cause: details.cause });
    this.name = 'UpstreamError';
    this.source = details.source;
    this.endpoint = details.endpoint;
    this.status = details.status;
  }

  static fromRequestFailure(
    err: unknown,
    source: LaunchSourceKind,
    endpoint: string
  ): UpstreamError {
    if (err instanceof UpstreamError) return err;
    const status = isAxiosError(err) ? err.response?.status : undefined;
    const reason = err instanceof Error ? err.message : String(err);
    return new UpstreamError(`${source} ${endpoint} failed: ${reason}`, {
      source,
      endpoint,
      status,
      cause: err
    });
  }
}
