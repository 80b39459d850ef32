import {
  Counter,
  Gauge,
  Histogram,
  Registry,
  collectDefaultMetrics
} from 'prom-client';

import type { LaunchSourceKind } from '../config/launchConfig';
import type { WakeupKind } from '../scheduling/wakeupPlanner';

export type StatusRetryOutcome = 'resolved' | 'unchanged' | 'exhausted' | 'failed';

export const metricsRegistry = new Registry();

collectDefaultMetrics({ register: metricsRegistry });

const upstreamLatency = new Histogram({
  name: 'launch_upstream_fetch_duration_ms',
  help: 'Latency of a full latest/next fetch against the launch API (ms).',
  labelNames: ['source'],
  buckets: [50, 100, 200, 400, 800, 1200, 2000, 4000, 8000],
  registers: [metricsRegistry]
});

const upstreamFailures = new Counter({
  name: 'launch_upstream_failures_total',
  help: 'Failed upstream requests, by source and endpoint.',
  labelNames: ['source', 'endpoint'],
  registers: [metricsRegistry]
});

const wakeupsFired = new Counter({
  name: 'launch_wakeups_fired_total',
  help: 'One-shot wakeups that fired, by kind.',
  labelNames: ['kind'],
  registers: [metricsRegistry]
});

const armedWakeups = new Gauge({
  name: 'launch_wakeups_armed',
  help: 'One-shot wakeups currently armed.',
  registers: [metricsRegistry]
});

const statusRetries = new Counter({
  name: 'launch_status_retries_total',
  help: 'Post-launch status checks, by outcome.',
  labelNames: ['outcome'],
  registers: [metricsRegistry]
});

export function recordUpstreamLatency(source: LaunchSourceKind, latencyMs: number): void {
  if (Number.isFinite(latencyMs)) {
    upstreamLatency.observe({ source }, latencyMs);
  }
}

export function recordUpstreamFailure(source: LaunchSourceKind, endpoint: string): void {
  upstreamFailures.inc({ source, endpoint });
}

export function recordWakeupFired(kind: WakeupKind): void {
  wakeupsFired.inc({ kind });
}

export function recordArmedWakeups(count: number): void {
  armedWakeups.set(count);
}

export function recordStatusRetry(outcome: StatusRetryOutcome): void {
  statusRetries.inc({ outcome });
}

export function getMetricsSnapshot(): Promise<string> {
  return metricsRegistry.metrics();
}

export const metricsContentType = metricsRegistry.contentType;
