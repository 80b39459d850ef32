import { z } from 'zod';

import { ONE_MINUTE_MS } from '../time/durations';

export const LAUNCH_SOURCES = ['spacex-v4', 'launch-library'] as const;
export type LaunchSourceKind = (typeof LAUNCH_SOURCES)[number];

export const DASHBOARD_LAYOUTS = ['compact', 'scalable'] as const;
export type DashboardLayout = (typeof DASHBOARD_LAYOUTS)[number];

export const MIN_REFRESH_INTERVAL_MINUTES = 5;
// Une semaine ; reste sous la limite de setInterval.
export const MAX_REFRESH_INTERVAL_MINUTES = 10_080;
export const DEFAULT_TEXT_COLOR = '#000000';

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

// Les variables d'environnement arrivent en texte, le body JSON de /configure en booléens.
const flag = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((value) => value === true || value === 'true' || value === '1');

const hoursInactive = z.preprocess(
  (value) => (value === '' || value === 'none' ? null : value),
  z.coerce.number().nonnegative().nullable()
);

const refreshIntervalMinutes = z.coerce
  .number()
  .positive()
  .max(MAX_REFRESH_INTERVAL_MINUTES)
  .transform((minutes) => Math.max(minutes, MIN_REFRESH_INTERVAL_MINUTES));

const textColor = z
  .string()
  .regex(/^#[0-9a-fA-F]{3,8}$/, 'Expected a hex color such as #1a2b3c');

const displayFields = {
  clearWhenInactive: flag,
  hoursInactive,
  refreshIntervalMinutes,
  showName: flag,
  showLocality: flag,
  dashboardLayout: z.enum(DASHBOARD_LAYOUTS),
  textColor,
  debugLogging: flag
};

export const DisplayOptionsSchema = z.object({
  clearWhenInactive: displayFields.clearWhenInactive.default(false),
  hoursInactive: displayFields.hoursInactive.default(24),
  refreshIntervalMinutes: displayFields.refreshIntervalMinutes.default(120),
  showName: displayFields.showName.default(false),
  showLocality: displayFields.showLocality.default(false),
  dashboardLayout: displayFields.dashboardLayout.default('compact'),
  textColor: displayFields.textColor.default(DEFAULT_TEXT_COLOR),
  debugLogging: displayFields.debugLogging.default(true)
});

export type DisplayOptions = z.infer<typeof DisplayOptionsSchema>;

/** Body accepted by POST /api/launch/configure. */
export const DisplayOptionsPatchSchema = z.object(displayFields).partial().strict();

export type DisplayOptionsPatch = z.infer<typeof DisplayOptionsPatchSchema>;

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  LAUNCH_SOURCE: z.enum(LAUNCH_SOURCES).default('spacex-v4'),
  SPACEX_API_URL: z.string().url().default('https://api.spacexdata.com/v4/'),
  LAUNCH_LIBRARY_API_URL: z.string().url().default('https://ll.thespacedevs.com/2.2.0/'),
  LAUNCH_LIBRARY_MAX_PAGES: z.coerce.number().int().positive().default(5),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  LAUNCH_TIME_ZONE: z
    .string()
    .refine(isValidTimeZone, { message: 'Unknown IANA time zone' })
    .optional(),
  DEFAULT_PATCH_URL: z.string().min(1).default('/assets/default-patch.svg'),
  REDIS_URL: z.string().url().optional(),
  STATUS_RETRY_INTERVAL_MINUTES: z.coerce.number().positive().default(10),
  STATUS_RETRY_MAX_ATTEMPTS: z.coerce.number().int().nonnegative().default(24),
  CLEAR_WHEN_INACTIVE: z.string().optional(),
  HOURS_INACTIVE: z.string().optional(),
  REFRESH_INTERVAL_MINUTES: z.string().optional(),
  SHOW_NAME: z.string().optional(),
  SHOW_LOCALITY: z.string().optional(),
  DASHBOARD_LAYOUT: z.string().optional(),
  TEXT_COLOR: z.string().optional(),
  DEBUG_LOGGING: z.string().optional()
});

export interface SourceSettings {
  kind: LaunchSourceKind;
  spacexApiUrl: string;
  launchLibraryApiUrl: string;
  launchLibraryMaxPages: number;
  timeoutMs: number;
  defaultPatchUrl: string;
}

export interface StatusRetrySettings {
  intervalMs: number;
  maxAttempts: number;
}

export interface LaunchConfig {
  port: number;
  timeZone: string;
  redisUrl?: string;
  source: SourceSettings;
  statusRetry: StatusRetrySettings;
  display: DisplayOptions;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

function systemTimeZone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone || 'UTC';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): LaunchConfig {
  const parsedEnv = EnvSchema.safeParse(env);
  if (!parsedEnv.success) {
    throw new Error(`Invalid configuration: ${formatIssues(parsedEnv.error)}`);
  }
  const vars = parsedEnv.data;

  const parsedDisplay = DisplayOptionsSchema.safeParse({
    clearWhenInactive: vars.CLEAR_WHEN_INACTIVE,
    hoursInactive: vars.HOURS_INACTIVE,
    refreshIntervalMinutes: vars.REFRESH_INTERVAL_MINUTES,
    showName: vars.SHOW_NAME,
    showLocality: vars.SHOW_LOCALITY,
    dashboardLayout: vars.DASHBOARD_LAYOUT,
    textColor: vars.TEXT_COLOR,
    debugLogging: vars.DEBUG_LOGGING
  });
  if (!parsedDisplay.success) {
    throw new Error(`Invalid display options: ${formatIssues(parsedDisplay.error)}`);
  }

  return {
    port: vars.PORT,
    timeZone: vars.LAUNCH_TIME_ZONE ?? systemTimeZone(),
    redisUrl: vars.REDIS_URL,
    source: {
      kind: vars.LAUNCH_SOURCE,
      spacexApiUrl: vars.SPACEX_API_URL,
      launchLibraryApiUrl: vars.LAUNCH_LIBRARY_API_URL,
      launchLibraryMaxPages: vars.LAUNCH_LIBRARY_MAX_PAGES,
      timeoutMs: vars.UPSTREAM_TIMEOUT_MS,
      defaultPatchUrl: vars.DEFAULT_PATCH_URL
    },
    statusRetry: {
      intervalMs: vars.STATUS_RETRY_INTERVAL_MINUTES * ONE_MINUTE_MS,
      maxAttempts: vars.STATUS_RETRY_MAX_ATTEMPTS
    },
    display: parsedDisplay.data
  };
}

export function applyDisplayPatch(current: DisplayOptions, patch: DisplayOptionsPatch): DisplayOptions {
  const next: DisplayOptions = { ...current };
  if (patch.clearWhenInactive !== undefined) next.clearWhenInactive = patch.clearWhenInactive;
  if (patch.hoursInactive !== undefined) next.hoursInactive = patch.hoursInactive;
  if (patch.refreshIntervalMinutes !== undefined) {
    next.refreshIntervalMinutes = patch.refreshIntervalMinutes;
  }
  if (patch.showName !== undefined) next.showName = patch.showName;
  if (patch.showLocality !== undefined) next.showLocality = patch.showLocality;
  if (patch.dashboardLayout !== undefined) next.dashboardLayout = patch.dashboardLayout;
  if (patch.textColor !== undefined) next.textColor = patch.textColor;
  if (patch.debugLogging !== undefined) next.debugLogging = patch.debugLogging;
  return next;
}
