export const TIME_PRECISIONS = [
  'exact',
  'hour',
  'day',
  'month',
  'quarter',
  'half',
  'year'
] as const;

export type TimePrecision = (typeof TIME_PRECISIONS)[number];

export type KnownLaunchStatus = 'Scheduled' | 'Launched' | 'Failed' | 'Go' | 'TBD' | 'TBC';

/**
 * `Scheduled` signifie « pas encore eu lieu ». Les autres valeurs du
 * fournisseur (ex. `Hold`, `In Flight`) sont gardées telles quelles.
 */
export type LaunchStatus = KnownLaunchStatus | string;

export const CORE_RECOVERY_STATUSES = [
  'NotApplicable',
  'NotAttempted',
  'Success',
  'Failure',
  'PartialSuccess'
] as const;

export type CoreRecoveryStatus = (typeof CORE_RECOVERY_STATUSES)[number];

export const CORE_RECOVERY_LABELS: Record<CoreRecoveryStatus, string> = {
  NotApplicable: 'Not Applicable',
  NotAttempted: 'Recovery Not Attempted',
  Success: 'Success',
  Failure: 'Failure',
  PartialSuccess: 'Partial Success'
};

export interface Launch {
  time: number;
  timePrecision: TimePrecision;
  name?: string;
  locality?: string;
  rocketName?: string;
  description?: string;
  patchUrl: string;
  status: LaunchStatus;
  coreRecovery: CoreRecoveryStatus;
}

export interface LatestAndNext {
  latest: Launch | null;
  next: Launch | null;
}

// Statuts qui ne disent pas encore si le lancement a réussi.
const PENDING_STATUSES: ReadonlySet<string> = new Set([
  '',
  'Scheduled',
  'Go',
  'TBD',
  'TBC',
  'Hold',
  'In Flight'
]);

export function isStatusResolved(status: LaunchStatus | null | undefined): boolean {
  if (status === null || status === undefined) return false;
  return !PENDING_STATUSES.has(status);
}

export interface RecoveryAttempt {
  attempted: boolean | null;
  success: boolean | null;
}

export function aggregateCoreRecovery(
  attempts: readonly RecoveryAttempt[] | null | undefined
): CoreRecoveryStatus {
  if (!attempts || attempts.length === 0) return 'NotApplicable';

  let anySuccess = false;
  let anyFailure = false;
  for (const attempt of attempts) {
    if (attempt.attempted !== true) continue;
    if (attempt.success === true) anySuccess = true;
    else if (attempt.success === false) anyFailure = true;
  }

  if (anySuccess && anyFailure) return 'PartialSuccess';
  if (anySuccess) return 'Success';
  if (anyFailure) return 'Failure';
  return 'NotAttempted';
}
