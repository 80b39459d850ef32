import { describe, expect, it } from 'vitest';

import { T, hours, makeLaunch } from '../testing/fixtures';
import { inactivityWindow, isInactive } from './activityWindow';

describe('inactivityWindow', () => {
  it('starts after the latest launch and ends before the next one', () => {
    const latest = makeLaunch({ time: T - hours(30) });
    const next = makeLaunch({ time: T + hours(30) });
    expect(inactivityWindow(latest, next, 24)).toEqual({ start: T - hours(6), end: T + hours(6) });
  });

  it('has no end when the next launch is only known to the month', () => {
    const next = makeLaunch({ time: T + hours(30), timePrecision: 'month' });
    expect(inactivityWindow(null, next, 24)).toEqual({ start: null, end: null });
  });

  it('keeps the end for day precision', () => {
    const next = makeLaunch({ time: T + hours(30), timePrecision: 'day' });
    expect(inactivityWindow(null, next, 24).end).toBe(T + hours(6));
  });
});

describe('isInactive', () => {
  const latest = makeLaunch({ time: T - hours(30) });
  const next = makeLaunch({ time: T + hours(30) });

  it('is inactive strictly inside the window', () => {
    expect(isInactive(latest, next, T, 24)).toBe(true);
    expect(isInactive(latest, next, T - hours(6), 24)).toBe(false);
    expect(isInactive(latest, next, T + hours(6), 24)).toBe(false);
    expect(isInactive(latest, next, T + hours(7), 24)).toBe(false);
  });

  it('uses only the end bound without a latest launch', () => {
    expect(isInactive(null, next, T, 24)).toBe(true);
    expect(isInactive(null, next, T + hours(7), 24)).toBe(false);
  });

  it('uses only the start bound without a next launch', () => {
    expect(isInactive(latest, null, T, 24)).toBe(true);
    expect(isInactive(latest, null, T - hours(7), 24)).toBe(false);
  });

  it('ignores a coarse next launch when placing the end bound', () => {
    const vague = makeLaunch({ time: T + hours(2), timePrecision: 'year' });
    expect(isInactive(latest, vague, T, 24)).toBe(true);
  });

  it('is never inactive without launches', () => {
    expect(isInactive(null, null, T, 24)).toBe(false);
  });

  it('is never inactive when the threshold is disabled', () => {
    expect(isInactive(latest, next, T, null)).toBe(false);
  });
});
