import { LifecycleErrorCode, lifecycleFailure, type LifecycleFailure } from '@turbinetrack/shared';

import { logWarn } from '../utils/logger.js';

export function rejected(op: string, failure: LifecycleFailure): LifecycleFailure {
  logWarn(`${op} rejected`, { error: failure.error, message: failure.message });
  return failure;
}

export function cleanText(value: string | null | undefined): string {
  return String(value ?? '').trim();
}

// Empty or missing date means "today"; the caller fills the default.
export function cleanDate(value: string | null | undefined): string | null {
  const v = cleanText(value);
  return v ? v : null;
}

export function requireText(value: string | null | undefined, label: string): string | LifecycleFailure {
  const v = cleanText(value);
  if (!v) return lifecycleFailure(LifecycleErrorCode.InvalidInput, `${label} is empty`);
  return v;
}

export function checkCounters(args: { hours?: number | undefined; starts?: number | undefined }): LifecycleFailure | null {
  if (args.hours !== undefined && !(Number.isFinite(args.hours) && args.hours >= 0)) {
    return lifecycleFailure(LifecycleErrorCode.InvalidInput, 'turbine hours must be a non-negative number');
  }
  if (args.starts !== undefined && !(Number.isInteger(args.starts) && args.starts >= 0)) {
    return lifecycleFailure(LifecycleErrorCode.InvalidInput, 'turbine starts must be a non-negative integer');
  }
  return null;
}
