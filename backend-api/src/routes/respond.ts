import type { Response } from 'express';
import type { ZodError } from 'zod';

import { LifecycleErrorCode, LifecycleErrorKind, lifecycleErrorKind, type LifecycleFailure } from '@turbinetrack/shared';

const STATUS_BY_KIND: Record<LifecycleErrorKind, number> = {
  [LifecycleErrorKind.NotFound]: 404,
  [LifecycleErrorKind.InvalidState]: 409,
  [LifecycleErrorKind.Conflict]: 409,
  [LifecycleErrorKind.Validation]: 400,
};

export function failureStatus(code: LifecycleErrorCode): number {
  return STATUS_BY_KIND[lifecycleErrorKind(code)];
}

export function sendFailure(res: Response, failure: LifecycleFailure) {
  return res.status(failureStatus(failure.error)).json(failure);
}

export function sendInvalidRequest(res: Response, error: ZodError) {
  return res.status(400).json({
    ok: false,
    error: LifecycleErrorCode.InvalidInput,
    message: 'invalid request',
    details: error.flatten(),
  });
}
