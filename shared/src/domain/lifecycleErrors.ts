// Typed failures returned by lifecycle operations.

export const LifecycleErrorCode = {
  PartNotFound: 'part_not_found',
  TurbineNotFound: 'turbine_not_found',
  InstanceNotFound: 'instance_not_found',
  PartMasterNotFound: 'part_master_not_found',
  AlreadyInstalled: 'already_installed',
  NoActiveInstallation: 'no_active_installation',
  DuplicateKey: 'duplicate_key',
  InvalidInput: 'invalid_input',
} as const;

export type LifecycleErrorCode = (typeof LifecycleErrorCode)[keyof typeof LifecycleErrorCode];

export const LifecycleErrorKind = {
  NotFound: 'not_found',
  InvalidState: 'invalid_state',
  Conflict: 'conflict',
  Validation: 'validation',
} as const;

export type LifecycleErrorKind = (typeof LifecycleErrorKind)[keyof typeof LifecycleErrorKind];

const KIND_BY_CODE: Record<LifecycleErrorCode, LifecycleErrorKind> = {
  part_not_found: LifecycleErrorKind.NotFound,
  turbine_not_found: LifecycleErrorKind.NotFound,
  instance_not_found: LifecycleErrorKind.NotFound,
  part_master_not_found: LifecycleErrorKind.NotFound,
  already_installed: LifecycleErrorKind.InvalidState,
  no_active_installation: LifecycleErrorKind.InvalidState,
  duplicate_key: LifecycleErrorKind.Conflict,
  invalid_input: LifecycleErrorKind.Validation,
};

export function lifecycleErrorKind(code: LifecycleErrorCode): LifecycleErrorKind {
  return KIND_BY_CODE[code];
}

export type LifecycleFailure = {
  ok: false;
  error: LifecycleErrorCode;
  message: string;
};

export function lifecycleFailure(error: LifecycleErrorCode, message: string): LifecycleFailure {
  return { ok: false, error, message };
}
