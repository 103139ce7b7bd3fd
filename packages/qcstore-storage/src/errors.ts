/**
 * Storage errors
 */

export class UnsupportedInputError extends Error {
  code = 'UNSUPPORTED_INPUT' as const;
  /** Which input variant was seen, when one could be recognized */
  variant: string;

  constructor(message: string, variant: string = 'unknown') {
    super(message);
    this.name = 'UnsupportedInputError';
    this.variant = variant;
  }
}

export type DerivedIdentityStage = 'geometry' | 'toolkit' | 'store';

export class DerivedIdentityError extends Error {
  code = 'DERIVED_IDENTITY_FAILED' as const;
  stationaryPointId: number;
  stage: DerivedIdentityStage;
  cause: unknown;

  constructor(message: string, stationaryPointId: number, stage: DerivedIdentityStage, cause?: unknown) {
    super(message);
    this.name = 'DerivedIdentityError';
    this.stationaryPointId = stationaryPointId;
    this.stage = stage;
    this.cause = cause;
  }
}

export class StoreMisconfiguredError extends Error {
  code = 'STORE_MISCONFIGURED' as const;

  constructor(message: string) {
    super(message);
    this.name = 'StoreMisconfiguredError';
  }
}

export class StoreNotInitializedError extends Error {
  code = 'STORE_NOT_INITIALIZED' as const;

  constructor() {
    super('Database not initialized; call initialize() first');
    this.name = 'StoreNotInitializedError';
  }
}
