/**
 * Calculation errors
 *
 * INVARIANT: Encoding, projection and registry failures always reach the caller.
 * A hash is never guessed.
 */

export class EncodingError extends Error {
  code = 'ENCODING_ERROR' as const;
  path: string;

  constructor(message: string, path: string) {
    super(`${message} (at ${path})`);
    this.name = 'EncodingError';
    this.path = path;
  }
}

export class UnknownSchemeError extends Error {
  code = 'UNKNOWN_SCHEME' as const;
  scheme: string;

  constructor(scheme: string, available: readonly string[]) {
    super(`Unknown hash scheme: ${scheme}. Registered: ${available.join(', ') || '(none)'}`);
    this.name = 'UnknownSchemeError';
    this.scheme = scheme;
  }
}

export class RegistrationError extends Error {
  code = 'REGISTRATION_ERROR' as const;
  scheme: string;

  constructor(message: string, scheme: string) {
    super(message);
    this.name = 'RegistrationError';
    this.scheme = scheme;
  }
}
