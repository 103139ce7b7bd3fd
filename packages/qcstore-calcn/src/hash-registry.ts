/**
 * Hash scheme registry
 *
 * Maps a scheme name to a function computing a calculation's identity hash.
 * Register schemes during startup, then freeze(); lookups after that read an
 * immutable snapshot.
 *
 * PRECONDITION: No register() once concurrent writers have started.
 */

import { digest } from './canonical';
import { CalculationSpec, dumpCalculation } from './calculation';
import { RegistrationError, UnknownSchemeError } from './errors';
import { CalculationTemplate, projectedHash } from './projection';

export type HashFunction = (spec: CalculationSpec) => string;

export const FULL_SCHEME = 'full';
export const MINIMAL_SCHEME = 'minimal';
export const BUILTIN_SCHEMES: readonly string[] = [FULL_SCHEME, MINIMAL_SCHEME];

/**
 * Fields that decide numerical results for deduplication.
 * Only the keyword keys named here count; their values here are ignored.
 */
export const MINIMAL_TEMPLATE: CalculationTemplate = {
  program: '',
  method: '',
  basis: '',
  keywords: { reference: null },
};

export function fullHash(spec: CalculationSpec): string {
  return digest(dumpCalculation(spec));
}

export function minimalHash(spec: CalculationSpec): string {
  return projectedHash(spec, MINIMAL_TEMPLATE);
}

export interface RegisterOptions {
  /** Required to replace a built-in scheme */
  overwrite?: boolean;
}

export class HashRegistry {
  private readonly schemes: Map<string, HashFunction> = new Map();
  private frozen = false;

  /**
   * Add or replace a scheme. Returns the function so it can wrap a declaration.
   */
  register(name: string, fn: HashFunction, options: RegisterOptions = {}): HashFunction {
    if (this.frozen) {
      throw new RegistrationError(`Registry is frozen; cannot register "${name}"`, name);
    }
    if (name.trim() === '') {
      throw new RegistrationError('Scheme name must not be empty', name);
    }
    if (BUILTIN_SCHEMES.includes(name) && this.schemes.has(name) && !options.overwrite) {
      throw new RegistrationError(
        `"${name}" is a built-in scheme; pass { overwrite: true } to replace it`,
        name
      );
    }

    this.schemes.set(name, fn);
    return fn;
  }

  /**
   * Register a scheme hashing the projection of each spec onto `template`
   */
  registerProjection(name: string, template: CalculationTemplate, options: RegisterOptions = {}): HashFunction {
    return this.register(name, (spec) => projectedHash(spec, template), options);
  }

  compute(spec: CalculationSpec, name: string): string {
    const fn = this.schemes.get(name);
    if (!fn) {
      throw new UnknownSchemeError(name, this.available());
    }
    return fn(spec);
  }

  /**
   * Every registered scheme's hash for a spec, keyed by scheme name
   */
  computeAll(spec: CalculationSpec): Record<string, string> {
    const hashes: Record<string, string> = {};
    for (const name of this.available()) {
      hashes[name] = this.compute(spec, name);
    }
    return hashes;
  }

  has(name: string): boolean {
    return this.schemes.has(name);
  }

  /** Registered names, sorted */
  available(): string[] {
    return [...this.schemes.keys()].sort();
  }

  /**
   * End of warm-up: later register() calls fail
   */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  isFrozen(): boolean {
    return this.frozen;
  }
}

/**
 * Registry preloaded with the built-in schemes
 */
export function createHashRegistry(): HashRegistry {
  const registry = new HashRegistry();
  registry.register(FULL_SCHEME, fullHash);
  registry.register(MINIMAL_SCHEME, minimalHash);
  return registry;
}

/**
 * calculationHash(spec, name, registry) = registry.compute(spec, name)
 */
export function calculationHash(spec: CalculationSpec, name: string, registry: HashRegistry): string {
  return registry.compute(spec, name);
}
