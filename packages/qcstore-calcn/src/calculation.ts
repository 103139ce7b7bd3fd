/**
 * Calculation specification
 *
 * The in-memory form of a calculation request. A spec only carries the fields
 * its author set: absent, null and a value are three distinct states, and
 * dumps decide which of them reach a hash.
 */

import { z } from 'zod';
import { isMapping } from './canonical';

// ============================================================================
// Types
// ============================================================================

export type KeywordValue =
  | string
  | number
  | boolean
  | null
  | KeywordValue[]
  | { [key: string]: KeywordValue };

export type KeywordMap = { [key: string]: KeywordValue };

export interface CalculationSpec {
  /** Program name (e.g. "psi4", "crest") */
  program: string;
  /** Computational method (e.g. "b3lyp", "gfn2") */
  method: string;
  basis?: string | null;
  /** Raw input file, for programs driven by one */
  input?: string | null;
  keywords?: KeywordMap;
  cmdline_args?: string[];
  /** File name -> content */
  files?: Record<string, string>;
  /** energy, gradient, hessian, optimization, ... */
  calctype?: string | null;
  program_version?: string | null;
  extras?: KeywordMap;
}

export type CalculationField = keyof CalculationSpec;

/** Any subset of the spec's fields, e.g. a projection or a template */
export type CalculationDict = Partial<CalculationSpec>;

/** Field order used by dumps; hashing does not depend on it */
export const CALCULATION_FIELDS: readonly CalculationField[] = [
  'program',
  'method',
  'basis',
  'input',
  'keywords',
  'cmdline_args',
  'files',
  'calctype',
  'program_version',
  'extras',
];

/** Fields holding nested keyword mappings; projection recurses into these */
export const MAPPING_FIELDS = ['keywords', 'extras'] as const;

export type MappingField = (typeof MAPPING_FIELDS)[number];

// ============================================================================
// Schema
// ============================================================================

export const KeywordValueSchema: z.ZodType<KeywordValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(KeywordValueSchema),
    z.record(KeywordValueSchema),
  ])
);

export const KeywordMapSchema: z.ZodType<KeywordMap> = z.record(KeywordValueSchema);

export const CalculationSpecSchema = z.object({
  program: z.string().min(1),
  method: z.string().min(1),
  basis: z.string().nullable().optional(),
  input: z.string().nullable().optional(),
  keywords: KeywordMapSchema.optional(),
  cmdline_args: z.array(z.string()).optional(),
  files: z.record(z.string()).optional(),
  calctype: z.string().nullable().optional(),
  program_version: z.string().nullable().optional(),
  extras: KeywordMapSchema.optional(),
});

// ============================================================================
// Construction and dumps
// ============================================================================

export function copyField<K extends CalculationField>(
  target: CalculationDict,
  source: CalculationDict,
  key: K
): void {
  target[key] = source[key];
}

/**
 * Fields whose value is not undefined, in CALCULATION_FIELDS order
 */
export function setFields(spec: CalculationDict): CalculationField[] {
  return CALCULATION_FIELDS.filter((field) => spec[field] !== undefined);
}

/**
 * Validate an unknown value as a calculation spec.
 * Unset fields stay absent; unknown keys are dropped.
 */
export function parseCalculation(input: unknown): CalculationSpec {
  const parsed = CalculationSpecSchema.parse(input);
  const spec: CalculationSpec = { program: parsed.program, method: parsed.method };
  for (const field of setFields(parsed)) {
    copyField(spec, parsed, field);
  }
  return spec;
}

/**
 * Values a field takes when the spec leaves it unset
 */
export function calculationDefaults(): Required<
  Pick<CalculationSpec, 'keywords' | 'cmdline_args' | 'files' | 'extras'>
> {
  return { keywords: {}, cmdline_args: [], files: {}, extras: {} };
}

/**
 * Copy of a keyword mapping without null-valued entries, at every depth
 */
export function pruneNulls(map: KeywordMap): KeywordMap {
  const pruned: KeywordMap = {};
  for (const [key, value] of Object.entries(map)) {
    if (value === null) continue;
    pruned[key] = isMapping(value) ? pruneNulls(value) : value;
  }
  return pruned;
}

export interface DumpOptions {
  /** Only fields the spec set; defaults are not merged in (default: false) */
  excludeUnset?: boolean;
  /** Drop null fields and null keyword entries (default: true) */
  excludeNull?: boolean;
}

/**
 * Plain dictionary of a spec, ready for canonical encoding
 */
export function dumpCalculation(spec: CalculationDict, options: DumpOptions = {}): CalculationDict {
  const excludeNull = options.excludeNull !== false;
  const source: CalculationDict = options.excludeUnset ? spec : { ...calculationDefaults(), ...spec };
  const dump: CalculationDict = {};

  for (const field of setFields(source)) {
    if (source[field] === null && excludeNull) continue;
    copyField(dump, source, field);
  }

  if (excludeNull) {
    for (const field of MAPPING_FIELDS) {
      const map = dump[field];
      if (map !== undefined) dump[field] = pruneNulls(map);
    }
  }

  return dump;
}
