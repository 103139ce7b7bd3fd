/**
 * External result records
 *
 * Structured program results: input_data (structure, model, calctype,
 * keywords), data (energy) and provenance (program, version). Geometries
 * arrive in Bohr and are stored in Angstrom.
 */

import { z } from 'zod';
import { CalculationSpec, KeywordMap, KeywordMapSchema } from 'qcstore-calcn';
import { UnsupportedInputError } from './errors';
import { Vector3, Vector3Schema } from './structure';
import type { NewCalculation, NewGeometry } from './schema';

export const BOHR_TO_ANGSTROM = 0.529177210903;

// ============================================================================
// Schemas
// ============================================================================

export const StructureSchema = z
  .object({
    symbols: z.array(z.string().min(1)).min(1),
    geometry: z.array(Vector3Schema).optional(),
    coordinates: z.array(Vector3Schema).optional(),
    charge: z.number().int().default(0),
    multiplicity: z.number().int().positive().default(1),
  })
  .refine((s) => s.geometry !== undefined || s.coordinates !== undefined, {
    message: 'structure needs geometry (or coordinates)',
    path: ['geometry'],
  })
  .transform(({ coordinates, geometry, ...rest }) => ({
    ...rest,
    geometry: geometry ?? coordinates ?? [],
  }))
  .refine((s) => s.geometry.length === s.symbols.length, {
    message: 'geometry must have one row per symbol',
    path: ['geometry'],
  });

export const ModelSchema = z.object({
  method: z.string().min(1),
  basis: z.string().nullable().optional(),
});

export const ProgramInputSchema = z.object({
  calctype: z.string().min(1),
  model: ModelSchema,
  structure: StructureSchema,
  keywords: KeywordMapSchema.optional(),
  extras: KeywordMapSchema.optional(),
});

export const ProvenanceSchema = z.object({
  program: z.string().min(1),
  program_version: z.string().nullable().optional(),
});

const ResultsEnvelopeSchema = z.object({
  input_data: z.unknown(),
  success: z.boolean().optional(),
  data: z
    .object({
      energy: z.number().finite().nullable().optional(),
    })
    .passthrough()
    .default({}),
  provenance: ProvenanceSchema,
});

/** A complete single-program result record */
export const ProgramResultsSchema = ResultsEnvelopeSchema.extend({ input_data: ProgramInputSchema });

export type StructureInput = z.infer<typeof StructureSchema>;
export type ProgramInput = z.infer<typeof ProgramInputSchema>;
export type Provenance = z.infer<typeof ProvenanceSchema>;

export interface ProgramResults {
  input_data: ProgramInput;
  success?: boolean;
  data: { energy?: number | null; [key: string]: unknown };
  provenance: Provenance;
}

// ============================================================================
// Parsing
// ============================================================================

export type InputVariant = 'program' | 'dual-program' | 'file' | 'unknown';

/**
 * Best-effort name of an input_data shape, for error messages
 */
export function describeInputVariant(input: unknown): InputVariant {
  if (typeof input !== 'object' || input === null) return 'unknown';
  if ('subprogram' in input || 'subprogram_args' in input) return 'dual-program';
  if ('structure' in input && 'model' in input) return 'program';
  if ('files' in input || 'cmdline_args' in input) return 'file';
  return 'unknown';
}

/**
 * Validate a result record.
 * Throws UnsupportedInputError unless input_data is a single-program input.
 */
export function parseProgramResults(value: unknown): ProgramResults {
  const envelope = ResultsEnvelopeSchema.safeParse(value);
  if (!envelope.success) {
    throw new UnsupportedInputError(`Malformed result record: ${envelope.error.issues[0]?.message ?? 'invalid'}`);
  }

  const variant = describeInputVariant(envelope.data.input_data);
  if (variant !== 'program') {
    throw new UnsupportedInputError(`Instantiation from ${variant} input_data is not implemented`, variant);
  }

  const input = ProgramInputSchema.safeParse(envelope.data.input_data);
  if (!input.success) {
    const issue = input.error.issues[0];
    throw new UnsupportedInputError(
      `Invalid program input at ${issue?.path.join('.') ?? '?'}: ${issue?.message ?? 'invalid'}`,
      variant
    );
  }

  return {
    input_data: input.data,
    success: envelope.data.success,
    data: envelope.data.data,
    provenance: envelope.data.provenance,
  };
}

/**
 * Energy of a result, or UnsupportedInputError when it carries none
 */
export function resultEnergy(results: ProgramResults): number {
  const energy = results.data.energy;
  if (energy === undefined || energy === null) {
    throw new UnsupportedInputError('Result record carries no energy', 'program');
  }
  return energy;
}

// ============================================================================
// Conversions
// ============================================================================

export function calculationFromResults(results: ProgramResults): CalculationSpec {
  const { input_data: input, provenance } = results;
  const spec: CalculationSpec = {
    program: provenance.program,
    method: input.model.method,
    calctype: input.calctype,
  };
  if (input.model.basis !== undefined) spec.basis = input.model.basis;
  if (provenance.program_version !== undefined) spec.program_version = provenance.program_version;
  if (input.keywords !== undefined) spec.keywords = input.keywords;
  if (input.extras !== undefined) spec.extras = input.extras;
  return spec;
}

export interface ProgramInputFields {
  input_data: {
    calctype?: string;
    model: { method: string; basis?: string | null };
    keywords?: KeywordMap;
    extras?: KeywordMap;
  };
  provenance: Provenance;
}

/**
 * The result-record fields a spec maps back onto.
 * Fields the record has no place for (input, cmdline_args, files) are dropped.
 */
export function calculationToProgramInput(spec: CalculationSpec): ProgramInputFields {
  const model: ProgramInputFields['input_data']['model'] = { method: spec.method };
  if (spec.basis !== undefined) model.basis = spec.basis;

  const fields: ProgramInputFields = {
    input_data: { model },
    provenance: { program: spec.program },
  };
  if (spec.calctype !== undefined && spec.calctype !== null) fields.input_data.calctype = spec.calctype;
  if (spec.keywords !== undefined) fields.input_data.keywords = spec.keywords;
  if (spec.extras !== undefined) fields.input_data.extras = spec.extras;
  if (spec.program_version !== undefined) fields.provenance.program_version = spec.program_version;
  return fields;
}

export function calculationRecordFromResults(results: ProgramResults): NewCalculation {
  return {
    program: results.provenance.program,
    version: results.provenance.program_version ?? null,
    method: results.input_data.model.method,
    basis: results.input_data.model.basis ?? null,
    input: null,
  };
}

export function toAngstrom([x, y, z]: Vector3): Vector3 {
  return [x * BOHR_TO_ANGSTROM, y * BOHR_TO_ANGSTROM, z * BOHR_TO_ANGSTROM];
}

export function geometryFromStructure(structure: StructureInput): NewGeometry {
  return {
    symbols: [...structure.symbols],
    coordinates: structure.geometry.map(toAngstrom),
    charge: structure.charge,
    spin: structure.multiplicity - 1,
  };
}

export function geometryFromResults(results: ProgramResults): NewGeometry {
  return geometryFromStructure(results.input_data.structure);
}
