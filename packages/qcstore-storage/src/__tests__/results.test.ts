/**
 * Result record tests
 * Proves: only single-program inputs are accepted, units and spin are
 * converted, calculation fields map both ways
 */

import { UnsupportedInputError } from '../errors';
import {
  BOHR_TO_ANGSTROM,
  ProgramResultsSchema,
  calculationFromResults,
  calculationRecordFromResults,
  calculationToProgramInput,
  describeInputVariant,
  geometryFromResults,
  parseProgramResults,
  resultEnergy,
  toAngstrom,
} from '../results';
import { WATER_ENERGY, hydrogenPeroxideResults, waterEnergyResults } from './test-utils';

describe('parseProgramResults', () => {
  it('should accept a program input', () => {
    const parsed = parseProgramResults(waterEnergyResults());

    expect(parsed.input_data.structure.symbols).toEqual(['O', 'H', 'H']);
    expect(parsed.input_data.structure.geometry).toHaveLength(3);
    expect(parsed.provenance).toEqual({ program: 'crest', program_version: '3.0.2' });
    expect(resultEnergy(parsed)).toBe(WATER_ENERGY);
  });

  it('should accept coordinates in place of geometry and default charge and multiplicity', () => {
    const base = waterEnergyResults();
    const { symbols, geometry } = base.input_data.structure;
    const parsed = parseProgramResults({
      ...base,
      input_data: { ...base.input_data, structure: { symbols, coordinates: geometry } },
    });

    expect(parsed.input_data.structure).toEqual({ symbols, geometry, charge: 0, multiplicity: 1 });
  });

  it('should reject a record without provenance', () => {
    const { provenance: _provenance, ...rest } = waterEnergyResults();

    expect(() => parseProgramResults(rest)).toThrow('Malformed result record: Required');
  });

  it('should name the unsupported dual-program variant', () => {
    const base = waterEnergyResults();
    const dual = { ...base, input_data: { ...base.input_data, subprogram: 'xtb' } };

    expect(() => parseProgramResults(dual)).toThrow(
      new UnsupportedInputError('Instantiation from dual-program input_data is not implemented', 'dual-program')
    );
  });

  it('should report where a program input is invalid', () => {
    const base = waterEnergyResults();
    const structure = { ...base.input_data.structure, geometry: base.input_data.structure.geometry.slice(0, 2) };

    expect(() => parseProgramResults({ ...base, input_data: { ...base.input_data, structure } })).toThrow(
      'Invalid program input at structure.geometry: geometry must have one row per symbol'
    );
  });

  it('should require a calctype', () => {
    const base = waterEnergyResults();
    const { calctype: _calctype, ...input } = base.input_data;

    expect(() => parseProgramResults({ ...base, input_data: input })).toThrow(
      'Invalid program input at calctype: Required'
    );
  });
});

describe('ProgramResultsSchema', () => {
  it('should accept a complete record', () => {
    expect(ProgramResultsSchema.safeParse(waterEnergyResults()).success).toBe(true);
  });

  it('should reject file input_data', () => {
    const record = { ...waterEnergyResults(), input_data: { files: { 'input.inp': '' } } };
    expect(ProgramResultsSchema.safeParse(record).success).toBe(false);
  });
});

describe('describeInputVariant', () => {
  it.each([
    { input: { structure: {}, model: {} }, variant: 'program' },
    { input: { structure: {}, model: {}, subprogram_args: {} }, variant: 'dual-program' },
    { input: { files: {} }, variant: 'file' },
    { input: { cmdline_args: [] }, variant: 'file' },
    { input: 'text', variant: 'unknown' },
    { input: null, variant: 'unknown' },
  ])('should classify $variant input', ({ input, variant }) => {
    expect(describeInputVariant(input)).toBe(variant);
  });
});

describe('conversions', () => {
  it('should convert Bohr to Angstrom', () => {
    expect(toAngstrom([1, 0, -2])).toEqual([BOHR_TO_ANGSTROM, 0, -2 * BOHR_TO_ANGSTROM]);
  });

  it('should derive spin from multiplicity', () => {
    const base = waterEnergyResults();
    const structure = { ...base.input_data.structure, multiplicity: 3 };
    const triplet = { ...base, input_data: { ...base.input_data, structure } };

    expect(geometryFromResults(parseProgramResults(triplet)).spin).toBe(2);
  });

  it('should build the calculation spec of a result', () => {
    expect(calculationFromResults(parseProgramResults(waterEnergyResults()))).toEqual({
      program: 'crest',
      method: 'gfn2',
      calctype: 'energy',
      basis: null,
      program_version: '3.0.2',
    });
  });

  it('should build the calculation row of a result', () => {
    expect(calculationRecordFromResults(parseProgramResults(hydrogenPeroxideResults()))).toEqual({
      program: 'psi4',
      version: '1.9.1',
      method: 'b3lyp',
      basis: 'def2-svp',
      input: null,
    });
  });

  it('should map a spec back onto result fields', () => {
    const spec = calculationFromResults(parseProgramResults(hydrogenPeroxideResults({ scf_type: 'df' })));

    expect(calculationToProgramInput(spec)).toEqual({
      input_data: {
        calctype: 'optimization',
        model: { method: 'b3lyp', basis: 'def2-svp' },
        keywords: { scf_type: 'df' },
      },
      provenance: { program: 'psi4', program_version: '1.9.1' },
    });
  });

  it('should drop fields a result record has no place for', () => {
    const fields = calculationToProgramInput({ program: 'orca', method: 'hf', input: '! HF', files: { 'a.xyz': '' } });

    expect(fields).toEqual({ input_data: { model: { method: 'hf' } }, provenance: { program: 'orca' } });
  });
});
