/**
 * Structure helper tests
 */

import { Molecule, MoleculeSchema, createStructureToolkit, geometryDigest, hillFormula } from '../structure';

const water: Molecule = {
  symbols: ['O', 'H', 'H'],
  coordinates: [
    [0, 0, 0],
    [0.9572, 0, 0],
    [-0.24, 0.927, 0],
  ],
  charge: 0,
  spin: 0,
};

describe('hillFormula', () => {
  it.each([
    { symbols: ['O', 'H', 'H'], formula: 'H2O' },
    { symbols: ['C', 'H', 'H', 'H', 'H'], formula: 'CH4' },
    { symbols: ['O', 'C', 'C', 'H', 'H', 'H', 'H', 'H', 'H'], formula: 'C2H6O' },
    { symbols: ['Na', 'Cl'], formula: 'ClNa' },
    { symbols: ['C', 'O', 'O'], formula: 'CO2' },
    { symbols: ['cl', 'CL', 'c'], formula: 'CCl2' },
  ])('should write $formula', ({ symbols, formula }) => {
    expect(hillFormula(symbols)).toBe(formula);
  });

  it('should return an empty formula for no atoms', () => {
    expect(hillFormula([])).toBe('');
  });
});

describe('geometryDigest', () => {
  it('should ignore noise below the rounding precision', () => {
    const jittered: Molecule = {
      ...water,
      coordinates: [
        [1e-9, 0, 0],
        [0.9572000001, 0, 0],
        [-0.24, 0.927, 0],
      ],
    };
    expect(geometryDigest(jittered)).toBe(geometryDigest(water));
  });

  it('should change when a coordinate moves', () => {
    const moved: Molecule = { ...water, coordinates: [[0, 0, 0], [0.958, 0, 0], [-0.24, 0.927, 0]] };
    expect(geometryDigest(moved)).not.toBe(geometryDigest(water));
  });

  it('should change with charge or spin', () => {
    expect(geometryDigest({ ...water, charge: 1, spin: 1 })).not.toBe(geometryDigest(water));
  });

  it('should honour a coarser precision', () => {
    const moved: Molecule = { ...water, coordinates: [[0, 0, 0], [0.958, 0, 0], [-0.24, 0.927, 0]] };
    expect(geometryDigest(moved, 2)).toBe(geometryDigest(water, 2));
  });
});

describe('MoleculeSchema', () => {
  it('should require one coordinate row per symbol', () => {
    const result = MoleculeSchema.safeParse({ ...water, symbols: ['O'] });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe('symbols and coordinates must have one entry per atom');
    }
  });

  it('should reject negative spin', () => {
    expect(MoleculeSchema.safeParse({ ...water, spin: -1 }).success).toBe(false);
  });
});

describe('createStructureToolkit', () => {
  it('should default the geometry hash to geometryDigest', () => {
    const toolkit = createStructureToolkit({ stereochemicalIdentifier: () => 'InChI=1S/H2O' });

    expect(toolkit.geometryHash(water)).toBe(geometryDigest(water));
    expect(toolkit.stereochemicalIdentifier(water)).toBe('InChI=1S/H2O');
  });

  it('should use a supplied geometry hash', () => {
    const toolkit = createStructureToolkit({ stereochemicalIdentifier: () => 'x', geometryHash: () => 'fixed' });

    expect(toolkit.geometryHash(water)).toBe('fixed');
  });
});
