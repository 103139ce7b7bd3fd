/**
 * Molecular structure toolkit seam
 *
 * Geometry hashes and stereochemical identifiers come from an external
 * toolkit. Both calls are synchronous and pure.
 */

import { z } from 'zod';
import { digest } from 'qcstore-calcn';

export type Vector3 = [number, number, number];

export interface Molecule {
  /** Element symbols, one per atom */
  symbols: string[];
  /** Cartesian coordinates in Angstrom, row order matches symbols */
  coordinates: Vector3[];
  charge: number;
  /** Number of unpaired electrons (2S) */
  spin: number;
}

export interface StructureToolkit {
  geometryHash(molecule: Molecule): string;
  /** InChI-style identifier distinguishing stereoisomers */
  stereochemicalIdentifier(molecule: Molecule): string;
}

export const Vector3Schema = z.tuple([z.number().finite(), z.number().finite(), z.number().finite()]);

export const MoleculeSchema = z
  .object({
    symbols: z.array(z.string().min(1)),
    coordinates: z.array(Vector3Schema),
    charge: z.number().int(),
    spin: z.number().int().nonnegative(),
  })
  .refine((molecule) => molecule.symbols.length === molecule.coordinates.length, {
    message: 'symbols and coordinates must have one entry per atom',
    path: ['coordinates'],
  });

/** Decimal places kept when hashing coordinates */
export const GEOMETRY_HASH_DECIMALS = 6;

/**
 * Content hash of a geometry with coordinates rounded to a fixed precision
 */
export function geometryDigest(molecule: Molecule, decimals: number = GEOMETRY_HASH_DECIMALS): string {
  const round = (x: number): number => Number(x.toFixed(decimals));
  return digest({
    symbols: molecule.symbols,
    coordinates: molecule.coordinates.map(([x, y, z]) => [round(x), round(y), round(z)]),
    charge: molecule.charge,
    spin: molecule.spin,
  });
}

/**
 * Hill-order formula: C, then H, then the rest alphabetically.
 * Without carbon every element is alphabetical.
 */
export function hillFormula(symbols: readonly string[]): string {
  const counts = new Map<string, number>();
  for (const symbol of symbols) {
    const element = symbol.charAt(0).toUpperCase() + symbol.slice(1).toLowerCase();
    counts.set(element, (counts.get(element) ?? 0) + 1);
  }

  const elements = [...counts.keys()].sort();
  const ordered = counts.has('C')
    ? ['C', ...(counts.has('H') ? ['H'] : []), ...elements.filter((e) => e !== 'C' && e !== 'H')]
    : elements;

  return ordered
    .map((element) => {
      const count = counts.get(element) ?? 0;
      return count === 1 ? element : `${element}${count}`;
    })
    .join('');
}

export interface StructureToolkitOptions {
  stereochemicalIdentifier: (molecule: Molecule) => string;
  /** Defaults to geometryDigest */
  geometryHash?: (molecule: Molecule) => string;
}

export function createStructureToolkit(options: StructureToolkitOptions): StructureToolkit {
  const geometryHash = options.geometryHash ?? ((molecule: Molecule) => geometryDigest(molecule));
  return {
    geometryHash,
    stereochemicalIdentifier: options.stereochemicalIdentifier,
  };
}
