/**
 * Shared fixtures for storage tests
 */

import { createLogger, Logger, LogRecord } from '../logger';
import { createStructureToolkit, hillFormula, Molecule, StructureToolkit } from '../structure';
import { QcStore, QcStoreOptions } from '../store';

/** Stand-in identifier: formula-only, so equal compositions share an identity */
export function fakeIdentifier(molecule: Molecule): string {
  return `InChI=1S/${hillFormula(molecule.symbols)}`;
}

export function fakeToolkit(overrides: Partial<StructureToolkit> = {}): StructureToolkit {
  return { ...createStructureToolkit({ stereochemicalIdentifier: fakeIdentifier }), ...overrides };
}

export interface CapturingLogger {
  logger: Logger;
  records: LogRecord[];
}

export function capturingLogger(): CapturingLogger {
  const records: LogRecord[] = [];
  return { logger: createLogger('test', { level: 'debug', sink: (record) => records.push(record) }), records };
}

export async function openTestStore(
  options: Partial<QcStoreOptions> = {}
): Promise<{ store: QcStore; records: LogRecord[] }> {
  const { logger, records } = capturingLogger();
  const store = new QcStore({ path: ':memory:', toolkit: fakeToolkit(), logger, ...options });
  await store.initialize();
  return { store, records };
}

export const WATER_ENERGY = -5.062316802835694;

export function waterEnergyResults() {
  return {
    input_data: {
      structure: {
        symbols: ['O', 'H', 'H'],
        geometry: [
          [0.0, 0.0, 0.0],
          [1.8897261259082012, 0.0, 0.0],
          [0.0, 1.8897261259082012, 0.0],
        ],
        charge: 0,
        multiplicity: 1,
      },
      model: { method: 'gfn2', basis: null },
      calctype: 'energy',
    },
    success: true,
    data: { energy: WATER_ENERGY },
    provenance: { program: 'crest', program_version: '3.0.2' },
  };
}

export function hydrogenPeroxideResults(keywords: Record<string, string> = {}) {
  return {
    input_data: {
      structure: {
        symbols: ['O', 'O', 'H', 'H'],
        geometry: [
          [0.0, 1.3, -0.1],
          [0.0, -1.3, -0.1],
          [1.5, 1.7, 0.8],
          [-1.5, -1.7, 0.8],
        ],
        charge: 0,
        multiplicity: 1,
      },
      model: { method: 'b3lyp', basis: 'def2-svp' },
      calctype: 'optimization',
      keywords,
    },
    success: true,
    data: { energy: -151.5 },
    provenance: { program: 'psi4', program_version: '1.9.1' },
  };
}
