/**
 * Write orchestrators
 *
 * Each write extracts a geometry and a calculation from a result record and
 * stores them with the dependent row in one transaction. No deduplication
 * happens across calls; geometry.hash and calculation_hash are there for
 * callers who want to look for equivalents.
 */

import { CANONICAL_HASH_VERSION } from 'qcstore-calcn';
import {
  ProgramResults,
  calculationFromResults,
  calculationRecordFromResults,
  geometryFromResults,
  parseProgramResults,
  resultEnergy,
} from './results';
import { CalculationRecord, EnergyRecord, GeometryRecord, StationaryPointRecord } from './schema';
import type { Session } from './session';
import type { QcStore } from './store';
import { Molecule } from './structure';
import { DerivedIdentityOutcome, resolveDerivedIdentity } from './identity';

interface StoredInputs {
  geometry: GeometryRecord;
  calculation: CalculationRecord;
}

function addInputs(store: QcStore, session: Session, results: ProgramResults): StoredInputs {
  const geometry = session.add('geometry', geometryFromResults(results));
  const calculation = session.add('calculation', calculationRecordFromResults(results));

  if (store.hashRegistry) {
    const hashes = store.hashRegistry.computeAll(calculationFromResults(results));
    for (const [name, value] of Object.entries(hashes)) {
      session.add('calculation_hash', { calculation_id: calculation.id, name, value, version: CANONICAL_HASH_VERSION });
    }
  }

  return { geometry, calculation };
}

/**
 * Store geometry, calculation and energy of a result in one transaction
 */
export async function writeEnergy(results: unknown, store: QcStore): Promise<EnergyRecord> {
  const parsed = parseProgramResults(results);
  const value = resultEnergy(parsed);

  const energy = store.transaction((session) => {
    const { geometry, calculation } = addInputs(store, session, parsed);
    return session.add('energy', { geometry_id: geometry.id, calculation_id: calculation.id, value });
  });

  store.logger.info('Energy written', {
    geometry_id: energy.geometry_id,
    calculation_id: energy.calculation_id,
  });
  return energy;
}

export interface StationaryPointOptions {
  /** 0 = minimum, 1 = transition state, -1 = unassigned (default) */
  order?: number;
}

/**
 * First phase of a stationary point write: commit geometry, calculation and
 * stationary point. Derived identities are left to resolveDerivedIdentity().
 */
export async function insertStationaryPoint(
  results: unknown,
  store: QcStore,
  options: StationaryPointOptions = {}
): Promise<StationaryPointRecord> {
  const parsed = parseProgramResults(results);
  const order = options.order ?? -1;
  if (!Number.isInteger(order)) {
    throw new RangeError(`Stationary point order must be an integer, got ${order}`);
  }

  const point = store.transaction((session) => {
    const { geometry, calculation } = addInputs(store, session, parsed);
    return session.add('stationary_point', { geometry_id: geometry.id, calculation_id: calculation.id, order });
  });

  store.logger.info('Stationary point written', { stationary_point_id: point.id, order: point.order });
  return point;
}

export interface StationaryPointWrite {
  stationary_point: StationaryPointRecord;
  identity: DerivedIdentityOutcome;
}

/**
 * Insert a stationary point, then resolve its derived identity right away.
 * An identity failure leaves the committed point in place; see identity.error.
 */
export async function writeStationaryPoint(
  results: unknown,
  store: QcStore,
  options: StationaryPointOptions = {}
): Promise<StationaryPointWrite> {
  const point = await insertStationaryPoint(results, store, options);
  const identity = await resolveDerivedIdentity(store, point.id);
  return { stationary_point: point, identity };
}

/**
 * Change a geometry; hash and formula are recomputed in the same write
 */
export async function updateGeometry(
  store: QcStore,
  geometryId: number,
  changes: Partial<Molecule>
): Promise<GeometryRecord | null> {
  return store.transaction((session) => {
    const current = session.get('geometry', geometryId);
    if (!current) return null;
    return session.replace('geometry', geometryId, {
      symbols: changes.symbols ?? current.symbols,
      coordinates: changes.coordinates ?? current.coordinates,
      charge: changes.charge ?? current.charge,
      spin: changes.spin ?? current.spin,
    });
  });
}

/**
 * Calculations whose stored hash under `name` equals `value`.
 * Rows written under another canonical encoding version never match.
 */
export async function findCalculationsByHash(store: QcStore, name: string, value: string): Promise<CalculationRecord[]> {
  return store.transaction((session) => {
    const matches: CalculationRecord[] = [];
    for (const row of session.query('calculation_hash').filter({ name, value, version: CANONICAL_HASH_VERSION }).all()) {
      const calculation = session.get('calculation', row.calculation_id);
      if (calculation) matches.push(calculation);
    }
    return matches;
  });
}
