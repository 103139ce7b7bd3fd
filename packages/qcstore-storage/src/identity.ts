/**
 * Derived identities for stationary points
 *
 * After a stationary point is committed, its geometry's stereochemical
 * identifier is found-or-created as an identity row and linked to the point.
 * The step runs in its own (possibly nested) transaction and is best-effort:
 * a failure rolls back only the identity work, is logged, and is returned.
 *
 * States: uninitialized -> geometry-hashed -> stationary-inserted
 *         -> identity-resolved -> linked
 *
 * INVARIANT: One identity row per (algorithm, identifier).
 * INVARIANT: One link row per (stationary point, identity).
 */

import { DerivedIdentityError, DerivedIdentityStage } from './errors';
import { IdentityMetadataRecord, IdentityRecord } from './schema';
import type { Session } from './session';
import type { QcStore } from './store';
import { Molecule } from './structure';

export type DerivedIdentityState =
  | 'uninitialized'
  | 'geometry-hashed'
  | 'stationary-inserted'
  | 'identity-resolved'
  | 'linked';

export const STEREOISOMER_IDENTITY = { type: 'stereoisomer', algorithm: 'InChI' } as const;

export interface DerivedIdentityOutcome {
  stationary_point_id: number;
  state: DerivedIdentityState;
  identity: IdentityRecord | null;
  /** A new identity row was written (false when an existing one was reused) */
  created_identity: boolean;
  /** A new link row was written */
  created_link: boolean;
  error: DerivedIdentityError | null;
}

function loadMolecule(session: Session, stationaryPointId: number): Molecule {
  const point = session.get('stationary_point', stationaryPointId);
  if (!point) {
    throw new DerivedIdentityError(`Stationary point ${stationaryPointId} not found`, stationaryPointId, 'geometry');
  }
  const geometry = session.get('geometry', point.geometry_id);
  if (!geometry) {
    throw new DerivedIdentityError(
      `Geometry ${point.geometry_id} of stationary point ${stationaryPointId} not found`,
      stationaryPointId,
      'geometry'
    );
  }
  return { symbols: geometry.symbols, coordinates: geometry.coordinates, charge: geometry.charge, spin: geometry.spin };
}

/**
 * Find-or-create the stereoisomer identity of a stationary point and link it.
 * Never throws for failures inside the step; see outcome.error.
 */
export async function resolveDerivedIdentity(store: QcStore, stationaryPointId: number): Promise<DerivedIdentityOutcome> {
  const outcome: DerivedIdentityOutcome = {
    stationary_point_id: stationaryPointId,
    state: 'stationary-inserted',
    identity: null,
    created_identity: false,
    created_link: false,
    error: null,
  };

  let session: Session | null = null;
  let stage: DerivedIdentityStage = 'store';

  try {
    session = store.session();

    stage = 'geometry';
    const molecule = loadMolecule(session, stationaryPointId);

    stage = 'toolkit';
    const identifier = store.toolkit.stereochemicalIdentifier(molecule);
    if (!identifier) {
      throw new DerivedIdentityError('Structure toolkit returned an empty identifier', stationaryPointId, 'toolkit');
    }

    // Conflict-tolerant inserts: a concurrent writer's row wins and is reused
    stage = 'store';
    const createdIdentity = session.insertOrIgnore('identity', { ...STEREOISOMER_IDENTITY, identifier });
    const identity = session
      .query('identity')
      .filter({ algorithm: STEREOISOMER_IDENTITY.algorithm, identifier })
      .first();
    if (!identity) {
      throw new DerivedIdentityError(`Identity ${identifier} vanished after insert`, stationaryPointId, 'store');
    }

    const createdLink = session.insertOrIgnore('stationary_identity_link', {
      stationary_point_id: stationaryPointId,
      identity_id: identity.id,
    });

    session.commit();

    outcome.state = 'linked';
    outcome.identity = identity;
    outcome.created_identity = createdIdentity;
    outcome.created_link = createdLink;

    store.logger.debug('Derived identity linked', {
      stationary_point_id: stationaryPointId,
      identity_id: identity.id,
      created_identity: createdIdentity,
      created_link: createdLink,
    });
    return outcome;
  } catch (err) {
    session?.rollback();

    const error =
      err instanceof DerivedIdentityError
        ? err
        : new DerivedIdentityError(
            `Derived identity failed at ${stage}: ${err instanceof Error ? err.message : String(err)}`,
            stationaryPointId,
            stage,
            err
          );
    store.logger.warn('Derived identity resolution failed', {
      stationary_point_id: stationaryPointId,
      stage: error.stage,
      error: error.message,
    });

    outcome.error = error;
    return outcome;
  }
}

/**
 * Identities linked to a stationary point, in link order
 */
export async function identitiesFor(store: QcStore, stationaryPointId: number): Promise<IdentityRecord[]> {
  return store.transaction((session) => {
    const identities: IdentityRecord[] = [];
    for (const link of session.query('stationary_identity_link').filter({ stationary_point_id: stationaryPointId }).all()) {
      const identity = session.get('identity', link.identity_id);
      if (identity) identities.push(identity);
    }
    return identities;
  });
}

export async function addIdentityMetadata(
  store: QcStore,
  identityId: number,
  attribute: string,
  value: string
): Promise<IdentityMetadataRecord> {
  return store.transaction((session) => session.add('identity_metadata', { identity_id: identityId, attribute, value }));
}

export async function identityMetadata(store: QcStore, identityId: number): Promise<IdentityMetadataRecord[]> {
  return store.transaction((session) => session.query('identity_metadata').filter({ identity_id: identityId }).all());
}
