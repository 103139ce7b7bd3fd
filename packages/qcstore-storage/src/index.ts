/**
 * qcstore storage
 *
 * - QcStore: SQLite connection, schema and write hooks
 * - Session: transactions with add / get / query / commit / rollback
 * - Write orchestrators for energies and stationary points
 * - Derived stereoisomer identities, deduplicated per (algorithm, identifier)
 */

export * from './errors';
export * from './config';
export * from './logger';
export * from './structure';
export * from './results';
export * from './schema';
export * from './session';
export * from './store';
export * from './identity';
export * from './write';
