/**
 * Relational schema
 *
 * Tables: calculation, geometry, energy, stationary_point, identity,
 * stationary_identity_link, identity_metadata, calculation_hash.
 *
 * INVARIANT: geometry.hash and geometry.formula are set by the write hook
 * before the row is stored (NOT NULL enforces it).
 * INVARIANT: (identity.algorithm, identity.identifier) is unique.
 * INVARIANT: a (stationary point, identity) pair is linked at most once.
 */

import { z } from 'zod';
import { Vector3, Vector3Schema } from './structure';

export type SqlValue = string | number | null;

// ============================================================================
// Records
// ============================================================================

export interface CalculationRecord {
  id: number;
  program: string;
  version: string | null;
  method: string;
  basis: string | null;
  input: string | null;
}

export interface GeometryRecord {
  id: number;
  symbols: string[];
  /** Angstrom, one row per symbol */
  coordinates: Vector3[];
  charge: number;
  spin: number;
  /** Structural hash; indexed, not unique */
  hash: string;
  /** Hill formula; indexed, not unique */
  formula: string;
}

/** Energy in Hartree of one geometry under one calculation */
export interface EnergyRecord {
  geometry_id: number;
  calculation_id: number;
  value: number;
}

export interface StationaryPointRecord {
  id: number;
  geometry_id: number;
  calculation_id: number;
  /** 0 = minimum, 1 = first-order saddle, -1 = unassigned */
  order: number;
}

export interface IdentityRecord {
  id: number;
  /** Category, e.g. "stereoisomer" */
  type: string;
  /** Generator, e.g. "InChI" */
  algorithm: string;
  identifier: string;
}

export interface StationaryIdentityLinkRecord {
  stationary_point_id: number;
  identity_id: number;
}

export interface IdentityMetadataRecord {
  id: number;
  identity_id: number;
  attribute: string;
  value: string;
}

export interface CalculationHashRecord {
  calculation_id: number;
  /** Hash scheme name */
  name: string;
  value: string;
  /** Canonical encoding version that produced value */
  version: number;
}

type WithOptionalId<T extends { id: number }> = Omit<T, 'id'> & { id?: number };

export type NewCalculation = WithOptionalId<CalculationRecord>;
export type NewGeometry = Omit<GeometryRecord, 'id' | 'hash' | 'formula'> & {
  id?: number;
  hash?: string;
  formula?: string;
};
export type NewStationaryPoint = Omit<WithOptionalId<StationaryPointRecord>, 'order'> & { order?: number };
export type NewIdentity = WithOptionalId<IdentityRecord>;
export type NewIdentityMetadata = WithOptionalId<IdentityMetadataRecord>;

export interface RecordMap {
  calculation: CalculationRecord;
  geometry: GeometryRecord;
  energy: EnergyRecord;
  stationary_point: StationaryPointRecord;
  identity: IdentityRecord;
  stationary_identity_link: StationaryIdentityLinkRecord;
  identity_metadata: IdentityMetadataRecord;
  calculation_hash: CalculationHashRecord;
}

export interface NewRecordMap {
  calculation: NewCalculation;
  geometry: NewGeometry;
  energy: EnergyRecord;
  stationary_point: NewStationaryPoint;
  identity: NewIdentity;
  stationary_identity_link: StationaryIdentityLinkRecord;
  identity_metadata: NewIdentityMetadata;
  calculation_hash: CalculationHashRecord;
}

export type TableName = keyof RecordMap;

/** Tables keyed by an INTEGER PRIMARY KEY "id" */
export type IdTableName = {
  [K in TableName]: RecordMap[K] extends { id: number } ? K : never;
}[TableName];

// ============================================================================
// Table definitions
// ============================================================================

export interface TableDefinition<TRecord, TNew> {
  name: string;
  columns: readonly string[];
  keyColumns: readonly string[];
  toColumns(row: TNew): Record<string, SqlValue>;
  fromColumns(raw: unknown): TRecord;
}

const id = z.number().int();

function jsonColumn<T extends z.ZodTypeAny>(schema: T) {
  return z
    .string()
    .transform((text): unknown => JSON.parse(text))
    .pipe(schema);
}

const CalculationColumns = z.object({
  id,
  program: z.string(),
  version: z.string().nullable(),
  method: z.string(),
  basis: z.string().nullable(),
  input: z.string().nullable(),
});

const GeometryColumns = z.object({
  id,
  symbols: jsonColumn(z.array(z.string())),
  coordinates: jsonColumn(z.array(Vector3Schema)),
  charge: z.number().int(),
  spin: z.number().int(),
  hash: z.string(),
  formula: z.string(),
});

const EnergyColumns = z.object({ geometry_id: id, calculation_id: id, value: z.number() });

const StationaryPointColumns = z.object({ id, geometry_id: id, calculation_id: id, order: z.number().int() });

const IdentityColumns = z.object({ id, type: z.string(), algorithm: z.string(), identifier: z.string() });

const LinkColumns = z.object({ stationary_point_id: id, identity_id: id });

const MetadataColumns = z.object({ id, identity_id: id, attribute: z.string(), value: z.string() });

const HashColumns = z.object({ calculation_id: id, name: z.string(), value: z.string(), version: z.number().int() });

export const TABLES: { [K in TableName]: TableDefinition<RecordMap[K], NewRecordMap[K]> } = {
  calculation: {
    name: 'calculation',
    columns: ['id', 'program', 'version', 'method', 'basis', 'input'],
    keyColumns: ['id'],
    toColumns: (row) => ({
      id: row.id ?? null,
      program: row.program,
      version: row.version,
      method: row.method,
      basis: row.basis,
      input: row.input,
    }),
    fromColumns: (raw) => CalculationColumns.parse(raw),
  },
  geometry: {
    name: 'geometry',
    columns: ['id', 'symbols', 'coordinates', 'charge', 'spin', 'hash', 'formula'],
    keyColumns: ['id'],
    toColumns: (row) => ({
      id: row.id ?? null,
      symbols: JSON.stringify(row.symbols),
      coordinates: JSON.stringify(row.coordinates),
      charge: row.charge,
      spin: row.spin,
      hash: row.hash ?? null,
      formula: row.formula ?? null,
    }),
    fromColumns: (raw) => GeometryColumns.parse(raw),
  },
  energy: {
    name: 'energy',
    columns: ['geometry_id', 'calculation_id', 'value'],
    keyColumns: ['geometry_id', 'calculation_id'],
    toColumns: (row) => ({ geometry_id: row.geometry_id, calculation_id: row.calculation_id, value: row.value }),
    fromColumns: (raw) => EnergyColumns.parse(raw),
  },
  stationary_point: {
    name: 'stationary_point',
    columns: ['id', 'geometry_id', 'calculation_id', 'order'],
    keyColumns: ['id'],
    toColumns: (row) => ({
      id: row.id ?? null,
      geometry_id: row.geometry_id,
      calculation_id: row.calculation_id,
      order: row.order ?? -1,
    }),
    fromColumns: (raw) => StationaryPointColumns.parse(raw),
  },
  identity: {
    name: 'identity',
    columns: ['id', 'type', 'algorithm', 'identifier'],
    keyColumns: ['id'],
    toColumns: (row) => ({ id: row.id ?? null, type: row.type, algorithm: row.algorithm, identifier: row.identifier }),
    fromColumns: (raw) => IdentityColumns.parse(raw),
  },
  stationary_identity_link: {
    name: 'stationary_identity_link',
    columns: ['stationary_point_id', 'identity_id'],
    keyColumns: ['stationary_point_id', 'identity_id'],
    toColumns: (row) => ({ stationary_point_id: row.stationary_point_id, identity_id: row.identity_id }),
    fromColumns: (raw) => LinkColumns.parse(raw),
  },
  identity_metadata: {
    name: 'identity_metadata',
    columns: ['id', 'identity_id', 'attribute', 'value'],
    keyColumns: ['id'],
    toColumns: (row) => ({ id: row.id ?? null, identity_id: row.identity_id, attribute: row.attribute, value: row.value }),
    fromColumns: (raw) => MetadataColumns.parse(raw),
  },
  calculation_hash: {
    name: 'calculation_hash',
    columns: ['calculation_id', 'name', 'value', 'version'],
    keyColumns: ['calculation_id', 'name'],
    toColumns: (row) => ({
      calculation_id: row.calculation_id,
      name: row.name,
      value: row.value,
      version: row.version,
    }),
    fromColumns: (raw) => HashColumns.parse(raw),
  },
};

// ============================================================================
// Migrations
// ============================================================================

export const SCHEMA_VERSION = 1;

export const MIGRATIONS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS calculation (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    program TEXT NOT NULL,
    version TEXT,
    method TEXT NOT NULL,
    basis TEXT,
    input TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS geometry (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    symbols TEXT NOT NULL,
    coordinates TEXT NOT NULL,
    charge INTEGER NOT NULL DEFAULT 0,
    spin INTEGER NOT NULL DEFAULT 0,
    hash TEXT NOT NULL,
    formula TEXT NOT NULL
  )`,
  'CREATE INDEX IF NOT EXISTS idx_geometry_hash ON geometry(hash)',
  'CREATE INDEX IF NOT EXISTS idx_geometry_formula ON geometry(formula)',
  `CREATE TABLE IF NOT EXISTS energy (
    geometry_id INTEGER NOT NULL REFERENCES geometry(id),
    calculation_id INTEGER NOT NULL REFERENCES calculation(id),
    value REAL NOT NULL,
    PRIMARY KEY (geometry_id, calculation_id)
  )`,
  `CREATE TABLE IF NOT EXISTS stationary_point (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    geometry_id INTEGER NOT NULL REFERENCES geometry(id),
    calculation_id INTEGER NOT NULL REFERENCES calculation(id),
    "order" INTEGER NOT NULL DEFAULT -1
  )`,
  `CREATE TABLE IF NOT EXISTS identity (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    type TEXT NOT NULL,
    algorithm TEXT NOT NULL,
    identifier TEXT NOT NULL
  )`,
  'CREATE UNIQUE INDEX IF NOT EXISTS idx_identity_algorithm_identifier ON identity(algorithm, identifier)',
  `CREATE TABLE IF NOT EXISTS stationary_identity_link (
    stationary_point_id INTEGER NOT NULL REFERENCES stationary_point(id),
    identity_id INTEGER NOT NULL REFERENCES identity(id),
    PRIMARY KEY (stationary_point_id, identity_id)
  )`,
  `CREATE TABLE IF NOT EXISTS identity_metadata (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    identity_id INTEGER NOT NULL REFERENCES identity(id) ON DELETE CASCADE,
    attribute TEXT NOT NULL,
    value TEXT NOT NULL
  )`,
  'CREATE INDEX IF NOT EXISTS idx_identity_metadata_identity ON identity_metadata(identity_id)',
  `CREATE TABLE IF NOT EXISTS calculation_hash (
    calculation_id INTEGER NOT NULL REFERENCES calculation(id),
    name TEXT NOT NULL,
    value TEXT NOT NULL,
    version INTEGER NOT NULL,
    PRIMARY KEY (calculation_id, name)
  )`,
  'CREATE INDEX IF NOT EXISTS idx_calculation_hash_value ON calculation_hash(name, value)',
];
