/**
 * Session - one transaction on the store's connection
 *
 * Opens BEGIN on a fresh connection, or a SAVEPOINT when a transaction is
 * already open, so an inner session commits or rolls back without touching
 * the outer one.
 *
 * INVARIANT: All statements are parameterized; column names come from TABLES.
 * INVARIANT: beforeWrite hooks run exactly once per insert or replace.
 */

import Database from 'better-sqlite3';
import { z } from 'zod';
import {
  IdTableName,
  NewRecordMap,
  RecordMap,
  SqlValue,
  TABLES,
  TableDefinition,
  TableName,
} from './schema';

export type WriteHook<K extends TableName> = (row: NewRecordMap[K]) => NewRecordMap[K];

export type SessionHooks = {
  [K in TableName]?: { beforeWrite?: WriteHook<K> };
};

export type Filter = Record<string, SqlValue>;

export type SessionState = 'open' | 'committed' | 'rolled-back';

const CountRow = z.object({ n: z.number().int() });

function quote(identifier: string): string {
  return `"${identifier}"`;
}

function assertColumns(table: { name: string; columns: readonly string[] }, names: Iterable<string>): void {
  for (const name of names) {
    if (!table.columns.includes(name)) {
      throw new Error(`Unknown column ${table.name}.${name}`);
    }
  }
}

function whereClause(filter: Filter): { sql: string; params: SqlValue[] } {
  const entries = Object.entries(filter);
  if (entries.length === 0) return { sql: '', params: [] };

  const params: SqlValue[] = [];
  const conditions = entries.map(([column, value]) => {
    if (value === null) return `${quote(column)} IS NULL`;
    params.push(value);
    return `${quote(column)} = ?`;
  });
  return { sql: ` WHERE ${conditions.join(' AND ')}`, params };
}

/**
 * Filterable read over one table; each call returns a new query
 */
export class Query<K extends TableName> {
  constructor(
    private readonly db: Database.Database,
    private readonly table: TableDefinition<RecordMap[K], NewRecordMap[K]>,
    private readonly conditions: Filter = {},
    private readonly ordering: string[] = []
  ) {}

  filter(where: Filter): Query<K> {
    assertColumns(this.table, Object.keys(where));
    return new Query(this.db, this.table, { ...this.conditions, ...where }, this.ordering);
  }

  orderBy(column: string, direction: 'ASC' | 'DESC' = 'ASC'): Query<K> {
    assertColumns(this.table, [column]);
    return new Query(this.db, this.table, this.conditions, [...this.ordering, `${quote(column)} ${direction}`]);
  }

  all(): RecordMap[K][] {
    const { sql, params } = this.select();
    return this.db
      .prepare(sql)
      .all(...params)
      .map((raw) => this.table.fromColumns(raw));
  }

  first(): RecordMap[K] | null {
    const { sql, params } = this.select();
    const raw = this.db.prepare(`${sql} LIMIT 1`).get(...params);
    return raw === undefined ? null : this.table.fromColumns(raw);
  }

  count(): number {
    const where = whereClause(this.conditions);
    const raw = this.db.prepare(`SELECT COUNT(*) AS n FROM ${quote(this.table.name)}${where.sql}`).get(...where.params);
    return CountRow.parse(raw).n;
  }

  private select(): { sql: string; params: SqlValue[] } {
    const where = whereClause(this.conditions);
    // rowid keeps insertion order for tables without an explicit ordering
    const order = this.ordering.length > 0 ? this.ordering.join(', ') : 'rowid ASC';
    return {
      sql: `SELECT * FROM ${quote(this.table.name)}${where.sql} ORDER BY ${order}`,
      params: where.params,
    };
  }
}

let savepointCounter = 0;

export class Session {
  private state: SessionState = 'open';
  private readonly savepoint: string | null;

  constructor(
    private readonly db: Database.Database,
    private readonly hooks: SessionHooks = {}
  ) {
    if (db.inTransaction) {
      this.savepoint = `qcstore_sp_${++savepointCounter}`;
      db.exec(`SAVEPOINT ${this.savepoint}`);
    } else {
      this.savepoint = null;
      db.exec('BEGIN');
    }
  }

  get nested(): boolean {
    return this.savepoint !== null;
  }

  get status(): SessionState {
    return this.state;
  }

  /**
   * Insert a row and return it as stored (generated id included)
   */
  add<K extends TableName>(name: K, row: NewRecordMap[K]): RecordMap[K] {
    const rowid = this.insert(name, row, false);
    const stored = this.byRowid(name, rowid);
    if (!stored) {
      throw new Error(`Inserted ${name} row ${rowid} could not be read back`);
    }
    return stored;
  }

  /**
   * Insert unless a uniqueness constraint already holds an equal row.
   * Returns true when a row was written.
   */
  insertOrIgnore<K extends TableName>(name: K, row: NewRecordMap[K]): boolean {
    return this.insert(name, row, true) !== null;
  }

  /**
   * Overwrite every column of an id-keyed row; hooks run as on insert
   */
  replace<K extends IdTableName>(name: K, id: number, row: NewRecordMap[K]): RecordMap[K] | null {
    this.ensureOpen();
    const table: TableDefinition<RecordMap[K], NewRecordMap[K]> = TABLES[name];
    const columns = Object.entries(table.toColumns(this.applyHooks(name, row))).filter(([column]) => column !== 'id');
    const assignments = columns.map(([column]) => `${quote(column)} = ?`).join(', ');

    const info = this.db
      .prepare(`UPDATE ${quote(table.name)} SET ${assignments} WHERE "id" = ?`)
      .run(...columns.map(([, value]) => value), id);
    return info.changes === 0 ? null : this.get(name, id);
  }

  /**
   * Row by primary key: a number for id-keyed tables, column values otherwise
   */
  get<K extends TableName>(name: K, key: number | Filter): RecordMap[K] | null {
    const table: TableDefinition<RecordMap[K], NewRecordMap[K]> = TABLES[name];
    const filter: Filter = typeof key === 'number' ? { id: key } : key;
    const missing = table.keyColumns.filter((column) => !(column in filter));
    if (missing.length > 0 || Object.keys(filter).length !== table.keyColumns.length) {
      throw new Error(`Key for ${name} must name exactly: ${table.keyColumns.join(', ')}`);
    }
    return this.query(name).filter(filter).first();
  }

  query<K extends TableName>(name: K): Query<K> {
    this.ensureOpen();
    return new Query<K>(this.db, TABLES[name]);
  }

  commit(): void {
    this.ensureOpen();
    if (this.savepoint) {
      this.db.exec(`RELEASE ${this.savepoint}`);
    } else {
      this.db.exec('COMMIT');
    }
    this.state = 'committed';
  }

  /**
   * Discard this session's writes; a no-op once committed or rolled back
   */
  rollback(): void {
    if (this.state !== 'open') return;
    this.state = 'rolled-back';
    // SQLite may already have ended the transaction after a fatal error
    if (!this.db.inTransaction) return;

    if (this.savepoint) {
      this.db.exec(`ROLLBACK TO ${this.savepoint}`);
      this.db.exec(`RELEASE ${this.savepoint}`);
    } else {
      this.db.exec('ROLLBACK');
    }
  }

  private ensureOpen(): void {
    if (this.state !== 'open') {
      throw new Error(`Session already ${this.state}`);
    }
  }

  private applyHooks<K extends TableName>(name: K, row: NewRecordMap[K]): NewRecordMap[K] {
    const hook = this.hooks[name]?.beforeWrite;
    return hook ? hook(row) : row;
  }

  private insert<K extends TableName>(name: K, row: NewRecordMap[K], ignoreConflicts: boolean): number | null {
    this.ensureOpen();
    const table: TableDefinition<RecordMap[K], NewRecordMap[K]> = TABLES[name];
    const columns = Object.entries(table.toColumns(this.applyHooks(name, row)));
    const names = columns.map(([column]) => quote(column)).join(', ');
    const placeholders = columns.map(() => '?').join(', ');
    const conflict = ignoreConflicts ? ' ON CONFLICT DO NOTHING' : '';

    const info = this.db
      .prepare(`INSERT INTO ${quote(table.name)} (${names}) VALUES (${placeholders})${conflict}`)
      .run(...columns.map(([, value]) => value));
    return info.changes === 0 ? null : Number(info.lastInsertRowid);
  }

  private byRowid<K extends TableName>(name: K, rowid: number | null): RecordMap[K] | null {
    if (rowid === null) return null;
    const table: TableDefinition<RecordMap[K], NewRecordMap[K]> = TABLES[name];
    const raw = this.db.prepare(`SELECT * FROM ${quote(table.name)} WHERE rowid = ?`).get(rowid);
    return raw === undefined ? null : table.fromColumns(raw);
  }
}
