/**
 * QcStore - SQLite store for calculation results
 *
 * Owns the connection, the schema and the write hooks. Geometry rows get
 * their structural hash and formula from the structure toolkit before they
 * are written.
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { HashRegistry } from 'qcstore-calcn';
import { DEFAULT_STORE_CONFIG, MEMORY_PATH, QcStoreConfig } from './config';
import { StoreNotInitializedError } from './errors';
import { Logger, createLogger } from './logger';
import { MIGRATIONS, NewGeometry, RecordMap, SCHEMA_VERSION, TableName } from './schema';
import { Session, SessionHooks } from './session';
import { MoleculeSchema, StructureToolkit, hillFormula } from './structure';

export interface QcStoreOptions extends Partial<QcStoreConfig> {
  toolkit: StructureToolkit;
  /** When set, orchestrated writes store one hash per registered scheme */
  hashRegistry?: HashRegistry;
  logger?: Logger;
}

export class QcStore {
  readonly config: QcStoreConfig;
  readonly toolkit: StructureToolkit;
  readonly hashRegistry: HashRegistry | null;
  readonly logger: Logger;
  private db: Database.Database | null = null;
  private opening: Promise<void> | null = null;
  private readonly hooks: SessionHooks;

  constructor(options: QcStoreOptions) {
    this.config = {
      path: options.path ?? DEFAULT_STORE_CONFIG.path,
      walMode: options.walMode ?? DEFAULT_STORE_CONFIG.walMode,
      echo: options.echo ?? DEFAULT_STORE_CONFIG.echo,
      busyTimeout: options.busyTimeout ?? DEFAULT_STORE_CONFIG.busyTimeout,
      logLevel: options.logLevel ?? DEFAULT_STORE_CONFIG.logLevel,
    };
    this.toolkit = options.toolkit;
    this.hashRegistry = options.hashRegistry ?? null;
    this.logger = options.logger ?? createLogger('qcstore', { level: this.config.logLevel });
    this.hooks = {
      geometry: { beforeWrite: (row) => this.populateGeometry(row) },
    };
  }

  // -------------------------------------------------------------------------
  // Connection Management
  // -------------------------------------------------------------------------

  /**
   * Open the database and run migrations; overlapping calls share one open
   */
  async initialize(): Promise<void> {
    if (this.db) return;
    if (!this.opening) {
      this.opening = this.open().finally(() => {
        this.opening = null;
      });
    }
    return this.opening;
  }

  private async open(): Promise<void> {
    const inMemory = this.config.path === MEMORY_PATH;
    if (!inMemory) {
      await fs.promises.mkdir(path.dirname(this.config.path), { recursive: true });
    }

    const sqlLogger = this.logger.child('sql');
    this.db = new Database(this.config.path, {
      verbose: this.config.echo ? (statement) => sqlLogger.debug(String(statement)) : undefined,
    });

    if (this.config.walMode && !inMemory) {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma(`busy_timeout = ${this.config.busyTimeout}`);
    this.db.pragma('foreign_keys = ON');

    this.runMigrations();
    this.logger.info('Store initialized', { path: this.config.path, schema_version: SCHEMA_VERSION });
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
      this.logger.info('Store closed', { path: this.config.path });
    }
  }

  async healthCheck(): Promise<boolean> {
    if (!this.db) return false;
    try {
      return this.db.prepare('SELECT 1').get() !== undefined;
    } catch (err) {
      this.logger.warn('Health check failed', { error: err instanceof Error ? err.message : String(err) });
      return false;
    }
  }

  get initialized(): boolean {
    return this.db !== null;
  }

  private getDb(): Database.Database {
    if (!this.db) {
      throw new StoreNotInitializedError();
    }
    return this.db;
  }

  private runMigrations(): void {
    const db = this.getDb();
    db.transaction(() => {
      for (const statement of MIGRATIONS) {
        db.exec(statement);
      }
      db.pragma(`user_version = ${SCHEMA_VERSION}`);
    })();
  }

  // -------------------------------------------------------------------------
  // Sessions
  // -------------------------------------------------------------------------

  /**
   * Open a session; the caller commits or rolls back
   */
  session(): Session {
    return new Session(this.getDb(), this.hooks);
  }

  /**
   * Run fn in a session: commit on return, roll back on throw
   */
  transaction<T>(fn: (session: Session) => T): T {
    const session = this.session();
    try {
      const result = fn(session);
      session.commit();
      return result;
    } catch (err) {
      session.rollback();
      throw err;
    }
  }

  selectAll<K extends TableName>(name: K): RecordMap[K][] {
    return this.transaction((session) => session.query(name).all());
  }

  // -------------------------------------------------------------------------
  // Hooks
  // -------------------------------------------------------------------------

  private populateGeometry(row: NewGeometry): NewGeometry {
    const molecule = MoleculeSchema.parse({
      symbols: row.symbols,
      coordinates: row.coordinates,
      charge: row.charge,
      spin: row.spin,
    });
    return {
      ...row,
      hash: this.toolkit.geometryHash(molecule),
      formula: hillFormula(molecule.symbols),
    };
  }
}
