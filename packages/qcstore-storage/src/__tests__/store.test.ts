/**
 * QcStore lifecycle tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { StoreNotInitializedError } from '../errors';
import { QcStore } from '../store';
import { capturingLogger, fakeToolkit } from './test-utils';

describe('QcStore', () => {
  it('should refuse sessions before initialize', () => {
    const store = new QcStore({ toolkit: fakeToolkit(), logger: capturingLogger().logger });

    expect(store.initialized).toBe(false);
    expect(() => store.session()).toThrow(StoreNotInitializedError);
  });

  it('should fill missing options from defaults', () => {
    const store = new QcStore({ toolkit: fakeToolkit(), busyTimeout: 250 });

    expect(store.config).toEqual({ path: ':memory:', walMode: true, echo: false, busyTimeout: 250, logLevel: 'info' });
    expect(store.hashRegistry).toBeNull();
  });

  it('should report health across the lifecycle', async () => {
    const { logger, records } = capturingLogger();
    const store = new QcStore({ toolkit: fakeToolkit(), logger });

    expect(await store.healthCheck()).toBe(false);
    await store.initialize();
    expect(await store.healthCheck()).toBe(true);
    await store.close();
    expect(await store.healthCheck()).toBe(false);

    expect(records.map((r) => r.message)).toEqual(['Store initialized', 'Store closed']);
  });

  it('should log statements at debug level when echo is on', async () => {
    const { logger, records } = capturingLogger();
    const store = new QcStore({ toolkit: fakeToolkit(), logger, echo: true });
    await store.initialize();

    store.selectAll('calculation');

    const sql = records.filter((r) => r.component === 'test.sql');
    expect(sql.some((r) => r.message.startsWith('SELECT * FROM "calculation"'))).toBe(true);
    await store.close();
  });

  it('should open once when initialize calls overlap', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'qcstore-'));
    const { logger, records } = capturingLogger();
    const store = new QcStore({ path: path.join(dir, 'store.db'), toolkit: fakeToolkit(), logger });

    try {
      await Promise.all([store.initialize(), store.initialize()]);

      expect(records.filter((r) => r.message === 'Store initialized')).toHaveLength(1);
      expect(await store.healthCheck()).toBe(true);
      await store.close();
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('should create a file database with its directory', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'qcstore-'));
    const file = path.join(dir, 'nested', 'store.db');
    const store = new QcStore({ path: file, toolkit: fakeToolkit(), logger: capturingLogger().logger });

    try {
      await store.initialize();
      store.transaction((session) =>
        session.add('calculation', { program: 'crest', version: null, method: 'gfn2', basis: null, input: null })
      );
      await store.close();

      const reopened = new QcStore({ path: file, toolkit: fakeToolkit(), logger: capturingLogger().logger });
      await reopened.initialize();
      expect(reopened.selectAll('calculation')).toHaveLength(1);
      await reopened.close();
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
