/**
 * Verifies that the package entry point exposes the public API and that the
 * modules behind it load together.
 */
import { describe, it } from 'node:test';
import { expect } from 'expect';
import * as api from '../src/index.js';

describe('Module exports', () => {
  it('should export the target operations', () => {
    for (const name of ['parseTarget', 'parseIndexTarget', 'isLocal', 'primaryColumnName', 'serializeTargets', 'targetsOf'] as const) {
      expect(typeof api[name]).toBe('function');
    }
  });

  it('should export the error classes', () => {
    expect(new api.ColumnNotFoundError('x')).toBeInstanceOf(Error);
    expect(new api.MalformedTargetSpecError('x').name).toBe('MalformedTargetSpecError');
    expect(new api.ConfigurationError('i', 't', new Error('e')).name).toBe('ConfigurationError');
  });

  it('should export the option names and modes', () => {
    expect(api.TARGET_OPTION_NAME).toBe('target');
    expect(api.CUSTOM_INDEX_OPTION_NAME).toBe('class_name');
    expect(api.TargetMode).toEqual({ Keys: 'keys', Entries: 'entries', Values: 'values', Full: 'full' });
  });

  it('should run a catalog end to end', async () => {
    const schema = new api.TableSchema('events', [
      { name: 'day', type: 'date', kind: 'partition_key' },
      { name: 'kind', type: 'text' },
    ]);
    const catalog = new api.IndexCatalog(':memory:');

    try {
      await catalog.connect();
      await catalog.createIndex(schema, [api.singleColumn('kind')]);
      const [index] = await catalog.listIndexes(schema).toArray();

      expect(index.name).toBe('events_kind_idx');
      expect(index.partitionKeyColumns).toEqual(['kind']);
    } finally {
      await catalog.close();
    }
  });
});
