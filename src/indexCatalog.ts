import { ObjectId } from 'bson';
import { CatalogDatabaseOptions, IndexMetadataStore } from './db.js';
import { ConfigurationError, MalformedTargetSpecError } from './errors.js';
import { TableSchema } from './schema.js';
import {
  CUSTOM_INDEX_OPTION_NAME,
  TARGET_OPTION_NAME,
  indexOptionName,
  modeTargetString,
} from './targets/indexTarget.js';
import {
  isLocal,
  parseIndexTarget,
  parseTarget,
  primaryColumnName,
  serializeTargets,
} from './targets/targetParser.js';
import {
  CreateIndexOptions,
  CreateIndexResult,
  DropIndexResult,
  IndexDescription,
  IndexKind,
  IndexMetadata,
  IndexMetadataRow,
  IndexOptions,
  IndexTargetExpr,
  TargetMode,
} from './types.js';
import { isJsonObject, tryParseJson } from './utils/json.js';

export interface IndexCatalogOptions extends CatalogDatabaseOptions {}

/**
 * Default name of an index: `<table>_<column>_idx`, where column is the
 * primary column of `target`, with every character outside `[A-Za-z0-9_]` removed.
 */
export function defaultIndexName(table: string, target: string): string {
  return `${table}_${primaryColumnName(target)}_idx`.replace(/\W/g, '');
}

function toTargetString(targets: readonly IndexTargetExpr[], mode: TargetMode): string {
  if (mode === TargetMode.Values) {
    return serializeTargets(targets);
  }

  const [only] = targets;
  if (targets.length !== 1 || only.kind !== 'single') {
    throw new MalformedTargetSpecError(`Index mode ${mode} requires a single column target`);
  }
  return modeTargetString(only.column, mode);
}

function toIndexOptions(json: string): IndexOptions {
  const parsed = tryParseJson(json);
  const options: IndexOptions = {};
  if (!isJsonObject(parsed)) return options;

  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === 'string') {
      options[key] = value;
    }
  }
  return options;
}

function toIndexMetadata(row: IndexMetadataRow): IndexMetadata {
  return {
    name: row.index_name,
    table: row.table_name,
    kind: row.kind === 'custom' ? 'custom' : 'composites',
    options: toIndexOptions(row.options),
  };
}

/**
 * IndexCatalog stores secondary index metadata in SQLite. Each index keeps
 * its serialized target under the `target` option and is described by
 * parsing that target against the table schema it belongs to.
 */
export class IndexCatalog {
  private store: IndexMetadataStore;
  private readonly verbose: boolean;

  /**
   * @param dbPathOrOptions Path to the SQLite database file or an options object.
   */
  constructor(dbPathOrOptions: string | IndexCatalogOptions) {
    this.store = new IndexMetadataStore(dbPathOrOptions);
    this.verbose = typeof dbPathOrOptions === 'string' ? false : (dbPathOrOptions.verbose ?? false);
  }

  /**
   * Get the underlying row store for advanced operations or testing.
   */
  get database(): IndexMetadataStore {
    return this.store;
  }

  async connect(): Promise<void> {
    await this.store.connect();
  }

  async close(): Promise<void> {
    return this.store.close();
  }

  /**
   * Creates an index on the given target(s) of a table.
   *
   * @param schema The table the index belongs to. Every target column must exist in it.
   * @param targets The index targets, as in `CREATE INDEX ON t (a)` or `CREATE INDEX ON t ((a, b), c)`.
   * @param options Name, mode and custom class of the index.
   *
   * @example
   * // Index on the values of "email"
   * catalog.createIndex(users, [singleColumn('email')]);
   *
   * // Index on the keys of the "attributes" map
   * catalog.createIndex(users, [singleColumn('attributes')], { mode: TargetMode.Keys });
   *
   * // Local index: partition key "id", clustering column "email"
   * catalog.createIndex(users, [multipleColumns(['id']), singleColumn('email')]);
   */
  async createIndex(
    schema: TableSchema,
    targets: readonly IndexTargetExpr[],
    options: CreateIndexOptions = {}
  ): Promise<CreateIndexResult> {
    const mode = options.mode ?? TargetMode.Values;
    const target = toTargetString(targets, mode);
    // Fails with ColumnNotFoundError for columns the table does not have
    parseTarget(target, schema.resolver());

    const indexName = options.name ?? defaultIndexName(schema.name, serializeTargets(targets));
    const indexOptions: IndexOptions = { [TARGET_OPTION_NAME]: target };
    const modeOption = mode !== TargetMode.Values ? indexOptionName(mode) : undefined;
    if (modeOption) {
      indexOptions[modeOption] = '';
    }
    let kind: IndexKind = 'composites';
    if (options.customClass) {
      indexOptions[CUSTOM_INDEX_OPTION_NAME] = options.customClass;
      kind = 'custom';
    }

    if (this.verbose) {
      console.log(`Creating index ${indexName} on table ${schema.name} with target ${target}`);
    }
    // Writes nothing when the table already has an index of this name
    const inserted = await this.store.insert({
      _id: new ObjectId().toHexString(),
      table_name: schema.name,
      index_name: indexName,
      kind,
      options: JSON.stringify(indexOptions),
    });
    if (!inserted) {
      throw new Error(`Index ${indexName} already exists on table ${schema.name}`);
    }
    return { acknowledged: true, name: indexName, target };
  }

  /**
   * Loads an index and parses its target against `schema`.
   *
   * @returns The index description, or undefined if the table has no such index.
   * @throws {ConfigurationError} If the stored target cannot be parsed.
   */
  async getIndex(schema: TableSchema, indexName: string): Promise<IndexDescription | undefined> {
    const row = await this.store.find(schema.name, indexName);
    return row ? this.describe(schema, toIndexMetadata(row)) : undefined;
  }

  /**
   * Lists the indexes of a table, ordered by name. Indexes whose target can no
   * longer be parsed are skipped with a warning.
   */
  listIndexes(schema: TableSchema): { toArray: () => Promise<IndexDescription[]> } {
    return {
      toArray: async (): Promise<IndexDescription[]> => {
            const rows = await this.store.listByTable(schema.name);

        const results: IndexDescription[] = [];
        for (const row of rows) {
          try {
            results.push(this.describe(schema, toIndexMetadata(row)));
          } catch (error) {
            if (!(error instanceof ConfigurationError)) throw error;
            console.warn(`Skipping index ${row.index_name} on table ${schema.name}: ${error.message}`);
          }
        }
        return results;
      },
    };
  }

  /**
   * Drops an index from the catalog. Dropping a missing index is acknowledged.
   */
  async dropIndex(schema: TableSchema, indexName: string): Promise<DropIndexResult> {
    if (this.verbose) {
      console.log(`Dropping index ${indexName} from table ${schema.name}`);
    }
    await this.store.remove(schema.name, indexName);
    return { acknowledged: true, name: indexName };
  }

  /**
   * Drops every index of a table.
   */
  async dropIndexes(schema: TableSchema): Promise<{ acknowledged: boolean; droppedCount: number }> {
    const droppedCount = await this.store.removeByTable(schema.name);
    return { acknowledged: true, droppedCount };
  }

  private describe(schema: TableSchema, index: IndexMetadata): IndexDescription {
    const descriptor = parseIndexTarget(index, schema.resolver());
    const target = index.options[TARGET_OPTION_NAME];

    return {
      name: index.name,
      table: index.table,
      kind: index.kind,
      target,
      mode: descriptor.mode,
      partitionKeyColumns: descriptor.partitionKeyColumns.map((column) => column.name),
      clusteringKeyColumns: descriptor.clusteringKeyColumns.map((column) => column.name),
      local: isLocal(target),
      primaryColumn: primaryColumnName(target),
      options: index.options,
    };
  }
}
