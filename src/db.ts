import Database from 'better-sqlite3';
import { IndexMetadataRow } from './types.js';

export interface CatalogDatabaseOptions {
  filePath: string;
  verbose?: boolean;
  readOnly?: boolean;
  WAL?: boolean; // Write-Ahead Logging, ignored for read-only databases
}

export const CATALOG_TABLE = 'index_metadata';

const CREATE_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS "${CATALOG_TABLE}" (
    _id TEXT PRIMARY KEY,
    table_name TEXT NOT NULL,
    index_name TEXT NOT NULL,
    kind TEXT NOT NULL,
    options TEXT NOT NULL,
    UNIQUE (table_name, index_name)
  );
`;

const STATEMENTS = {
  insert: `INSERT INTO "${CATALOG_TABLE}" (_id, table_name, index_name, kind, options)
    VALUES (@_id, @table_name, @index_name, @kind, @options)
    ON CONFLICT (table_name, index_name) DO NOTHING`,
  find: `SELECT _id, table_name, index_name, kind, options FROM "${CATALOG_TABLE}"
    WHERE table_name = ? AND index_name = ?`,
  listByTable: `SELECT _id, table_name, index_name, kind, options FROM "${CATALOG_TABLE}"
    WHERE table_name = ? ORDER BY index_name`,
  remove: `DELETE FROM "${CATALOG_TABLE}" WHERE table_name = ? AND index_name = ?`,
  removeByTable: `DELETE FROM "${CATALOG_TABLE}" WHERE table_name = ?`,
} as const;

type StatementName = keyof typeof STATEMENTS;

function isIndexMetadataRow(value: unknown): value is IndexMetadataRow {
  if (typeof value !== 'object' || value === null) return false;
  const row: { [key: string]: unknown } = { ...value };
  return (
    typeof row._id === 'string' &&
    typeof row.table_name === 'string' &&
    typeof row.index_name === 'string' &&
    typeof row.kind === 'string' &&
    typeof row.options === 'string'
  );
}

function toRow(value: unknown): IndexMetadataRow {
  if (!isIndexMetadataRow(value)) {
    throw new Error(`Malformed row in ${CATALOG_TABLE}: ${JSON.stringify(value)}`);
  }
  return value;
}

/**
 * IndexMetadataStore keeps the rows of the index catalog table in a
 * better-sqlite3 database. Its methods return promises so callers do not
 * depend on the driver being synchronous.
 */
export class IndexMetadataStore {
  private db: Database.Database | null = null;
  private readonly statements = new Map<StatementName, Database.Statement>();
  private readonly filePath: string;
  private readonly verbose: boolean;
  private readonly readOnly: boolean;
  private readonly WAL: boolean;

  /**
   * @param dbPathOrOptions Path to the database file (':memory:' for an in-memory database) or an options object.
   */
  constructor(dbPathOrOptions: string | CatalogDatabaseOptions) {
    if (typeof dbPathOrOptions === 'string') {
      this.filePath = dbPathOrOptions;
      this.verbose = false;
      this.readOnly = false;
      this.WAL = false;
    } else {
      this.filePath = dbPathOrOptions.filePath;
      this.verbose = dbPathOrOptions.verbose ?? false;
      this.readOnly = dbPathOrOptions.readOnly ?? false;
      this.WAL = dbPathOrOptions.WAL ?? false;
    }
  }

  get isReadOnly(): boolean {
    return this.readOnly;
  }

  get isOpen(): boolean {
    return this.db !== null;
  }

  /**
   * Opens the database and creates the catalog table unless the database is
   * read-only. Does nothing when already open. A failed open leaves the store
   * closed, so a later call tries again.
   */
  public async connect(): Promise<void> {
    if (this.db) return;

    try {
      this.db = this.open();
    } catch (err) {
      console.error(`Error opening database ${this.filePath}:`, err instanceof Error ? err.message : err);
      throw err;
    }

    if (this.verbose) {
      console.log(`SQLite database opened: ${this.filePath}`);
    }
  }

  private open(): Database.Database {
    const db = new Database(this.filePath, {
      readonly: this.readOnly,
      verbose: this.verbose ? console.log : undefined,
    });
    if (this.readOnly) return db;

    try {
      if (this.WAL) {
        db.pragma('journal_mode = WAL');
      }
      db.exec(CREATE_TABLE_SQL);
    } catch (err) {
      db.close();
      throw err;
    }
    return db;
  }

  private async statement(name: StatementName): Promise<Database.Statement> {
    await this.connect();
    const cached = this.statements.get(name);
    if (cached) return cached;

    if (!this.db) {
      throw new Error('Database is not connected. Connection attempt failed.');
    }
    const prepared = this.db.prepare(STATEMENTS[name]);
    this.statements.set(name, prepared);
    return prepared;
  }

  /**
   * Inserts a catalog row.
   * @returns false, without writing, when the table already has an index of that name.
   */
  public async insert(row: IndexMetadataRow): Promise<boolean> {
    try {
      const stmt = await this.statement('insert');
      return stmt.run(row).changes > 0;
    } catch (err) {
      console.error(`Error inserting index ${row.index_name} of table ${row.table_name}:`, err);
      throw err;
    }
  }

  public async find(table: string, indexName: string): Promise<IndexMetadataRow | undefined> {
    try {
      const stmt = await this.statement('find');
      const row: unknown = stmt.get(table, indexName);
      return row === undefined ? undefined : toRow(row);
    } catch (err) {
      console.error(`Error loading index ${indexName} of table ${table}:`, err);
      throw err;
    }
  }

  /**
   * Rows of a table's indexes, ordered by index name.
   */
  public async listByTable(table: string): Promise<IndexMetadataRow[]> {
    try {
      const stmt = await this.statement('listByTable');
      return stmt.all(table).map(toRow);
    } catch (err) {
      console.error(`Error listing indexes of table ${table}:`, err);
      throw err;
    }
  }

  /**
   * @returns The number of rows deleted.
   */
  public async remove(table: string, indexName: string): Promise<number> {
    try {
      const stmt = await this.statement('remove');
      return stmt.run(table, indexName).changes;
    } catch (err) {
      console.error(`Error deleting index ${indexName} of table ${table}:`, err);
      throw err;
    }
  }

  /**
   * @returns The number of rows deleted.
   */
  public async removeByTable(table: string): Promise<number> {
    try {
      const stmt = await this.statement('removeByTable');
      return stmt.run(table).changes;
    } catch (err) {
      console.error(`Error deleting indexes of table ${table}:`, err);
      throw err;
    }
  }

  /**
   * Closes the database connection. Closing a store that is not open does nothing.
   */
  public async close(): Promise<void> {
    const db = this.db;
    if (!db) return;

    this.db = null;
    this.statements.clear();
    try {
      db.close();
      if (this.verbose) {
        console.log(`SQLite database closed: ${this.filePath}`);
      }
    } catch (err) {
      console.error(`Error closing database ${this.filePath}:`, err instanceof Error ? err.message : err);
      throw err;
    }
  }
}
