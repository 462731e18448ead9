/**
 * Indexing mode of a target. `values` indexes the whole value of a column and
 * is the mode of every target that does not name one explicitly.
 */
export const TargetMode = {
  Keys: 'keys',
  Entries: 'entries',
  Values: 'values',
  Full: 'full',
} as const;

export type TargetMode = (typeof TargetMode)[keyof typeof TargetMode];

/**
 * Role a column plays in its table.
 */
export type ColumnKind = 'partition_key' | 'clustering_key' | 'regular' | 'static';

/**
 * A column of a table schema, as returned by {@link TableSchema.getColumnDefinition}.
 */
export interface ColumnDefinition {
  name: string;
  /** CQL type name, e.g. `text` or `map<text, int>`. Not interpreted here. */
  type: string;
  kind: ColumnKind;
  /** Position within its kind, starting at 0. */
  position: number;
}

/**
 * Looks a column up by name. Returns undefined when the column does not exist.
 */
export type ColumnResolver<C> = (name: string) => C | undefined;

/**
 * Structured form of a target string.
 */
export interface TargetDescriptor<C = ColumnDefinition> {
  mode: TargetMode;
  partitionKeyColumns: C[];
  clusteringKeyColumns: C[];
}

export type NonEmptyArray<T> = [T, ...T[]];

/**
 * A column named in an index target: either its name or anything carrying one.
 */
export type ColumnName = string | { readonly name: string };

export interface SingleColumnTarget {
  kind: 'single';
  column: ColumnName;
}

export interface MultipleColumnsTarget {
  kind: 'multiple';
  columns: NonEmptyArray<ColumnName>;
}

/**
 * One element of the target list of a CREATE INDEX statement.
 */
export type IndexTargetExpr = SingleColumnTarget | MultipleColumnsTarget;

/**
 * Options map stored with every index. The serialized target lives under `target`.
 */
export type IndexOptions = Record<string, string>;

export type IndexKind = 'composites' | 'custom';

/**
 * Persisted index metadata, as stored in the catalog.
 */
export interface IndexMetadata {
  name: string;
  table: string;
  kind: IndexKind;
  options: IndexOptions;
}

/**
 * Row of the `index_metadata` table.
 */
export interface IndexMetadataRow {
  _id: string;
  table_name: string;
  index_name: string;
  kind: string;
  options: string; // JSON string
}

/**
 * Options for createIndex.
 */
export interface CreateIndexOptions {
  /**
   * Name of the index. If not specified, one is derived from the table and target.
   */
  name?: string;

  /**
   * Indexing mode. Only single-column targets accept a mode other than `values`.
   */
  mode?: TargetMode;

  /**
   * Implementation class of a custom index. Sets the index kind to `custom`.
   */
  customClass?: string;
}

/**
 * Result of createIndex operation.
 */
export interface CreateIndexResult {
  acknowledged: boolean;
  name: string;
  /** The serialized target stored with the index. */
  target: string;
}

/**
 * Result of dropIndex operation.
 */
export interface DropIndexResult {
  acknowledged: boolean;
  name: string;
}

/**
 * An index loaded from the catalog with its target parsed against the table schema.
 */
export interface IndexDescription {
  name: string;
  table: string;
  kind: IndexKind;
  target: string;
  mode: TargetMode;
  partitionKeyColumns: string[];
  clusteringKeyColumns: string[];
  local: boolean;
  primaryColumn: string;
  options: IndexOptions;
}
