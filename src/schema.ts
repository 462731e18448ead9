import type { ColumnDefinition, ColumnKind, ColumnResolver } from './types.js';

/**
 * Column declaration accepted by {@link TableSchema}. Positions are assigned
 * from declaration order within each kind.
 */
export interface ColumnSpec {
  name: string;
  type: string;
  kind?: ColumnKind;
}

/**
 * Immutable snapshot of a table's columns, used to resolve the column names
 * found in index targets.
 */
export class TableSchema {
  readonly name: string;
  private readonly columns: Map<string, ColumnDefinition> = new Map();

  /**
   * @param name Table name.
   * @param columns Column declarations. Columns without a kind are regular columns.
   */
  constructor(name: string, columns: ColumnSpec[]) {
    this.name = name;

    const positions = new Map<ColumnKind, number>();
    for (const spec of columns) {
      if (this.columns.has(spec.name)) {
        throw new Error(`Duplicate column ${spec.name} in table ${name}`);
      }
      const kind = spec.kind ?? 'regular';
      const position = positions.get(kind) ?? 0;
      positions.set(kind, position + 1);
      this.columns.set(spec.name, Object.freeze({ name: spec.name, type: spec.type, kind, position }));
    }

    if (this.partitionKeyColumns.length === 0) {
      throw new Error(`Table ${name} must have at least one partition key column`);
    }
  }

  get partitionKeyColumns(): ColumnDefinition[] {
    return this.columnsOfKind('partition_key');
  }

  get clusteringKeyColumns(): ColumnDefinition[] {
    return this.columnsOfKind('clustering_key');
  }

  get regularColumns(): ColumnDefinition[] {
    return this.columnsOfKind('regular');
  }

  /**
   * Looks a column up by its exact, case-sensitive name.
   */
  getColumnDefinition(name: string): ColumnDefinition | undefined {
    return this.columns.get(name);
  }

  resolver(): ColumnResolver<ColumnDefinition> {
    return (name) => this.getColumnDefinition(name);
  }

  private columnsOfKind(kind: ColumnKind): ColumnDefinition[] {
    return [...this.columns.values()].filter((column) => column.kind === kind);
  }
}
