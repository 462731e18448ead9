import { MalformedTargetSpecError } from '../errors.js';
import {
  ColumnName,
  IndexTargetExpr,
  MultipleColumnsTarget,
  NonEmptyArray,
  SingleColumnTarget,
  TargetMode,
} from '../types.js';

/** Option holding the serialized target of an index. */
export const TARGET_OPTION_NAME = 'target';
/** Option holding the implementation class of a custom index. */
export const CUSTOM_INDEX_OPTION_NAME = 'class_name';
export const INDEX_KEYS_OPTION_NAME = 'index_keys';
export const INDEX_VALUES_OPTION_NAME = 'index_values';
export const INDEX_ENTRIES_OPTION_NAME = 'index_keys_and_values';

const TARGET_MODES: readonly TargetMode[] = Object.values(TargetMode);

export function isTargetMode(value: string): value is TargetMode {
  return TARGET_MODES.some((mode) => mode === value);
}

export function targetModeFromString(text: string): TargetMode {
  if (!isTargetMode(text)) {
    throw new MalformedTargetSpecError(`Unknown index target type: ${text}`);
  }
  return text;
}

/**
 * Name of the index option recording that an index was created in `mode`.
 * `full` indexes have no such option.
 */
export function indexOptionName(mode: TargetMode): string | undefined {
  switch (mode) {
    case TargetMode.Keys:
      return INDEX_KEYS_OPTION_NAME;
    case TargetMode.Entries:
      return INDEX_ENTRIES_OPTION_NAME;
    case TargetMode.Values:
      return INDEX_VALUES_OPTION_NAME;
    case TargetMode.Full:
      return undefined;
  }
}

export function columnText(column: ColumnName): string {
  return typeof column === 'string' ? column : column.name;
}

export function singleColumn(column: ColumnName): SingleColumnTarget {
  return { kind: 'single', column };
}

export function multipleColumns(columns: NonEmptyArray<ColumnName>): MultipleColumnsTarget {
  return { kind: 'multiple', columns };
}

/**
 * Column names covered by a target expression, in order.
 */
export function targetColumnNames(target: IndexTargetExpr): string[] {
  switch (target.kind) {
    case 'single':
      return [columnText(target.column)];
    case 'multiple':
      return target.columns.map(columnText);
  }
}

/**
 * Target string of a single-column index created in `mode`. Non-default
 * modes use the functional form, e.g. `keys(tags)`.
 */
export function modeTargetString(column: ColumnName, mode: TargetMode): string {
  const name = columnText(column);
  return mode === TargetMode.Values ? name : `${mode}(${name})`;
}
