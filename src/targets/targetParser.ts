import { ColumnNotFoundError, ConfigurationError, MalformedTargetSpecError } from '../errors.js';
import {
  ColumnName,
  ColumnResolver,
  IndexMetadata,
  IndexTargetExpr,
  TargetDescriptor,
  TargetMode,
} from '../types.js';
import { getOrEmptyArray, isJsonObject, jsonScalarToString, tryParseJson } from '../utils/json.js';
import {
  TARGET_OPTION_NAME,
  columnText,
  multipleColumns,
  singleColumn,
  targetColumnNames,
  targetModeFromString,
} from './indexTarget.js';

const PK_TARGET_KEY = 'pk';
const CK_TARGET_KEY = 'ck';

const TARGET_REGEX = /^(keys|entries|values|full)\((.+)\)$/;

function getColumn<C>(resolve: ColumnResolver<C>, name: string): C {
  const column = resolve(name);
  if (column === undefined) {
    throw new ColumnNotFoundError(name);
  }
  return column;
}

/**
 * `keys(col)`, `entries(col)`, `values(col)` or `full(col)`.
 */
function parseFunctionalTarget<C>(
  raw: string,
  resolve: ColumnResolver<C>
): TargetDescriptor<C> | undefined {
  const match = TARGET_REGEX.exec(raw);
  if (!match) return undefined;

  return {
    mode: targetModeFromString(match[1]),
    partitionKeyColumns: [getColumn(resolve, match[2])],
    clusteringKeyColumns: [],
  };
}

/**
 * Flattens one level of nesting, so a composite written into `ck` reads back
 * as consecutive columns.
 */
function columnNamesOf(elements: unknown[], field: string): string[] {
  return elements.flatMap((element: unknown) =>
    Array.isArray(element)
      ? element.map((nested: unknown) => columnNameOf(nested, field))
      : [columnNameOf(element, field)]
  );
}

function columnNameOf(element: unknown, field: string): string {
  const name = jsonScalarToString(element);
  if (name === undefined) {
    throw new MalformedTargetSpecError(
      `${field} field of JSON definition must contain column names, got ${JSON.stringify(element)}`
    );
  }
  return name;
}

/**
 * `{"pk": [...], "ck": [...]}`. Both fields default to an empty array.
 */
function parseJsonTarget<C>(
  raw: string,
  resolve: ColumnResolver<C>
): TargetDescriptor<C> | undefined {
  const json = tryParseJson(raw);
  if (!isJsonObject(json)) return undefined;

  const pk = getOrEmptyArray(json, PK_TARGET_KEY);
  const ck = getOrEmptyArray(json, CK_TARGET_KEY);
  if (!Array.isArray(pk) || !Array.isArray(ck)) {
    throw new MalformedTargetSpecError('pk and ck fields of JSON definition must be arrays');
  }

  const pkNames = columnNamesOf(pk, PK_TARGET_KEY);
  const ckNames = columnNamesOf(ck, CK_TARGET_KEY);
  if (pkNames.length === 0) {
    throw new MalformedTargetSpecError('pk field of JSON definition must name at least one column');
  }

  return {
    mode: TargetMode.Values,
    partitionKeyColumns: pkNames.map((name) => getColumn(resolve, name)),
    clusteringKeyColumns: ckNames.map((name) => getColumn(resolve, name)),
  };
}

function parseBareTarget<C>(raw: string, resolve: ColumnResolver<C>): TargetDescriptor<C> {
  return {
    mode: TargetMode.Values,
    partitionKeyColumns: [getColumn(resolve, raw)],
    clusteringKeyColumns: [],
  };
}

/**
 * Parses a target string into the columns it covers and its indexing mode.
 *
 * The functional form is tried first, then the JSON object form, and finally
 * the whole string is taken as a single column name.
 *
 * @throws {ColumnNotFoundError} If a named column cannot be resolved.
 * @throws {MalformedTargetSpecError} If a JSON object target has unusable `pk`/`ck` fields.
 *
 * @example
 * parseTarget('keys(tags)', schema.resolver());
 * // { mode: 'keys', partitionKeyColumns: [tags], clusteringKeyColumns: [] }
 *
 * parseTarget('{"pk":["a","b"],"ck":["c"]}', schema.resolver());
 * // { mode: 'values', partitionKeyColumns: [a, b], clusteringKeyColumns: [c] }
 */
export function parseTarget<C>(raw: string, resolve: ColumnResolver<C>): TargetDescriptor<C> {
  return (
    parseFunctionalTarget(raw, resolve) ??
    parseJsonTarget(raw, resolve) ??
    parseBareTarget(raw, resolve)
  );
}

/**
 * Parses the target stored in an index's options.
 * @throws {ConfigurationError} If the index has no target or the target cannot be parsed.
 */
export function parseIndexTarget<C>(
  index: IndexMetadata,
  resolve: ColumnResolver<C>
): TargetDescriptor<C> {
  const target = index.options[TARGET_OPTION_NAME];
  if (target === undefined) {
    throw new ConfigurationError(index.name, '', new Error(`missing ${TARGET_OPTION_NAME} option`));
  }

  try {
    return parseTarget(target, resolve);
  } catch (error) {
    throw new ConfigurationError(index.name, target, error);
  }
}

/**
 * Whether a target describes a local index: a JSON object target naming both
 * partition key and clustering columns. Never throws.
 */
export function isLocal(raw: string): boolean {
  const json = tryParseJson(raw);
  if (!isJsonObject(json)) return false;

  const pk = json[PK_TARGET_KEY];
  const ck = json[CK_TARGET_KEY];
  return Array.isArray(pk) && pk.length > 0 && Array.isArray(ck) && ck.length > 0;
}

function firstColumnName(field: unknown): string | undefined {
  if (!Array.isArray(field) || field.length === 0) return undefined;

  const first: unknown = field[0];
  return Array.isArray(first) ? jsonScalarToString(first[0]) : jsonScalarToString(first);
}

/**
 * Name of the column a target is displayed by: the first clustering column of
 * a JSON target, else its first partition key column. Any other input is
 * returned unchanged.
 */
export function primaryColumnName(raw: string): string {
  const json = tryParseJson(raw);
  if (!isJsonObject(json)) return raw;

  return firstColumnName(json[CK_TARGET_KEY]) ?? firstColumnName(json[PK_TARGET_KEY]) ?? raw;
}

function asJsonValue(target: IndexTargetExpr): string | string[] {
  switch (target.kind) {
    case 'single':
      return columnText(target.column);
    case 'multiple':
      return targetColumnNames(target);
  }
}

function asJsonArray(target: IndexTargetExpr): string[] {
  const value = asJsonValue(target);
  return Array.isArray(value) ? value : [value];
}

/**
 * Serializes the targets of a CREATE INDEX statement.
 *
 * A lone single-column target is stored as the bare column name. Anything
 * else becomes `{"pk": [...], "ck": [...]}`, where the first target gives the
 * partition key columns and the remaining ones the clustering columns.
 */
export function serializeTargets(targets: readonly IndexTargetExpr[]): string {
  if (targets.length === 0) {
    throw new RangeError('At least one index target is required');
  }

  const [first, ...rest] = targets;
  if (rest.length === 0 && first.kind === 'single') {
    return columnText(first.column);
  }

  const json: { pk: string[]; ck?: (string | string[])[] } = { pk: asJsonArray(first) };
  if (rest.length > 0) {
    json.ck = rest.map(asJsonValue);
  }
  return JSON.stringify(json);
}

/**
 * Target expressions that serialize back to the columns and roles of `descriptor`.
 * The indexing mode is not carried over.
 */
export function targetsOf<C extends ColumnName>(descriptor: TargetDescriptor<C>): IndexTargetExpr[] {
  const pk = descriptor.partitionKeyColumns;
  if (pk.length === 0) {
    throw new RangeError('A target needs at least one partition key column');
  }

  const head = pk.length === 1 ? singleColumn(pk[0]) : multipleColumns([pk[0], ...pk.slice(1)]);
  return [head, ...descriptor.clusteringKeyColumns.map((column) => singleColumn(column))];
}
