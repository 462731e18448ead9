export {
  parseTarget,
  parseIndexTarget,
  isLocal,
  primaryColumnName,
  serializeTargets,
  targetsOf,
} from './targets/targetParser.js';
export {
  TARGET_OPTION_NAME,
  CUSTOM_INDEX_OPTION_NAME,
  INDEX_KEYS_OPTION_NAME,
  INDEX_VALUES_OPTION_NAME,
  INDEX_ENTRIES_OPTION_NAME,
  isTargetMode,
  targetModeFromString,
  indexOptionName,
  modeTargetString,
  columnText,
  singleColumn,
  multipleColumns,
  targetColumnNames,
} from './targets/indexTarget.js';
export { ColumnNotFoundError, MalformedTargetSpecError, ConfigurationError } from './errors.js';
export { TableSchema } from './schema.js';
export type { ColumnSpec } from './schema.js';
export { IndexCatalog, defaultIndexName } from './indexCatalog.js';
export type { IndexCatalogOptions } from './indexCatalog.js';
export { IndexMetadataStore } from './db.js';
export type { CatalogDatabaseOptions } from './db.js';
export * from './types.js';
