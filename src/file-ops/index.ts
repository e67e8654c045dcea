/**
 * File operations suite - traversal, styling, sorting, filtering and output assembly
 */

// Path utilities
export {
  basename,
  normalizePath,
  rootLabel,
  defaultOutputPath
} from './path';

// Connector styles
export {
  StyleRegistry,
  connectorStyler,
  visualWidth
} from './connector-styles';
export type { StyleSpec } from './connector-styles';

// Sorting
export {
  resolveSortKey,
  compareNatural,
  compareCodePoints
} from './sort-keys';
export type { NameComparator } from './sort-keys';

// Name filters
export {
  buildNameFilters,
  ALLOW_ALL
} from './filters';
export type { FilterPair, NamePredicate, NameFilterOptions } from './filters';

// Traversal
export {
  buildTree,
  orderEntries,
  readDirectoryEntries
} from './tree-builder';

// Output assembly
export {
  assembleTree,
  streamTree,
  countEntries,
  formatEntryCount
} from './output-assembler';
export type { TreeSink } from './output-assembler';

// Errors
export { TreeError, isTreeError, isConfigurationError } from './errors';
export type { TreeErrorCode } from './errors';

// Types
export type {
  BuildOptions,
  DirectoryEntry,
  DirectoryReader,
  EntryCount,
  EntryKind,
  TreeConfiguration
} from './tree-types';
