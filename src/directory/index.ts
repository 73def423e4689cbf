/**
 * Directory reader exports
 */

export type {
  DirectoryUser,
  DirectoryEntry,
  DirectoryFilterOptions,
  DirectoryReadOptions,
  EntryShapeOptions,
  LdapSearchClient,
  ShapeResult,
  SkippedEntry,
} from './types.js';

export { buildLdapFilter, splitGroupDns, escapeFilterValue } from './filter.js';

export {
  fetchDirectoryUsers,
  shapeEntries,
  isEntryDisabled,
  attributeValues,
  requestedAttributes,
  type DirectoryReaderDeps,
} from './reader.js';
