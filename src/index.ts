export * from './lib/types';
export * from './lib/sources';
export * from './lib/errors';
export { normalizeTitle, canonicalizeTitle, MIN_KEYWORD_LENGTH } from './lib/titles';
export {
  splitTokens,
  formatToken,
  normalizeForCompare,
  modalityKeys,
  modalityLabels,
  hasAllModalities,
  listModalities,
  MODALITY_SEPARATOR,
} from './lib/modality';
export { clusterDuplicates, titleSimilarity, keywordOverlap, groupMembers, DUPLICATE_THRESHOLD } from './lib/dedupe';
export {
  computeFacets,
  computeFilterOptions,
  reconcileFilters,
  summarizeCatalog,
  type FacetOption,
  type FilterOptions,
  type CatalogSummary,
} from './lib/facets';
export {
  filterRecords,
  matchesFilters,
  matchesGroup,
  compareRecords,
  sortRecords,
  paginate,
  clampPage,
  totalPagesFor,
  queryRecords,
  queryGroups,
  selectRecords,
  selectGroups,
  sliceAt,
  type RecordFilter,
  type RecordQuery,
} from './lib/query';
export {
  DEFAULT_FILTER_STATE,
  DEFAULT_PAGE_SIZE,
  nextSort,
  setSourceFilter,
  toggleModality,
  setPage,
  parseFilterState,
  serializeFilterState,
} from './lib/filterState';
export { loadCatalogConfig, type CatalogConfig, type DatabaseConfig } from './lib/config';
export { createLogger, createNullLogger, type Logger, type LogLevel } from './lib/logger';
export { createReadThroughCache, type ReadThroughCache } from './lib/cache';
export { toDatasetRecords, UnifiedDatasetRowSchema, type AdaptedRows } from './adapters/unifiedDatasets';
export {
  PgCatalogRepository,
  resolveSnapshotTarget,
  viewStatementUrl,
  NO_DATA_MESSAGE,
  type SnapshotTarget,
  type StorageObjects,
  type CatalogRepository,
  type CatalogSnapshot,
  type CatalogHealth,
  type SnapshotPushdown,
  type ViewRefreshResult,
} from './lib/db/repository';
export { MemoryCatalogRepository } from './lib/db/memory';
export {
  createCatalogService,
  parseDatasetsRequest,
  parseStatsRequest,
  DatasetsRequestSchema,
  StatsRequestSchema,
  MAX_LIMIT,
  type CatalogService,
  type CatalogServiceOptions,
  type DatasetsRequest,
  type DatasetsResponse,
  type StatsRequest,
  type StatsResponse,
  type FilterOptionsResponse,
  type RawRequest,
} from './lib/catalogService';
