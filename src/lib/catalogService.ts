import { z } from 'zod';
import { createReadThroughCache } from './cache';
import type { CatalogConfig } from './config';
import type { CatalogHealth, CatalogRepository, CatalogSnapshot, SnapshotPushdown, ViewRefreshResult } from './db/repository';
import { clusterDuplicates } from './dedupe';
import { CatalogError, CatalogValidationError, SnapshotUnavailableError } from './errors';
import { computeFacets, computeFilterOptions, reconcileFilters, summarizeCatalog, type CatalogSummary, type FilterOptions } from './facets';
import { DEFAULT_PAGE_SIZE } from './filterState';
import { createNullLogger, type Logger } from './logger';
import { MODALITY_SEPARATOR, normalizeForCompare, splitTokens } from './modality';
import { parseList } from './params';
import { selectGroups, selectRecords, sliceAt, type RecordQuery } from './query';
import { DatasetSourceSchema, type DatasetSource } from './sources';
import { SORT_COLUMNS, type DatasetGroup, type DatasetRecord, type FilterState } from './types';

export const MAX_LIMIT = 500;

const ModalityListSchema = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform((value) => {
    const list = value === undefined ? [] : Array.isArray(value) ? value : [value];
    const keys = list.flatMap(splitTokens).map(normalizeForCompare);
    return Array.from(new Set(keys));
  });

export const DatasetsRequestSchema = z.object({
  source: DatasetSourceSchema.optional(),
  modality: ModalityListSchema,
  search: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(MAX_LIMIT).optional(),
  offset: z.coerce.number().int().min(0).default(0),
  sortBy: z.enum(SORT_COLUMNS).default('citations'),
  sortOrder: z.enum(['asc', 'desc']).default('desc'),
  mode: z.enum(['raw', 'grouped']).default('raw'),
});

export const StatsRequestSchema = z.object({
  source: DatasetSourceSchema.optional(),
  modality: ModalityListSchema,
});

export type DatasetsRequest = z.input<typeof DatasetsRequestSchema>;
export type StatsRequest = z.input<typeof StatsRequestSchema>;

type PageInfo = {
  count: number;
  page: number;
  total_pages: number;
};

export type DatasetsResponse =
  | (PageInfo & { mode: 'raw'; datasets: DatasetRecord[] })
  | (PageInfo & { mode: 'grouped'; datasets: DatasetGroup[] });

export type StatsResponse = {
  total: number;
  by_source: Partial<Record<DatasetSource, number>>;
  by_modality: Record<string, number>;
};

export type FilterOptionsResponse = {
  options: FilterOptions;
  filters: FilterState;
  summary: CatalogSummary;
};

/**
 * Records in responses are the cached snapshot's own objects and are frozen.
 * Copy them before reshaping for transport.
 */
export type CatalogService = {
  getDatasets: (request?: unknown) => Promise<DatasetsResponse>;
  getStats: (request?: unknown) => Promise<StatsResponse>;
  getFilterOptions: (filters: FilterState) => Promise<FilterOptionsResponse>;
  checkHealth: () => Promise<CatalogHealth>;
  refreshView: () => Promise<ViewRefreshResult>;
  invalidate: () => void;
};

export type CatalogServiceOptions = {
  repository: CatalogRepository;
  config?: Partial<Pick<CatalogConfig, 'pageSize' | 'cacheTtlSeconds'>>;
  logger?: Logger;
};

const validate = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T => {
  const result = schema.safeParse(input ?? {});
  if (result.success) {
    return result.data;
  }
  const [issue] = result.error.issues;
  const field = issue ? String(issue.path[0] ?? 'request') : 'request';
  const raw: unknown = input && typeof input === 'object' ? Reflect.get(input, field) : undefined;
  const shown = raw === undefined ? issue?.message ?? 'invalid value' : String(raw);
  throw new CatalogValidationError(field, `Invalid ${field}: ${shown}`, result.error.issues);
};

/** Raw query-string values; validation happens in the service. */
export type RawRequest = Record<string, string | string[]>;

const readParams = (params: URLSearchParams, fields: Record<string, string[]>): RawRequest => {
  const request: RawRequest = { modality: parseList(params, 'modality', MODALITY_SEPARATOR) };
  for (const [key, names] of Object.entries(fields)) {
    for (const name of names) {
      const value = params.get(name);
      if (value !== null && value !== '') {
        request[key] = value;
        break;
      }
    }
  }
  return request;
};

export const parseDatasetsRequest = (params: URLSearchParams): RawRequest =>
  readParams(params, {
    source: ['source'],
    search: ['search'],
    limit: ['limit'],
    offset: ['offset'],
    sortBy: ['sort_by', 'sortBy'],
    sortOrder: ['sort_order', 'sortOrder'],
    mode: ['mode'],
  });

export const parseStatsRequest = (params: URLSearchParams): RawRequest =>
  readParams(params, { source: ['source'] });

const freezeSnapshot = (snapshot: CatalogSnapshot): CatalogSnapshot => {
  snapshot.records.forEach((record) => Object.freeze(record));
  Object.freeze(snapshot.records);
  return snapshot;
};

export const createCatalogService = ({ repository, config = {}, logger }: CatalogServiceOptions): CatalogService => {
  const log = (logger ?? createNullLogger()).child('catalog');
  const pageSize = config.pageSize ?? DEFAULT_PAGE_SIZE;
  const cache = createReadThroughCache<CatalogSnapshot>({ ttlSeconds: config.cacheTtlSeconds ?? 0 });

  const loadSnapshot = async (pushdown: SnapshotPushdown = {}): Promise<DatasetRecord[]> => {
    const key = pushdown.source ?? 'all';
    try {
      const { value, hit } = await cache.get(key, async () =>
        freezeSnapshot(await repository.loadSnapshot(pushdown)),
      );
      log.debug(hit ? 'snapshot cache hit' : 'snapshot cache miss', { key });
      if (!hit && value.skipped > 0) {
        log.warn('skipped invalid catalog rows', { key, skipped: value.skipped });
      }
      return value.records;
    } catch (error) {
      log.error('catalog snapshot unavailable', { key, error });
      if (error instanceof CatalogError) {
        throw error;
      }
      throw new SnapshotUnavailableError('Catalog snapshot unavailable', { cause: error });
    }
  };

  const getDatasets = async (input?: unknown): Promise<DatasetsResponse> => {
    const request = validate(DatasetsRequestSchema, input);
    if (request.search) {
      log.debug('search parameter is not applied', { search: request.search });
    }
    const limit = request.limit ?? pageSize;
    const query: RecordQuery = {
      sourceFilter: request.source ?? 'all',
      selectedModalities: request.modality,
      sortBy: request.sortBy,
      sortOrder: request.sortOrder,
    };

    if (request.mode === 'grouped') {
      // Clusters span sources, so the source filter cannot be pushed down here.
      const groups = selectGroups(await loadSnapshot(), query);
      const result = sliceAt(groups, request.offset, limit);
      return {
        mode: 'grouped',
        datasets: result.items,
        count: result.totalCount,
        page: result.page,
        total_pages: result.totalPages,
      };
    }

    const records = selectRecords(await loadSnapshot({ source: request.source }), query);
    const result = sliceAt(records, request.offset, limit);
    return {
      mode: 'raw',
      datasets: result.items,
      count: result.totalCount,
      page: result.page,
      total_pages: result.totalPages,
    };
  };

  const getStats = async (input?: unknown): Promise<StatsResponse> => {
    const request = validate(StatsRequestSchema, input);
    const records = await loadSnapshot({ source: request.source });
    const facets = computeFacets(records, {
      sourceFilter: request.source ?? 'all',
      selectedModalities: request.modality,
    });
    return { total: facets.total, by_source: facets.bySource, by_modality: facets.byModality };
  };

  const getFilterOptions = async (filters: FilterState): Promise<FilterOptionsResponse> => {
    const records = await loadSnapshot();
    const options = computeFilterOptions(records, filters);
    return {
      options,
      filters: reconcileFilters(filters, options),
      summary: summarizeCatalog(records, clusterDuplicates(records)),
    };
  };

  const refreshView = async (): Promise<ViewRefreshResult> => {
    const result = await repository.refreshView();
    cache.invalidate();
    log.info('unified view refreshed', { totalRows: result.totalRows });
    return result;
  };

  return {
    getDatasets,
    getStats,
    getFilterOptions,
    checkHealth: () => repository.checkHealth(),
    refreshView,
    invalidate: () => cache.invalidate(),
  };
};
