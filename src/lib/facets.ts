import { rollup } from 'd3-array';
import { modalityKeys, modalityLabels } from './modality';
import { filterRecords, type RecordFilter } from './query';
import { DATASET_SOURCES, type DatasetSource } from './sources';
import type { DatasetGroup, DatasetRecord, FacetStats, FilterState } from './types';

export type FacetOption<T extends string = string> = {
  value: T;
  label: string;
  count: number;
};

export type FilterOptions = {
  sources: FacetOption<DatasetSource>[];
  modalities: FacetOption[];
};

const countBySource = (records: readonly DatasetRecord[]): Map<DatasetSource, number> =>
  rollup(
    records,
    (entries) => entries.length,
    (record) => record.source,
  );

const countByModality = (records: readonly DatasetRecord[]): Map<string, number> =>
  rollup(
    records.flatMap((record) => modalityKeys(record)),
    (entries) => entries.length,
    (key) => key,
  );

export const computeFacets = (records: readonly DatasetRecord[], filters: RecordFilter): FacetStats => {
  const matching = filterRecords(records, filters);
  return {
    total: matching.length,
    bySource: Object.fromEntries(countBySource(matching)),
    byModality: Object.fromEntries(countByModality(matching)),
  };
};

/**
 * Options still worth offering. Each dimension is counted under the other
 * dimension's filter only, and zero-count options are dropped.
 */
export const computeFilterOptions = (records: readonly DatasetRecord[], filters: RecordFilter): FilterOptions => {
  const sourceCounts = countBySource(
    filterRecords(records, { sourceFilter: 'all', selectedModalities: filters.selectedModalities }),
  );
  const sources = DATASET_SOURCES.flatMap((source): FacetOption<DatasetSource>[] => {
    const count = sourceCounts.get(source) ?? 0;
    return count > 0 ? [{ value: source, label: source, count }] : [];
  });

  const scoped = filterRecords(records, { sourceFilter: filters.sourceFilter, selectedModalities: [] });
  const labels = modalityLabels(scoped);
  const modalities = Array.from(countByModality(scoped), ([value, count]) => ({
    value,
    label: labels.get(value) ?? value,
    count,
  }))
    .filter((option) => option.count > 0)
    .sort((a, b) => a.label.localeCompare(b.label, undefined, { sensitivity: 'base' }));

  return { sources, modalities };
};

/**
 * A source selection that no longer has any records falls back to "all".
 * Selected modalities are left alone even when they count zero.
 */
export const reconcileFilters = <T extends FilterState>(filters: T, options: FilterOptions): T => {
  if (filters.sourceFilter === 'all') {
    return filters;
  }
  const available = options.sources.some((option) => option.value === filters.sourceFilter);
  if (available) {
    return filters;
  }
  return { ...filters, sourceFilter: 'all', page: 1 };
};

export type CatalogSummary = {
  total: number;
  unique: number;
  bySource: Partial<Record<DatasetSource, number>>;
};

export const summarizeCatalog = (
  records: readonly DatasetRecord[],
  groups: readonly DatasetGroup[],
): CatalogSummary => ({
  total: records.length,
  unique: groups.length,
  bySource: Object.fromEntries(countBySource(records)),
});
