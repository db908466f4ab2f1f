import { clusterDuplicates, groupMembers } from './dedupe';
import { hasAllModalities } from './modality';
import type {
  DatasetGroup,
  DatasetRecord,
  FilterState,
  PageResult,
  SortColumn,
  SortOrder,
  SourceFilter,
} from './types';

export type RecordFilter = Pick<FilterState, 'sourceFilter' | 'selectedModalities'>;

export const matchesSource = (record: DatasetRecord, sourceFilter: SourceFilter): boolean =>
  sourceFilter === 'all' || record.source === sourceFilter;

export const matchesFilters = (record: DatasetRecord, filters: RecordFilter): boolean =>
  matchesSource(record, filters.sourceFilter) && hasAllModalities(record, filters.selectedModalities);

export const filterRecords = (records: readonly DatasetRecord[], filters: RecordFilter): DatasetRecord[] =>
  records.filter((record) => matchesFilters(record, filters));

/**
 * A group stays when any member has the source and any member carries all
 * selected modalities. The two checks may be satisfied by different members.
 */
export const matchesGroup = (group: DatasetGroup, filters: RecordFilter): boolean => {
  const members = groupMembers(group);
  if (filters.sourceFilter !== 'all' && !members.some((member) => matchesSource(member, filters.sourceFilter))) {
    return false;
  }
  return members.some((member) => hasAllModalities(member, filters.selectedModalities));
};

const publishedAt = (record: DatasetRecord): number => {
  if (!record.createdAt) {
    return Number.NEGATIVE_INFINITY;
  }
  const parsed = Date.parse(record.createdAt);
  return Number.isNaN(parsed) ? Number.NEGATIVE_INFINITY : parsed;
};

const compareNumbers = (a: number, b: number): number => {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
};

export const compareRecords = (a: DatasetRecord, b: DatasetRecord, sortBy: SortColumn): number => {
  switch (sortBy) {
    case 'published':
      return compareNumbers(publishedAt(a), publishedAt(b));
    case 'citations':
      return a.citations - b.citations;
    case 'modality':
      return (a.modality ?? '').localeCompare(b.modality ?? '');
    case 'title':
      return a.title.localeCompare(b.title);
    case 'id':
      return a.id.localeCompare(b.id);
    case 'source':
      return a.source.localeCompare(b.source);
  }
};

export const sortRecords = <T>(
  items: readonly T[],
  sortBy: SortColumn,
  sortOrder: SortOrder,
  pick: (item: T) => DatasetRecord,
): T[] => {
  const direction = sortOrder === 'asc' ? 1 : -1;
  return [...items].sort((a, b) => direction * compareRecords(pick(a), pick(b), sortBy));
};

export const totalPagesFor = (totalCount: number, pageSize: number): number =>
  Math.max(1, Math.ceil(totalCount / pageSize));

export const clampPage = (page: number, totalPages: number): number => {
  if (!Number.isFinite(page) || page < 1) {
    return 1;
  }
  return Math.min(Math.floor(page), totalPages);
};

export const paginate = <T>(items: readonly T[], page: number, pageSize: number): PageResult<T> => {
  const size = Math.max(1, Math.floor(pageSize));
  const totalCount = items.length;
  const totalPages = totalPagesFor(totalCount, size);
  const current = clampPage(page, totalPages);
  const offset = (current - 1) * size;
  return {
    items: items.slice(offset, offset + size),
    totalCount,
    page: current,
    pageSize: size,
    totalPages,
    clamped: current !== page,
  };
};

/** Page starting at an arbitrary row. An offset past the end serves the last page. */
export const sliceAt = <T>(items: readonly T[], offset: number, limit: number): PageResult<T> => {
  const size = Math.max(1, Math.floor(limit));
  const totalCount = items.length;
  const totalPages = totalPagesFor(totalCount, size);
  const requested = Math.max(0, Math.floor(offset));
  const clamped = requested >= totalCount && requested > 0;
  const start = clamped ? (totalPages - 1) * size : requested;
  return {
    items: items.slice(start, start + size),
    totalCount,
    page: clamped ? totalPages : Math.floor(requested / size) + 1,
    pageSize: size,
    totalPages,
    clamped,
  };
};

export type RecordQuery = RecordFilter & Pick<FilterState, 'sortBy' | 'sortOrder'>;

export const selectRecords = (snapshot: readonly DatasetRecord[], query: RecordQuery): DatasetRecord[] =>
  sortRecords(filterRecords(snapshot, query), query.sortBy, query.sortOrder, (record) => record);

/** Clusters the whole snapshot first, then filters and sorts the groups by their primary. */
export const selectGroups = (snapshot: readonly DatasetRecord[], query: RecordQuery): DatasetGroup[] => {
  const groups = clusterDuplicates(snapshot).filter((group) => matchesGroup(group, query));
  return sortRecords(groups, query.sortBy, query.sortOrder, (group) => group.primary);
};

export const queryRecords = (
  snapshot: readonly DatasetRecord[],
  filters: FilterState,
): PageResult<DatasetRecord> => paginate(selectRecords(snapshot, filters), filters.page, filters.pageSize);

export const queryGroups = (
  snapshot: readonly DatasetRecord[],
  filters: FilterState,
): PageResult<DatasetGroup> => paginate(selectGroups(snapshot, filters), filters.page, filters.pageSize);
