import { MODALITY_SEPARATOR, normalizeForCompare } from './modality';
import { int, pageFromParams, parseList } from './params';
import { isDatasetSource } from './sources';
import { SORT_COLUMNS, type FilterState, type SortColumn, type SortOrder, type SourceFilter } from './types';

export const DEFAULT_PAGE_SIZE = 25;

export const DEFAULT_FILTER_STATE: FilterState = {
  sourceFilter: 'all',
  selectedModalities: [],
  sortBy: 'citations',
  sortOrder: 'desc',
  page: 1,
  pageSize: DEFAULT_PAGE_SIZE,
};

export const isSortColumn = (value: unknown): value is SortColumn =>
  typeof value === 'string' && SORT_COLUMNS.some((column) => column === value);

const isSortOrder = (value: unknown): value is SortOrder => value === 'asc' || value === 'desc';

/** Re-selecting the active column flips direction; a new column starts descending. */
export const nextSort = (state: FilterState, column: SortColumn): FilterState => {
  if (state.sortBy === column) {
    return { ...state, sortOrder: state.sortOrder === 'asc' ? 'desc' : 'asc', page: 1 };
  }
  return { ...state, sortBy: column, sortOrder: 'desc', page: 1 };
};

export const setSourceFilter = (state: FilterState, sourceFilter: SourceFilter): FilterState => ({
  ...state,
  sourceFilter,
  page: 1,
});

export const toggleModality = (state: FilterState, token: string): FilterState => {
  const key = normalizeForCompare(token);
  if (!key) {
    return state;
  }
  const selected = state.selectedModalities.map(normalizeForCompare);
  const selectedModalities = selected.includes(key)
    ? selected.filter((entry) => entry !== key)
    : [...selected, key];
  return { ...state, selectedModalities, page: 1 };
};

export const setPage = (state: FilterState, page: number): FilterState => ({
  ...state,
  page: page > 0 ? Math.floor(page) : 1,
});

/** Lenient: anything unrecognised falls back to the default. */
export const parseFilterState = (params: URLSearchParams): FilterState => {
  const source = params.get('source');
  const sort = params.get('sort');
  const order = params.get('order');
  const size = int(params.get('size'), DEFAULT_PAGE_SIZE);

  return {
    sourceFilter: isDatasetSource(source) ? source : 'all',
    selectedModalities: Array.from(new Set(parseList(params, 'modality', MODALITY_SEPARATOR).map(normalizeForCompare))),
    sortBy: isSortColumn(sort) ? sort : DEFAULT_FILTER_STATE.sortBy,
    sortOrder: isSortOrder(order) ? order : DEFAULT_FILTER_STATE.sortOrder,
    page: pageFromParams(params),
    pageSize: size > 0 ? size : DEFAULT_PAGE_SIZE,
  };
};

export const serializeFilterState = (state: FilterState): URLSearchParams => {
  const params = new URLSearchParams();
  if (state.sourceFilter !== 'all') params.set('source', state.sourceFilter);
  for (const modality of state.selectedModalities) {
    if (modality) params.append('modality', modality);
  }
  if (state.sortBy !== DEFAULT_FILTER_STATE.sortBy) params.set('sort', state.sortBy);
  if (state.sortOrder !== DEFAULT_FILTER_STATE.sortOrder) params.set('order', state.sortOrder);
  if (state.page > 1) params.set('page', String(state.page));
  if (state.pageSize !== DEFAULT_PAGE_SIZE) params.set('size', String(state.pageSize));
  return params;
};
