import type { DatasetSource } from './sources';

export type DatasetRecord = {
  source: DatasetSource;
  id: string;
  title: string;
  modality?: string;
  citations: number;
  url: string;
  description?: string;
  createdAt?: string;
  updatedAt?: string;
  version?: string;
};

export type DatasetGroup = {
  primary: DatasetRecord;
  alternates: DatasetRecord[];
  hasDuplicates: boolean;
};

export const SORT_COLUMNS = ['citations', 'title', 'id', 'source', 'modality', 'published'] as const;

export type SortColumn = (typeof SORT_COLUMNS)[number];

export type SortOrder = 'asc' | 'desc';

export type SourceFilter = 'all' | DatasetSource;

export type FilterState = {
  sourceFilter: SourceFilter;
  selectedModalities: string[];
  sortBy: SortColumn;
  sortOrder: SortOrder;
  page: number;
  pageSize: number;
};

export type FacetStats = {
  total: number;
  bySource: Partial<Record<DatasetSource, number>>;
  byModality: Record<string, number>;
};

export type CatalogMode = 'raw' | 'grouped';

export type PageResult<T> = {
  items: T[];
  totalCount: number;
  page: number;
  pageSize: number;
  totalPages: number;
  /** Set when the requested page was past the end and got pulled back. */
  clamped: boolean;
};
