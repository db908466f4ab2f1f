import { toDatasetRecords } from '../../adapters/unifiedDatasets';
import { SnapshotUnavailableError } from '../errors';
import type {
  CatalogHealth,
  CatalogRepository,
  CatalogSnapshot,
  SnapshotPushdown,
  ViewRefreshResult,
} from './repository';

/** In-process catalog over a fixed list of rows, for tests and static embeds. */
export class MemoryCatalogRepository implements CatalogRepository {
  private rows: unknown[];
  private failure: Error | null = null;
  loadCount = 0;

  constructor(rows: unknown[] = []) {
    this.rows = [...rows];
  }

  setRows(rows: unknown[]): void {
    this.rows = [...rows];
  }

  /** Every call fails with `error` until cleared with `fail(null)`. */
  fail(error: Error | null): void {
    this.failure = error;
  }

  private guard(): void {
    if (this.failure) {
      throw new SnapshotUnavailableError(`Snapshot unavailable: ${this.failure.message}`, { cause: this.failure });
    }
  }

  async loadSnapshot(pushdown: SnapshotPushdown = {}): Promise<CatalogSnapshot> {
    this.guard();
    this.loadCount += 1;
    const snapshot = toDatasetRecords(this.rows);
    if (!pushdown.source) {
      return snapshot;
    }
    return {
      records: snapshot.records.filter((record) => record.source === pushdown.source),
      skipped: snapshot.skipped,
    };
  }

  async checkHealth(): Promise<CatalogHealth> {
    this.guard();
    return { status: 'healthy', database: 'connected', view: 'exists', rowCount: this.rows.length };
  }

  async refreshView(): Promise<ViewRefreshResult> {
    this.guard();
    const { records } = toDatasetRecords(this.rows);
    const rowsBySource: Record<string, number> = {};
    for (const record of records) {
      rowsBySource[record.source] = (rowsBySource[record.source] ?? 0) + 1;
    }
    return { totalRows: records.length, rowsBySource };
  }
}
