import { readFile } from 'node:fs/promises';
import { asc, desc, eq, sql } from 'drizzle-orm';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import { toDatasetRecords, type AdaptedRows } from '../../adapters/unifiedDatasets';
import type { DatabaseConfig } from '../config';
import { CatalogError, SnapshotUnavailableError, SourceTablesMissingError } from '../errors';
import { createNullLogger, type Logger } from '../logger';
import type { DatasetSource } from '../sources';
import { neuroscienceDatasets, unifiedDatasets } from './schema';

export type SnapshotPushdown = {
  source?: DatasetSource;
};

export type CatalogSnapshot = AdaptedRows;

export type CatalogHealth = {
  status: 'healthy';
  database: 'connected';
  view: 'exists' | 'missing';
  rowCount?: number;
};

export type ViewRefreshResult = {
  totalRows: number;
  rowsBySource: Record<string, number>;
};

export interface CatalogRepository {
  loadSnapshot(pushdown?: SnapshotPushdown): Promise<CatalogSnapshot>;
  checkHealth(): Promise<CatalogHealth>;
  refreshView(): Promise<ViewRefreshResult>;
}

/** Where snapshots are read from: the unified view, or the ingestion table when the view is missing. */
export type SnapshotTarget = 'view' | 'table';

export type StorageObjects = {
  view: boolean;
  dandiTable: boolean;
  neuroscienceTable: boolean;
};

export const NO_DATA_MESSAGE =
  'No dataset tables or view found. Run ingestion or refresh the view after tables exist.';

export const resolveSnapshotTarget = (objects: Pick<StorageObjects, 'view' | 'neuroscienceTable'>): SnapshotTarget => {
  if (objects.view) return 'view';
  if (objects.neuroscienceTable) return 'table';
  throw new SnapshotUnavailableError(NO_DATA_MESSAGE);
};

/** The view unions whichever ingestion tables exist. */
export const viewStatementUrl = (objects: Pick<StorageObjects, 'dandiTable' | 'neuroscienceTable'>): URL => {
  if (objects.dandiTable && objects.neuroscienceTable) {
    return new URL('../../../sql/unified_datasets.sql', import.meta.url);
  }
  if (objects.dandiTable) {
    return new URL('../../../sql/unified_datasets_dandi.sql', import.meta.url);
  }
  if (objects.neuroscienceTable) {
    return new URL('../../../sql/unified_datasets_neuroscience.sql', import.meta.url);
  }
  throw new SourceTablesMissingError('Neither dandi_dataset nor neuroscience_datasets tables exist');
};

const wrap = async <T>(what: string, run: () => Promise<T>): Promise<T> => {
  try {
    return await run();
  } catch (error) {
    if (error instanceof CatalogError) {
      throw error;
    }
    const detail = error instanceof Error ? error.message : String(error);
    throw new SnapshotUnavailableError(`${what} failed: ${detail}`, { cause: error });
  }
};

export class PgCatalogRepository implements CatalogRepository {
  private readonly db: NodePgDatabase;

  constructor(
    private readonly pool: pg.Pool,
    private readonly logger: Logger = createNullLogger(),
  ) {
    this.db = drizzle(pool);
  }

  static fromConfig(config: DatabaseConfig, logger?: Logger): PgCatalogRepository {
    return new PgCatalogRepository(
      new pg.Pool({
        host: config.host,
        port: config.port,
        database: config.database,
        user: config.user,
        password: config.password,
      }),
      logger,
    );
  }

  /** Rows come back most-cited first, then by title, so clustering sees a stable order. */
  snapshotQuery(pushdown: SnapshotPushdown = {}, target: SnapshotTarget = 'view') {
    if (target === 'table') {
      return this.db
        .select()
        .from(neuroscienceDatasets)
        .where(pushdown.source ? eq(neuroscienceDatasets.source, pushdown.source) : undefined)
        .orderBy(desc(neuroscienceDatasets.citations), asc(neuroscienceDatasets.title));
    }
    return this.db
      .select()
      .from(unifiedDatasets)
      .where(pushdown.source ? eq(unifiedDatasets.source, pushdown.source) : undefined)
      .orderBy(desc(unifiedDatasets.citations), asc(unifiedDatasets.title));
  }

  async loadSnapshot(pushdown: SnapshotPushdown = {}): Promise<CatalogSnapshot> {
    return wrap('Snapshot query', async () => {
      const view = await this.exists('views', 'unified_datasets');
      const neuroscienceTable = view ? false : await this.exists('tables', 'neuroscience_datasets');
      const target = resolveSnapshotTarget({ view, neuroscienceTable });
      if (target === 'table') {
        this.logger.warn('unified_datasets view missing, reading neuroscience_datasets');
      }
      return toDatasetRecords(await this.snapshotQuery(pushdown, target));
    });
  }

  private async exists(catalog: 'tables' | 'views', name: string): Promise<boolean> {
    const source = catalog === 'views' ? sql`information_schema.views` : sql`information_schema.tables`;
    const result = await this.db.execute<{ exists: boolean }>(sql`
      SELECT EXISTS (
        SELECT FROM ${source}
        WHERE table_schema = 'public'
        AND table_name = ${name}
      ) AS "exists"
    `);
    return Boolean(result.rows[0]?.exists);
  }

  private async sourceTables(): Promise<Pick<StorageObjects, 'dandiTable' | 'neuroscienceTable'>> {
    return {
      dandiTable: await this.exists('tables', 'dandi_dataset'),
      neuroscienceTable: await this.exists('tables', 'neuroscience_datasets'),
    };
  }

  private async countRows(): Promise<number> {
    const [row] = await this.db.select({ count: sql<number>`count(*)::int` }).from(unifiedDatasets);
    return row?.count ?? 0;
  }

  async checkHealth(): Promise<CatalogHealth> {
    return wrap('Health check', async () => {
      await this.db.execute(sql`SELECT 1`);
      if (!(await this.exists('views', 'unified_datasets'))) {
        return { status: 'healthy', database: 'connected', view: 'missing' };
      }
      return { status: 'healthy', database: 'connected', view: 'exists', rowCount: await this.countRows() };
    });
  }

  async refreshView(): Promise<ViewRefreshResult> {
    return wrap('View refresh', async () => {
      const statement = await readFile(viewStatementUrl(await this.sourceTables()), 'utf8');
      await this.db.execute(sql.raw(statement));
      const rows = await this.db
        .select({ source: unifiedDatasets.source, count: sql<number>`count(*)::int` })
        .from(unifiedDatasets)
        .groupBy(unifiedDatasets.source)
        .orderBy(asc(unifiedDatasets.source));
      const rowsBySource = Object.fromEntries(rows.map((row) => [row.source, row.count]));
      const totalRows = rows.reduce((sum, row) => sum + row.count, 0);
      return { totalRows, rowsBySource };
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
