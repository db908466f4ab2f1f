import { describe, expect, it } from 'vitest';
import { createCatalogService, parseDatasetsRequest } from './catalogService';
import { MemoryCatalogRepository } from './db/memory';
import { toErrorResponse } from './errors';
import { DEFAULT_FILTER_STATE } from './filterState';
import { createLogger, type LogLevel } from './logger';

const rows = [
  {
    source: 'DANDI',
    dataset_id: '000001',
    title: 'Intracranial EEG Recordings During Sleep Staging',
    modality: 'EEG;iEEG',
    citations: 120,
    url: 'https://example.org/dandi/000001',
  },
  {
    source: 'OpenNeuro',
    dataset_id: 'ds000002',
    title: 'Intracranial EEG Recordings During Sleep Staging Analysis',
    modality: 'EEG',
    citations: 45,
    url: 'https://example.org/openneuro/ds000002',
  },
  {
    source: 'PhysioNet',
    dataset_id: 'ecgdb',
    title: 'Electrocardiogram Database Arrhythmia',
    modality: 'ECG',
    citations: 45,
    url: 'https://example.org/physionet/ecgdb',
  },
  {
    source: 'Kaggle',
    dataset_id: 'rsfc',
    title: 'Resting State Functional Connectivity',
    modality: 'fMRI',
    citations: 10,
    url: 'https://example.org/kaggle/rsfc',
  },
  {
    source: 'OpenNeuro',
    dataset_id: 'ds000005',
    title: 'Visual Cortex Mapping',
    modality: 'fMRI;MRI',
    citations: 7,
    url: 'https://example.org/openneuro/ds000005',
  },
];

const setup = (cacheTtlSeconds = 0) => {
  const repository = new MemoryCatalogRepository(rows);
  const service = createCatalogService({ repository, config: { cacheTtlSeconds } });
  return { repository, service };
};

describe('getDatasets', () => {
  it('lists raw records most-cited first', async () => {
    const { service } = setup();
    const response = await service.getDatasets();

    expect(response.count).toBe(5);
    expect(response.page).toBe(1);
    expect(response.total_pages).toBe(1);
    if (response.mode !== 'raw') throw new Error('expected raw response');
    const ids = response.datasets.map((record) => record.id);
    expect(ids[0]).toBe('000001');
    expect(ids.slice(1, 3).sort()).toEqual(['ds000002', 'ecgdb']);
    expect(ids.slice(3)).toEqual(['rsfc', 'ds000005']);
  });

  it('clamps an offset past the end to the last page', async () => {
    const { service } = setup();
    const response = await service.getDatasets({ limit: '2', offset: '40' });

    expect(response.page).toBe(3);
    expect(response.total_pages).toBe(3);
    expect(response.mode === 'raw' && response.datasets.map((record) => record.id)).toEqual(['ds000005']);
  });

  it('starts at an offset that is not a multiple of the limit', async () => {
    const repository = new MemoryCatalogRepository(
      Array.from({ length: 10 }, (_, index) => ({
        source: 'Kaggle',
        dataset_id: `d${index}`,
        title: `Dataset ${index}`,
        citations: 100 - index,
        url: `https://example.org/kaggle/d${index}`,
      })),
    );
    const service = createCatalogService({ repository });
    const response = await service.getDatasets({ limit: 4, offset: 3 });

    expect(response.page).toBe(1);
    expect(response.total_pages).toBe(3);
    expect(response.mode === 'raw' && response.datasets.map((record) => record.id)).toEqual(['d3', 'd4', 'd5', 'd6']);
  });

  it('groups near-duplicate titles across sources', async () => {
    const { service } = setup();
    const response = await service.getDatasets({ mode: 'grouped' });

    expect(response.count).toBe(4);
    if (response.mode !== 'grouped') throw new Error('expected grouped response');
    expect(response.datasets[0].primary.id).toBe('000001');
    expect(response.datasets[0].alternates.map((record) => record.id)).toEqual(['ds000002']);
    expect(response.datasets[0].hasDuplicates).toBe(true);
  });

  it('keeps a group when any member has the requested source', async () => {
    const { service } = setup();
    const response = await service.getDatasets({ mode: 'grouped', source: 'OpenNeuro' });

    expect(response.count).toBe(2);
    if (response.mode !== 'grouped') throw new Error('expected grouped response');
    expect(response.datasets.map((group) => group.primary.id)).toEqual(['000001', 'ds000005']);
  });

  it('requires every selected modality', async () => {
    const { service } = setup();
    const response = await service.getDatasets({ modality: 'eeg,IEEG' });

    expect(response.count).toBe(1);
    expect(response.mode === 'raw' && response.datasets[0].id).toBe('000001');
  });

  it('splits request modalities on semicolons too', async () => {
    const { service } = setup();
    const response = await service.getDatasets({ modality: 'EEG;iEEG' });

    expect(response.count).toBe(1);
    expect(response.mode === 'raw' && response.datasets[0].id).toBe('000001');
  });

  it('hands out frozen records so the cached snapshot cannot be edited', async () => {
    const { service } = setup(300);
    const response = await service.getDatasets();
    if (response.mode !== 'raw') throw new Error('expected raw response');

    expect(Object.isFrozen(response.datasets[0])).toBe(true);
    expect(() => {
      response.datasets[0].title = 'Edited';
    }).toThrow(TypeError);
    const again = await service.getDatasets();
    expect(again.mode === 'raw' && again.datasets[0].title).toBe('Intracranial EEG Recordings During Sleep Staging');
  });

  it('rejects an unknown source', async () => {
    const { service } = setup();
    await expect(service.getDatasets({ source: 'Zenodo' })).rejects.toMatchObject({
      field: 'source',
      message: 'Invalid source: Zenodo',
      status: 400,
    });
  });

  it('rejects a limit outside 1..500', async () => {
    const { service } = setup();
    await expect(service.getDatasets({ limit: '0' })).rejects.toThrow('Invalid limit: 0');
    await expect(service.getDatasets({ limit: '501' })).rejects.toThrow('Invalid limit: 501');
  });

  it('answers filters that match nothing with an empty page', async () => {
    const { service } = setup();
    expect(await service.getDatasets({ modality: 'survey' })).toEqual({
      mode: 'raw',
      datasets: [],
      count: 0,
      page: 1,
      total_pages: 1,
    });
  });

  it('reports an unreachable catalog as 503', async () => {
    const { repository, service } = setup();
    repository.fail(new Error('connection refused'));

    const error = await service.getDatasets().catch((reason: unknown) => reason);
    expect(toErrorResponse(error)).toEqual({
      status: 503,
      body: { error: 'snapshot_unavailable', message: 'Snapshot unavailable: connection refused' },
    });
  });
});

describe('getStats', () => {
  it('counts by source and by modality', async () => {
    const { service } = setup();
    expect(await service.getStats()).toEqual({
      total: 5,
      by_source: { DANDI: 1, OpenNeuro: 2, PhysioNet: 1, Kaggle: 1 },
      by_modality: { eeg: 2, ieeg: 1, ecg: 1, fmri: 2, mri: 1 },
    });
  });

  it('applies the source and modality filters', async () => {
    const { service } = setup();
    expect((await service.getStats({ source: 'OpenNeuro' })).total).toBe(2);
    expect(await service.getStats({ modality: 'EEG,iEEG' })).toEqual({
      total: 1,
      by_source: { DANDI: 1 },
      by_modality: { eeg: 1, ieeg: 1 },
    });
  });
});

describe('getFilterOptions', () => {
  it('drops an exhausted source but keeps the selected modalities', async () => {
    const { service } = setup();
    const filters = { ...DEFAULT_FILTER_STATE, sourceFilter: 'PhysioNet' as const, selectedModalities: ['ecg', 'fmri'] };
    const response = await service.getFilterOptions(filters);

    expect(response.options.sources).toEqual([]);
    expect(response.options.modalities).toEqual([{ value: 'ecg', label: 'ECG', count: 1 }]);
    expect(response.filters).toEqual({ ...filters, sourceFilter: 'all', page: 1 });
    expect(response.summary).toEqual({
      total: 5,
      unique: 4,
      bySource: { DANDI: 1, OpenNeuro: 2, PhysioNet: 1, Kaggle: 1 },
    });
  });
});

describe('snapshot cache', () => {
  it('reuses a snapshot per pushdown key until the view is refreshed', async () => {
    const { repository, service } = setup(300);

    await service.getDatasets();
    await service.getDatasets({ sortBy: 'title' });
    await service.getStats();
    expect(repository.loadCount).toBe(1);

    await service.getDatasets({ source: 'DANDI' });
    expect(repository.loadCount).toBe(2);

    await service.refreshView();
    await service.getDatasets();
    expect(repository.loadCount).toBe(3);
  });

  it('loads on every request when caching is off', async () => {
    const { repository, service } = setup();
    await service.getDatasets();
    await service.getDatasets();
    expect(repository.loadCount).toBe(2);
  });
});

describe('logging', () => {
  it('warns once about rows the adapter skipped', async () => {
    const entries: Record<string, unknown>[] = [];
    const sink = (_level: LogLevel, line: string) => {
      entries.push(JSON.parse(line));
    };
    const repository = new MemoryCatalogRepository([...rows, { source: 'Zenodo', dataset_id: 'z', title: 'x', url: 'u' }]);
    const service = createCatalogService({
      repository,
      config: { cacheTtlSeconds: 60 },
      logger: createLogger({ level: 'debug', sink }),
    });

    await service.getDatasets();
    await service.getDatasets();

    const warnings = entries.filter((entry) => entry.level === 'warn');
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatchObject({
      scope: 'catalog',
      message: 'skipped invalid catalog rows',
      key: 'all',
      skipped: 1,
    });
    expect(entries.filter((entry) => entry.message === 'snapshot cache hit')).toHaveLength(1);
  });
});

describe('parseDatasetsRequest', () => {
  it('accepts both spellings of the sort parameters and drops blanks', () => {
    const params = new URLSearchParams(
      'source=DANDI&modality=EEG&modality=fMRI,EEG;iEEG&sort_by=title&sortOrder=asc&limit=10&offset=&mode=grouped',
    );
    expect(parseDatasetsRequest(params)).toEqual({
      modality: ['EEG', 'fMRI', 'iEEG'],
      source: 'DANDI',
      sortBy: 'title',
      sortOrder: 'asc',
      limit: '10',
      mode: 'grouped',
    });
  });
});
