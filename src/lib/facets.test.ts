import { describe, expect, it } from 'vitest';
import { makeRecord, titled } from '../test/records';
import { clusterDuplicates } from './dedupe';
import { computeFacets, computeFilterOptions, reconcileFilters, summarizeCatalog } from './facets';
import { DEFAULT_FILTER_STATE } from './filterState';
import type { FilterState } from './types';

const records = [
  makeRecord({ source: 'DANDI', modality: 'EEG;fMRI' }),
  makeRecord({ source: 'OpenNeuro', modality: 'fMRI' }),
  makeRecord({ source: 'PhysioNet', modality: 'ECG' }),
  makeRecord({ source: 'PhysioNet', modality: 'EEG, ECG' }),
  makeRecord({ source: 'Kaggle' }),
];

describe('computeFacets', () => {
  it('counts the whole snapshot without filters', () => {
    expect(computeFacets(records, { sourceFilter: 'all', selectedModalities: [] })).toEqual({
      total: 5,
      bySource: { DANDI: 1, OpenNeuro: 1, PhysioNet: 2, Kaggle: 1 },
      byModality: { eeg: 2, fmri: 2, ecg: 2 },
    });
  });

  it('counts only records matching the active filters', () => {
    expect(computeFacets(records, { sourceFilter: 'all', selectedModalities: ['EEG'] })).toEqual({
      total: 2,
      bySource: { DANDI: 1, PhysioNet: 1 },
      byModality: { eeg: 2, fmri: 1, ecg: 1 },
    });
  });

  it('counts a repeated token once per record', () => {
    const facets = computeFacets([makeRecord({ modality: 'EEG;eeg' })], {
      sourceFilter: 'all',
      selectedModalities: [],
    });
    expect(facets.byModality).toEqual({ eeg: 1 });
  });
});

describe('computeFilterOptions', () => {
  it('counts each dimension under the other dimension only and drops empty options', () => {
    const options = computeFilterOptions(records, { sourceFilter: 'PhysioNet', selectedModalities: ['fmri'] });

    expect(options.sources).toEqual([
      { value: 'DANDI', label: 'DANDI', count: 1 },
      { value: 'OpenNeuro', label: 'OpenNeuro', count: 1 },
    ]);
    expect(options.modalities).toEqual([
      { value: 'ecg', label: 'ECG', count: 2 },
      { value: 'eeg', label: 'EEG', count: 1 },
    ]);
  });
});

describe('reconcileFilters', () => {
  const state = (overrides: Partial<FilterState>): FilterState => ({ ...DEFAULT_FILTER_STATE, ...overrides });

  it('resets a source that has no records left but keeps selected modalities', () => {
    const current = state({ sourceFilter: 'PhysioNet', selectedModalities: ['fmri'], page: 4 });
    const options = computeFilterOptions(records, current);

    expect(options.modalities.map((option) => option.value)).not.toContain('fmri');
    expect(reconcileFilters(current, options)).toEqual({
      ...current,
      sourceFilter: 'all',
      selectedModalities: ['fmri'],
      page: 1,
    });
  });

  it('returns the same state when the source is still available', () => {
    const current = state({ sourceFilter: 'DANDI', selectedModalities: ['eeg'] });
    expect(reconcileFilters(current, computeFilterOptions(records, current))).toBe(current);
  });

  it('leaves "all" alone', () => {
    const current = state({ selectedModalities: ['survey'] });
    expect(reconcileFilters(current, computeFilterOptions(records, current))).toBe(current);
  });
});

describe('summarizeCatalog', () => {
  it('reports raw and clustered totals', () => {
    const snapshot = [
      titled('Intracranial EEG Recordings During Sleep Staging', { source: 'DANDI' }),
      titled('Intracranial EEG Recordings During Sleep Staging Analysis', { source: 'OpenNeuro' }),
      titled('Visual Cortex Mapping', { source: 'OpenNeuro' }),
    ];
    expect(summarizeCatalog(snapshot, clusterDuplicates(snapshot))).toEqual({
      total: 3,
      unique: 2,
      bySource: { DANDI: 1, OpenNeuro: 2 },
    });
  });
});
