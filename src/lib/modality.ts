import type { DatasetRecord } from './types';

export const MODALITY_SEPARATOR = /[;,]/;
const ACRONYM = /[A-Z]{2,}/;

export const splitTokens = (field: string | null | undefined): string[] => {
  if (!field) {
    return [];
  }
  return field
    .split(MODALITY_SEPARATOR)
    .map((piece) => piece.trim())
    .filter((piece) => piece.length > 0);
};

export const normalizeForCompare = (token: string): string => token.trim().toLowerCase();

/**
 * Display casing. Anything with a run of two capitals is treated as an
 * acronym (EEG, fMRI, iEEG) and kept as written; everything else is
 * lowercased. Camel-cased words like "McGill" stay lowercase.
 */
export const formatToken = (token: string): string => {
  const trimmed = token.trim();
  return ACRONYM.test(trimmed) ? trimmed : trimmed.toLowerCase();
};

/** Distinct comparison keys carried by a record, in first-seen order. */
export const modalityKeys = (record: Pick<DatasetRecord, 'modality'>): string[] => {
  const keys = new Set<string>();
  for (const token of splitTokens(record.modality)) {
    keys.add(normalizeForCompare(token));
  }
  return Array.from(keys);
};

export const hasAllModalities = (
  record: Pick<DatasetRecord, 'modality'>,
  selected: readonly string[],
): boolean => {
  if (selected.length === 0) {
    return true;
  }
  const keys = new Set(modalityKeys(record));
  return selected.every((token) => keys.has(normalizeForCompare(token)));
};

/** Display label per comparison key, first spelling wins. */
export const modalityLabels = (records: readonly DatasetRecord[]): Map<string, string> => {
  const labels = new Map<string, string>();
  for (const record of records) {
    for (const token of splitTokens(record.modality)) {
      const key = normalizeForCompare(token);
      if (!labels.has(key)) {
        labels.set(key, formatToken(token));
      }
    }
  }
  return labels;
};

export const listModalities = (records: readonly DatasetRecord[]): string[] =>
  Array.from(modalityLabels(records).values()).sort((a, b) =>
    a.localeCompare(b, undefined, { sensitivity: 'base' }),
  );
