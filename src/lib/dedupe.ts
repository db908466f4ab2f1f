import { normalizeTitle } from './titles';
import type { DatasetGroup, DatasetRecord } from './types';

/** Overlap ratio a pair must strictly exceed to be called duplicates. */
export const DUPLICATE_THRESHOLD = 0.6;

export const keywordOverlap = (a: ReadonlySet<string>, b: ReadonlySet<string>): number => {
  const smaller = Math.min(a.size, b.size);
  if (smaller === 0) {
    return 0;
  }
  let common = 0;
  for (const keyword of a) {
    if (b.has(keyword)) {
      common += 1;
    }
  }
  return common / smaller;
};

export const titleSimilarity = (a: string, b: string): number =>
  keywordOverlap(normalizeTitle(a), normalizeTitle(b));

/**
 * Single greedy pass: the first unprocessed record becomes an anchor and
 * swallows every later unprocessed record whose title overlaps it. Matches
 * are not chained, so B matching A and C matching B does not pull C into
 * A's group.
 */
export const clusterDuplicates = (records: readonly DatasetRecord[]): DatasetGroup[] => {
  const keywords = records.map((record) => normalizeTitle(record.title));
  const processed = new Set<number>();
  const groups: DatasetGroup[] = [];

  records.forEach((anchor, index) => {
    if (processed.has(index)) {
      return;
    }

    const anchorKeywords = keywords[index];
    const alternates: DatasetRecord[] = [];

    records.forEach((other, otherIndex) => {
      if (otherIndex === index || processed.has(otherIndex)) {
        return;
      }
      if (keywordOverlap(anchorKeywords, keywords[otherIndex]) > DUPLICATE_THRESHOLD) {
        alternates.push(other);
        processed.add(otherIndex);
      }
    });

    groups.push({
      primary: anchor,
      alternates,
      hasDuplicates: alternates.length > 0,
    });

    processed.add(index);
  });

  return groups;
};

export const groupMembers = (group: DatasetGroup): DatasetRecord[] => [group.primary, ...group.alternates];
