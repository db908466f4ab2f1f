export const int = (
  value: string | number | null | undefined,
  fallback: number
): number => {
  if (typeof value === "number" && Number.isFinite(value)) {
    return Math.trunc(value);
  }

  if (typeof value === "string") {
    const parsed = parseInt(value, 10);
    if (!Number.isNaN(parsed)) {
      return parsed;
    }
  }

  return fallback;
};

/** Repeated keys and comma-separated values both count; blanks and repeats are dropped. */
export const parseList = (
  params: URLSearchParams,
  key: string,
  separator: string | RegExp = ","
): string[] => {
  const set = new Set<string>();
  for (const entry of params.getAll(key)) {
    for (const segment of entry.split(separator)) {
      const normalized = segment.trim();
      if (normalized) set.add(normalized);
    }
  }
  return Array.from(set);
};

export const pageFromParams = (params: URLSearchParams): number => {
  const page = int(params.get("page"), 1);
  return page > 0 ? page : 1;
};
