import { ComparisonFilters } from '../types/site';

const PAGE_PARAMS = ['page', 'paged', 'pg', 'p'];
const TAXONOMY_SEGMENTS = new Set(['category', 'categories', 'tag', 'tags', 'topic', 'topics']);

export interface FilterOutcome {
  kept: string[];
  pagination: number;
  taxonomy: number;
}

/** `/page/2` style paths, or a numeric paging query parameter. */
export function isPaginationUrl(url: string): boolean {
  const parsed = parse(url);
  if (!parsed) return false;

  if (/\/page\/\d+(?:\/|$)/i.test(parsed.pathname)) {
    return true;
  }
  return PAGE_PARAMS.some(name => {
    const value = parsed.searchParams.get(name);
    return value !== null && /^\d+$/.test(value);
  });
}

/** Archive listings such as `/category/news` or `/blog/tag/release`. */
export function isTaxonomyUrl(url: string): boolean {
  const parsed = parse(url);
  if (!parsed) return false;

  const segments = parsed.pathname.split('/').filter(Boolean);
  return segments.some((segment, i) => TAXONOMY_SEGMENTS.has(segment.toLowerCase()) && i < segments.length - 1);
}

export function applyFilters(urls: Iterable<string>, filters: ComparisonFilters): FilterOutcome {
  const outcome: FilterOutcome = { kept: [], pagination: 0, taxonomy: 0 };

  for (const url of urls) {
    if (filters.ignorePagination && isPaginationUrl(url)) {
      outcome.pagination++;
    } else if (filters.ignoreTaxonomy && isTaxonomyUrl(url)) {
      outcome.taxonomy++;
    } else {
      outcome.kept.push(url);
    }
  }

  return outcome;
}

function parse(url: string): URL | null {
  try {
    return new URL(url);
  } catch {
    return null;
  }
}
