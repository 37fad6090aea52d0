export const ITEMS_PER_PAGE = 10;

export interface PageWindow {
  page: number;
  numPages: number;
  offset: number;
  limit: number;
}

function parsePageNumber(raw: unknown): number | null {
  if (typeof raw === 'number') {
    return Number.isInteger(raw) ? raw : null;
  }
  if (typeof raw === 'string' && /^\s*[+-]?\d+\s*$/.test(raw)) {
    return parseInt(raw, 10);
  }
  return null;
}

/**
 * Resolves a requested page against the number of matching rows. A value that
 * is not an integer selects the first page; a page below 1 clamps to the
 * first page and one past the end clamps to the last. An empty result set
 * still has one (empty) page.
 */
export function resolvePage(
  raw: unknown,
  totalItems: number,
  pageSize: number = ITEMS_PER_PAGE,
): PageWindow {
  const numPages = Math.max(1, Math.ceil(totalItems / pageSize));
  const requested = parsePageNumber(raw) ?? 1;
  const page = Math.min(Math.max(requested, 1), numPages);

  return {
    page,
    numPages,
    offset: (page - 1) * pageSize,
    limit: pageSize,
  };
}
