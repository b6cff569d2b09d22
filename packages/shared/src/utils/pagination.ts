/**
 * Pagination Utilities
 *
 * Pure page-window arithmetic and navigation control layout used by share
 * retrieval and by the owner's share listing.
 *
 * @module @relayshare/shared/utils/pagination
 */

import { RELAY_CONFIG } from '../constants/relay.constants';
import type { NavigationControl, NavigationRows, PageWindow } from '../types/pagination.types';

export const NAVIGATION_LABELS = {
  PREVIOUS: '‹ Prev',
  NEXT: 'Next ›',
  FIRST: '« First',
  LAST: 'Last »',
} as const;

/**
 * Compute the window of `requestedPage` over `totalItems` items.
 *
 * `totalPages` is never below 1, so an empty list still has one (empty) page.
 * Out-of-range and non-integer page requests are clamped.
 *
 * @throws RangeError if `pageSize` is not a positive integer
 *
 * @example
 * paginate(23, 10, 3);
 * // { page: 3, totalPages: 3, offset: 20, limit: 3 }
 */
export function paginate(totalItems: number, pageSize: number, requestedPage: number): PageWindow {
  if (!Number.isInteger(pageSize) || pageSize <= 0) {
    throw new RangeError(`pageSize must be a positive integer, got ${pageSize}`);
  }

  const total = Number.isFinite(totalItems) ? Math.max(0, Math.floor(totalItems)) : 0;
  const totalPages = Math.max(1, Math.ceil(total / pageSize));
  const wanted = Number.isFinite(requestedPage) ? Math.floor(requestedPage) : 1;
  const page = Math.min(Math.max(wanted, 1), totalPages);
  const offset = (page - 1) * pageSize;
  const limit = Math.max(0, Math.min(pageSize, total - offset));

  return { page, totalPages, offset, limit };
}

/**
 * Items of `items` that fall inside `window`
 */
export function sliceWindow<T>(items: readonly T[], window: PageWindow): T[] {
  return items.slice(window.offset, window.offset + window.limit);
}

/**
 * First and last page number shown in the page-number row
 */
export function pageControlRange(
  page: number,
  totalPages: number,
  maxControls: number = RELAY_CONFIG.MAX_PAGE_CONTROLS
): { start: number; end: number } {
  const span = Math.max(1, maxControls);
  const half = Math.floor(span / 2);
  let start = Math.max(1, page - half);
  const end = Math.min(totalPages, start + span - 1);
  start = Math.max(1, end - span + 1);
  return { start, end };
}

function gotoControl(label: string, role: NavigationControl['role'], page: number): NavigationControl {
  return { label, role, action: { type: 'goto', page } };
}

/**
 * Lay out navigation controls for `page` of `totalPages`.
 *
 * Rows, top to bottom:
 * 1. Up to `maxControls` page numbers centred on the current page (only when
 *    there is more than one page). The current page is a disabled no-op.
 * 2. Previous / next, each only when applicable.
 * 3. First / last, each only when applicable.
 *
 * Empty rows are omitted.
 */
export function buildNavigationControls(
  page: number,
  totalPages: number,
  maxControls: number = RELAY_CONFIG.MAX_PAGE_CONTROLS
): NavigationRows {
  const pages = Math.max(1, totalPages);
  const current = Math.min(Math.max(page, 1), pages);
  const rows: NavigationRows = [];

  if (pages > 1) {
    const { start, end } = pageControlRange(current, pages, maxControls);
    const numbers: NavigationControl[] = [];
    for (let p = start; p <= end; p++) {
      numbers.push(
        p === current
          ? { label: `· ${p} ·`, role: 'page', action: { type: 'noop' } }
          : gotoControl(String(p), 'page', p)
      );
    }
    rows.push(numbers);
  }

  const stepRow: NavigationControl[] = [];
  const endsRow: NavigationControl[] = [];

  if (current > 1) {
    stepRow.push(gotoControl(NAVIGATION_LABELS.PREVIOUS, 'previous', current - 1));
    endsRow.push(gotoControl(NAVIGATION_LABELS.FIRST, 'first', 1));
  }

  if (current < pages) {
    stepRow.push(gotoControl(NAVIGATION_LABELS.NEXT, 'next', current + 1));
    endsRow.push(gotoControl(NAVIGATION_LABELS.LAST, 'last', pages));
  }

  if (stepRow.length > 0) rows.push(stepRow);
  if (endsRow.length > 0) rows.push(endsRow);

  return rows;
}
