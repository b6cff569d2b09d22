/**
 * Pagination Types
 *
 * @module @relayshare/shared/types/pagination
 */

/**
 * Window over an ordered list
 *
 * `offset` and `limit` describe `items[offset, offset + limit)`.
 */
export interface PageWindow {
  /** Requested page clamped into [1, totalPages] */
  page: number;
  totalPages: number;
  offset: number;
  /** Number of items in this window, never negative */
  limit: number;
}

/**
 * What a navigation control pages through
 */
export type PagingTarget =
  | { kind: 'share'; shareToken: string }
  | { kind: 'listing' };

/**
 * Action bound to a navigation control
 */
export type NavigationAction =
  | { type: 'goto'; page: number }
  | { type: 'noop' };

export type NavigationControlRole = 'page' | 'previous' | 'next' | 'first' | 'last';

export interface NavigationControl {
  label: string;
  role: NavigationControlRole;
  action: NavigationAction;
}

/**
 * Rows of controls, rendered top to bottom
 */
export type NavigationRows = NavigationControl[][];
