/**
 * Types Index
 *
 * @module @relayshare/shared/types
 */

export type {
  ItemRef,
  PrincipalId,
  ShareRecord,
  ShareSummary,
  ShareDeletionResult,
} from './share.types';

export type {
  UploadSession,
  DrainedSession,
  PageView,
  ViewerState,
} from './session.types';

export type {
  PageWindow,
  PagingTarget,
  NavigationAction,
  NavigationControlRole,
  NavigationControl,
  NavigationRows,
} from './pagination.types';

export type { ApiErrorResponse, ErrorResponseWithStatus } from './error.types';
export { isValidErrorCode } from './error.types';
