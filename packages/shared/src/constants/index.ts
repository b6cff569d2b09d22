/**
 * Constants Index
 *
 * Barrel export for all shared constants.
 *
 * @module @relayshare/shared/constants
 */

export {
  ErrorCode,
  HTTP_STATUS_NAMES,
  ERROR_MESSAGES,
  ERROR_STATUS_CODES,
  getHttpStatusName,
  getErrorMessage,
  getErrorStatusCode,
} from './errors';

export {
  RELAY_CONFIG,
  SHARE_KIND,
  SESSION_MODE,
  CALLBACK_ACTION,
  type ShareKindValue,
  type SessionModeValue,
  type CallbackActionValue,
} from './relay.constants';
