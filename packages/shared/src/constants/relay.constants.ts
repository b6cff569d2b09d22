/**
 * Relay Constants
 *
 * Defaults for upload aggregation, paging and share tokens.
 * Most of them can be overridden through backend environment variables.
 *
 * @module @relayshare/shared/constants/relay
 */

export const RELAY_CONFIG = {
  /** Items shown per retrieval page and per owner listing page */
  FILES_PER_PAGE: 10,

  /** Quiet period after the last item of a media group before it is drained */
  MEDIA_GROUP_DEBOUNCE_MS: 2000,

  /** Pause between delivering a page's items and showing the navigation panel */
  PANEL_SETTLE_DELAY_MS: 3000,

  /** Maximum number of page-number controls in one row */
  MAX_PAGE_CONTROLS: 5,

  /** Random bytes behind a share token (64 bits of entropy) */
  SHARE_TOKEN_BYTES: 8,

  /** Upload sessions idle longer than this are forgotten */
  UPLOAD_SESSION_TTL_MS: 24 * 60 * 60 * 1000,

  /** Characters of a caption shown on an owner listing button */
  LISTING_CAPTION_PREVIEW_LENGTH: 25,
} as const;

/**
 * Kinds of share records
 */
export const SHARE_KIND = {
  /** Several files bundled by one upload session */
  COLLECTION: 'collection',
  /** A single file */
  FILE: 'file',
} as const;

export type ShareKindValue = (typeof SHARE_KIND)[keyof typeof SHARE_KIND];

/**
 * Upload session modes
 */
export const SESSION_MODE = {
  IDLE: 'idle',
  COLLECTING: 'collecting',
} as const;

export type SessionModeValue = (typeof SESSION_MODE)[keyof typeof SESSION_MODE];

/**
 * Prefixes of inline button callback data
 */
export const CALLBACK_ACTION = {
  /** Navigate a shared file page: `spage:<page>:<token>` */
  SHARE_PAGE: 'spage',
  /** Navigate the owner listing: `page:<page>` */
  LISTING_PAGE: 'page',
  /** Show the link of a share: `info:<token>` */
  INFO: 'info',
  /** Delete a share: `delete:<token>:<listingPage>` */
  DELETE: 'delete',
  /** Disabled control */
  NOOP: 'noop',
} as const;

export type CallbackActionValue = (typeof CALLBACK_ACTION)[keyof typeof CALLBACK_ACTION];
