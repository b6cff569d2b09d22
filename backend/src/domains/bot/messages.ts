/**
 * User-facing texts
 */

export const BUTTONS = {
  UPLOAD: '📤 Upload files',
  FINISH: '✅ Finish upload',
  CANCEL: '❌ Cancel',
  MY_FILES: '📂 My files',
  HELP: 'ℹ️ Help',
  JOIN_GROUP: '👥 Join group',
  TRY_AGAIN: '🔄 Try again',
  OPEN_PRIVATE: '💬 Open private chat',
} as const;

export const MESSAGES = {
  WELCOME:
    '👋 Welcome!\n\nTap "📤 Upload files" to start a batch upload, send your files, then tap "✅ Finish upload" to get a share link.',
  HELP: [
    'ℹ️ How it works',
    '',
    '1. Tap "📤 Upload files".',
    '2. Send photos, videos, audio or documents. Albums are kept together.',
    '3. Tap "✅ Finish upload" to receive a share link.',
    '',
    'Commands:',
    '/myfiles - list and delete your shares',
    '/cancel - finish the current upload with the files received so far',
    '/help - show this message',
  ].join('\n'),
  UPLOAD_STARTED: '📤 Upload started. Send your files now and tap "✅ Finish upload" when you are done.',
  UPLOAD_NOT_STARTED: 'Tap "📤 Upload files" first, then send your files.',
  FILE_RECEIVED: '📥 File received.',
  ALBUM_RECEIVED: '📥 Album received.',
  RELAY_FAILED: '⚠️ One of your files may not have been saved. Please send it again.',
  NO_FILES: 'No files were uploaded.',
  FINISH_FAILED: '⚠️ Your share could not be saved. Your files are kept, please tap "✅ Finish upload" again.',
  SHARE_NOT_FOUND: 'This share link is invalid or has been removed.',
  SHARE_EMPTY: 'This share contains no files.',
  ACCESS_RESTRICTED:
    '🔒 Access restricted\n\nJoin our group to use this bot, then tap "🔄 Try again".',
  PRIVATE_ONLY: 'Please use this bot in a private chat.',
  NO_SHARES: "You haven't shared any files yet.",
  NOT_OWNER: 'You can only delete your own shares.',
  SHARE_DELETED: '🗑️ Share deleted.',
  GENERIC_ERROR: '⚠️ Something went wrong. Please try again.',
} as const;

export function itemsOrphanedText(count: number): string {
  return `⚠️ ${count} file(s) arrived after your upload was closed and were not added to a share.`;
}

export function uploadCompletedText(itemCount: number, link: string): string {
  return `✅ Upload complete!\n\n📦 ${itemCount} file(s) shared.\n🔗 ${link}`;
}

export function batchCaption(itemCount: number): string {
  return `Batch upload (${itemCount} files)`;
}

export function panelText(caption: string, page: number, totalPages: number, totalItems: number): string {
  return `▶️ Viewing: ${caption}\n📑 Page ${page} / ${totalPages} (${totalItems} files total)`;
}

export function uploadLogText(owner: string, ownerId: number, itemCount: number, link: string): string {
  return `📤 New upload\n👤 ${owner} (${ownerId})\n📦 ${itemCount} file(s)\n🔗 ${link}`;
}

export function listingHeaderText(page: number, totalPages: number, total: number): string {
  return `📂 Your shares (page ${page} / ${totalPages}, ${total} total)`;
}

export function shareInfoText(caption: string, itemCount: number, createdAt: Date, link: string): string {
  return `📄 ${caption}\n📦 ${itemCount} file(s)\n📅 ${createdAt.toISOString().slice(0, 16).replace('T', ' ')} UTC\n🔗 ${link}`;
}

export function deletionWarningText(warnings: number): string {
  return `🗑️ Share deleted. ${warnings} file(s) could not be removed from storage.`;
}
