/**
 * Bot surface
 * @module domains/bot
 */

export { BotUpdateRouter, type BotUpdateRouterDependencies } from './BotUpdateRouter';
export { UploadCommandHandler, type FinishOutcome, type UploadCommandHandlerDependencies } from './UploadCommandHandler';
export { ShareListingHandler, type ShareListingHandlerDependencies } from './ShareListingHandler';
export { TelegramUploadNotifier } from './TelegramUploadNotifier';
export { UpdateQueue, principalOf, type UpdateHandler } from './UpdateQueue';
export type { BotContext, CallbackAnswer } from './bot.types';
export { BUTTONS, MESSAGES } from './messages';
export { shareLink, botLink, extractShareToken, parseStartPayload } from './deep-links';
