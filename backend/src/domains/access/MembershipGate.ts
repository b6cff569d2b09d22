/**
 * Access Gate
 *
 * A principal is authorized while it is a member of the required group.
 * Lookup failures count as "not authorized".
 *
 * @module domains/access/MembershipGate
 */

import type { Logger } from 'pino';
import type { PrincipalId } from '@relayshare/shared';
import { createChildLogger } from '@/shared/utils/logger';
import { GateError, errorMessage } from '@/shared/errors/relay-errors';
import type { ChatId, ChatMemberStatus, IBotTransport } from '@/infrastructure/telegram';

export interface IAccessGate {
  isAuthorized(principalId: PrincipalId): Promise<boolean>;
}

const EXCLUDED_STATUSES: readonly ChatMemberStatus[] = ['left', 'kicked'];

export interface MembershipGateDependencies {
  transport: Pick<IBotTransport, 'getChatMemberStatus'>;
  requiredGroupId: ChatId;
  logger?: Logger;
}

export class MembershipGate implements IAccessGate {
  private readonly transport: Pick<IBotTransport, 'getChatMemberStatus'>;
  private readonly requiredGroupId: ChatId;
  private readonly log: Logger;

  constructor(deps: MembershipGateDependencies) {
    this.transport = deps.transport;
    this.requiredGroupId = deps.requiredGroupId;
    this.log = deps.logger ?? createChildLogger({ service: 'MembershipGate' });
  }

  async isAuthorized(principalId: PrincipalId): Promise<boolean> {
    try {
      const status = await this.transport.getChatMemberStatus(this.requiredGroupId, principalId);
      return !EXCLUDED_STATUSES.includes(status);
    } catch (error) {
      const gateError = new GateError(`Membership lookup failed: ${errorMessage(error)}`, { cause: error });
      this.log.warn({ err: gateError, principalId }, 'Gate check failed, treating as not authorized');
      return false;
    }
  }
}

export interface GatedContext {
  principalId: PrincipalId;
}

export type GatedHandler<TContext extends GatedContext> = (context: TContext) => Promise<void>;

/**
 * Run `handler` only for authorized principals; everyone else gets `onDenied`
 *
 * Usage:
 * ```typescript
 * const beginUpload = withGate(gate, replyRestricted, async (ctx) => {
 *   await sessions.begin(ctx.principalId);
 * });
 * ```
 */
export function withGate<TContext extends GatedContext>(
  gate: IAccessGate,
  onDenied: GatedHandler<TContext>,
  handler: GatedHandler<TContext>
): GatedHandler<TContext> {
  return async (context) => {
    if (await gate.isAuthorized(context.principalId)) {
      await handler(context);
      return;
    }
    await onDenied(context);
  };
}
