import { describe, it, expect, vi } from 'vitest';
import { MembershipGate, withGate, type GatedContext } from '@/domains/access/MembershipGate';
import { TelegramApiError } from '@/shared/errors/relay-errors';
import { FakeBotTransport } from '@/__tests__/helpers/FakeBotTransport';
import { createTestLogger } from '@/__tests__/helpers/mockPinoFactory';

const GROUP = -1001000000002;

describe('MembershipGate', () => {
  it.each([
    ['creator', true],
    ['administrator', true],
    ['member', true],
    ['restricted', true],
    ['left', false],
    ['kicked', false],
  ] as const)('status %s authorizes: %s', async (status, expected) => {
    const transport = new FakeBotTransport();
    transport.memberships.set(2002, status);
    const gate = new MembershipGate({ transport, requiredGroupId: GROUP });

    expect(await gate.isAuthorized(2002)).toBe(expected);
  });

  it('denies and logs when the lookup fails', async () => {
    const transport = new FakeBotTransport();
    transport.failNext('getChatMemberStatus', new TelegramApiError('getChatMember', 400, 'Bad Request: user not found'));
    const { testLogger, hasLogWithMessage } = createTestLogger();
    const gate = new MembershipGate({ transport, requiredGroupId: GROUP, logger: testLogger });

    expect(await gate.isAuthorized(2002)).toBe(false);
    expect(hasLogWithMessage('Gate check failed, treating as not authorized')).toBe(true);
  });

  it('asks about the required group', async () => {
    const transport = { getChatMemberStatus: vi.fn().mockResolvedValue('member') };
    const gate = new MembershipGate({ transport, requiredGroupId: GROUP });

    await gate.isAuthorized(2002);

    expect(transport.getChatMemberStatus).toHaveBeenCalledWith(GROUP, 2002);
  });
});

describe('withGate', () => {
  it('runs the handler for authorized principals only', async () => {
    const gate = { isAuthorized: vi.fn(async (principalId: number) => principalId === 1) };
    const handler = vi.fn(async (_ctx: GatedContext) => undefined);
    const onDenied = vi.fn(async (_ctx: GatedContext) => undefined);
    const gated = withGate(gate, onDenied, handler);

    await gated({ principalId: 1 });
    await gated({ principalId: 2 });

    expect(handler).toHaveBeenCalledWith({ principalId: 1 });
    expect(onDenied).toHaveBeenCalledWith({ principalId: 2 });
    expect(handler).toHaveBeenCalledTimes(1);
    expect(onDenied).toHaveBeenCalledTimes(1);
  });
});
