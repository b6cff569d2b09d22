import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryUploadSessionStore } from '@/domains/upload-session/InMemoryUploadSessionStore';
import { InvalidStateError } from '@/shared/errors/relay-errors';

describe('InMemoryUploadSessionStore', () => {
  const principal = 1001;
  let store: InMemoryUploadSessionStore;

  beforeEach(() => {
    store = new InMemoryUploadSessionStore();
  });

  it('reports an idle empty session for an unknown principal', async () => {
    expect(await store.get(principal)).toEqual({ principalId: principal, mode: 'idle', itemRefs: [], itemCount: 0 });
  });

  it('accepts refs in order while collecting', async () => {
    await store.begin(principal);
    expect(await store.accept(principal, [11, 12])).toBe(2);
    expect(await store.accept(principal, [13])).toBe(3);

    const session = await store.get(principal);
    expect(session.mode).toBe('collecting');
    expect(session.itemRefs).toEqual([11, 12, 13]);
    expect(session.itemCount).toBe(3);
  });

  it('rejects refs when not collecting', async () => {
    await expect(store.accept(principal, [11])).rejects.toBeInstanceOf(InvalidStateError);
  });

  it('begin discards refs of a previous session', async () => {
    await store.begin(principal);
    await store.accept(principal, [11]);
    await store.begin(principal);

    expect((await store.get(principal)).itemRefs).toEqual([]);
  });

  it('drain returns the refs and resets to idle', async () => {
    await store.begin(principal);
    await store.accept(principal, [11, 12]);

    expect(await store.drain(principal)).toEqual({ itemRefs: [11, 12], itemCount: 2 });
    expect((await store.get(principal)).mode).toBe('idle');
    expect(await store.drain(principal)).toEqual({ itemRefs: [], itemCount: 0 });
  });

  it('abandon drops the session', async () => {
    await store.begin(principal);
    await store.accept(principal, [11]);
    await store.abandon(principal);

    await expect(store.accept(principal, [12])).rejects.toBeInstanceOf(InvalidStateError);
  });

  it('restore puts refs back in front and resumes collecting', async () => {
    await store.begin(principal);
    await store.accept(principal, [11, 12]);
    const drained = await store.drain(principal);

    await store.restore(principal, drained.itemRefs);
    await store.accept(principal, [13]);

    expect((await store.get(principal)).itemRefs).toEqual([11, 12, 13]);
  });

  it('keeps principals separate', async () => {
    await store.begin(principal);
    await store.begin(2002);
    await store.accept(principal, [11]);
    await store.accept(2002, [21]);

    expect((await store.get(principal)).itemRefs).toEqual([11]);
    expect((await store.get(2002)).itemRefs).toEqual([21]);
  });
});
