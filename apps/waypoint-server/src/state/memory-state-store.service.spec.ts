import { MemoryStateStoreService } from './memory-state-store.service';
import { StateService } from './state.service';

const state = (sessionId: string, entries: Record<string, string>) => ({
  sessionId,
  entries,
  updatedAtUtc: '2026-01-01T00:00:00.000Z',
});

describe('MemoryStateStoreService', () => {
  afterEach(() => jest.restoreAllMocks());

  it('returns what was stored', async () => {
    const store = new MemoryStateStoreService();

    await store.set('s1', state('s1', { name: 'Alice' }));

    expect(await store.get('s1')).toEqual(state('s1', { name: 'Alice' }));
    expect(await store.get('s2')).toBeUndefined();
  });

  it('drops entries once their ttl has passed', async () => {
    const now = jest.spyOn(Date, 'now').mockReturnValue(1_000);
    const store = new MemoryStateStoreService();
    await store.set('s1', state('s1', { name: 'Alice' }), 10);

    now.mockReturnValue(10_999);
    expect(await store.get('s1')).toBeDefined();

    now.mockReturnValue(11_000);
    expect(await store.get('s1')).toBeUndefined();
  });

  it('evicts abandoned sessions once they expire', async () => {
    const now = jest.spyOn(Date, 'now').mockReturnValue(1_000);
    const store = new MemoryStateStoreService();
    await store.set('abandoned', state('abandoned', {}), 10);
    await store.set('kept', state('kept', { name: 'Alice' }));

    now.mockReturnValue(11_000);
    await store.set('fresh', state('fresh', {}), 10);

    expect(store.size).toBe(2);
    expect(await store.get('kept')).toEqual(state('kept', { name: 'Alice' }));
    expect(await store.get('fresh')).toBeDefined();
  });

  it('deletes on request', async () => {
    const store = new MemoryStateStoreService();
    await store.set('s1', state('s1', {}));

    await store.delete('s1');

    expect(await store.get('s1')).toBeUndefined();
  });
});

describe('StateService', () => {
  it('reads an unknown session as empty', async () => {
    const service = new StateService(new MemoryStateStoreService());

    expect(await service.getEntries('missing')).toEqual({});
  });

  it('replaces the entries of a session', async () => {
    const service = new StateService(new MemoryStateStoreService());

    await service.saveEntries('s1', { name: 'Alice' });
    await service.saveEntries('s1', { name: 'Alice', age: '30' });

    expect(await service.getEntries('s1')).toEqual({ name: 'Alice', age: '30' });
  });

  it('forgets a cleared session', async () => {
    const service = new StateService(new MemoryStateStoreService());
    await service.saveEntries('s1', { name: 'Alice' });

    await service.clearState('s1');

    expect(await service.getEntries('s1')).toEqual({});
  });
});
