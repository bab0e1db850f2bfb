import { InMemoryDocumentStore } from '@/store/memory';
import { decodeEntry, decodeLedger, encodeLedger } from '@/xp/codec';
import { CorruptDocumentError, StoreQueryError } from '@/xp/errors';
import { LedgerStore, projectEntry } from '@/xp/ledger';
import { event, settle } from './helpers/engine';

const now = new Date('2024-03-15T12:00:00.000Z');

describe('Ledger codec', () => {
  it('уровень всегда пересчитывается из XP', () => {
    const decoded = decodeLedger(
      {
        id: 'u1',
        path: 'users/u1',
        version: 4,
        fields: { xp: 530, level: 7, xpHistory: [], lastXPUpdate: '2024-03-10T00:00:00.000Z' },
      },
      now,
    );

    expect(decoded.state.level).toBe(2);
    expect(decoded.repaired).toBe(true);
  });

  it('история сортируется от новых к старым, weeklyXP выводится заново', () => {
    const { state, profile, repaired } = decodeLedger(
      {
        id: 'u1',
        path: 'users/u1',
        version: 1,
        fields: {
          displayName: 'Ana',
          avatar: 'avatars/ana.png',
          xp: 80,
          level: 1,
          weeklyXP: 9999,
          xpHistory: [
            { id: 'old', event: 'visit', xp: 50, timestamp: '2024-03-01T00:00:00.000Z' },
            { id: 'new', event: 'checkIn', xp: 30, timestamp: '2024-03-14T00:00:00.000Z', subjectRef: 'place-1' },
          ],
        },
      },
      now,
    );

    expect(state.history.map((item) => item.id)).toEqual(['new', 'old']);
    expect(state.history[0]).toEqual({
      id: 'new',
      eventKind: 'checkIn',
      xpAmount: 30,
      timestamp: new Date('2024-03-14T00:00:00.000Z'),
      subjectRef: 'place-1',
    });
    expect(state.weeklyXP).toBe(30);
    expect(state.lastUpdate).toEqual(now);
    expect(profile).toEqual({ displayName: 'Ana', avatarRef: 'avatars/ana.png' });
    expect(repaired).toBe(false);
  });

  it('битый документ даёт CorruptDocumentError', () => {
    expect(() =>
      decodeLedger({ id: 'u1', path: 'users/u1', version: 1, fields: { xp: 'lots' } }, now),
    ).toThrow(CorruptDocumentError);
  });

  it('encodeLedger пишет только поля леджера', () => {
    const fields = encodeLedger({
      currentXP: 50,
      level: 1,
      history: [event('e1', 50, '2024-03-14T00:00:00.000Z')],
      weeklyXP: 50,
      lastUpdate: now,
    });

    expect(fields).toEqual({
      xp: 50,
      level: 1,
      xpHistory: [{ id: 'e1', event: 'visit', xp: 50, timestamp: new Date('2024-03-14T00:00:00.000Z') }],
      weeklyXP: 50,
      lastXPUpdate: now,
    });
  });

  it('decodeEntry берёт уровень из XP', () => {
    const entry = decodeEntry({
      id: '2024-03_u1',
      path: 'leaderboard/2024-03_u1',
      version: 1,
      fields: {
        userId: 'u1',
        displayName: 'Ana',
        xp: 1200,
        level: 1,
        lastUpdated: '2024-03-14T00:00:00.000Z',
        monthYear: '2024-03',
      },
    });

    expect(entry).toEqual({
      userId: 'u1',
      displayName: 'Ana',
      currentXP: 1200,
      level: 3,
      lastUpdated: new Date('2024-03-14T00:00:00.000Z'),
      periodKey: '2024-03',
    });
  });
});

describe('LedgerStore', () => {
  let store: InMemoryDocumentStore;
  let ledger: LedgerStore;

  beforeEach(() => {
    store = new InMemoryDocumentStore();
    ledger = new LedgerStore(store);
  });

  it('отсутствующий документ читается как нулевое состояние версии 0', async () => {
    const snapshot = await ledger.read('u1', now);

    expect(snapshot.exists).toBe(false);
    expect(snapshot.version).toBe(0);
    expect(snapshot.state).toEqual({ currentXP: 0, level: 1, history: [], weeklyXP: 0, lastUpdate: now });
  });

  it('commit не трогает поля профиля', async () => {
    await store.set('users/u1', { displayName: 'Ana', avatar: 'a.png' });
    const before = await ledger.read('u1', now);

    const written = await ledger.commit(
      'u1',
      { ...before.state, currentXP: 50, history: [event('e1', 50, '2024-03-15T11:00:00.000Z')], weeklyXP: 50 },
      before.version,
    );
    const after = await ledger.read('u1', now);

    expect(written).toBe(true);
    expect(after.profile).toEqual({ displayName: 'Ana', avatarRef: 'a.png' });
    expect(after.state.currentXP).toBe(50);
    expect(after.version).toBe(2);
  });

  it('commit со старой версией возвращает false', async () => {
    await store.set('users/u1', { xp: 10 });
    const stale = await ledger.read('u1', now);
    await store.updateFields('users/u1', { xp: 20 });

    expect(await ledger.commit('u1', stale.state, stale.version)).toBe(false);
    expect((await ledger.read('u1', now)).state.currentXP).toBe(20);
  });

  it('initialize создаёт документ только если его нет', async () => {
    expect(await ledger.initialize('u1', now)).toBe(true);
    expect(await ledger.initialize('u1', now)).toBe(false);
    expect((await store.get('users/u1'))?.fields.displayName).toBe('');
  });

  it('entriesForIds: пустой список без запроса, больше 10 отклоняется', async () => {
    const query = jest.spyOn(store, 'query');

    expect(await ledger.entriesForIds('2024-03', [])).toEqual([]);
    expect(query).not.toHaveBeenCalled();

    const ids = Array.from({ length: 11 }, (_, i) => `u${i}`);
    await expect(ledger.entriesForIds('2024-03', ids)).rejects.toThrow(StoreQueryError);
  });

  it('writeEntry и entriesForPeriod', async () => {
    const snapshot = await ledger.read('u1', now);
    await ledger.writeEntry(projectEntry({ ...snapshot, state: { ...snapshot.state, currentXP: 75 } }, '2024-03', now));

    const entries = await ledger.entriesForPeriod('2024-03', 10);
    expect(entries).toEqual([
      { userId: 'u1', displayName: '', currentXP: 75, level: 1, lastUpdated: now, periodKey: '2024-03' },
    ]);
    expect(await ledger.entriesForPeriod('2024-02', 10)).toEqual([]);
  });

  it('writeEntry не заменяет запись с большим или равным XP', async () => {
    const base = { userId: 'u1', displayName: 'Ana', level: 1, lastUpdated: now, periodKey: '2024-03' };

    expect(await ledger.writeEntry({ ...base, currentXP: 80 })).toBe('written');
    expect(await ledger.writeEntry({ ...base, currentXP: 50 })).toBe('stale');
    expect(await ledger.writeEntry({ ...base, currentXP: 80 })).toBe('stale');
    expect(await ledger.writeEntry({ ...base, currentXP: 120 })).toBe('written');
    expect((await store.get('leaderboard/2024-03_u1'))?.fields.xp).toBe(120);
  });

  it('writeEntry сообщает о конфликте, если запись изменилась между чтением и записью', async () => {
    const base = { userId: 'u1', displayName: 'Ana', level: 1, lastUpdated: now, periodKey: '2024-03' };
    await ledger.writeEntry({ ...base, currentXP: 10 });
    const get = store.get.bind(store);
    jest.spyOn(store, 'get').mockImplementationOnce(async (path) => {
      const doc = await get(path);
      await store.updateFields(path, { xp: 200 });
      return doc;
    });

    expect(await ledger.writeEntry({ ...base, currentXP: 60 })).toBe('conflict');
    expect((await store.get('leaderboard/2024-03_u1'))?.fields.xp).toBe(200);
  });

  it('watch сообщает о битом документе через onError', async () => {
    await store.set('users/u1', { xp: -5 });
    const onSnapshot = jest.fn();
    const onError = jest.fn();

    ledger.watch('u1', () => now, onSnapshot, onError);
    await settle();

    expect(onSnapshot).not.toHaveBeenCalled();
    expect(onError).toHaveBeenCalledWith(expect.any(CorruptDocumentError));
  });
});
