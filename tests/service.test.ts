import { PubSub } from 'graphql-subscriptions';
import { InMemoryDocumentStore } from '@/store/memory';
import { XPService } from '@/xp/service';
import { AwardOutcomeSignal, XPSignals } from '@/xp/signals';
import { NO_WAIT_RETRY, fixedClock, settle } from './helpers/engine';

const NOW = '2024-03-15T12:00:00.000Z';

const wait = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('XPService', () => {
  let store: InMemoryDocumentStore;
  let xp: XPService;
  let outcomes: AwardOutcomeSignal[];

  beforeEach(async () => {
    store = new InMemoryDocumentStore();
    xp = new XPService({
      store,
      signals: new XPSignals(new PubSub()),
      clock: fixedClock(NOW).clock,
      options: { retry: NO_WAIT_RETRY },
    });
    outcomes = [];
    await xp.signals.on('awardOutcome', 'u1', (payload) => outcomes.push(payload));
  });

  afterEach(() => xp.close());

  const finish = async (userId = 'u1') => {
    await xp.session(userId).drain();
    await settle();
  };

  it('awardXP сразу отдаёт eventId и сообщает об успехе', async () => {
    const eventId = xp.awardXP('u1', 50, 'visit', { eventId: 'e1' });
    expect(eventId).toBe('e1');

    await finish();

    expect(outcomes).toEqual([
      { userId: 'u1', eventId: 'e1', amount: 50, eventKind: 'visit', recorded: true, duplicate: false, currentXP: 50 },
    ]);
  });

  it('без eventId генерирует новый для каждого вызова', async () => {
    const first = xp.awardXP('u1', 10, 'checkIn');
    const second = xp.awardXP('u1', 10, 'checkIn');
    await finish();

    expect(first).not.toBe(second);
    expect(outcomes.map((outcome) => outcome.eventId)).toEqual([first, second]);
  });

  it('ошибка не бросается, а приходит в awardOutcome с кодом', async () => {
    expect(() => xp.awardXP('u1', -5, 'visit', { eventId: 'bad' })).not.toThrow();
    await finish();

    expect(outcomes).toEqual([
      {
        userId: 'u1',
        eventId: 'bad',
        amount: -5,
        eventKind: 'visit',
        recorded: false,
        code: 'BAD_USER_INPUT',
        message: 'XP amount must be a positive integer, got -5',
      },
    ]);
  });

  it('начисления одного пользователя выполняются в порядке вызова', async () => {
    xp.awardXP('u1', 10, 'checkIn');
    xp.awardXP('u1', 20, 'addReview');
    xp.awardXP('u1', 30, 'sharePlace');
    await finish();

    expect(outcomes.map((outcome) => outcome.currentXP)).toEqual([10, 30, 60]);
  });

  it('повтор с тем же eventId отмечается как duplicate', async () => {
    xp.awardXP('u1', 50, 'visit', { eventId: 'again' });
    xp.awardXP('u1', 50, 'visit', { eventId: 'again' });
    await finish();

    expect(outcomes.map((outcome) => [outcome.duplicate, outcome.currentXP])).toEqual([
      [false, 50],
      [true, 50],
    ]);
  });

  it('currentState следует за леджером, пока держится watch', async () => {
    expect(xp.currentState('u1').currentXP).toBe(0);

    const release = xp.watch('u1');
    await xp.award('u1', { amount: 75, eventKind: 'first-visit' });
    await settle();

    expect(xp.currentState('u1').currentXP).toBe(75);
    expect(store.listenerCount('users/u1')).toBe(1);

    release();
    release();
    expect(store.listenerCount('users/u1')).toBe(0);
    expect(xp.session('u1').watchers).toBe(0);
  });

  it('currentState отражает зафиксированное начисление и без watch', async () => {
    await xp.award('u1', { amount: 75, eventKind: 'first-visit' });

    expect(xp.currentState('u1').currentXP).toBe(75);
    expect(xp.currentState('u1').level).toBe(1);
  });

  it('несколько watch держат одну подписку до последнего release', () => {
    const first = xp.watch('u1');
    const second = xp.watch('u1');
    expect(store.listenerCount('users/u1')).toBe(1);

    first();
    expect(store.listenerCount('users/u1')).toBe(1);
    second();
    expect(store.listenerCount('users/u1')).toBe(0);
  });

  it('fetchState и лидерборды читают хранилище', async () => {
    await xp.award('u1', { amount: 300, eventKind: 'mission-complete' });
    await xp.award('u2', { amount: 500, eventKind: 'monthlyBonus' });

    expect((await xp.fetchState('u1')).currentXP).toBe(300);

    const global = await xp.globalLeaderboard('2024-03', 10);
    expect(global.map(({ rank, entry }) => [rank, entry.userId, entry.level])).toEqual([
      [1, 'u2', 2],
      [2, 'u1', 1],
    ]);

    const friends = await xp.friendsLeaderboard('2024-03', ['u1']);
    expect(friends.map(({ entry }) => entry.userId)).toEqual(['u1']);
  });

  it('простаивающие сессии удаляются', async () => {
    const shortLived = new XPService({
      store,
      signals: new XPSignals(new PubSub()),
      clock: fixedClock(NOW).clock,
      options: { retry: NO_WAIT_RETRY, sessionIdleMs: 0 },
    });

    await Promise.all(
      Array.from({ length: 100 }, (_, i) => shortLived.award(`u${i}`, { amount: 10, eventKind: 'checkIn' })),
    );
    expect(shortLived.sessionCount).toBe(100);

    await wait(5);
    expect(shortLived.sessionCount).toBe(0);
    await shortLived.close();
  });

  it('сессия с watch не удаляется до release', async () => {
    const shortLived = new XPService({
      store,
      signals: new XPSignals(new PubSub()),
      clock: fixedClock(NOW).clock,
      options: { retry: NO_WAIT_RETRY, sessionIdleMs: 0 },
    });

    const release = shortLived.watch('u1');
    await wait(5);
    expect(shortLived.sessionCount).toBe(1);

    release();
    await wait(5);
    expect(shortLived.sessionCount).toBe(0);
    expect(store.listenerCount('users/u1')).toBe(0);
    await shortLived.close();
  });

  it('close снимает все подписки', async () => {
    xp.watch('u1');
    xp.watch('u2');

    await xp.close();

    expect(store.listenerCount('users/u1')).toBe(0);
    expect(store.listenerCount('users/u2')).toBe(0);
  });
});
