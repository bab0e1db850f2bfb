import { loadConfig } from '@/config';

describe('loadConfig', () => {
  it('значения по умолчанию для mongo', () => {
    expect(loadConfig({ MONGO_URI: 'mongodb://localhost:27017/xp' })).toEqual({
      port: 4000,
      store: { driver: 'mongo', mongoUri: 'mongodb://localhost:27017/xp' },
      retry: { attempts: 3, baseDelayMs: 200 },
      maxConflictRetries: 5,
      reconcileIntervalMs: 60000,
      sessionIdleMs: 60000,
      leaderboardLimit: 50,
    });
  });

  it('in-memory хранилище не требует MONGO_URI', () => {
    const config = loadConfig({ XP_STORE: 'memory', PORT: '5050', LEADERBOARD_LIMIT: '10', XP_RECONCILE_INTERVAL_MS: '0' });

    expect(config.store).toEqual({ driver: 'memory' });
    expect(config.port).toBe(5050);
    expect(config.leaderboardLimit).toBe(10);
    expect(config.reconcileIntervalMs).toBe(0);
  });

  it('без MONGO_URI для mongo - ошибка', () => {
    expect(() => loadConfig({})).toThrow('Invalid configuration: MONGO_URI: MONGO_URI is required when XP_STORE=mongo');
  });

  it('нечисловые значения отклоняются', () => {
    expect(() => loadConfig({ XP_STORE: 'memory', XP_STORE_ATTEMPTS: 'many' })).toThrow(/XP_STORE_ATTEMPTS/);
  });
});
