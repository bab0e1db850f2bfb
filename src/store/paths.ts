import { StoreQueryError } from '../xp/errors';
import { MAX_IN_VALUES, QueryFilter } from './types';

export const USERS = 'users';
export const LEADERBOARD = 'leaderboard';

export const userPath = (userId: string) => `${USERS}/${userId}`;

export const leaderboardId = (periodKey: string, userId: string) => `${periodKey}_${userId}`;

export const leaderboardPath = (periodKey: string, userId: string) =>
  `${LEADERBOARD}/${leaderboardId(periodKey, userId)}`;

export const splitPath = (path: string): { collection: string; id: string } => {
  const slash = path.indexOf('/');
  if (slash <= 0 || slash === path.length - 1 || path.indexOf('/', slash + 1) !== -1) {
    throw new StoreQueryError(`Invalid document path "${path}"`);
  }
  return { collection: path.slice(0, slash), id: path.slice(slash + 1) };
};

export const assertFilters = (filters: QueryFilter[]) => {
  for (const filter of filters) {
    if (filter.op !== 'in') continue;
    if (!Array.isArray(filter.value)) {
      throw new StoreQueryError(`"in" filter on ${filter.field} needs an array`);
    }
    if (filter.value.length > MAX_IN_VALUES) {
      throw new StoreQueryError(
        `"in" filter on ${filter.field} takes at most ${MAX_IN_VALUES} values, got ${filter.value.length}`,
      );
    }
  }
};
