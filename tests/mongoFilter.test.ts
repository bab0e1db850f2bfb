import { toMongoFilter, toMongoSort } from '@/store/mongo';
import { DOCUMENT_ID } from '@/store/types';
import { StoreQueryError } from '@/xp/errors';

describe('toMongoFilter', () => {
  it('равенство и id документа', () => {
    expect(
      toMongoFilter([
        { field: 'monthYear', op: '==', value: '2024-03' },
        { field: DOCUMENT_ID, op: 'in', value: ['2024-03_a', '2024-03_b'] },
      ]),
    ).toEqual({
      monthYear: { $eq: '2024-03' },
      _id: { $in: ['2024-03_a', '2024-03_b'] },
    });
  });

  it('диапазон по одному полю объединяется', () => {
    expect(
      toMongoFilter([
        { field: 'xp', op: '>=', value: 100 },
        { field: 'xp', op: '<', value: 500 },
      ]),
    ).toEqual({ xp: { $gte: 100, $lt: 500 } });
  });

  it('in больше чем с 10 значениями отклоняется', () => {
    const ids = Array.from({ length: 11 }, (_, i) => `u${i}`);
    expect(() => toMongoFilter([{ field: DOCUMENT_ID, op: 'in', value: ids }])).toThrow(StoreQueryError);
  });
});

describe('toMongoSort', () => {
  it('сохраняет порядок ключей и переводит id документа в _id', () => {
    const sort = toMongoSort([
      { field: 'xp', direction: 'desc' },
      { field: 'lastUpdated', direction: 'asc' },
      { field: DOCUMENT_ID, direction: 'asc' },
    ]);

    expect(Object.entries(sort)).toEqual([
      ['xp', -1],
      ['lastUpdated', 1],
      ['_id', 1],
    ]);
  });
});
