import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { run } from '@/lib/__fixtures__/records';
import { aggregate } from '@/lib/aggregator';
import { CURRENT_FEATURE_VERSION, PgFeatureStore, rowToVector, vectorToRow } from './features';
import { movieFeatures } from './schema';
import type { MovieFeatureRow } from './schema';
import { createTestDb } from './testing';
import type { TestDb } from './testing';

const M = 1_000_000;
const week = (movieId: string, scale = 1) =>
  aggregate(movieId, run('2024-05-03', [10, 14, 8, 5, 4, 4, 3].map((g) => g * M * scale), { theaterCount: 3000 }), '2024-05-03');

describe('row mapping', () => {
  it('stamps rows with the current feature version', () => {
    const computedAt = new Date('2025-01-01T00:00:00Z');
    const row = vectorToRow(week('m-1'), computedAt);
    expect(row.featureVersion).toBe(CURRENT_FEATURE_VERSION);
    expect(row.computedAt).toBe(computedAt);
  });

  it('reads a vector back from a selected row', () => {
    const vector = week('m-1');
    const row: MovieFeatureRow = { ...vector, featureVersion: CURRENT_FEATURE_VERSION, computedAt: new Date() };
    expect(rowToVector(row)).toEqual(vector);
  });
});

describe('PgFeatureStore', () => {
  let testDb: TestDb;
  let features: PgFeatureStore;

  beforeEach(async () => {
    testDb = await createTestDb();
    features = new PgFeatureStore(testDb.db);
  });

  afterEach(async () => {
    await testDb.close();
  });

  it('stores vectors and lists them by movie id', async () => {
    await features.replace(week('m-2'));
    await features.replace(week('m-1'));
    const listed = await features.list();
    expect(listed.map((v) => v.movieId)).toEqual(['m-1', 'm-2']);
    expect(listed[0]).toEqual(week('m-1'));
  });

  it('replaces a vector wholesale', async () => {
    await features.replace(week('m-1'));
    const partial = aggregate('m-1', run('2024-05-03', [2 * M, 1 * M]), '2024-05-03');
    await features.replace(partial);

    const [stored] = await features.list();
    expect(stored).toEqual(partial);
    expect(stored.week1MeanGross).toBeNull();
  });

  it('keeps only the listed movies', async () => {
    await features.replace(week('m-1'));
    await features.replace(week('m-2'));
    await features.replace(week('m-3'));

    expect(await features.retainOnly(['m-2'])).toEqual(['m-1', 'm-3']);
    expect((await features.list()).map((v) => v.movieId)).toEqual(['m-2']);
    expect(await features.retainOnly(['m-2'])).toEqual([]);
  });

  it('empties the table when no movie is kept', async () => {
    await features.replace(week('m-1'));
    expect(await features.retainOnly([])).toEqual(['m-1']);
    expect(await features.list()).toEqual([]);
  });

  it('hides vectors from other feature versions', async () => {
    await testDb.db.insert(movieFeatures).values({ ...vectorToRow(week('m-old'), new Date()), featureVersion: 0 });
    await features.replace(week('m-1'));
    expect((await features.list()).map((v) => v.movieId)).toEqual(['m-1']);
  });
});
