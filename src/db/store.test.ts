import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { dailyRecord } from '@/lib/__fixtures__/records';
import { CheckpointCorruption } from '@/lib/errors';
import { collectionCheckpoint, collectionDates } from './schema';
import { dedupeBatch, parseCheckpoint, PgRecordStore } from './store';
import { createTestDb } from './testing';
import type { TestDb } from './testing';

const URL_A = 'https://reports.test/release/rl1/';
const URL_B = 'https://reports.test/release/rl2/';

describe('dedupeBatch', () => {
  it('keeps the first record per key', () => {
    const first = dailyRecord({ sourceUrl: URL_A, dailyGross: 10 });
    const again = dailyRecord({ sourceUrl: URL_A, dailyGross: 20 });
    const other = dailyRecord({ sourceUrl: null, sourceTitle: 'Paper Comets' });
    const { unique, duplicates } = dedupeBatch([first, other, again]);
    expect(unique).toEqual([first, other]);
    expect(duplicates).toEqual([{ key: URL_A, title: 'Harbor Lights' }]);
  });

  it('keeps distinct non-Latin titles without URLs', () => {
    const spirited = dailyRecord({ sourceTitle: '千と千尋の神隠し' });
    const stalker = dailyRecord({ sourceTitle: 'Сталкер' });
    const { unique, duplicates } = dedupeBatch([spirited, stalker]);
    expect(unique).toEqual([spirited, stalker]);
    expect(duplicates).toEqual([]);
  });
});

describe('parseCheckpoint', () => {
  it('accepts a well-formed checkpoint', () => {
    expect(parseCheckpoint({ lastCompletedDate: '2024-05-03', consecutiveFailureCount: 2 })).toEqual({
      lastCompletedDate: '2024-05-03',
      consecutiveFailureCount: 2,
    });
  });

  it('raises CheckpointCorruption for bad dates and counts', () => {
    expect(() => parseCheckpoint({ lastCompletedDate: '2024-13-40', consecutiveFailureCount: 0 })).toThrow(
      CheckpointCorruption,
    );
    expect(() => parseCheckpoint({ lastCompletedDate: null, consecutiveFailureCount: -1 })).toThrow(
      'Checkpoint is corrupt: consecutiveFailureCount: Number must be greater than or equal to 0. Re-run with an explicit resume date.',
    );
  });
});

describe('PgRecordStore', () => {
  let testDb: TestDb;
  let store: PgRecordStore;

  beforeEach(async () => {
    testDb = await createTestDb();
    store = new PgRecordStore(testDb.db);
  });

  afterEach(async () => {
    await testDb.close();
  });

  it('starts empty', async () => {
    expect(await store.readCheckpoint()).toEqual({ lastCompletedDate: null, consecutiveFailureCount: 0 });
    expect(await store.listRecords()).toEqual([]);
    expect(await store.has('2024-05-03')).toBe(false);
  });

  it('stores a date with its checkpoint', async () => {
    const records = [
      dailyRecord({ sourceUrl: URL_B, sourceTitle: 'Paper Comets', rank: 2 }),
      dailyRecord({ sourceUrl: URL_A, rank: 1, ydChangePct: -12.5, perTheaterAvg: 1000 }),
    ];

    const result = await store.append('2024-05-03', records, {
      lastCompletedDate: '2024-05-03',
      consecutiveFailureCount: 0,
    });

    expect(result).toEqual({ inserted: 2, duplicates: 0 });
    expect(await store.has('2024-05-03')).toBe(true);
    expect(await store.readCheckpoint()).toEqual({ lastCompletedDate: '2024-05-03', consecutiveFailureCount: 0 });
    expect(await store.listRecords()).toEqual([records[1], records[0]]);
  });

  it('stores an empty report as a completed date', async () => {
    await store.append('2024-05-03', [], { lastCompletedDate: '2024-05-03', consecutiveFailureCount: 0 });
    expect(await store.has('2024-05-03')).toBe(true);
  });

  it('drops duplicate keys within a batch', async () => {
    const result = await store.append(
      '2024-05-03',
      [dailyRecord({ sourceUrl: URL_A, dailyGross: 10 }), dailyRecord({ sourceUrl: URL_A, dailyGross: 20 })],
      { lastCompletedDate: '2024-05-03', consecutiveFailureCount: 0 },
    );
    expect(result).toEqual({ inserted: 1, duplicates: 1 });
    expect((await store.listRecords()).map((r) => r.dailyGross)).toEqual([10]);
  });

  it('never rewrites a stored record on replay', async () => {
    const checkpoint = { lastCompletedDate: '2024-05-03', consecutiveFailureCount: 0 };
    await store.append('2024-05-03', [dailyRecord({ sourceUrl: URL_A, dailyGross: 10 })], checkpoint);
    await store.append('2024-05-03', [dailyRecord({ sourceUrl: URL_A, dailyGross: 99 })], checkpoint);
    expect((await store.listRecords()).map((r) => r.dailyGross)).toEqual([10]);
  });

  it('counts only the rows a replay adds', async () => {
    const checkpoint = { lastCompletedDate: '2024-05-03', consecutiveFailureCount: 0 };
    await store.append('2024-05-03', [dailyRecord({ sourceUrl: URL_A })], checkpoint);
    const replay = await store.append(
      '2024-05-03',
      [dailyRecord({ sourceUrl: URL_A }), dailyRecord({ sourceUrl: URL_B })],
      checkpoint,
    );
    expect(replay).toEqual({ inserted: 1, duplicates: 0 });
    expect(await store.listRecords()).toHaveLength(2);
  });

  it('rejects records from another date', async () => {
    await expect(
      store.append('2024-05-03', [dailyRecord({ date: '2024-05-04' })], {
        lastCompletedDate: '2024-05-03',
        consecutiveFailureCount: 0,
      }),
    ).rejects.toThrow('Record dated 2024-05-04 appended under 2024-05-03');
    expect(await store.has('2024-05-03')).toBe(false);
  });

  it('rolls the whole date back when the checkpoint cannot be written', async () => {
    await expect(
      store.append('2024-05-03', [dailyRecord()], { lastCompletedDate: 'yesterday', consecutiveFailureCount: 0 }),
    ).rejects.toThrow(CheckpointCorruption);
    expect(await store.listRecords()).toEqual([]);
    expect(await store.has('2024-05-03')).toBe(false);
  });

  it('never moves the checkpoint backwards on append', async () => {
    await store.append('2024-05-05', [], { lastCompletedDate: '2024-05-05', consecutiveFailureCount: 0 });
    await store.append('2024-05-04', [dailyRecord({ date: '2024-05-04' })], {
      lastCompletedDate: '2024-05-04',
      consecutiveFailureCount: 0,
    });
    expect((await store.readCheckpoint()).lastCompletedDate).toBe('2024-05-05');
  });

  it('lets an operator rewind the checkpoint', async () => {
    await store.append('2024-05-05', [], { lastCompletedDate: '2024-05-05', consecutiveFailureCount: 0 });
    await store.writeCheckpoint({ lastCompletedDate: '2024-05-01', consecutiveFailureCount: 3 });
    expect(await store.readCheckpoint()).toEqual({ lastCompletedDate: '2024-05-01', consecutiveFailureCount: 3 });
  });

  it('records skipped dates with the failure count', async () => {
    await store.markSkipped('2024-05-03', 'http_status: Request failed: 503', {
      lastCompletedDate: '2024-05-03',
      consecutiveFailureCount: 1,
    }, 3);

    expect(await store.has('2024-05-03')).toBe(false);
    expect(await store.listSkippedDates()).toEqual(['2024-05-03']);
    expect(await store.readCheckpoint()).toEqual({ lastCompletedDate: '2024-05-03', consecutiveFailureCount: 1 });
    const [row] = await testDb.db.select().from(collectionDates);
    expect(row).toMatchObject({ status: 'skipped', attempts: 3, reason: 'http_status: Request failed: 503' });
  });

  it('promotes a skipped date once it is stored, and never demotes it', async () => {
    const checkpoint = { lastCompletedDate: '2024-05-03', consecutiveFailureCount: 0 };
    await store.markSkipped('2024-05-03', 'network: fetch failed', { ...checkpoint, consecutiveFailureCount: 1 });
    await store.append('2024-05-03', [dailyRecord()], checkpoint);
    await store.markSkipped('2024-05-03', 'network: fetch failed', checkpoint);

    expect(await store.has('2024-05-03')).toBe(true);
    expect(await store.listSkippedDates()).toEqual([]);
  });

  it('raises CheckpointCorruption for an unreadable stored checkpoint', async () => {
    await testDb.db
      .insert(collectionCheckpoint)
      .values({ id: 'default', lastCompletedDate: '05/03/2024', consecutiveFailureCount: 0 });
    await expect(store.readCheckpoint()).rejects.toBeInstanceOf(CheckpointCorruption);
  });

  it('keeps separate checkpoints per id', async () => {
    const other = new PgRecordStore(testDb.db, 'backfill');
    await store.writeCheckpoint({ lastCompletedDate: '2024-05-03', consecutiveFailureCount: 0 });
    expect((await other.readCheckpoint()).lastCompletedDate).toBeNull();
  });
});
