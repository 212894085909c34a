import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { movie } from '@/lib/__fixtures__/records';
import { identityToRow, PgCatalog } from './catalog';
import { createTestDb } from './testing';
import type { TestDb } from './testing';

const URL_A = 'https://reports.test/release/rl1/';

describe('identityToRow', () => {
  it('stores the normalized title for lookups', () => {
    expect(identityToRow(movie('m-1', 'Echo Valley!', '2025-01-03', URL_A), 77)).toEqual({
      movieId: 'm-1',
      canonicalTitle: 'Echo Valley!',
      normalizedTitle: 'echovalley',
      sourceUrl: URL_A,
      releaseDate: '2025-01-03',
      tmdbId: 77,
    });
  });
});

describe('identityToRow source URLs', () => {
  it('drops tracking parameters', () => {
    const row = identityToRow(movie('m-9', 'Harbor Lights', '2024-05-03', 'https://reports.test/release/rl9/?ref_=bo_ds_table_1'));
    expect(row.sourceUrl).toBe('https://reports.test/release/rl9/');
  });
});

describe('PgCatalog', () => {
  let testDb: TestDb;
  let catalog: PgCatalog;

  beforeEach(async () => {
    testDb = await createTestDb();
    catalog = new PgCatalog(testDb.db);
  });

  afterEach(async () => {
    await testDb.close();
  });

  it('finds candidates by normalized title in id order', async () => {
    await catalog.upsert([
      identityToRow(movie('m-2', 'Echo Valley', '2025-06-10')),
      identityToRow(movie('m-1', 'ECHO VALLEY', '2025-01-03')),
      identityToRow(movie('m-3', 'Paper Comets', '2024-04-19')),
    ]);
    expect(await catalog.listCandidates('echovalley')).toEqual([
      movie('m-1', 'ECHO VALLEY', '2025-01-03'),
      movie('m-2', 'Echo Valley', '2025-06-10'),
    ]);
    expect(await catalog.listCandidates('nothing')).toEqual([]);
  });

  it('resolves source URLs', async () => {
    await catalog.upsert([identityToRow(movie('m-1', 'Harbor Lights', '2024-05-03', URL_A))]);
    expect(await catalog.byUrl(URL_A)).toEqual(movie('m-1', 'Harbor Lights', '2024-05-03', URL_A));
    expect(await catalog.byUrl('https://reports.test/release/rl9/')).toBeNull();
  });

  it('matches a parsed report URL against a catalog URL with tracking parameters', async () => {
    await catalog.upsert([
      identityToRow(movie('m-9', 'Harbor Lights', '2024-05-03', 'https://reports.test/release/rl9/?ref_=bo_ds_table_1')),
    ]);
    expect((await catalog.byUrl('https://reports.test/release/rl9/'))?.movieId).toBe('m-9');
    expect((await catalog.byUrl('https://reports.test/release/rl9/?ref_=bo_gr_rls'))?.movieId).toBe('m-9');
  });

  it('finds nothing for an empty title key', async () => {
    await catalog.upsert([identityToRow(movie('m-1', '???', '2025-01-03'))]);
    expect(await catalog.listCandidates('')).toEqual([]);
  });

  it('refreshes existing entries on upsert', async () => {
    await catalog.upsert([identityToRow(movie('m-1', 'Harbor Lights', null))]);
    const written = await catalog.upsert([identityToRow(movie('m-1', 'Harbor Lights', '2024-05-03', URL_A))]);
    expect(written).toBe(1);
    expect(await catalog.byUrl(URL_A)).toEqual(movie('m-1', 'Harbor Lights', '2024-05-03', URL_A));
  });

  it('writes nothing for an empty batch', async () => {
    expect(await catalog.upsert([])).toBe(0);
  });
});
