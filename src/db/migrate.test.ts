import { describe, expect, it } from 'vitest';
import { applySchema, schemaStatements } from './migrate';
import { createTestDb } from './testing';

describe('schemaStatements', () => {
  it('splits on statement-ending semicolons', () => {
    expect(schemaStatements('CREATE TABLE a (x int);\n\nCREATE INDEX i ON a (x);\n')).toEqual([
      'CREATE TABLE a (x int)',
      'CREATE INDEX i ON a (x)',
    ]);
  });

  it('reads the bundled schema file', () => {
    const statements = schemaStatements();
    expect(statements.filter((s) => s.startsWith('CREATE TABLE'))).toHaveLength(5);
  });
});

describe('applySchema', () => {
  it('can run twice against the same database', async () => {
    const { db, close } = await createTestDb();
    try {
      await expect(applySchema(db)).resolves.toBeUndefined();
    } finally {
      await close();
    }
  });
});
