import { createActorId, createEntityId, ValidationError } from '@revision-log/core';
import { parts } from '@revision-log/database';
import { createInProcessDatabase, type InProcessDatabase } from '@revision-log/database/testing';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createDrizzleRevisionStore } from '../src/revision-store.js';
import { createDrizzleTransactionRunner } from '../src/transaction-runner.js';

const actor = createActorId('user1');
const partId = createEntityId(1);
const nameDraft = {
  fieldName: 'name',
  oldValue: null,
  newValue: 'Widget',
  changeKind: 'CREATED',
  category: 'value',
} as const;

describe('createDrizzleTransactionRunner', () => {
  let database: InProcessDatabase;

  beforeEach(async () => {
    database = await createInProcessDatabase();
  });

  afterEach(async () => {
    await database.close();
  });

  it('should commit the business record and its revisions together', async () => {
    const transactions = createDrizzleTransactionRunner(database.db);

    const result = await transactions.run(async ({ tx, store }) => {
      await tx.insert(parts).values({ name: 'Widget' });
      return store.append(partId, [nameDraft], { actor });
    });

    expect(result).toHaveLength(1);
    expect(await database.db.select({ name: parts.name }).from(parts)).toEqual([{ name: 'Widget' }]);
    expect(await createDrizzleRevisionStore(database.db).listFor(partId)).toHaveLength(1);
  });

  it('should roll back both when the callback fails', async () => {
    const transactions = createDrizzleTransactionRunner(database.db);

    await expect(
      transactions.run(async ({ tx, store }) => {
        await tx.insert(parts).values({ name: 'Widget' });
        await store.append(partId, [nameDraft], { actor });
        throw new Error('pricing service unavailable');
      }),
    ).rejects.toThrow('[transaction] pricing service unavailable');

    expect(await database.db.select().from(parts)).toEqual([]);
    expect(await createDrizzleRevisionStore(database.db).listFor(partId)).toEqual([]);
  });

  it('should pass validation errors through unchanged', async () => {
    const transactions = createDrizzleTransactionRunner(database.db);
    const validation = ValidationError.forField('entityId', 'persist callback returned no key for a new record');

    await expect(
      transactions.run(async () => {
        throw validation;
      }),
    ).rejects.toBe(validation);
  });
});
