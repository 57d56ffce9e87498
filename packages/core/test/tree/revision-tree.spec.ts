import { describe, expect, it } from 'vitest';
import {
  assertChangeRecord,
  buildRevisionTree,
  type ChangeRecord,
  type ChangeRecordInput,
  createRevisionTreeBuilder,
  flattenRevisionTree,
  summarizeRevisionTree,
  ValidationError,
} from '../../src/index.js';

const record = (overrides: Partial<ChangeRecordInput> & Pick<ChangeRecordInput, 'id' | 'changedAt'>): ChangeRecord =>
  assertChangeRecord({
    entityId: '42',
    fieldName: 'name',
    oldValue: null,
    newValue: 'Widget',
    changeKind: 'CREATED',
    category: 'value',
    changedBy: 'user1',
    notes: null,
    batchId: `batch-${overrides.id}`,
    ...overrides,
  });

// Two days of history for one part, listed out of order
const history: ChangeRecord[] = [
  record({
    id: 4,
    fieldName: 'material_id',
    oldValue: '1',
    newValue: '2',
    changeKind: 'UPDATED',
    changedAt: new Date('2026-01-26T14:00:00Z'),
    changedBy: 'user2',
  }),
  record({
    id: 1,
    fieldName: 'weight_g',
    oldValue: '45.7',
    newValue: '46.0',
    changeKind: 'UPDATED',
    changedAt: new Date('2026-01-25T16:30:00Z'),
  }),
  record({ id: 3, fieldName: 'volume_cm3', newValue: '50.0', changedAt: new Date('2026-01-26T09:00:00Z') }),
  record({ id: 2, fieldName: 'name', newValue: 'Widget', changedAt: new Date('2026-01-26T09:00:00Z') }),
];

const shape = (tree: ReturnType<typeof buildRevisionTree>) =>
  tree.map((group) => ({
    date: group.date,
    actors: group.actors.map((actorGroup) => ({
      actor: actorGroup.actor,
      ids: actorGroup.changes.map((change) => change.id),
    })),
  }));

describe('buildRevisionTree', () => {
  it('should group by date, then actor, then change', () => {
    expect(shape(buildRevisionTree(history))).toEqual([
      {
        date: '2026-01-26',
        actors: [
          { actor: 'user1', ids: [2, 3] },
          { actor: 'user2', ids: [4] },
        ],
      },
      { date: '2026-01-25', actors: [{ actor: 'user1', ids: [1] }] },
    ]);
  });

  it('should return an empty tree for an empty history', () => {
    expect(buildRevisionTree([])).toEqual([]);
  });

  it('should order actors by their first change of the day', () => {
    const tree = buildRevisionTree([
      record({ id: 1, changedAt: new Date('2026-02-01T08:00:00Z'), changedBy: 'user2' }),
      record({ id: 2, changedAt: new Date('2026-02-01T09:00:00Z'), changedBy: 'user1' }),
      record({ id: 3, changedAt: new Date('2026-02-01T10:00:00Z'), changedBy: 'user2' }),
    ]);

    expect(shape(tree)).toEqual([
      {
        date: '2026-02-01',
        actors: [
          { actor: 'user2', ids: [1, 3] },
          { actor: 'user1', ids: [2] },
        ],
      },
    ]);
  });

  it('should cut dates in the reference time zone', () => {
    const lateEvening = [record({ id: 1, changedAt: new Date('2026-01-25T23:30:00Z') })];

    expect(buildRevisionTree(lateEvening)[0]?.date).toBe('2026-01-25');
    expect(buildRevisionTree(lateEvening, { timeZone: 'Asia/Tokyo' })[0]?.date).toBe('2026-01-26');
  });

  it('should not modify its input', () => {
    const input = [...history];

    buildRevisionTree(input);

    expect(input.map((change) => change.id)).toEqual([4, 1, 3, 2]);
  });

  it('should return a frozen tree', () => {
    const tree = buildRevisionTree(history);

    expect(Object.isFrozen(tree)).toBe(true);
    expect(Object.isFrozen(tree[0]?.actors)).toBe(true);
  });
});

describe('createRevisionTreeBuilder', () => {
  it('should reject an unknown time zone', () => {
    expect(() => createRevisionTreeBuilder({ timeZone: 'Mars/Olympus_Mons' })).toThrow(ValidationError);
    expect(() => createRevisionTreeBuilder({ timeZone: 'Mars/Olympus_Mons' })).toThrow(
      'Validation failed: timeZone: unknown time zone "Mars/Olympus_Mons"',
    );
  });
});

describe('summarizeRevisionTree', () => {
  it('should count actors and changes per date', () => {
    expect(summarizeRevisionTree(buildRevisionTree(history))).toEqual([
      { date: '2026-01-26', actorCount: 2, changeCount: 3 },
      { date: '2026-01-25', actorCount: 1, changeCount: 1 },
    ]);
  });
});

describe('flattenRevisionTree', () => {
  it('should list changes newest first', () => {
    expect(flattenRevisionTree(buildRevisionTree(history)).map((change) => change.id)).toEqual([4, 3, 2, 1]);
  });
});
