/**
 * Revision tree: date → actor → change hierarchy for history views
 *
 * @module revision-tree
 *
 * @remarks
 * Ordering contract:
 * - date groups: most recent calendar date first
 * - actor groups within a date: order of the actor's first change on that date
 * - changes within an actor group: oldest first
 *
 * Dates are calendar dates in one reference time zone fixed when the builder is created.
 *
 * @example
 * ```typescript
 * const buildTree = createRevisionTreeBuilder({ timeZone: 'Europe/Berlin' });
 * const tree = buildTree(await store.listFor(partId));
 * // => [{ date: '2026-01-26', actors: [{ actor: 'user1', changes: [...] }, ...] }, ...]
 * ```
 */

import { DEFAULTS } from '../constants.js';
import type { ActorId } from '../domain/branded-types.js';
import type { ChangeRecord } from '../domain/change-record.js';
import { ValidationError } from '../domain/errors.js';
import { compareChangeRecords, sortChangeRecords } from '../store/ordering.js';
import { treeLog } from '../utils/debug.js';

export interface ActorGroup {
  readonly actor: ActorId;
  readonly changes: readonly ChangeRecord[];
}

export interface DateGroup {
  /** Calendar date, `YYYY-MM-DD` */
  readonly date: string;
  readonly actors: readonly ActorGroup[];
}

export type RevisionTree = readonly DateGroup[];

export interface RevisionTreeOptions {
  /** IANA time zone used to cut timestamps into calendar dates (default: UTC) */
  timeZone?: string;
}

export type RevisionTreeBuilder = (records: readonly ChangeRecord[]) => RevisionTree;

/** Per-date counts for a history header */
export interface DateSummary {
  readonly date: string;
  readonly actorCount: number;
  readonly changeCount: number;
}

const createDateFormatter = (timeZone: string): Intl.DateTimeFormat => {
  try {
    return new Intl.DateTimeFormat('en-CA', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
    });
  } catch (error) {
    if (error instanceof RangeError) {
      throw ValidationError.forField('timeZone', `unknown time zone "${timeZone}"`);
    }
    throw error;
  }
};

const toDateKey = (formatter: Intl.DateTimeFormat, date: Date): string => {
  const parts = formatter.formatToParts(date);
  const part = (type: Intl.DateTimeFormatPartTypes): string => parts.find((p) => p.type === type)?.value ?? '';
  return `${part('year')}-${part('month')}-${part('day')}`;
};

const freezeGroups = (byDate: Map<string, Map<ActorId, ChangeRecord[]>>): RevisionTree => {
  const dates = [...byDate.keys()].sort((a, b) => (a < b ? 1 : a > b ? -1 : 0));

  return Object.freeze(
    dates.map((date): DateGroup => {
      const byActor = byDate.get(date) ?? new Map<ActorId, ChangeRecord[]>();
      return Object.freeze({
        date,
        actors: Object.freeze(
          [...byActor.entries()].map(
            ([actor, changes]): ActorGroup => Object.freeze({ actor, changes: Object.freeze(changes) }),
          ),
        ),
      });
    }),
  );
};

/**
 * Creates a tree builder for a fixed reference time zone
 *
 * @throws {ValidationError} When the time zone is unknown
 */
export const createRevisionTreeBuilder = (options: RevisionTreeOptions = {}): RevisionTreeBuilder => {
  const timeZone = options.timeZone ?? DEFAULTS.TIME_ZONE;
  const formatter = createDateFormatter(timeZone);

  return (records) => {
    const byDate = new Map<string, Map<ActorId, ChangeRecord[]>>();

    for (const record of sortChangeRecords(records)) {
      const date = toDateKey(formatter, record.changedAt);

      let byActor = byDate.get(date);
      if (!byActor) {
        byActor = new Map();
        byDate.set(date, byActor);
      }

      const changes = byActor.get(record.changedBy);
      if (changes) {
        changes.push(record);
      } else {
        byActor.set(record.changedBy, [record]);
      }
    }

    treeLog('Built revision tree: %d records, %d dates (%s)', records.length, byDate.size, timeZone);
    return freezeGroups(byDate);
  };
};

/** One-shot variant of {@link createRevisionTreeBuilder} */
export const buildRevisionTree = (records: readonly ChangeRecord[], options: RevisionTreeOptions = {}): RevisionTree =>
  createRevisionTreeBuilder(options)(records);

export const summarizeRevisionTree = (tree: RevisionTree): DateSummary[] =>
  tree.map((group) => ({
    date: group.date,
    actorCount: group.actors.length,
    changeCount: group.actors.reduce((total, actorGroup) => total + actorGroup.changes.length, 0),
  }));

/** All changes of a tree, newest first (flat table view) */
export const flattenRevisionTree = (tree: RevisionTree): ChangeRecord[] =>
  tree
    .flatMap((group) => group.actors.flatMap((actorGroup) => actorGroup.changes))
    .sort((a, b) => compareChangeRecords(b, a));
