import type { ChangeRecord } from '../domain/change-record.js';

/** Canonical order of a log: `changedAt` ascending, ties broken by `id` */
export const compareChangeRecords = (a: ChangeRecord, b: ChangeRecord): number => {
  const byTime = a.changedAt.getTime() - b.changedAt.getTime();
  return byTime !== 0 ? byTime : a.id - b.id;
};

/** Returns a sorted copy; the input is left untouched */
export const sortChangeRecords = (records: readonly ChangeRecord[]): ChangeRecord[] =>
  [...records].sort(compareChangeRecords);
