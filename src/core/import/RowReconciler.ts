import {
  DAILY_VALUE_FIELDS,
  WEEKLY_VALUE_FIELDS,
  type DailyRecord,
  type StoreSnapshot,
  type WeeklyRecord,
} from '../../ports/ProgressStorePort.js';
import { isIsoDate } from '../../utils/dates.js';
import type {
  Candidate,
  ConflictOverwrite,
  ConflictPolicy,
  DailyCandidate,
  FieldValue,
  Provenance,
  RecordKind,
  WeeklyCandidate,
} from './types.js';

export interface ReconcileInput {
  /** Daily candidates in file order */
  daily: DailyCandidate[];
  /** Weekly candidates in file order */
  weekly: WeeklyCandidate[];
  snapshot: StoreSnapshot;
  policy: ConflictPolicy;
}

export interface ReconciledRecord<R> {
  kind: RecordKind;
  key: string;
  /** Merge of this import's candidates; what gets written */
  incoming: R;
  /** What the store will hold after the partial update */
  merged: R;
  created: boolean;
  /** False when the store already holds exactly `merged` */
  changed: boolean;
  outcome: 'accepted' | 'overwritten';
  conflicts: ConflictOverwrite[];
  sources: Provenance[];
}

export interface RejectedCandidate {
  kind: RecordKind;
  key: string;
  provenance: Provenance;
  reason: string;
}

export interface ReconcileResult {
  weekly: ReconciledRecord<WeeklyRecord>[];
  daily: ReconciledRecord<DailyRecord>[];
  rejected: RejectedCandidate[];
}

interface FieldChange {
  field: string;
  previous: FieldValue;
  incoming: FieldValue;
  kept: FieldValue;
}

interface FieldMerge<R> {
  record: R;
  changes: FieldChange[];
  /** True when a value already present was replaced by a different one */
  replaced: boolean;
}

/**
 * Field-by-field merge. A non-null value always beats a null one; when both
 * sides hold different values, `preferIncoming` decides and the clash is
 * reported as a change.
 */
function mergeFields<F extends string, R extends Record<F, FieldValue>>(
  base: R,
  incoming: R,
  fields: readonly F[],
  preferIncoming: boolean
): FieldMerge<R> {
  const record = { ...base };
  const changes: FieldChange[] = [];
  let replaced = false;

  for (const field of fields) {
    const previous = base[field];
    const next = incoming[field];
    if (next === null || next === previous) continue;
    if (previous === null) {
      record[field] = next;
      continue;
    }
    const kept = preferIncoming ? next : previous;
    record[field] = kept;
    changes.push({ field, previous, incoming: next, kept });
    if (preferIncoming) replaced = true;
  }

  return { record, changes, replaced };
}

interface Group<R> {
  key: string;
  record: R;
  sources: Provenance[];
  conflicts: ConflictOverwrite[];
  replaced: boolean;
}

function reconcileKind<F extends string, R extends Record<F, FieldValue>>(
  kind: RecordKind,
  candidates: Candidate<R>[],
  keyOf: (record: R) => string,
  isValidKey: (record: R) => boolean,
  stored: (record: R) => R | undefined,
  fields: readonly F[],
  policy: ConflictPolicy,
  rejected: RejectedCandidate[]
): ReconciledRecord<R>[] {
  const groups = new Map<string, Group<R>>();

  for (const candidate of candidates) {
    const key = keyOf(candidate.record);
    if (!isValidKey(candidate.record)) {
      rejected.push({ kind, key, provenance: candidate.provenance, reason: `invalid ${kind} key "${key}"` });
      continue;
    }

    const group = groups.get(key);
    if (!group) {
      groups.set(key, {
        key,
        record: { ...candidate.record },
        sources: [candidate.provenance],
        conflicts: [],
        replaced: false,
      });
      continue;
    }

    const merge = mergeFields(group.record, candidate.record, fields, policy === 'last-wins');
    const lines = [...new Set([...group.sources.map((source) => source.line), candidate.provenance.line])];
    group.record = merge.record;
    group.sources.push(candidate.provenance);
    group.replaced = group.replaced || merge.replaced;
    for (const change of merge.changes) {
      group.conflicts.push({ kind, key, against: 'import', lines, ...change });
    }
  }

  const results: ReconciledRecord<R>[] = [];
  for (const group of groups.values()) {
    const existing = stored(group.record);
    const lines = [...new Set(group.sources.map((source) => source.line))];
    let merged = group.record;
    let persistedReplaced = false;
    const conflicts = [...group.conflicts];

    if (existing) {
      const onto = mergeFields(existing, group.record, fields, true);
      merged = onto.record;
      persistedReplaced = onto.replaced;
      for (const change of onto.changes) {
        conflicts.push({ kind, key: group.key, against: 'persisted', lines, ...change });
      }
    }

    results.push({
      kind,
      key: group.key,
      incoming: group.record,
      merged,
      created: existing === undefined,
      changed: existing === undefined || fields.some((field) => existing[field] !== merged[field]),
      outcome: group.replaced || persistedReplaced ? 'overwritten' : 'accepted',
      conflicts,
      sources: group.sources,
    });
  }

  return results;
}

/**
 * Collapses every candidate onto one record per key, then lays the result over
 * the persisted snapshot. Pure: the snapshot is read, never written.
 */
export function reconcile(input: ReconcileInput): ReconcileResult {
  const rejected: RejectedCandidate[] = [];

  const weekly = reconcileKind(
    'weekly',
    input.weekly,
    (record) => String(record.weekNumber),
    (record) => Number.isInteger(record.weekNumber) && record.weekNumber > 0,
    (record) => input.snapshot.weekly.get(record.weekNumber),
    WEEKLY_VALUE_FIELDS,
    input.policy,
    rejected
  ).sort((a, b) => a.incoming.weekNumber - b.incoming.weekNumber);

  const daily = reconcileKind(
    'daily',
    input.daily,
    (record) => record.date,
    (record) => isIsoDate(record.date),
    (record) => input.snapshot.daily.get(record.date),
    DAILY_VALUE_FIELDS,
    input.policy,
    rejected
  ).sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));

  return { weekly, daily, rejected };
}
