import type {
  DailyRecord,
  ProgressStorePort,
  SnapshotScope,
  StoreSnapshot,
  WeeklyRecord,
} from '../../ports/ProgressStorePort.js';
import type { IsoDate } from '../../utils/dates.js';

/** Overlays the non-null fields of `incoming` onto `stored`. */
function overlay<R extends object>(stored: R | undefined, incoming: R): R {
  if (!stored) return { ...incoming };
  const next = { ...stored };
  for (const [field, value] of Object.entries(incoming)) {
    if (value !== null) Reflect.set(next, field, value);
  }
  return next;
}

/** Map-backed progress store for tests and dry environments. */
export class InMemoryProgressStore implements ProgressStorePort {
  private readonly daily = new Map<IsoDate, DailyRecord>();
  private readonly weekly = new Map<number, WeeklyRecord>();

  constructor(seed: { daily?: DailyRecord[]; weekly?: WeeklyRecord[] } = {}) {
    for (const record of seed.daily ?? []) this.daily.set(record.date, { ...record });
    for (const record of seed.weekly ?? []) this.weekly.set(record.weekNumber, { ...record });
  }

  async snapshot(scope: SnapshotScope): Promise<StoreSnapshot> {
    const daily = new Map<IsoDate, DailyRecord>();
    for (const date of scope.dates) {
      const record = this.daily.get(date);
      if (record) daily.set(date, { ...record });
    }
    const weekly = new Map<number, WeeklyRecord>();
    for (const weekNumber of scope.weekNumbers) {
      const record = this.weekly.get(weekNumber);
      if (record) weekly.set(weekNumber, { ...record });
    }
    return { daily, weekly };
  }

  async upsertDaily(record: DailyRecord): Promise<void> {
    this.daily.set(record.date, overlay(this.daily.get(record.date), record));
  }

  async upsertWeekly(record: WeeklyRecord): Promise<void> {
    this.weekly.set(record.weekNumber, overlay(this.weekly.get(record.weekNumber), record));
  }

  getDaily(date: IsoDate): DailyRecord | undefined {
    const record = this.daily.get(date);
    return record && { ...record };
  }

  getWeekly(weekNumber: number): WeeklyRecord | undefined {
    const record = this.weekly.get(weekNumber);
    return record && { ...record };
  }

  listDaily(): DailyRecord[] {
    return [...this.daily.values()].sort((a, b) => (a.date < b.date ? -1 : 1)).map((record) => ({ ...record }));
  }

  listWeekly(): WeeklyRecord[] {
    return [...this.weekly.values()].sort((a, b) => a.weekNumber - b.weekNumber).map((record) => ({ ...record }));
  }
}
