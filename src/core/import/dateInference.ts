import type { DailyRecord } from '../../ports/ProgressStorePort.js';
import { addCalendarDays, calendarDaysBetween } from '../../utils/dates.js';
import type { MappedWeeklyRow } from './SchemaMapper.js';
import type { DailyCandidate, ImportWarning } from './types.js';

export interface InferenceResult {
  candidates: DailyCandidate[];
  warnings: ImportWarning[];
}

/**
 * Unfolds the `day1..day7` sub-columns of a weekly row into daily candidates,
 * dated `start_date + (day - 1)`. An explicit `date` on the row keeps its own
 * date and wins over the derived values of the day it lands on.
 */
export function inferDailyCandidates(row: MappedWeeklyRow): InferenceResult {
  const { weekNumber, startDate } = row.record;
  const warnings: ImportWarning[] = [];
  const candidates: DailyCandidate[] = [];

  if (startDate === null) {
    warnings.push({
      code: 'START_DATE_MISSING',
      line: row.line,
      message:
        row.days.length > 0
          ? `week ${weekNumber} has per-day values but no usable start_date; daily values were not derived`
          : `week ${weekNumber} has no usable start_date; no days were inferred`,
    });
  } else {
    for (const day of row.days) {
      candidates.push({
        record: {
          date: addCalendarDays(startDate, day.dayIndex - 1),
          weightKg: day.weightKg,
          steps: day.steps,
          weekNumber,
        },
        provenance: { line: row.line, origin: 'weekly-day', weekNumber, dayIndex: day.dayIndex },
      });
    }
  }

  const hasRowDaily = row.rowDaily.weightKg !== null || row.rowDaily.steps !== null;
  const { explicitDate } = row;

  if (explicitDate === null) {
    if (hasRowDaily && row.dateError === null) {
      warnings.push({
        code: 'DAILY_VALUES_WITHOUT_DATE',
        line: row.line,
        message: `week ${weekNumber} has weight_kg/steps without a date; they were ignored`,
      });
    }
    return { candidates, warnings };
  }

  let dayIndex: number | undefined;
  if (startDate !== null) {
    const offset = calendarDaysBetween(startDate, explicitDate);
    if (offset >= 0 && offset <= 6) {
      dayIndex = offset + 1;
    } else {
      warnings.push({
        code: 'DATE_OUTSIDE_WEEK',
        line: row.line,
        message: `date ${explicitDate} is outside week ${weekNumber} starting ${startDate}`,
      });
    }
  }

  if (!hasRowDaily) {
    return { candidates, warnings };
  }

  const explicit: DailyRecord = {
    date: explicitDate,
    weightKg: row.rowDaily.weightKg,
    steps: row.rowDaily.steps,
    weekNumber,
  };

  const derivedIndex = candidates.findIndex((candidate) => candidate.record.date === explicitDate);
  if (derivedIndex >= 0) {
    const derived = candidates[derivedIndex].record;
    const differs =
      (explicit.weightKg !== null && derived.weightKg !== null && explicit.weightKg !== derived.weightKg) ||
      (explicit.steps !== null && derived.steps !== null && explicit.steps !== derived.steps);
    if (differs) {
      warnings.push({
        code: 'EXPLICIT_DATE_OVERRIDE',
        line: row.line,
        message: `date ${explicitDate} values override day ${dayIndex ?? derivedIndex + 1} of week ${weekNumber}`,
      });
    }
    candidates[derivedIndex] = {
      record: {
        ...explicit,
        weightKg: explicit.weightKg ?? derived.weightKg,
        steps: explicit.steps ?? derived.steps,
      },
      provenance: { line: row.line, origin: 'weekly-explicit', weekNumber, dayIndex },
    };
    return { candidates, warnings };
  }

  candidates.push({
    record: explicit,
    provenance: { line: row.line, origin: 'weekly-explicit', weekNumber, dayIndex },
  });
  return { candidates, warnings };
}
