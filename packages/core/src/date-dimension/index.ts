import type Database from 'better-sqlite3';
import { AppError, err, ok, type Result } from '@medwarehouse/shared';

const DAY_MS = 86_400_000;
const DAY_NAMES = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'] as const;
const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const;

export interface DateDimensionRow {
  dateKey: number;
  fullDate: string;
  dayOfWeek: number;
  dayName: string;
  dayOfMonth: number;
  dayOfYear: number;
  weekOfYear: number;
  month: number;
  monthName: string;
  quarter: number;
  year: number;
  isWeekend: boolean;
}

export interface PopulateDateDimensionInput {
  startDate: string;
  endDate: string;
}

export interface PopulateDateDimensionResult {
  /** Days in the requested range. */
  requested: number;
  /** Days that were not in `dim_dates` yet. */
  inserted: number;
}

const DATE_TIME_PREFIX = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}/;
const UTC_OFFSET_SUFFIX = /(?:[zZ]|[+-]\d{2}(?::?\d{2})?)$/;

/**
 * Parses a scraped timestamp. A date-time without an offset is read as UTC,
 * never in the host time zone. Null for a missing or unparseable value.
 */
export function parseUtcTimestamp(value: string | null): Date | null {
  if (value === null) {
    return null;
  }
  const trimmed = value.trim();
  const normalized =
    DATE_TIME_PREFIX.test(trimmed) && !UTC_OFFSET_SUFFIX.test(trimmed) ? `${trimmed.replace(' ', 'T')}Z` : trimmed;
  const millis = Date.parse(normalized);
  return Number.isNaN(millis) ? null : new Date(millis);
}

/** Date key for a timestamp: `YYYY * 10000 + MM * 100 + DD`, taken in UTC. */
export function toDateKey(timestamp: string | null): number | null {
  const date = parseUtcTimestamp(timestamp);
  if (date === null) {
    return null;
  }
  return date.getUTCFullYear() * 10_000 + (date.getUTCMonth() + 1) * 100 + date.getUTCDate();
}

function isoWeekOfYear(date: Date): number {
  const target = new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
  const dayOfWeek = target.getUTCDay() === 0 ? 7 : target.getUTCDay();
  // Thursday of the same ISO week decides which year the week belongs to.
  target.setUTCDate(target.getUTCDate() + 4 - dayOfWeek);
  const yearStart = Date.UTC(target.getUTCFullYear(), 0, 1);
  return Math.ceil(((target.getTime() - yearStart) / DAY_MS + 1) / 7);
}

export function buildDateDimensionRow(date: Date): DateDimensionRow {
  const year = date.getUTCFullYear();
  const month = date.getUTCMonth() + 1;
  const dayOfMonth = date.getUTCDate();
  const dayOfWeek = date.getUTCDay() === 0 ? 7 : date.getUTCDay();
  const dayOfYear = Math.floor((Date.UTC(year, month - 1, dayOfMonth) - Date.UTC(year, 0, 1)) / DAY_MS) + 1;

  return {
    dateKey: year * 10_000 + month * 100 + dayOfMonth,
    fullDate: date.toISOString().slice(0, 10),
    dayOfWeek,
    dayName: DAY_NAMES[dayOfWeek - 1] ?? 'Monday',
    dayOfMonth,
    dayOfYear,
    weekOfYear: isoWeekOfYear(date),
    month,
    monthName: MONTH_NAMES[month - 1] ?? 'January',
    quarter: Math.floor((month - 1) / 3) + 1,
    year,
    isWeekend: dayOfWeek >= 6,
  };
}

export function generateDateDimensionRows(input: PopulateDateDimensionInput): Result<DateDimensionRow[], AppError> {
  const start = Date.parse(`${input.startDate}T00:00:00.000Z`);
  const end = Date.parse(`${input.endDate}T00:00:00.000Z`);
  if (Number.isNaN(start) || Number.isNaN(end) || start > end) {
    return err(
      AppError.create(
        'DATE_DIMENSION_RANGE_INVALID',
        'Date dimension range is invalid.',
        'error',
        { startDate: input.startDate, endDate: input.endDate },
      ),
    );
  }

  const rows: DateDimensionRow[] = [];
  for (let current = start; current <= end; current += DAY_MS) {
    rows.push(buildDateDimensionRow(new Date(current)));
  }
  return ok(rows);
}

export function populateDateDimension(
  db: Database.Database,
  input: PopulateDateDimensionInput,
): Result<PopulateDateDimensionResult, AppError> {
  try {
    const rowsResult = generateDateDimensionRows(input);
    if (!rowsResult.ok) {
      return rowsResult;
    }

    const insertStmt = db.prepare<{
      dateKey: number;
      fullDate: string;
      dayOfWeek: number;
      dayName: string;
      dayOfMonth: number;
      dayOfYear: number;
      weekOfYear: number;
      month: number;
      monthName: string;
      quarter: number;
      year: number;
      isWeekend: number;
    }>(
      `
        INSERT INTO dim_dates (
          date_key,
          full_date,
          day_of_week,
          day_name,
          day_of_month,
          day_of_year,
          week_of_year,
          month,
          month_name,
          quarter,
          year,
          is_weekend
        )
        VALUES (
          @dateKey,
          @fullDate,
          @dayOfWeek,
          @dayName,
          @dayOfMonth,
          @dayOfYear,
          @weekOfYear,
          @month,
          @monthName,
          @quarter,
          @year,
          @isWeekend
        )
        ON CONFLICT(date_key) DO NOTHING
      `,
    );

    // Existing days are left alone, so a wider range only adds the missing ones.
    const insertTx = db.transaction((rows: readonly DateDimensionRow[]): number => {
      let inserted = 0;
      for (const row of rows) {
        inserted += insertStmt.run({ ...row, isWeekend: row.isWeekend ? 1 : 0 }).changes;
      }
      return inserted;
    });
    const inserted = insertTx(rowsResult.value);

    return ok({ requested: rowsResult.value.length, inserted });
  } catch (cause) {
    return err(
      AppError.fromCause('DATE_DIMENSION_POPULATE_FAILED', 'Could not populate the date dimension.', cause, {
        startDate: input.startDate,
        endDate: input.endDate,
      }),
    );
  }
}

export function readDateKeys(db: Database.Database): Result<ReadonlySet<number>, AppError> {
  try {
    const rows = db
      .prepare<[], { dateKey: number }>('SELECT date_key AS dateKey FROM dim_dates ORDER BY date_key ASC')
      .all();
    return ok(new Set(rows.map((row) => row.dateKey)));
  } catch (cause) {
    return err(AppError.fromCause('DATE_DIMENSION_READ_FAILED', 'Could not read the date dimension.', cause));
  }
}
