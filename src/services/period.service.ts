import { isAfter } from 'date-fns';
import { parseCalendarDate } from './contribution.service';
import { InvalidInputError } from './errors';
import type { DateRange, Period } from './types';

export interface PeriodQuery {
  year?: string;
  from?: string;
  to?: string;
}

export interface ResolvedPeriod {
  period: Period;
  range: DateRange;
}

/**
 * Turns `year` or a `from`/`to` pair into an inclusive day range. A year takes
 * precedence over an explicit range.
 */
export function resolvePeriod({ year, from, to }: PeriodQuery): ResolvedPeriod {
  if (year) {
    from = `${year}-01-01`;
    to = `${year}-12-31`;
  } else if (!(from && to)) {
    throw new InvalidInputError('Either year or both from and to are required');
  }

  const start = parseCalendarDate(from);
  const end = parseCalendarDate(to);
  if (!start || !end) {
    throw new InvalidInputError('Invalid date format. Use YYYY-MM-DD');
  }
  if (isAfter(start, end)) {
    throw new InvalidInputError('from must not be after to');
  }

  return { period: { from, to }, range: { start, end } };
}
