import { format, isValid, isWithinInterval, parse, parseISO } from 'date-fns';
import { CheerioDocument, type DocumentQuery } from './document-query';
import { UpstreamError } from './errors';
import type { ContributionLevel, ContributionRecord, DateRange } from './types';

export const DATE_FORMAT = 'yyyy-MM-dd';

export const CONTRIBUTION_COLORS: Readonly<Record<ContributionLevel, string>> = {
  0: '#ebedf0',
  1: '#9be9a8',
  2: '#40c463',
  3: '#30a14e',
  4: '#216e39',
};

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const COUNT_PATTERN = /(\d[\d,]*) contributions?/;

/** Parses a strict `yyyy-MM-dd` string to local midnight, or `null`. */
export function parseCalendarDate(value: string): Date | null {
  if (!DATE_PATTERN.test(value)) return null;
  const date = parse(value, DATE_FORMAT, new Date());
  return isValid(date) ? date : null;
}

export function toContributionLevel(raw: string | undefined): ContributionLevel {
  switch (raw) {
    case undefined:
    case '0':
      return 0;
    case '1':
      return 1;
    case '2':
      return 2;
    case '3':
      return 3;
    case '4':
      return 4;
    default:
      throw new UpstreamError(`Unexpected contribution level "${raw}"`);
  }
}

export function extractCount(description: string): number {
  const match = COUNT_PATTERN.exec(description);
  return match ? parseInt(match[1].replace(/,/g, ''), 10) : 0;
}

/**
 * Reads the day cells of a contribution calendar.
 *
 * Cells without a date, dated after `now`'s calendar day, or without a
 * tooltip are left out. The result is sorted by date.
 */
export function extractContributions<TNode>(
  doc: DocumentQuery<TNode>,
  now: Date
): ContributionRecord[] {
  const todayStr = format(now, DATE_FORMAT);

  const tooltips = new Map<string, TNode>();
  for (const tooltip of doc.findAll('tool-tip')) {
    const target = doc.attribute(tooltip, 'for');
    if (target && !tooltips.has(target)) {
      tooltips.set(target, tooltip);
    }
  }

  const records: ContributionRecord[] = [];

  for (const cell of doc.findAll('td', { class: 'ContributionCalendar-day' })) {
    const date = doc.attribute(cell, 'data-date');
    if (!date || !parseCalendarDate(date)) continue;
    if (date > todayStr) continue;

    const id = doc.attribute(cell, 'id');
    const tooltip = id ? tooltips.get(id) : undefined;
    if (!tooltip) continue;

    const description = doc.text(tooltip).trim();
    const level = toContributionLevel(doc.attribute(cell, 'data-level'));

    records.push({
      date,
      count: extractCount(description),
      level,
      colorCode: CONTRIBUTION_COLORS[level],
      description,
    });
  }

  return records.sort((a, b) => a.date.localeCompare(b.date));
}

export function parseContributions(markup: string, now: Date = new Date()): ContributionRecord[] {
  return extractContributions(new CheerioDocument(markup), now);
}

export function filterToPeriod(
  records: ContributionRecord[],
  range: DateRange
): ContributionRecord[] {
  return records.filter((record) => isWithinInterval(parseISO(record.date), range));
}
