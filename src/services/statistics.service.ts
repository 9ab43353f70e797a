import type { ContributionRecord, StatisticsSummary, Streak } from './types';

const round2 = (value: number) => Math.round(value * 100) / 100;

function median(values: number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/**
 * Longest run of adjacent records with contributions. Adjacency is by position
 * in the sorted sequence: a day missing from the input does not break a run.
 */
export function calculateLongestStreak(records: ContributionRecord[]): Streak {
  let tempStreak = 0;
  let longestStreak = 0;
  let endDate: string | null = null;

  for (const { date, count } of records) {
    if (count > 0) {
      tempStreak++;
      if (tempStreak > longestStreak) {
        longestStreak = tempStreak;
        endDate = date;
      }
    } else {
      tempStreak = 0;
    }
  }

  return { length: longestStreak, endDate };
}

/** Aggregates over records sorted by date; `null` when there are none. */
export function summarize(records: ContributionRecord[]): StatisticsSummary | null {
  if (records.length === 0) return null;

  const counts = records.map((record) => record.count);
  const total = counts.reduce((a, b) => a + b, 0);

  let maxDay = records[0];
  for (const record of records) {
    if (record.count > maxDay.count) maxDay = record;
  }

  const activeDays = counts.filter((count) => count > 0).length;

  return {
    total,
    mean: round2(total / records.length),
    median: median(counts),
    maxDay,
    streak: calculateLongestStreak(records),
    activeDays,
    inactiveDays: records.length - activeDays,
  };
}
