export type ContributionLevel = 0 | 1 | 2 | 3 | 4;

export interface ContributionRecord {
  date: string;
  count: number;
  level: ContributionLevel;
  colorCode: string;
  description: string;
}

export interface DateRange {
  start: Date;
  end: Date;
}

export interface Period {
  from: string;
  to: string;
}

export interface Streak {
  length: number;
  endDate: string | null;
}

export interface StatisticsSummary {
  total: number;
  mean: number;
  median: number;
  maxDay: ContributionRecord;
  streak: Streak;
  activeDays: number;
  inactiveDays: number;
}

export interface ProfileStats {
  totalContributionsLastYear?: number;
  repositories?: number;
  followers?: number;
  following?: number;
}

export interface RepositorySummary {
  name: string;
  description: string;
  language: string;
}

// JSON shapes served by the API

export interface ContributionDayBody {
  date: string;
  contributions: number;
  level: ContributionLevel;
  colorCode: string;
  description: string;
}

export interface StatisticsBody {
  total_contributions: number;
  average_daily_contributions: number;
  median_daily_contributions: number;
  max_contributions_day: ContributionDayBody;
  streak: {
    length: number;
    end_date: string | null;
  };
  active_days: number;
  inactive_days: number;
}

export interface ContributionsBody {
  username: string;
  period: Period;
  contributions: ContributionDayBody[];
  statistics: StatisticsBody | Record<string, never>;
}

export interface ProfileStatsBody {
  total_contributions_last_year?: number;
  repositories?: number;
  followers?: number;
  following?: number;
}
