import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { filterToPeriod, parseContributions } from './services/contribution.service';
import { InvalidInputError, ScraperError } from './services/errors';
import { GitHubService } from './services/github.service';
import { resolvePeriod } from './services/period.service';
import { parseProfileStats, parseRepositories } from './services/profile.service';
import { summarize } from './services/statistics.service';
import type {
  ContributionDayBody,
  ContributionRecord,
  ContributionsBody,
  ProfileStats,
  ProfileStatsBody,
  StatisticsBody,
  StatisticsSummary,
} from './services/types';

type Variables = {
  githubService: GitHubService;
};

export interface AppOptions {
  githubService: GitHubService;
  logRequests?: boolean;
}

const CACHE_CONTROL = 'public, max-age=3600';

export const toDayBody = (record: ContributionRecord): ContributionDayBody => ({
  date: record.date,
  contributions: record.count,
  level: record.level,
  colorCode: record.colorCode,
  description: record.description,
});

export function toStatisticsBody(
  summary: StatisticsSummary | null
): StatisticsBody | Record<string, never> {
  if (!summary) return {};
  return {
    total_contributions: summary.total,
    average_daily_contributions: summary.mean,
    median_daily_contributions: summary.median,
    max_contributions_day: toDayBody(summary.maxDay),
    streak: {
      length: summary.streak.length,
      end_date: summary.streak.endDate,
    },
    active_days: summary.activeDays,
    inactive_days: summary.inactiveDays,
  };
}

export const toProfileStatsBody = (stats: ProfileStats): ProfileStatsBody => ({
  total_contributions_last_year: stats.totalContributionsLastYear,
  repositories: stats.repositories,
  followers: stats.followers,
  following: stats.following,
});

export function createApp({ githubService, logRequests = false }: AppOptions) {
  const app = new Hono<{ Variables: Variables }>();

  if (logRequests) {
    app.use('*', logger());
  }

  app.use(
    '/api/*',
    cors({
      origin: '*',
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      allowHeaders: ['Content-Type', 'Authorization'],
    })
  );

  app.use('*', async (c, next) => {
    c.set('githubService', githubService);
    await next();
  });

  app.get('/api/contributions', async (c) => {
    const username = c.req.query('username');
    if (!username) {
      throw new InvalidInputError('Username is required');
    }

    const { period, range } = resolvePeriod({
      year: c.req.query('year'),
      from: c.req.query('from'),
      to: c.req.query('to'),
    });

    const markup = await c.get('githubService').fetchContributions(username, range);
    const contributions = filterToPeriod(parseContributions(markup), range);

    const body: ContributionsBody = {
      username,
      period,
      contributions: contributions.map(toDayBody),
      statistics: toStatisticsBody(summarize(contributions)),
    };

    c.header('Cache-Control', CACHE_CONTROL);
    return c.json(body);
  });

  app.get('/api/profile/:username', async (c) => {
    const username = c.req.param('username');
    const markup = await c.get('githubService').fetchProfilePage(username);

    c.header('Cache-Control', CACHE_CONTROL);
    return c.json({ username, stats: toProfileStatsBody(parseProfileStats(markup)) });
  });

  app.get('/api/repositories/:username', async (c) => {
    const username = c.req.param('username');
    const markup = await c.get('githubService').fetchRepositoriesPage(username);

    c.header('Cache-Control', CACHE_CONTROL);
    return c.json({ username, repositories: parseRepositories(markup) });
  });

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.onError((error, c) => {
    if (error instanceof ScraperError) {
      return c.json({ error: error.message }, error.status);
    }
    console.error('Unhandled error:', error);
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}
