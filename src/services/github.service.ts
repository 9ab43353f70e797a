import { writeFile } from 'node:fs/promises';
import { format } from 'date-fns';
import { DATE_FORMAT } from './contribution.service';
import { NotFoundError, UpstreamError } from './errors';
import { MemoCache } from './memo-cache';
import type { DateRange } from './types';

export interface GitHubServiceOptions {
  baseUrl?: string;
  timeoutMs?: number;
  cache?: MemoCache<string>;
  /** Every freshly fetched contributions page is also written here. */
  dumpPath?: string;
  fetch?: typeof fetch;
}

export class GitHubService {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly cache: MemoCache<string>;
  private readonly dumpPath?: string;
  private readonly fetchFn: typeof fetch;

  constructor(options: GitHubServiceOptions = {}) {
    this.baseUrl = (options.baseUrl ?? 'https://github.com').replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.cache = options.cache ?? new MemoCache<string>();
    this.dumpPath = options.dumpPath;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /** Contribution calendar markup for `username` between two days, both included. */
  fetchContributions(username: string, range: DateRange): Promise<string> {
    const from = format(range.start, DATE_FORMAT);
    const to = format(range.end, DATE_FORMAT);
    const key = `${username}|${from}|${to}`;

    return this.cache.getOrLoad(key, async () => {
      const markup = await this.getPage(
        `/users/${encodeURIComponent(username)}/contributions?from=${from}&to=${to}`
      );
      await this.dump(markup);
      return markup;
    });
  }

  fetchProfilePage(username: string): Promise<string> {
    return this.getPage(`/${encodeURIComponent(username)}`, 'User not found');
  }

  fetchRepositoriesPage(username: string): Promise<string> {
    return this.getPage(`/${encodeURIComponent(username)}?tab=repositories`, 'User not found');
  }

  private async getPage(path: string, notFoundMessage?: string): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchFn(`${this.baseUrl}${path}`, {
        headers: { accept: 'text/html' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new UpstreamError('Failed to reach GitHub', { cause: error });
    }

    if (response.status === 404) {
      throw new NotFoundError(notFoundMessage);
    }
    if (!response.ok) {
      throw new UpstreamError(`Failed to fetch GitHub data (status ${response.status})`);
    }

    // The timeout still applies while the body streams in
    try {
      return await response.text();
    } catch (error) {
      throw new UpstreamError('Failed to reach GitHub', { cause: error });
    }
  }

  private async dump(markup: string) {
    if (!this.dumpPath) return;
    try {
      await writeFile(this.dumpPath, markup, 'utf-8');
    } catch (error) {
      console.warn(`⚠️ Could not write response dump to ${this.dumpPath}:`, error);
    }
  }
}
