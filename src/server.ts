import { serve } from '@hono/node-server';
import { loadConfig } from './config';
import { createApp } from './index';
import { GitHubService } from './services/github.service';
import { MemoCache } from './services/memo-cache';

const config = loadConfig();

const githubService = new GitHubService({
  baseUrl: config.GITHUB_BASE_URL,
  timeoutMs: config.UPSTREAM_TIMEOUT_MS,
  cache: new MemoCache<string>(config.CACHE_MAX_ENTRIES),
  dumpPath: config.RESPONSE_DUMP_PATH,
});

const app = createApp({ githubService, logRequests: config.LOG_REQUESTS });

serve({ fetch: app.fetch, hostname: config.HOST, port: config.PORT }, (info) => {
  console.log(`🔥 GitHub contributions API listening on http://${info.address}:${info.port}`);
});
