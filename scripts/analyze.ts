import 'dotenv/config';

import { parseArgs } from 'node:util';
import { makeLanguageModel } from '../lib/ai';
import { FileCacheStore, MemoryCacheStore } from '../lib/cache';
import { loadSettings, setSettings } from '../lib/config';
import { log } from '../lib/logger';
import { HostRateLimiter, QuotaCounter } from '../lib/quota';
import { orchestrateRun } from '../lib/runs/orchestrator';
import { makeSearch } from '../lib/search';
import { createCompetitorProfile } from '../lib/validation';

const USAGE = 'Usage: npm run analyze -- "<competitor name>" <root url> [--override <url>]... [--country <code>] [--cache-dir <dir>]';

async function main() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      override: { type: 'string', multiple: true },
      country: { type: 'string' },
      'cache-dir': { type: 'string' },
    },
  });
  const [name, rootUrl] = positionals;
  if (!name || !rootUrl) {
    console.error(USAGE);
    process.exitCode = 2;
    return;
  }

  if (values['cache-dir']) await setSettings({ cacheDir: values['cache-dir'] });
  const settings = await loadSettings();
  const profile = createCompetitorProfile({ name, rootUrl, manualOverrides: values.override ?? [], country: values.country });

  const quota = new QuotaCounter();
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  const outcome = await orchestrateRun(
    profile,
    {
      settings,
      cacheStore: settings.cacheDir ? new FileCacheStore(settings.cacheDir) : new MemoryCacheStore(),
      quota,
      limiter: new HostRateLimiter(),
      search: makeSearch(settings, quota),
      model: makeLanguageModel(settings),
    },
    { signal: controller.signal }
  );

  if (outcome.status === 'Failed') {
    console.log(JSON.stringify({ status: outcome.status, error: outcome.error.message, failures: outcome.failures }, null, 2));
    process.exitCode = 1;
    return;
  }
  console.log(JSON.stringify(outcome.result, null, 2));
}

main().catch((error: unknown) => {
  log.error({ error }, 'Analysis aborted');
  process.exitCode = 1;
});
