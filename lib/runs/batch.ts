import { log as rootLog } from '../logger';
import { RunFailed, errorMessage, isAbortError, toRunFailure } from '../errors';
import { HostRateLimiter, QuotaCounter } from '../quota';
import type { CompetitorProfile } from '../types';
import { orchestrateRun, type RunDeps, type RunOutcome, type RunState } from './orchestrator';

export type BatchOptions = {
  concurrency?: number;
  signal?: AbortSignal;
  onStatus?: (competitorId: string, state: RunState, note: string) => void;
};

export type BatchEntry = { competitorId: string; outcome: RunOutcome };

/**
 * Analyses several competitors in batches. Runs share one quota counter and
 * one host limiter, so a host that two competitors both use is paced once.
 */
export async function analyzeCompetitors(
  profiles: readonly CompetitorProfile[],
  deps: RunDeps,
  opts: BatchOptions = {}
): Promise<BatchEntry[]> {
  const log = deps.logger ?? rootLog.child({ module: 'batch' });
  const shared: RunDeps = {
    ...deps,
    quota: deps.quota ?? new QuotaCounter(),
    limiter: deps.limiter ?? new HostRateLimiter(),
  };
  const concurrency = Math.max(1, opts.concurrency ?? 3);
  const entries: BatchEntry[] = [];

  log.info({ competitors: profiles.length, concurrency }, 'Starting batch');
  for (let i = 0; i < profiles.length; i += concurrency) {
    opts.signal?.throwIfAborted();
    const batch = profiles.slice(i, i + concurrency);
    const settled = await Promise.allSettled(
      batch.map((profile) =>
        orchestrateRun(profile, shared, {
          signal: opts.signal,
          onStatus: opts.onStatus ? (state, note) => opts.onStatus?.(profile.id, state, note) : undefined,
        })
      )
    );

    for (const [j, result] of settled.entries()) {
      const profile = batch[j];
      if (result.status === 'fulfilled') {
        entries.push({ competitorId: profile.id, outcome: result.value });
        continue;
      }
      if (isAbortError(result.reason) || opts.signal?.aborted) throw result.reason;
      log.error({ competitorId: profile.id, error: result.reason }, 'Run crashed');
      const error = new RunFailed(profile.id, `Run crashed: ${errorMessage(result.reason)}`);
      entries.push({
        competitorId: profile.id,
        outcome: { status: 'Failed', error, failures: [toRunFailure('discovery', profile.rootUrl, result.reason)] },
      });
    }
  }

  const failed = entries.filter((e) => e.outcome.status === 'Failed').length;
  log.info({ competitors: entries.length, failed }, 'Batch finished');
  return entries;
}
