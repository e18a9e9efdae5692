import * as core from '@actions/core';

import { parseConfig } from './config.js';
import { forEachSeries } from './helpers.js';
import { runCopyJob } from './job.js';

import type { CopyOutcome, CopyResult } from './types.js';

const OUTCOME_SEVERITY: Record<CopyOutcome, number> = {
  succeeded: 0,
  cancelled: 1,
  failed: 2
};

/**
 * Main entry point
 */
async function run(): Promise<void> {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    core.warning('Interrupt received, stopping after the current item');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  const jobs = await parseConfig();
  const totals: { outcome: CopyOutcome; filesCopied: number; errorCount: number } = {
    outcome: 'succeeded',
    filesCopied: 0,
    errorCount: 0
  };

  if (jobs.length === 0) {
    core.warning('No copy jobs configured');
  }

  try {
    await forEachSeries(jobs, async (job) => {
      if (controller.signal.aborted) {
        core.info(`Skipping ${job.source}: cancelled`);
        return;
      }

      let result: CopyResult;
      try {
        result = await runCopyJob(job, { signal: controller.signal });
      } catch (err) {
        core.setFailed(err instanceof Error ? err.message : String(err));
        totals.outcome = 'failed';
        return;
      }

      totals.filesCopied += result.filesCopied;
      totals.errorCount += result.errors.length;

      if (OUTCOME_SEVERITY[result.outcome] > OUTCOME_SEVERITY[totals.outcome]) {
        totals.outcome = result.outcome;
      }

      if (result.outcome === 'failed') {
        core.setFailed(`Copy from ${job.source} failed: ${result.failure ?? 'unknown error'}`);
      }
    });
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }

  core.setOutput('files_copied', totals.filesCopied);
  core.setOutput('error_count', totals.errorCount);
  core.setOutput('outcome', totals.outcome);

  if (totals.outcome === 'cancelled') {
    process.exitCode = 130;
  }
}

run().catch((err: Error) => {
  core.setFailed(err.message);
  core.debug(String(err));
});
