/**
 * Run today's batch once
 *
 * Usage:
 *   npm run batch
 *   npm run batch -- 2025-11-16   # run or resume a specific batch
 */

import { createPipeline } from '../lib';
import { Logger, errorMessage } from '../lib/utils';

async function runBatch(): Promise<void> {
  const batchId = process.argv[2];
  const { coordinator, operator } = createPipeline();

  const report = await coordinator.run(batchId ? { batchId } : {});

  console.log(`\nBatch ${report.batch_id} (${report.run_id}): ${report.outcome}`);
  console.log(
    `  published ${report.counts.succeeded}/${report.counts.total}, ` +
      `dead-lettered ${report.counts.dead_lettered}, in progress ${report.counts.in_progress}`
  );
  if (report.deadline_exceeded) {
    console.log(`  deadline ${report.deadline} was reached`);
  }
  for (const failure of report.failures) {
    console.log(`  #${failure.rank} ${failure.item_id} failed at ${failure.stage}: ${failure.cause} (${failure.detail})`);
  }
  if (report.feed?.url) {
    console.log(`  feed: ${report.feed.url} (${report.feed.episodes} episodes)`);
  }

  const purged = await operator.purgeExpired();
  if (purged.length > 0) {
    Logger.info('Expired batches purged', { batches: purged });
  }

  if (report.outcome === 'total_failure') {
    process.exitCode = 1;
  }
}

// Run if called directly
if (require.main === module) {
  runBatch().catch(error => {
    console.error('\nBatch run failed:', errorMessage(error));
    process.exitCode = 1;
  });
}
