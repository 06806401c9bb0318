/**
 * Replay dead-lettered items
 *
 * Usage:
 *   npm run replay -- 2025-11-16              # list dead letters of a batch
 *   npm run replay -- 2025-11-16 <item_id>    # replay one item and resume the batch
 */

import { createPipeline } from '../lib';
import { DeadLetterSink } from '../lib/tools/dead-letter-sink';
import { errorMessage } from '../lib/utils';

async function replayItem(): Promise<void> {
  const [batchId, itemId] = process.argv.slice(2);
  if (!batchId) {
    console.error('Usage: replay-item <batch_id> [item_id]');
    process.exitCode = 1;
    return;
  }

  const { coordinator, operator } = createPipeline();

  if (!itemId) {
    const entries = await operator.listDeadLetters(batchId);
    console.log(`\n${entries.length} dead-letter entries for ${batchId}`, DeadLetterSink.causeCounts(entries));
    for (const entry of entries) {
      console.log(
        `  ${entry.dead_lettered_at} #${entry.rank} ${entry.item_id} at ${entry.stage}: ` +
          `${entry.last_error.kind} (${entry.last_error.cause}) after ${entry.attempt_count} retries`
      );
    }
    return;
  }

  const record = await operator.replay(batchId, itemId);
  console.log(`\nItem ${itemId} re-enqueued at ${record.stage} (replay #${record.replay_count})`);

  const report = await coordinator.run({ batchId });
  const item = await operator.getItem(batchId, itemId);
  console.log(`Batch ${batchId}: ${report.outcome}; item ${itemId} is now ${item.stage}`);
}

// Run if called directly
if (require.main === module) {
  replayItem().catch(error => {
    console.error('\nReplay failed:', errorMessage(error));
    process.exitCode = 1;
  });
}
