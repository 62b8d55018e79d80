/**
 * Rebuild the vector index from the current record of every source.
 * Needed after changing OPENAI_EMBEDDING_MODEL.
 */
import 'dotenv/config';
import { createAppContext } from '../app-context.js';
import { loadSettings } from '../config/settings.js';
import { closeConnection } from '../db/connection.js';

async function main() {
  const { indexer } = createAppContext(loadSettings());

  const summary = await indexer.reindexAll();

  console.log(`Embedding version: ${summary.embeddingVersion}`);
  console.log(`Records indexed:   ${summary.recordsIndexed}`);
  console.log(`Chunks indexed:    ${summary.chunksIndexed}`);
  if (summary.failures.length > 0) {
    console.log('\nFailures (marked for re-index on next run):');
    for (const failure of summary.failures) {
      console.log(`  ${failure.sourceUrl}: ${failure.error}`);
    }
    process.exitCode = 1;
  }
}

main()
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  })
  .finally(() => closeConnection());
