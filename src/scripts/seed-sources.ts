/**
 * Register the sources listed in config/sources.json (or a registry path given as argument)
 */
import 'dotenv/config';
import { createAppContext } from '../app-context.js';
import { loadSettings } from '../config/settings.js';
import { closeConnection } from '../db/connection.js';

async function main() {
  const { sources } = createAppContext(loadSettings());
  const path = process.argv[2];

  const result = path ? await sources.seedSources(path) : await sources.seedSources();

  console.log('Seeded sources:\n');
  for (const source of result.sources) {
    const state = source.isActive ? '' : ' (inactive)';
    console.log(`  [${source.typeHint}] ${source.url}${state}`);
    if (source.tags.length > 0) {
      console.log(`    Tags: ${source.tags.join(', ')}`);
    }
  }

  console.log(`\nTotal: ${result.seeded} sources`);
}

main()
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  })
  .finally(() => closeConnection());
