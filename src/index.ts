import './config'; // Must be the first import
import { Command } from 'commander';
import { scanCommand, generateCommand, generateLibraryCommand, rewriteCommand, migrateCommand } from './commands';
import { initDialectEngine } from './utils/dialect_profile';
import { logger } from './utils/logger';
import { shutdown } from './utils/otel_provider';

const program = new Command()
  .name('portable-sql')
  .description('Generate cross-database compatible dbt macros and rewrite models to use them')
  .hook('preAction', async () => {
    await initDialectEngine();
  })
  .addCommand(scanCommand)
  .addCommand(generateCommand)
  .addCommand(generateLibraryCommand)
  .addCommand(rewriteCommand)
  .addCommand(migrateCommand);

async function main() {
  try {
    await program.parseAsync(process.argv);
  } finally {
    await shutdown();
  }
}

main().catch(error => {
  logger.error(`An error occurred: ${error instanceof Error ? error.message : String(error)}`);
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
