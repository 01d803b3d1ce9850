import { Command } from 'commander';
import { appConfig } from '../config';
import { loadProjectConfig } from '../utils/project_config';
import { writeMacroLibrary } from '../utils/macro_generator';
import { scanProject, type ConfigOptions } from './scan_command';
import { rewriteWithProgress } from './rewrite_command';

async function migrate(options: ConfigOptions) {
  const config = loadProjectConfig(options.config || appConfig.configPath);

  console.log('[1/3] Scanning project...');
  const functions = Object.keys(scanProject(config));
  console.log(`      Found ${functions.length} non-portable function(s)`);

  console.log('[2/3] Generating macros...');
  const outputPath = writeMacroLibrary(config, functions);
  console.log(`      Generated macros at: ${outputPath}`);

  console.log('[3/3] Rewriting models...');
  const changes = rewriteWithProgress(config, false);
  console.log(`      Modified ${changes.length} file(s)`);

  console.log('Migration complete.');
}

export const migrateCommand = new Command('migrate')
  .description('Run the complete migration: scan, generate, rewrite')
  .option('-c, --config <path>', 'Path to the config file')
  .action(migrate);

export { migrate };
