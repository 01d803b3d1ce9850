import { Command } from 'commander';
import { appConfig } from '../config';
import { loadProjectConfig } from '../utils/project_config';
import { catalogDifferences } from '../utils/dialect_oracle';
import { writeMacroLibrary } from '../utils/macro_generator';
import { createLogger } from '../utils/logger';
import { scanProject, type ConfigOptions } from './scan_command';

async function generate(options: ConfigOptions) {
  const config = loadProjectConfig(options.config || appConfig.configPath);
  const functions = Object.keys(scanProject(config));
  const outputPath = writeMacroLibrary(config, functions);
  console.log(`Generated ${functions.length} macro(s) at: ${outputPath}`);
}

async function generateLibrary(options: ConfigOptions) {
  const config = loadProjectConfig(options.config || appConfig.configPath);
  const logger = createLogger({ root: config.projectRoot });

  const functions = catalogDifferences(config.dialects);
  logger.info(`${functions.length} function(s) differ across ${config.dialects.join(', ')}`);

  const outputPath = writeMacroLibrary(config, functions);
  console.log(`Generated ${functions.length} macro(s) at: ${outputPath}`);
}

export const generateCommand = new Command('generate')
  .description('Generate portable_* macros for the functions detected in the project')
  .option('-c, --config <path>', 'Path to the config file')
  .action(generate);

export const generateLibraryCommand = new Command('generate-library')
  .description('Generate macros for every known non-portable function across the configured dialects')
  .option('-c, --config <path>', 'Path to the config file')
  .action(generateLibrary);

export { generate, generateLibrary };
