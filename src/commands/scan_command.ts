import { Command } from 'commander';
import { appConfig } from '../config';
import { loadProjectConfig, type ProjectConfig } from '../utils/project_config';
import { scan, type FunctionFrequencies } from '../utils/scanner';
import { createLogger } from '../utils/logger';

export interface ConfigOptions {
  config?: string;
}

export function scanProject(config: ProjectConfig): FunctionFrequencies {
  if (!config.scanProject) {
    return {};
  }
  return scan(config.modelRoots, config.dialects);
}

/** Rows sorted by descending count, then name. */
export function formatFrequencyTable(functions: FunctionFrequencies): string[] {
  const rows = Object.entries(functions).sort(([a, countA], [b, countB]) => countB - countA || a.localeCompare(b));
  const width = Math.max('Function'.length, ...rows.map(([name]) => name.length));
  return [
    `${'Function'.padEnd(width)}  Count`,
    `${'-'.repeat(width)}  -----`,
    ...rows.map(([name, count]) => `${name.padEnd(width)}  ${String(count).padStart(5)}`),
  ];
}

async function scanAction(options: ConfigOptions) {
  const config = loadProjectConfig(options.config || appConfig.configPath);
  const logger = createLogger({ root: config.projectRoot });
  logger.info(`Scanning ${config.modelRoots.length} model path(s) for ${config.dialects.join(', ')}`);

  const functions = scanProject(config);

  console.log('Non-portable functions detected:');
  formatFrequencyTable(functions).forEach(line => console.log(`  ${line}`));
  console.log(`\nTotal unique functions: ${Object.keys(functions).length}`);
}

export const scanCommand = new Command('scan')
  .description('Scan the dbt project and detect non-portable SQL functions')
  .option('-c, --config <path>', 'Path to the config file')
  .action(scanAction);

export { scanAction };
