import { Command } from 'commander';
import cliProgress from 'cli-progress';
import { appConfig } from '../config';
import { loadProjectConfig, type ProjectConfig } from '../utils/project_config';
import { listModelFiles, rewriteModels } from '../utils/model_rewriter';
import { createLogger } from '../utils/logger';
import type { ConfigOptions } from './scan_command';

export interface RewriteCommandOptions extends ConfigOptions {
  dryRun?: boolean;
}

export function rewriteWithProgress(config: ProjectConfig, dryRun: boolean): string[] {
  const total = listModelFiles(config).length;
  const progressBar = new cliProgress.SingleBar(
    {
      clearOnComplete: false,
      hideCursor: true,
      format: '{bar} | {percentage}% | {value}/{total} | {task}',
    },
    cliProgress.Presets.shades_classic
  );

  progressBar.start(total, 0, { task: dryRun ? 'Previewing models' : 'Rewriting models' });
  try {
    return rewriteModels(config, { dryRun, onFileProcessed: () => progressBar.increment() });
  } finally {
    progressBar.stop();
  }
}

async function rewrite(options: RewriteCommandOptions) {
  const config = loadProjectConfig(options.config || appConfig.configPath);
  const logger = createLogger({ root: config.projectRoot });
  const dryRun = options.dryRun ?? false;

  const changes = rewriteWithProgress(config, dryRun);
  changes.forEach(file => logger.debug(`${dryRun ? 'Would modify' : 'Modified'} ${file}`));

  if (dryRun) {
    console.log(`Would modify ${changes.length} file(s)`);
  } else {
    console.log(`Modified ${changes.length} file(s)`);
  }
}

export const rewriteCommand = new Command('rewrite')
  .description('Rewrite SQL models to use portable_* macros')
  .option('-c, --config <path>', 'Path to the config file')
  .option('--dry-run', 'Show how many files would change without modifying them')
  .action(rewrite);

export { rewrite };
