import { findSqlFiles } from './file_finder';
import { rewriteFile } from './rewrite_engine';
import type { ProjectConfig } from './project_config';

export interface RewriteModelsOptions {
  dryRun: boolean;
  /** Called once per file, after it has been processed. */
  onFileProcessed?: (filePath: string, modified: boolean) => void;
}

/** SQL files below every configured model root. */
export function listModelFiles(config: ProjectConfig): string[] {
  return config.modelRoots.flatMap(root => findSqlFiles(root));
}

/**
 * Rewrites every model under the configured roots and returns the paths that
 * changed (or would change, for a dry run).
 */
export function rewriteModels(config: ProjectConfig, options: RewriteModelsOptions): string[] {
  const modified: string[] = [];

  for (const filePath of listModelFiles(config)) {
    const changed = rewriteFile(filePath, {
      dialects: config.dialects,
      primaryDialect: config.primaryDialect,
      dryRun: options.dryRun,
    });
    if (changed) {
      modified.push(filePath);
    }
    options.onFileProcessed?.(filePath, changed);
  }

  return modified;
}
