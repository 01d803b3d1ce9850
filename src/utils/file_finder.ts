import fs from 'fs';
import { globSync } from 'glob';

/**
 * Every `.sql` file below `root`, as sorted absolute paths. A missing root has none.
 */
export function findSqlFiles(root: string): string[] {
  if (!fs.existsSync(root)) {
    return [];
  }

  return globSync('**/*.sql', {
    cwd: root,
    absolute: true,
    nodir: true,
    ignore: ['**/node_modules/**', '**/target/**', '**/dbt_packages/**'],
  }).sort();
}
