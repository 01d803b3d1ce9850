import fs from 'fs';
import path from 'path';

/**
 * Walks up from `startPath` until a directory containing package.json is found.
 */
export function findProjectRoot(startPath: string): string | null {
  let currentPath = path.resolve(startPath);
  while (currentPath !== path.parse(currentPath).root) {
    if (fs.existsSync(path.join(currentPath, 'package.json'))) {
      return currentPath;
    }
    currentPath = path.dirname(currentPath);
  }
  return null;
}
