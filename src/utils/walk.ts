import * as fs from 'fs';
import * as path from 'path';
import { debugLog, toError, type Logger } from './debug';

const SKIPPED_DIRS = ['node_modules', '.git', '__pycache__', 'target'];

function shouldSkipDir(name: string): boolean {
  return SKIPPED_DIRS.includes(name);
}

/**
 * Every file below `root`, depth first, in name order. Unreadable directories
 * are skipped.
 */
export function walkFiles(root: string, logger?: Logger): string[] {
  const files: string[] = [];

  const scan = (dir: string) => {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch (error) {
      if (logger) {
        debugLog(logger, 'scan', `Skipping ${dir}: ${toError(error).message}`);
      }
      return;
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!shouldSkipDir(entry.name)) {
          scan(fullPath);
        }
      } else if (entry.isFile()) {
        files.push(fullPath);
      }
    }
  };

  scan(root);
  return files;
}

export function isDirectory(dir: string): boolean {
  try {
    return fs.statSync(dir).isDirectory();
  } catch {
    return false;
  }
}
