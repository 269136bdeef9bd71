import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { getTreeSitterError, initializeTreeSitter, type Grammars } from '../src/parsers/tree-sitter';

export async function loadGrammars(): Promise<Grammars> {
  const grammars = await initializeTreeSitter();
  if (!grammars) {
    throw getTreeSitterError() ?? new Error('Grammars failed to load');
  }
  return grammars;
}

/**
 * Write `files` (relative path -> content) below a fresh temporary directory.
 */
export function createProject(files: Record<string, string>): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'htmx-ls-test-'));
  for (const [relative, content] of Object.entries(files)) {
    const filePath = path.join(root, relative);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
  }
  return root;
}

export function removeProject(root: string): void {
  fs.rmSync(root, { recursive: true, force: true });
}
