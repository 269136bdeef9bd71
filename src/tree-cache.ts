import type { FileId } from './document-index';
import type { LangType } from './lang-types';
import type { Parsers, Tree } from './parsers/tree-sitter';

export interface TreeCacheEntry {
  tree: Tree;
  lang: LangType;
}

/**
 * Parsed trees keyed by file id.
 *
 * Every edit is a full reparse whose result replaces the entry; the old tree
 * is freed only after the new one is in place. A file keeps the
 * classification it was first parsed with.
 */
export class SyntaxTreeCache {
  private readonly trees = new Map<FileId, TreeCacheEntry>();

  constructor(private parsers: Parsers | null = null) {}

  setParsers(parsers: Parsers): void {
    this.parsers = parsers;
  }

  /**
   * `lang` only matters for the first insertion; without it an unknown file is ignored.
   */
  upsert(file: FileId, lang: LangType | undefined, text: string): TreeCacheEntry | undefined {
    if (!this.parsers) {
      return undefined;
    }

    const previous = this.trees.get(file);
    const effectiveLang = previous ? previous.lang : lang;
    if (!effectiveLang) {
      return undefined;
    }

    const entry: TreeCacheEntry = {
      tree: this.parsers.parse(effectiveLang, text),
      lang: effectiveLang,
    };
    this.trees.set(file, entry);
    previous?.tree.delete();
    return entry;
  }

  get(file: FileId): TreeCacheEntry | undefined {
    return this.trees.get(file);
  }

  clear(): void {
    for (const entry of this.trees.values()) {
      entry.tree.delete();
    }
    this.trees.clear();
  }

  get size(): number {
    return this.trees.size;
  }
}
