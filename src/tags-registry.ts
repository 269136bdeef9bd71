import type { FileId } from './document-index';
import type { Tag } from './tags';

export type InsertResult = { ok: true } | { ok: false; tag: Tag };

/**
 * Project-wide `hx@` tags by name. A name has one owner: a second insert is
 * refused and handed back to the caller as a conflict.
 */
export class TagsRegistry {
  private readonly tags = new Map<string, Tag>();

  insert(tag: Tag): InsertResult {
    if (this.tags.has(tag.name)) {
      return { ok: false, tag };
    }
    this.tags.set(tag.name, tag);
    return { ok: true };
  }

  lookup(name: string): Tag | undefined {
    return this.tags.get(name);
  }

  deleteAllForFile(file: FileId): number {
    let removed = 0;
    for (const [name, tag] of this.tags) {
      if (tag.file === file) {
        this.tags.delete(name);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Replace every tag owned by `file` with `tags`. Returns the refused ones.
   */
  reconcile(file: FileId, tags: Tag[]): Tag[] {
    this.deleteAllForFile(file);
    const conflicts: Tag[] = [];
    for (const tag of tags) {
      const result = this.insert({ ...tag, file });
      if (!result.ok) {
        conflicts.push(result.tag);
      }
    }
    return conflicts;
  }

  resetAll(): void {
    this.tags.clear();
  }

  all(): Tag[] {
    return Array.from(this.tags.values());
  }

  get size(): number {
    return this.tags.size;
  }
}
