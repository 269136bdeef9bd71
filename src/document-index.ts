export type FileId = number;

/**
 * URI <-> FileId table. Ids come from a counter that only moves forward and
 * survives resets, so an id is never handed out twice in one process.
 */
export class DocumentIndex {
  private current: FileId = 0;
  private readonly indexes = new Map<string, FileId>();

  /**
   * Returns the new id, or undefined when the uri is already known.
   */
  register(uri: string): FileId | undefined {
    if (this.indexes.has(uri)) {
      return undefined;
    }
    const file = this.current++;
    this.indexes.set(uri, file);
    return file;
  }

  lookup(uri: string): FileId | undefined {
    return this.indexes.get(uri);
  }

  reverseLookup(file: FileId): string | undefined {
    for (const [uri, index] of this.indexes) {
      if (index === file) {
        return uri;
      }
    }
    return undefined;
  }

  resetAll(): void {
    this.indexes.clear();
  }

  get size(): number {
    return this.indexes.size;
  }
}
