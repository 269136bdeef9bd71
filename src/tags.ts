import type { FileId } from './document-index';
import type { Query, Tree } from './parsers/tree-sitter';

export const TAG_PREFIX = 'hx@';

/**
 * A tag declared in a comment, e.g. `// hx@create_user`.
 * `start`/`end` are the half-open column span of the whole `hx@...` token.
 */
export interface Tag {
  name: string;
  start: number;
  end: number;
  file: FileId;
  line: number;
}

export interface TagToken {
  name: string;
  start: number;
  end: number;
}

interface ScanOptions {
  /**
   * Read words without the prefix as tags too (`create_user` -> `hx@create_user`).
   */
  bare?: boolean;
}

/**
 * Split `text` on whitespace and read every word that carries a tag.
 * Columns are shifted by `offset`.
 */
export function scanTags(text: string, offset = 0, options: ScanOptions = {}): TagToken[] {
  const tokens: TagToken[] = [];
  const words = /\S+/g;
  let match: RegExpExecArray | null;

  while ((match = words.exec(text)) !== null) {
    const word = match[0];
    const wordStart = match.index;
    const prefixAt = word.indexOf(TAG_PREFIX);

    if (prefixAt !== -1 && prefixAt + TAG_PREFIX.length < word.length) {
      tokens.push({
        name: word.slice(prefixAt),
        start: offset + wordStart + prefixAt,
        end: offset + wordStart + word.length,
      });
    } else if (options.bare && prefixAt === -1) {
      tokens.push({
        name: `${TAG_PREFIX}${word}`,
        start: offset + wordStart,
        end: offset + wordStart + word.length,
      });
    }
  }

  return tokens;
}

/**
 * First tag of a line. Used for extraction and anything that reports a declaration.
 */
export function getTag(line: string): TagToken | null {
  return scanTags(line)[0] ?? null;
}

/**
 * Every tag of an attribute value that starts at `startColumn` on `line`.
 * Values with a leading space or a double space are rejected.
 */
export function getTags(value: string, startColumn: number, line: number): Tag[] | null {
  if (value.startsWith(' ') || value.includes('  ')) {
    return null;
  }
  return scanTags(value, startColumn, { bare: true }).map(token => ({
    ...token,
    file: 0,
    line,
  }));
}

function contains(token: TagToken, column: number): boolean {
  return column >= token.start && column <= token.end;
}

export function inTag(line: string, column: number): TagToken | null {
  const tag = getTag(line);
  return tag && contains(tag, column) ? tag : null;
}

export function inTags(value: string, startColumn: number, line: number, column: number): Tag | null {
  const tags = getTags(value, startColumn, line);
  return tags?.find(tag => contains(tag, column)) ?? null;
}

/**
 * Tags declared in the comments of a script or backend tree. File id is left
 * at 0 for the caller to fill in.
 */
export function extractTags(tree: Tree, query: Query): Tag[] {
  const tags: Tag[] = [];

  for (const capture of query.captures(tree.rootNode)) {
    const node = capture.node;
    const lines = node.text.split('\n');

    lines.forEach((lineText, index) => {
      const token = getTag(lineText);
      if (!token) {
        return;
      }
      const column = index === 0 ? node.startPosition.column : 0;
      tags.push({
        name: token.name,
        start: token.start + column,
        end: token.end + column,
        file: 0,
        line: node.startPosition.row + index,
      });
    });
  }

  return tags;
}
