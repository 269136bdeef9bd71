import * as fs from 'fs';
import * as path from 'path';
import { CompletionItem, Hover, Location, MarkupKind, Range } from 'vscode-languageserver/node';
import { URI } from 'vscode-uri';
import { classifyFile, directoryGroups, type HtmxConfig } from './config';
import { getAttributeCompletions, getAttributeDocumentation, getValueCompletions, getValueDocumentation } from './completions/htmx';
import { buildTagHoverDocumentation, getTagCompletions, LINK_ATTRIBUTE } from './completions/tags';
import { DocumentIndex, type FileId } from './document-index';
import { isTagSource, type LangType } from './lang-types';
import { HtmxQueries } from './parsers/queries';
import { Parsers, type Grammars, type Point, type Query } from './parsers/tree-sitter';
import { NEW_ATTRIBUTE, QueryType, queryPosition, type Position } from './position';
import { extractTags, inTag, inTags, type Tag } from './tags';
import { TagsRegistry } from './tags-registry';
import { SyntaxTreeCache } from './tree-cache';
import { debugLog, silentLogger, toError, type Logger } from './utils/debug';
import { PerfTimer, time } from './utils/perf';
import { isDirectory, walkFiles } from './utils/walk';

export class ProjectScanError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProjectScanError';
  }
}

interface ProjectRoot {
  lang: LangType;
  dir: string;
}

/**
 * Canonical document uri for a path on disk. Symlinks are resolved, so the
 * same file reached two ways gets one id. Throws when the path does not exist.
 */
export function canonicalUri(filePath: string): string {
  return URI.file(fs.realpathSync(filePath)).toString();
}

/**
 * Everything the server knows about the project: open document text, file
 * ids, syntax trees, the tag registry and the conflicts from the last
 * extraction of each file.
 */
export class HtmxWorkspace {
  readonly index = new DocumentIndex();
  readonly trees = new SyntaxTreeCache();
  readonly tags = new TagsRegistry();

  private readonly documents = new Map<string, string>();
  private readonly conflicts = new Map<FileId, Tag[]>();
  private parsers: Parsers | null = null;
  private queries: HtmxQueries | null = null;
  private config: HtmxConfig | null = null;
  private roots: ProjectRoot[] = [];

  constructor(private readonly logger: Logger = silentLogger) {}

  initialize(grammars: Grammars): void {
    const backend = this.config?.lang ?? 'rust';
    this.parsers = new Parsers(grammars, backend);
    this.queries = new HtmxQueries(grammars, backend);
    this.trees.setParsers(this.parsers);
  }

  setConfig(config: HtmxConfig): void {
    this.config = config;
    this.parsers?.setBackend(config.lang);
    this.queries?.setBackend(config.lang);
  }

  /**
   * Conflicts currently reported for every file.
   */
  getConflicts(): Tag[] {
    return Array.from(this.conflicts.values()).flat();
  }

  resetAll(): void {
    this.index.resetAll();
    this.trees.clear();
    this.tags.resetAll();
    this.conflicts.clear();
  }

  /**
   * Classify the cursor. Registered templates use their cached tree; files
   * the project does not track are parsed as markup for this request only.
   */
  resolvePosition(uri: string, point: Point, mode: QueryType): Position | null {
    if (!this.parsers || !this.queries) {
      return null;
    }

    const file = this.index.lookup(uri);
    const entry = file === undefined ? undefined : this.trees.get(file);
    if (entry) {
      return entry.lang === 'template'
        ? queryPosition(entry.tree.rootNode, point, mode, this.queries)
        : null;
    }

    const text = this.documents.get(uri);
    if (text === undefined) {
      return null;
    }
    const tree = this.parsers.parse('template', text);
    try {
      return queryPosition(tree.rootNode, point, mode, this.queries);
    } finally {
      tree.delete();
    }
  }

  /**
   * Store the new text, reparse and, for tag sources, re-extract tags.
   * Returns the file's conflicts after the edit.
   */
  onEdit(uri: string, text: string): Tag[] {
    this.documents.set(uri, text);
    if (!this.parsers) {
      return [];
    }

    let file = this.index.lookup(uri);
    if (file === undefined) {
      const lang = this.classifyUri(uri);
      if (!lang) {
        return [];
      }
      file = this.index.register(uri);
      if (file === undefined) {
        return [];
      }
      debugLog(this.logger, 'documents', `Registered ${uri} as ${lang} (file ${file})`);
      return this.indexFile(file, lang, text);
    }

    const timer = new PerfTimer('workspace.onEdit', this.logger);
    const entry = this.trees.upsert(file, undefined, text);
    const conflicts = entry ? this.updateTags(file, entry.lang) : [];
    timer.stop({ file, conflicts: conflicts.length });
    return conflicts;
  }

  /**
   * Re-extract tags from the stored text. Null for templates and for files
   * the project does not track.
   */
  onSave(uri: string): Tag[] | null {
    const file = this.index.lookup(uri);
    const text = this.documents.get(uri);
    if (file === undefined || text === undefined) {
      return null;
    }
    const entry = this.trees.get(file);
    if (!entry || !isTagSource(entry.lang)) {
      return null;
    }
    return this.updateTags(file, entry.lang);
  }

  onClose(uri: string): void {
    this.documents.delete(uri);
  }

  gotoDefinition(uri: string, point: Point): Location | null {
    const position = this.resolvePosition(uri, point, QueryType.Hover);
    if (!position) {
      return null;
    }

    const tag = position.kind === 'attributeName'
      ? this.tags.lookup(position.name)
      : this.tagUnderCursor(uri, point, position);
    if (!tag) {
      return null;
    }

    const targetUri = this.index.reverseLookup(tag.file);
    if (!targetUri) {
      return null;
    }
    debugLog(this.logger, 'definition', `${tag.name} -> ${targetUri}:${tag.line + 1}`);
    return Location.create(targetUri, Range.create(tag.line, tag.start, tag.line, tag.end));
  }

  hover(uri: string, point: Point): Hover | null {
    const declared = this.declaredTagUnderCursor(uri, point);
    const position = declared ? null : this.resolvePosition(uri, point, QueryType.Hover);

    let documentation: string | null;
    if (declared) {
      documentation = buildTagHoverDocumentation(declared, this.index);
    } else if (!position) {
      return null;
    } else if (position.kind === 'attributeName') {
      documentation = getAttributeDocumentation(position.name);
    } else if (position.name === LINK_ATTRIBUTE) {
      const tag = this.tagUnderCursor(uri, point, position);
      documentation = tag ? buildTagHoverDocumentation(tag, this.index) : null;
    } else {
      documentation = getValueDocumentation(position.name, position.value);
    }

    if (!documentation) {
      return null;
    }
    return { contents: { kind: MarkupKind.Markdown, value: documentation } };
  }

  completion(uri: string, point: Point): CompletionItem[] | null {
    const position = this.resolvePosition(uri, point, QueryType.Completion);
    if (!position) {
      return null;
    }

    if (position.kind === 'attributeName') {
      if (position.name === NEW_ATTRIBUTE || position.name.startsWith('hx-')) {
        return getAttributeCompletions();
      }
      return null;
    }

    if (position.name === LINK_ATTRIBUTE) {
      return getTagCompletions(this.tags.all(), this.index);
    }
    const items = getValueCompletions(position.name);
    return items.length > 0 ? items : null;
  }

  /**
   * Reset every table and rebuild them from the configured directories.
   * Open documents win over the file on disk. Returns every conflict found.
   */
  initialProjectScan(config: HtmxConfig, workspaceRoot: string): Tag[] {
    if (!this.parsers) {
      throw new ProjectScanError('Grammars are not loaded.');
    }

    const timer = new PerfTimer('workspace.initialProjectScan', this.logger);
    this.setConfig(config);
    this.resetAll();
    this.roots = [];

    const conflicts: Tag[] = [];
    let fileCount = 0;

    for (const group of directoryGroups(config)) {
      for (const dir of group.dirs) {
        const root = path.resolve(workspaceRoot, dir);
        if (!isDirectory(root)) {
          throw new ProjectScanError(`Directory ${root} does not exist.`);
        }
        this.roots.push({ lang: group.lang, dir: fs.realpathSync(root) });

        const files = time(`workspace.walk ${dir}`, this.logger, () => walkFiles(root, this.logger));
        for (const filePath of files) {
          if (!classifyFile(filePath, config).includes(group.lang)) {
            continue;
          }
          const found = this.addProjectFile(filePath, group.lang);
          if (found) {
            fileCount++;
            conflicts.push(...found);
          }
        }
      }
    }

    timer.stop({ files: fileCount, tags: this.tags.size, conflicts: conflicts.length });
    return conflicts;
  }

  /**
   * Register, parse and tag one file from the walk. Null when the file is
   * skipped: unreadable, or already claimed by an earlier group.
   */
  private addProjectFile(filePath: string, lang: LangType): Tag[] | null {
    let uri: string;
    try {
      uri = canonicalUri(filePath);
    } catch (error) {
      debugLog(this.logger, 'scan', `Skipping ${filePath}: ${toError(error).message}`);
      return null;
    }

    const file = this.index.register(uri);
    if (file === undefined) {
      return null;
    }

    let text = this.documents.get(uri);
    if (text === undefined) {
      try {
        text = fs.readFileSync(filePath, 'utf-8');
      } catch (error) {
        debugLog(this.logger, 'scan', `Skipping ${filePath}: ${toError(error).message}`);
        return null;
      }
    }

    return this.indexFile(file, lang, text);
  }

  private indexFile(file: FileId, lang: LangType, text: string): Tag[] {
    const entry = this.trees.upsert(file, lang, text);
    return entry ? this.updateTags(file, entry.lang) : [];
  }

  private updateTags(file: FileId, lang: LangType): Tag[] {
    const query = this.tagQuery(lang);
    const entry = this.trees.get(file);
    if (!query || !entry) {
      return [];
    }

    const conflicts = this.reconcileFile(file, extractTags(entry.tree, query));
    this.promoteRefusedTags(file);
    debugLog(this.logger, 'tags', `file ${file}: ${this.tags.size} tags, ${conflicts.length} conflicts`);
    return conflicts;
  }

  private reconcileFile(file: FileId, tags: Tag[]): Tag[] {
    const conflicts = this.tags.reconcile(file, tags);
    if (conflicts.length > 0) {
      this.conflicts.set(file, conflicts);
    } else {
      this.conflicts.delete(file);
    }
    return conflicts;
  }

  /**
   * Re-reconcile the files that were refused a name nobody owns any more, so
   * the remaining declaration takes it over and its warning clears.
   */
  private promoteRefusedTags(updated: FileId): void {
    for (const [file, refused] of Array.from(this.conflicts)) {
      if (file === updated || refused.every(tag => this.tags.lookup(tag.name) !== undefined)) {
        continue;
      }
      const entry = this.trees.get(file);
      const query = entry ? this.tagQuery(entry.lang) : null;
      if (!entry || !query) {
        continue;
      }
      const conflicts = this.reconcileFile(file, extractTags(entry.tree, query));
      debugLog(this.logger, 'tags', `file ${file}: promoted, ${conflicts.length} conflicts left`);
    }
  }

  private tagQuery(lang: LangType): Query | null {
    if (!this.queries) {
      return null;
    }
    switch (lang) {
      case 'template':
        return null;
      case 'javascript':
        return this.queries.jsTags;
      case 'backend':
        return this.queries.getBackendTags();
    }
  }

  /**
   * Domain of a file that was not part of the last scan, from the configured
   * directories it sits in.
   */
  private classifyUri(uri: string): LangType | null {
    if (!this.config) {
      return null;
    }
    const parsed = URI.parse(uri);
    if (parsed.scheme !== 'file') {
      return null;
    }
    const filePath = parsed.fsPath;
    const langs = classifyFile(filePath, this.config);
    const root = this.roots.find(
      candidate => langs.includes(candidate.lang) && filePath.startsWith(candidate.dir + path.sep)
    );
    return root ? root.lang : null;
  }

  /**
   * The registered owner of the tag written under the cursor in a script or
   * backend file. A refused duplicate hovers as the tag that won.
   */
  private declaredTagUnderCursor(uri: string, point: Point): Tag | undefined {
    const file = this.index.lookup(uri);
    const entry = file === undefined ? undefined : this.trees.get(file);
    if (!entry || !isTagSource(entry.lang)) {
      return undefined;
    }
    const line = this.documents.get(uri)?.split('\n')[point.row];
    const token = line === undefined ? null : inTag(line, point.column);
    return token ? this.tags.lookup(token.name) : undefined;
  }

  /**
   * The tag token under the cursor inside an `hx-lsp` value.
   */
  private tagUnderCursor(uri: string, point: Point, position: Position): Tag | undefined {
    if (position.kind !== 'attributeValue' || position.name !== LINK_ATTRIBUTE || !position.value) {
      return undefined;
    }
    const line = this.documents.get(uri)?.split('\n')[point.row];
    if (line === undefined) {
      return undefined;
    }
    const start = findValueStart(line, position.value, point.column);
    if (start === null) {
      return undefined;
    }
    const token = inTags(position.value, start, point.row, point.column);
    return token ? this.tags.lookup(token.name) : undefined;
  }
}

function findValueStart(line: string, value: string, column: number): number | null {
  let from = line.indexOf(value);
  while (from !== -1) {
    if (column >= from && column <= from + value.length) {
      return from;
    }
    from = line.indexOf(value, from + 1);
  }
  return null;
}
