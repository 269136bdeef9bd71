import * as fs from 'fs';
import { createRequire } from 'module';
import Parser from 'web-tree-sitter';
import type { BackendLang, LangType } from '../lang-types';
import { debugLog, toError, type Logger } from '../utils/debug';

export type Tree = Parser.Tree;
export type SyntaxNode = Parser.SyntaxNode;
export type Point = Parser.Point;
export type Language = Parser.Language;
export type Query = Parser.Query;
export type QueryMatch = Parser.QueryMatch;

export type GrammarName = 'html' | 'javascript' | BackendLang;

export type Grammars = Record<GrammarName, Language>;

let loadAttempt: Promise<Grammars | null> | null = null;
let initializationError: Error | null = null;

function locateGrammar(name: GrammarName): string {
  const runtimeRequire = createRequire(__filename);
  const candidate = runtimeRequire.resolve(`tree-sitter-wasms/out/tree-sitter-${name}.wasm`);
  if (!fs.existsSync(candidate)) {
    throw new Error(`tree-sitter-${name}.wasm not found. Install tree-sitter-wasms to enable parsing.`);
  }
  return candidate;
}

async function loadGrammar(name: GrammarName, logger?: Logger): Promise<Language> {
  const wasmPath = locateGrammar(name);
  const language = await Parser.Language.load(wasmPath);
  if (logger) {
    debugLog(logger, 'tree-sitter', `Loaded ${name} grammar from ${wasmPath}`);
  }
  return language;
}

async function loadGrammars(logger?: Logger): Promise<Grammars | null> {
  try {
    await Parser.init();
    return {
      html: await loadGrammar('html', logger),
      javascript: await loadGrammar('javascript', logger),
      python: await loadGrammar('python', logger),
      rust: await loadGrammar('rust', logger),
      go: await loadGrammar('go', logger),
    };
  } catch (error) {
    initializationError = toError(error);
    return null;
  }
}

/**
 * Load the wasm runtime and every grammar once. Later calls share the first result.
 */
export function initializeTreeSitter(logger?: Logger): Promise<Grammars | null> {
  if (!loadAttempt) {
    loadAttempt = loadGrammars(logger);
  }
  return loadAttempt;
}

export function getTreeSitterError(): Error | null {
  return initializationError;
}

/**
 * One parser per lexical domain. tree-sitter parsers carry state between
 * calls, so each domain keeps its own instance and nobody else touches it.
 */
export class Parsers {
  private readonly html = new Parser();
  private readonly javascript = new Parser();
  private readonly backend = new Parser();
  private backendLang: BackendLang;

  constructor(private readonly grammars: Grammars, backendLang: BackendLang = 'rust') {
    this.html.setLanguage(grammars.html);
    this.javascript.setLanguage(grammars.javascript);
    this.backendLang = backendLang;
    this.backend.setLanguage(grammars[backendLang]);
  }

  setBackend(lang: BackendLang): void {
    if (lang === this.backendLang) {
      return;
    }
    this.backendLang = lang;
    this.backend.setLanguage(this.grammars[lang]);
  }

  /**
   * Full reparse. Malformed input still yields a tree, with ERROR nodes in it.
   */
  parse(lang: LangType, text: string): Tree {
    switch (lang) {
      case 'template':
        return this.html.parse(text);
      case 'javascript':
        return this.javascript.parse(text);
      case 'backend':
        return this.backend.parse(text);
    }
  }
}
