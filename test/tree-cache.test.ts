import { beforeAll, describe, expect, it } from 'vitest';
import { Parsers } from '../src/parsers/tree-sitter';
import { SyntaxTreeCache } from '../src/tree-cache';
import { loadGrammars } from './helpers';

let parsers: Parsers;

beforeAll(async () => {
  parsers = new Parsers(await loadGrammars(), 'python');
});

describe('SyntaxTreeCache', () => {
  it('does nothing before parsers are available', () => {
    const cache = new SyntaxTreeCache();
    expect(cache.upsert(0, 'template', '<div></div>')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('needs a language for the first insertion', () => {
    const cache = new SyntaxTreeCache(parsers);
    expect(cache.upsert(0, undefined, 'const a = 1;')).toBeUndefined();
    expect(cache.get(0)).toBeUndefined();
  });

  it('keeps the first language on later updates', () => {
    const cache = new SyntaxTreeCache(parsers);
    expect(cache.upsert(0, 'javascript', 'const a = 1;')?.tree.rootNode.type).toBe('program');

    const updated = cache.upsert(0, 'template', 'let b = 2;');
    expect(updated?.lang).toBe('javascript');
    expect(updated?.tree.rootNode.type).toBe('program');
    expect(cache.get(0)?.tree.rootNode.text).toBe('let b = 2;');
  });

  it('parses backend files with the configured grammar', () => {
    const cache = new SyntaxTreeCache(parsers);
    expect(cache.upsert(1, 'backend', 'def f():\n    pass\n')?.tree.rootNode.type).toBe('module');
  });

  it('still returns a tree for malformed input', () => {
    const cache = new SyntaxTreeCache(parsers);
    const entry = cache.upsert(2, 'template', '<div hx-swap=" ></div>');
    expect(entry?.tree.rootNode.hasError()).toBe(true);
  });

  it('clears entries', () => {
    const cache = new SyntaxTreeCache(parsers);
    cache.upsert(0, 'javascript', 'a;');
    cache.upsert(1, 'javascript', 'b;');

    expect(cache.size).toBe(2);
    cache.clear();
    expect(cache.size).toBe(0);
    expect(cache.get(0)).toBeUndefined();
  });
});
