import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { URI } from 'vscode-uri';
import type { HtmxConfig } from '../src/config';
import { getAttributeCompletions, getAttributeDocumentation } from '../src/completions/htmx';
import type { Grammars } from '../src/parsers/tree-sitter';
import { HtmxWorkspace, ProjectScanError, canonicalUri } from '../src/workspace';
import { createProject, loadGrammars, removeProject } from './helpers';

const TEMPLATE = '<button hx-post="/users" hx-lsp="hx@create_user">Create</button>\n';
const USERS = '# hx@create_user\ndef create_user():\n    pass\n';
const ADMIN = 'def admin():\n    pass  # hx@create_user\n';

const config: HtmxConfig = {
  lang: 'python',
  template_ext: 'html',
  templates: ['templates'],
  js_tags: ['static'],
  backend_tags: ['app'],
};

let grammars: Grammars;
let root: string;
let workspace: HtmxWorkspace;

beforeAll(async () => {
  grammars = await loadGrammars();
});

beforeEach(() => {
  root = createProject({
    'templates/index.html': TEMPLATE,
    'static/app.js': '// hx@delete_user\n',
    'app/admin.py': ADMIN,
    'app/users.py': USERS,
    'app/notes.txt': 'hx@ignored\n',
  });
  workspace = new HtmxWorkspace();
  workspace.initialize(grammars);
});

afterEach(() => {
  removeProject(root);
});

function uriOf(relative: string): string {
  return canonicalUri(path.join(root, relative));
}

describe('initialProjectScan', () => {
  it('indexes configured directories and reports duplicates', () => {
    const conflicts = workspace.initialProjectScan(config, root);

    expect(conflicts).toEqual([
      { name: 'hx@create_user', start: 2, end: 16, file: workspace.index.lookup(uriOf('app/users.py')), line: 0 },
    ]);
    expect(workspace.tags.lookup('hx@create_user')).toEqual({
      name: 'hx@create_user',
      start: 12,
      end: 26,
      file: workspace.index.lookup(uriOf('app/admin.py')),
      line: 1,
    });
    expect(workspace.tags.lookup('hx@delete_user')?.file).toBe(workspace.index.lookup(uriOf('static/app.js')));
    expect(workspace.index.size).toBe(4);
    expect(workspace.index.lookup(uriOf('app/notes.txt'))).toBeUndefined();
    expect(workspace.getConflicts()).toEqual(conflicts);
  });

  it('fails on a configured directory that does not exist', () => {
    expect(() => workspace.initialProjectScan({ ...config, backend_tags: ['missing'] }, root)).toThrow(
      new ProjectScanError(`Directory ${path.join(root, 'missing')} does not exist.`)
    );
  });

  it('requires loaded grammars', () => {
    expect(() => new HtmxWorkspace().initialProjectScan(config, root)).toThrow('Grammars are not loaded.');
  });

  it('prefers the text of an open document over the file on disk', () => {
    const usersUri = uriOf('app/users.py');
    workspace.onEdit(usersUri, '# hx@renamed\n');

    expect(workspace.initialProjectScan(config, root)).toEqual([]);
    expect(workspace.tags.lookup('hx@renamed')?.file).toBe(workspace.index.lookup(usersUri));
  });

  it('resets tags and conflicts on a second scan', () => {
    workspace.initialProjectScan(config, root);
    fs.writeFileSync(path.join(root, 'app/admin.py'), 'def admin():\n    pass\n');

    expect(workspace.initialProjectScan(config, root)).toEqual([]);
    expect(workspace.tags.lookup('hx@create_user')?.file).toBe(workspace.index.lookup(uriOf('app/users.py')));
    expect(workspace.getConflicts()).toEqual([]);
  });
});

describe('edits', () => {
  beforeEach(() => {
    workspace.initialProjectScan(config, root);
  });

  it('returns the same conflicts when the same text is applied twice', () => {
    const usersUri = uriOf('app/users.py');
    const first = workspace.onEdit(usersUri, USERS);
    const second = workspace.onEdit(usersUri, USERS);

    expect(second).toEqual(first);
    expect(first).toHaveLength(1);
    expect(workspace.tags.size).toBe(2);
  });

  it('hands a tag to the refused file once its owner drops it', () => {
    expect(workspace.onEdit(uriOf('app/admin.py'), 'def admin():\n    pass\n')).toEqual([]);

    expect(workspace.tags.lookup('hx@create_user')).toEqual({
      name: 'hx@create_user',
      start: 2,
      end: 16,
      file: workspace.index.lookup(uriOf('app/users.py')),
      line: 0,
    });
    expect(workspace.getConflicts()).toEqual([]);
  });

  it('keeps the conflict while the owner still declares the tag', () => {
    workspace.onEdit(uriOf('app/admin.py'), 'def admin():\n    pass  # hx@create_user hx@extra\n');

    expect(workspace.tags.lookup('hx@create_user')?.file).toBe(workspace.index.lookup(uriOf('app/admin.py')));
    expect(workspace.getConflicts()).toEqual([
      { name: 'hx@create_user', start: 2, end: 16, file: workspace.index.lookup(uriOf('app/users.py')), line: 0 },
    ]);
  });

  it('registers a new file inside a configured directory', () => {
    const uri = URI.file(path.join(fs.realpathSync(root), 'app', 'fresh.py')).toString();
    expect(workspace.onEdit(uri, '# hx@fresh\n')).toEqual([]);
    expect(workspace.tags.lookup('hx@fresh')?.file).toBe(workspace.index.lookup(uri));
  });

  it('leaves files outside the configured directories alone', () => {
    const uri = URI.file(path.join(fs.realpathSync(root), 'scripts', 'tool.py')).toString();
    expect(workspace.onEdit(uri, '# hx@outside\n')).toEqual([]);
    expect(workspace.index.lookup(uri)).toBeUndefined();
    expect(workspace.tags.lookup('hx@outside')).toBeUndefined();
  });

  it('re-extracts tags on save for tag sources only', () => {
    const templateUri = uriOf('templates/index.html');
    const adminUri = uriOf('app/admin.py');

    expect(workspace.onSave(adminUri)).toBeNull();
    workspace.onEdit(templateUri, TEMPLATE);
    expect(workspace.onSave(templateUri)).toBeNull();
    workspace.onEdit(adminUri, ADMIN);
    expect(workspace.onSave(adminUri)).toEqual([]);
  });
});

describe('requests', () => {
  beforeEach(() => {
    workspace.initialProjectScan(config, root);
  });

  it('goes to the definition of a linked tag', () => {
    const templateUri = uriOf('templates/index.html');
    workspace.onEdit(templateUri, TEMPLATE);

    expect(workspace.gotoDefinition(templateUri, { row: 0, column: 40 })).toEqual({
      uri: uriOf('app/admin.py'),
      range: { start: { line: 1, character: 12 }, end: { line: 1, character: 26 } },
    });
  });

  it('has no definition outside of a linked value', () => {
    const templateUri = uriOf('templates/index.html');
    workspace.onEdit(templateUri, TEMPLATE);

    expect(workspace.gotoDefinition(templateUri, { row: 0, column: 19 })).toBeNull();
  });

  it('shows where a linked tag is defined on hover', () => {
    const templateUri = uriOf('templates/index.html');
    workspace.onEdit(templateUri, TEMPLATE);
    const adminPath = fs.realpathSync(path.join(root, 'app', 'admin.py'));

    expect(workspace.hover(templateUri, { row: 0, column: 40 })).toEqual({
      contents: { kind: 'markdown', value: `**hx@create_user**\n\nDefined in \`${adminPath}:2\`` },
    });
  });

  it('shows the owner of a tag hovered in a backend file', () => {
    const usersUri = uriOf('app/users.py');
    workspace.onEdit(usersUri, USERS);
    const adminPath = fs.realpathSync(path.join(root, 'app', 'admin.py'));

    expect(workspace.hover(usersUri, { row: 0, column: 5 })).toEqual({
      contents: { kind: 'markdown', value: `**hx@create_user**\n\nDefined in \`${adminPath}:2\`` },
    });
    expect(workspace.hover(usersUri, { row: 1, column: 5 })).toBeNull();
  });

  it('documents an attribute name on hover', () => {
    const templateUri = uriOf('templates/index.html');
    workspace.onEdit(templateUri, TEMPLATE);

    expect(workspace.hover(templateUri, { row: 0, column: 10 })).toEqual({
      contents: { kind: 'markdown', value: getAttributeDocumentation('hx-post') },
    });
  });

  it('completes registered tags inside a linking attribute', () => {
    const uri = 'file:///virtual/page.html';
    workspace.onEdit(uri, '<button hx-lsp=""></button>');

    expect(workspace.completion(uri, { row: 0, column: 15 })?.map(item => item.label)).toEqual([
      'hx@create_user',
      'hx@delete_user',
    ]);
  });

  it('completes attribute names in documents outside the project', () => {
    const uri = 'file:///virtual/page.html';
    workspace.onEdit(uri, '<div hx- ></div>');

    expect(workspace.completion(uri, { row: 0, column: 8 })).toHaveLength(getAttributeCompletions().length);
  });

  it('completes known values of an attribute', () => {
    const uri = 'file:///virtual/page.html';
    workspace.onEdit(uri, '<div hx-swap=""></div>');

    expect(workspace.completion(uri, { row: 0, column: 13 })?.map(item => item.label)).toEqual([
      'innerHTML',
      'outerHTML',
      'beforebegin',
      'afterbegin',
      'beforeend',
      'afterend',
      'delete',
      'none',
    ]);
  });

  it('answers nothing for documents it has never seen', () => {
    expect(workspace.hover('file:///virtual/unknown.html', { row: 0, column: 0 })).toBeNull();
  });
});
