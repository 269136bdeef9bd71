import {
  createConnection,
  TextDocuments,
  ProposedFeatures,
  InitializeParams,
  InitializeResult,
  CompletionItem,
  CompletionParams,
  CompletionTriggerKind,
  Hover,
  Location,
  Position,
  TextDocumentPositionParams,
  TextDocumentSyncKind,
} from 'vscode-languageserver/node';

import { TextDocument } from 'vscode-languageserver-textdocument';
import { URI } from 'vscode-uri';
import { checkConfig, validateConfig, type HtmxConfig } from './config';
import { getTreeSitterError, initializeTreeSitter, type Point } from './parsers/tree-sitter';
import { debugLog, getDebugFlags, toError } from './utils/debug';
import { buildTagDiagnostics } from './validators/tag-diagnostics';
import { HtmxWorkspace } from './workspace';

// Create a connection for the server
const connection = createConnection(ProposedFeatures.all);

const debugFlags = getDebugFlags();
connection.console.log(
  debugFlags.length > 0
    ? `[htmx-ls] Debug flags enabled: ${debugFlags.join(', ')}`
    : '[htmx-ls] Debug flags disabled (set HTMX_LS_DEBUG to enable)'
);

const documents: TextDocuments<TextDocument> = new TextDocuments(TextDocument);

const workspace = new HtmxWorkspace(connection.console);

let isHelix = false;
let workspaceRoot: string | null = null;
let config: HtmxConfig | null = null;
let configError: Error | null = null;
let publishedUris = new Set<string>();

function toPoint(position: Position): Point {
  return { row: position.line, column: position.character };
}

function reportError(context: string, error: unknown) {
  connection.console.error(`[htmx-ls] ${context}: ${toError(error).message}`);
}

/**
 * Push duplicate-tag warnings for every file that has them and clear the
 * ones that no longer do.
 */
async function publishTagDiagnostics(): Promise<void> {
  const byUri = buildTagDiagnostics(workspace.getConflicts(), workspace.index);
  const stale = Array.from(publishedUris).filter(uri => !byUri.has(uri));

  await Promise.all([
    ...stale.map(uri => connection.sendDiagnostics({ uri, diagnostics: [] })),
    ...Array.from(byUri, ([uri, diagnostics]) => connection.sendDiagnostics({ uri, diagnostics })),
  ]);
  publishedUris = new Set(byUri.keys());
}

function schedulePublish() {
  publishTagDiagnostics().catch(error => reportError('Publishing diagnostics failed', error));
}

connection.onInitialize((params: InitializeParams) => {
  isHelix = params.clientInfo?.name === 'helix';

  const rootUri = params.workspaceFolders?.[0]?.uri ?? params.rootUri;
  workspaceRoot = rootUri ? URI.parse(rootUri).fsPath : null;

  try {
    config = checkConfig(validateConfig(params.initializationOptions));
    workspace.setConfig(config);
  } catch (error) {
    configError = toError(error);
    connection.console.info(`[htmx-ls] ${configError.message}`);
  }

  const result: InitializeResult = {
    capabilities: {
      textDocumentSync: {
        openClose: true,
        change: TextDocumentSyncKind.Full,
        save: { includeText: false },
      },
      completionProvider: {
        resolveProvider: false,
        triggerCharacters: ['-', '"', ' '],
      },
      hoverProvider: true,
      definitionProvider: config !== null,
    },
    serverInfo: {
      name: 'htmx-ls',
    },
  };
  return result;
});

async function startup(): Promise<void> {
  const grammars = await initializeTreeSitter(connection.console);
  if (!grammars) {
    const error = getTreeSitterError();
    connection.console.warn(`Tree-sitter unavailable: ${error?.message ?? 'grammars not loaded'}`);
    return;
  }
  workspace.initialize(grammars);

  if (!config) {
    if (configError) {
      await connection.window.showErrorMessage(`htmx-ls: ${configError.message}`);
    }
    return;
  }
  if (!workspaceRoot) {
    connection.console.warn('[htmx-ls] No workspace folder; tags are not indexed.');
    return;
  }

  try {
    const conflicts = workspace.initialProjectScan(config, workspaceRoot);
    connection.console.log(
      `Indexed ${workspace.index.size} files, ${workspace.tags.size} tags, ${conflicts.length} duplicates`
    );
    await publishTagDiagnostics();
  } catch (error) {
    reportError('Project scan failed', error);
    await connection.window.showErrorMessage(`htmx-ls: ${toError(error).message}`);
  }
}

connection.onInitialized(() => {
  connection.console.log('htmx-ls initialized!');
  startup().catch(error => reportError('Startup failed', error));
});

documents.onDidChangeContent((change) => {
  const conflicts = workspace.onEdit(change.document.uri, change.document.getText());
  debugLog(connection.console, 'documents', `${change.document.uri} changed, ${conflicts.length} conflicts`);
  schedulePublish();
});

documents.onDidSave((e) => {
  if (workspace.onSave(e.document.uri) !== null) {
    schedulePublish();
  }
});

documents.onDidClose((e) => {
  workspace.onClose(e.document.uri);
});

connection.onCompletion((params: CompletionParams): CompletionItem[] | null => {
  const triggerKind = params.context?.triggerKind;
  const canComplete =
    triggerKind === CompletionTriggerKind.TriggerCharacter ||
    triggerKind === CompletionTriggerKind.Invoked;
  // Helix sends completion requests without a context.
  if (!canComplete && !isHelix) {
    return null;
  }
  return workspace.completion(params.textDocument.uri, toPoint(params.position));
});

connection.onHover((params: TextDocumentPositionParams): Hover | null => {
  return workspace.hover(params.textDocument.uri, toPoint(params.position));
});

connection.onDefinition((params: TextDocumentPositionParams): Location | null => {
  return workspace.gotoDefinition(params.textDocument.uri, toPoint(params.position));
});

// Make the text document manager listen on the connection
documents.listen(connection);

// Listen on the connection
connection.listen();
