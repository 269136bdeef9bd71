import { Diagnostic, DiagnosticSeverity, Range } from 'vscode-languageserver/node';
import type { DocumentIndex } from '../document-index';
import type { Tag } from '../tags';

export const DIAGNOSTIC_SOURCE = 'htmx-ls';

export function createDuplicateTagDiagnostic(tag: Tag): Diagnostic {
  return {
    severity: DiagnosticSeverity.Warning,
    range: Range.create(tag.line, tag.start, tag.line, tag.end),
    message: `Tag ${tag.name} is already defined.`,
    source: DIAGNOSTIC_SOURCE,
    code: 'duplicate-tag',
  };
}

/**
 * Group refused tags by the uri of the file that tried to declare them.
 * Conflicts whose file is no longer indexed are dropped.
 */
export function buildTagDiagnostics(conflicts: Tag[], index: DocumentIndex): Map<string, Diagnostic[]> {
  const byUri = new Map<string, Diagnostic[]>();

  for (const tag of conflicts) {
    const uri = index.reverseLookup(tag.file);
    if (!uri) {
      continue;
    }
    const diagnostics = byUri.get(uri) ?? [];
    diagnostics.push(createDuplicateTagDiagnostic(tag));
    byUri.set(uri, diagnostics);
  }

  return byUri;
}
