import { CompletionItem, CompletionItemKind } from 'vscode-languageserver/node';
import { URI } from 'vscode-uri';
import type { DocumentIndex } from '../document-index';
import type { Tag } from '../tags';

/**
 * Attribute whose value names `hx@` tags declared in backend or script comments.
 */
export const LINK_ATTRIBUTE = 'hx-lsp';

function describeLocation(tag: Tag, index: DocumentIndex): string {
  const uri = index.reverseLookup(tag.file);
  const where = uri ? URI.parse(uri).fsPath : 'an unknown file';
  return `${where}:${tag.line + 1}`;
}

export function getTagCompletions(tags: Tag[], index: DocumentIndex): CompletionItem[] {
  return [...tags]
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .map(tag => ({
      label: tag.name,
      kind: CompletionItemKind.Reference,
      detail: describeLocation(tag, index),
    }));
}

export function buildTagHoverDocumentation(tag: Tag, index: DocumentIndex): string {
  return `**${tag.name}**\n\nDefined in \`${describeLocation(tag, index)}\``;
}
