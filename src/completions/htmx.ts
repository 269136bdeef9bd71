import { CompletionItem, CompletionItemKind, MarkupContent, MarkupKind } from 'vscode-languageserver/node';
import { z } from 'zod';
import rawKnowledgeBase from '../../data/htmx-attributes.json';

const entrySchema = z.object({
  name: z.string(),
  description: z.string(),
});

const knowledgeBaseSchema = z.object({
  attributes: z.array(entrySchema),
  values: z.record(z.array(entrySchema)),
});

const knowledgeBase = knowledgeBaseSchema.parse(rawKnowledgeBase);

const attributesByName = new Map(knowledgeBase.attributes.map(entry => [entry.name, entry]));

export function getAttributeDocumentation(name: string): string | null {
  return attributesByName.get(name)?.description ?? null;
}

/**
 * Values are matched exactly; `hx-swap="outerHTML"` hovers, `hx-swap="outerHTML swap:1s"` does not.
 */
export function getValueDocumentation(name: string, value: string): string | null {
  const values = knowledgeBase.values[name];
  return values?.find(entry => entry.name === value)?.description ?? null;
}

function toMarkdown(value: string): MarkupContent {
  return { kind: MarkupKind.Markdown, value };
}

export function getAttributeCompletions(): CompletionItem[] {
  return knowledgeBase.attributes.map((entry, index) => ({
    label: entry.name,
    kind: CompletionItemKind.Property,
    detail: firstLine(entry.description),
    documentation: toMarkdown(entry.description),
    sortText: `0${index.toString().padStart(3, '0')}`,
  }));
}

export function getValueCompletions(name: string): CompletionItem[] {
  const values = knowledgeBase.values[name];
  if (!values) {
    return [];
  }
  return values.map((entry, index) => ({
    label: entry.name,
    kind: CompletionItemKind.Value,
    detail: firstLine(entry.description),
    documentation: toMarkdown(entry.description),
    sortText: `0${index.toString().padStart(3, '0')}`,
  }));
}

function firstLine(text: string): string {
  const end = text.indexOf('\n');
  return end === -1 ? text : text.slice(0, end);
}
