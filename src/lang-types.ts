/**
 * Lexical domains a project file can belong to.
 *
 * A file is parsed with exactly one of them; the classifier may still report
 * two (backend + template) when the template extension equals the backend one.
 */
export type LangType = 'template' | 'javascript' | 'backend';

export const BACKEND_LANGS = ['python', 'rust', 'go'] as const;

export type BackendLang = (typeof BACKEND_LANGS)[number];

export const BACKEND_EXTENSIONS: Record<BackendLang, string> = {
  python: 'py',
  rust: 'rs',
  go: 'go',
};

export function isBackendLang(value: string): value is BackendLang {
  return (BACKEND_LANGS as readonly string[]).includes(value);
}

/**
 * Languages that may declare hx@ tags. Templates only ever consume them.
 */
export function isTagSource(lang: LangType): boolean {
  return lang !== 'template';
}
