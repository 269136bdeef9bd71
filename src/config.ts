import * as path from 'path';
import { z } from 'zod';
import { BACKEND_EXTENSIONS, BACKEND_LANGS, isBackendLang, type BackendLang, type LangType } from './lang-types';

/**
 * Project settings, passed by the client as `initializationOptions`.
 *
 * ```json
 * {
 *   "lang": "python",
 *   "template_ext": "jinja",
 *   "templates": ["./templates"],
 *   "js_tags": ["./frontend/src"],
 *   "backend_tags": ["./app"]
 * }
 * ```
 */
const htmxConfigSchema = z.object({
  lang: z.string(),
  template_ext: z.string(),
  templates: z.array(z.string()).default([]),
  js_tags: z.array(z.string()).default([]),
  backend_tags: z.array(z.string()).default([]),
});

export type RawHtmxConfig = z.infer<typeof htmxConfigSchema>;

export interface HtmxConfig extends Omit<RawHtmxConfig, 'lang'> {
  lang: BackendLang;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Shape check only. Returns null when the options are missing or malformed.
 */
export function validateConfig(value: unknown): RawHtmxConfig | null {
  if (value === undefined || value === null) {
    return null;
  }
  const parsed = htmxConfigSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

/**
 * The checks the project scan depends on. Throws ConfigError.
 */
export function checkConfig(config: RawHtmxConfig | null): HtmxConfig {
  if (!config) {
    throw new ConfigError('Config is not found.');
  }
  if (config.template_ext.length === 0 || /\s/.test(config.template_ext)) {
    throw new ConfigError('Template extension not found.');
  }
  if (!isBackendLang(config.lang)) {
    throw new ConfigError(
      `Language ${config.lang} is not supported. Use one of: ${BACKEND_LANGS.join(', ')}.`
    );
  }
  return { ...config, lang: config.lang };
}

function extensionOf(filePath: string): string | null {
  const ext = path.extname(filePath);
  return ext.length > 1 ? ext.slice(1) : null;
}

export function isBackendExtension(config: Pick<HtmxConfig, 'lang'>, ext: string): boolean {
  return BACKEND_EXTENSIONS[config.lang] === ext;
}

/**
 * Which domains a file belongs to. Empty when the project does not track it.
 */
export function classifyFile(filePath: string, config: Pick<HtmxConfig, 'lang' | 'template_ext'>): LangType[] {
  const ext = extensionOf(filePath);
  if (!ext) {
    return [];
  }
  if (ext === 'js' || ext === 'ts') {
    return ['javascript'];
  }
  if (isBackendExtension(config, ext)) {
    return ext === config.template_ext ? ['backend', 'template'] : ['backend'];
  }
  if (ext === config.template_ext) {
    return ['template'];
  }
  return [];
}

/**
 * Directory groups in scan order, each with the domain its files are parsed as.
 */
export function directoryGroups(config: HtmxConfig): Array<{ lang: LangType; dirs: string[] }> {
  return [
    { lang: 'template', dirs: config.templates },
    { lang: 'javascript', dirs: config.js_tags },
    { lang: 'backend', dirs: config.backend_tags },
  ];
}
