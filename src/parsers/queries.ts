import type { BackendLang } from '../lang-types';
import type { Grammars, Language, Query } from './tree-sitter';

/**
 * hx-* attribute names inside a start tag.
 *
 * `complete_match` only matches when the attribute is nothing but its name
 * (the #eq? compares the whole attribute text to the name text).
 * `unfinished_tag` matches any start tag with an attribute and carries no
 * name; `equal_error` is the stray `=` the parser leaves behind when no
 * value follows.
 */
export const HX_NAME = `
[
  (_
    (tag_name)
    (_)*
    (attribute (attribute_name) @attr_name) @complete_match
    (#eq? @attr_name @complete_match)
    (#match? @attr_name "hx-.*")
  )

  (_
    (tag_name)
    (attribute (attribute_name))
    (ERROR)? @equal_error
  ) @unfinished_tag
]
`;

/**
 * hx-* attribute values in their four shapes: unterminated quote (the parser
 * wraps the tag in ERROR), a raw value followed by an error character, an
 * empty quoted value, and a quoted value with text.
 */
export const HX_VALUE = `
(
  [
    (ERROR
      (tag_name)
      (attribute_name) @attr_name
      (_)
    ) @open_quote_error

    (_
      (tag_name)
      (attribute
        (attribute_name) @attr_name
        (_)
      ) @last_item
      (ERROR) @error_char
    )

    (_
      (tag_name)
      (attribute
        (attribute_name) @attr_name
        (quoted_attribute_value) @quoted_attr_value
        (#eq? @quoted_attr_value "\\"\\"")
      ) @empty_attribute
    )

    (_
      (tag_name)
      (attribute
        (attribute_name) @attr_name
        (quoted_attribute_value (attribute_value) @attr_value)
      ) @non_empty_attribute
    )
  ]

  (#match? @attr_name "hx-.*")
)
`;

export const JS_TAGS = `(comment) @comment`;

export const BACKEND_TAGS: Record<BackendLang, string> = {
  python: `(comment) @comment`,
  go: `(comment) @comment`,
  rust: `
    [
      (line_comment)
      (block_comment)
    ] @comment
  `,
};

/**
 * Compiled queries. Compilation is not free, so it happens once per grammar
 * load and once per backend switch.
 */
export class HtmxQueries {
  readonly name: Query;
  readonly value: Query;
  readonly jsTags: Query;
  private backendTags: Query;
  private backendLang: BackendLang;

  constructor(private readonly grammars: Grammars, backendLang: BackendLang = 'rust') {
    this.name = grammars.html.query(HX_NAME);
    this.value = grammars.html.query(HX_VALUE);
    this.jsTags = grammars.javascript.query(JS_TAGS);
    this.backendLang = backendLang;
    this.backendTags = compileBackendQuery(grammars[backendLang], backendLang);
  }

  setBackend(lang: BackendLang): void {
    if (lang === this.backendLang) {
      return;
    }
    this.backendTags.delete();
    this.backendLang = lang;
    this.backendTags = compileBackendQuery(this.grammars[lang], lang);
  }

  getBackendTags(): Query {
    return this.backendTags;
  }
}

function compileBackendQuery(language: Language, lang: BackendLang): Query {
  return language.query(BACKEND_TAGS[lang]);
}
