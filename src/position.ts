import type { HtmxQueries } from './parsers/queries';
import type { Point, Query, QueryMatch, SyntaxNode } from './parsers/tree-sitter';

export enum QueryType {
  Hover = 'hover',
  Completion = 'completion',
}

/**
 * What the cursor is over. Carries text only, never tree nodes: trees are
 * replaced on every edit.
 */
export type Position =
  | { kind: 'attributeName'; name: string }
  | { kind: 'attributeValue'; name: string; value: string };

/**
 * Name reported when the cursor sits after an unfinished tag, where a fresh
 * attribute name can be typed.
 */
export const NEW_ATTRIBUTE = '--';

type CaptureMap = Map<string, SyntaxNode>;

export function attributeName(name: string): Position {
  return { kind: 'attributeName', name };
}

export function attributeValue(name: string, value = ''): Position {
  return { kind: 'attributeValue', name, value };
}

/**
 * Lexicographic (row, column) comparison. Negative when `a` comes first.
 */
export function comparePoints(a: Point, b: Point): number {
  if (a.row !== b.row) {
    return a.row - b.row;
  }
  return a.column - b.column;
}

/**
 * Keep, per capture label, the last capture that starts at or before the
 * cursor.
 */
function collectProps(matches: QueryMatch[], triggerPoint: Point): CaptureMap {
  const props: CaptureMap = new Map();
  for (const match of matches) {
    for (const capture of match.captures) {
      if (comparePoints(capture.node.startPosition, triggerPoint) > 0) {
        continue;
      }
      props.set(capture.name, capture.node);
    }
  }
  return props;
}

function captureOf(match: QueryMatch, name: string): SyntaxNode | undefined {
  return match.captures.find(capture => capture.name === name)?.node;
}

/**
 * Like `collectProps`, restricted to the matches of one attribute: the one
 * whose `@attr_name` starts last at or before the cursor. Labels of sibling
 * attributes never leak into the result.
 */
function queryAttributeProps(node: SyntaxNode, triggerPoint: Point, query: Query): CaptureMap {
  let selected: QueryMatch[] = [];
  let selectedStart: Point | null = null;

  for (const match of query.matches(node)) {
    const name = captureOf(match, 'attr_name');
    if (!name || comparePoints(name.startPosition, triggerPoint) > 0) {
      continue;
    }
    const order = selectedStart === null ? 1 : comparePoints(name.startPosition, selectedStart);
    if (order > 0) {
      selected = [match];
      selectedStart = name.startPosition;
    } else if (order === 0) {
      selected.push(match);
    }
  }

  return collectProps(selected, triggerPoint);
}

const CONTAINER_TYPES = new Set(['element', 'fragment', 'document']);

function findElementReferentToCurrentNode(node: SyntaxNode): SyntaxNode | null {
  let current: SyntaxNode | null = node;
  while (current) {
    if (CONTAINER_TYPES.has(current.type)) {
      return current;
    }
    current = current.parent;
  }
  return null;
}

/**
 * Classify the cursor against the htmx attributes of the enclosing element.
 * Returns null when the cursor is not over an hx-* attribute name or value.
 */
export function queryPosition(
  root: SyntaxNode,
  triggerPoint: Point,
  queryType: QueryType,
  queries: Pick<HtmxQueries, 'name' | 'value'>
): Position | null {
  const closestNode = root.descendantForPosition(triggerPoint, triggerPoint);
  const element = findElementReferentToCurrentNode(closestNode);
  if (!element) {
    return null;
  }

  return (
    queryName(element, triggerPoint, queryType, queries.name) ??
    queryValue(element, triggerPoint, queryType, queries.value)
  );
}

function queryName(
  element: SyntaxNode,
  triggerPoint: Point,
  queryType: QueryType,
  query: Query
): Position | null {
  const matches = query.matches(element);
  const props = collectProps(matches, triggerPoint);
  const attrName = props.get('attr_name');
  if (!attrName) {
    return null;
  }

  const unfinishedTag = props.get('unfinished_tag');
  if (unfinishedTag) {
    if (queryType === QueryType.Hover) {
      if (props.has('complete_match') && comparePoints(triggerPoint, attrName.endPosition) <= 0) {
        return attributeName(attrName.text);
      }
      return null;
    }
    if (comparePoints(triggerPoint, unfinishedTag.endPosition) > 0) {
      return attributeName(NEW_ATTRIBUTE);
    }
    // A stray `=` may be the start of a value; nothing is suggested there.
    if (props.has('equal_error') || hasPendingEquals(matches, unfinishedTag, attrName, triggerPoint)) {
      return null;
    }
  }

  return attributeName(attrName.text);
}

/**
 * True when the cursor sits at or past the end of `attrName` and the tag's
 * stray `=` follows that attribute directly, with only whitespace between.
 */
function hasPendingEquals(
  matches: QueryMatch[],
  tag: SyntaxNode,
  attrName: SyntaxNode,
  triggerPoint: Point
): boolean {
  if (comparePoints(triggerPoint, attrName.endPosition) < 0) {
    return false;
  }
  const following = attrName.parent?.nextNamedSibling;
  if (!following) {
    return false;
  }
  return matches.some(match => {
    const equalError = captureOf(match, 'equal_error');
    return (
      captureOf(match, 'unfinished_tag')?.startIndex === tag.startIndex &&
      equalError?.startIndex === following.startIndex
    );
  });
}

function queryValue(
  element: SyntaxNode,
  triggerPoint: Point,
  queryType: QueryType,
  query: Query
): Position | null {
  const props = queryAttributeProps(element, triggerPoint, query);
  const attrName = props.get('attr_name');
  if (!attrName) {
    return null;
  }

  if (queryType === QueryType.Hover && comparePoints(triggerPoint, attrName.endPosition) < 0) {
    return attributeName(attrName.text);
  }

  if (props.has('open_quote_error') || props.has('empty_attribute')) {
    const quoted = props.get('quoted_attr_value');
    if (
      queryType === QueryType.Completion &&
      quoted &&
      comparePoints(triggerPoint, quoted.endPosition) >= 0
    ) {
      return null;
    }
    return attributeValue(attrName.text);
  }

  if (props.get('error_char')?.text === '=') {
    return null;
  }

  let value = '';
  const nonEmpty = props.get('non_empty_attribute');
  if (nonEmpty) {
    if (comparePoints(triggerPoint, nonEmpty.endPosition) >= 0) {
      return null;
    }
    if (queryType === QueryType.Hover) {
      value = props.get('attr_value')?.text ?? '';
    }
  }

  return attributeValue(attrName.text, value);
}
