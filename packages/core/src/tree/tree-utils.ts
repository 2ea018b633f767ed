import type { IListDelimiterHandler } from '@cfgtree/models';
import { ImmutableNode } from './immutable-node.js';

/**
 * Returns the node at the given index path, or undefined when the path
 * leaves the tree.
 * @public
 */
export function nodeAtPath(
  root: ImmutableNode,
  path: readonly number[],
): ImmutableNode | undefined {
  let node: ImmutableNode | undefined = root;
  for (const index of path) {
    node = node?.children[index];
  }
  return node;
}

/**
 * Rebuilds the ancestors of the node at `path` after `update` changed it.
 * When `update` returns undefined the node is removed from its parent; for
 * the root an empty node of the same name takes its place. Subtrees off the
 * path are shared with the old root.
 * @public
 */
export function updateAtPath(
  root: ImmutableNode,
  path: readonly number[],
  update: (node: ImmutableNode) => ImmutableNode | undefined,
): ImmutableNode {
  if (path.length === 0) {
    return update(root) ?? ImmutableNode.of(root.name);
  }
  const [head, ...rest] = path;
  const child = root.children[head];
  if (child === undefined) {
    return root;
  }
  if (rest.length === 0) {
    const replaced = update(child);
    return replaced === undefined
      ? root.withoutChildAt(head)
      : root.withChildAt(head, replaced);
  }
  return root.withChildAt(head, updateAtPath(child, rest, update));
}

/**
 * Orders index paths in document order; ancestors precede descendants.
 * @public
 */
export function compareDocumentOrder(
  a: readonly number[],
  b: readonly number[],
): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) {
      return a[i] - b[i];
    }
  }
  return a.length - b.length;
}

/**
 * Returns a copy of the tree with `transform` applied to every node value
 * (attribute values included). Nodes whose values are unchanged are shared.
 * @public
 */
export function mapValues(
  node: ImmutableNode,
  transform: (value: unknown) => unknown,
): ImmutableNode {
  let result = node.withValue(
    node.value === undefined ? undefined : transform(node.value),
  );
  for (const [name, value] of node.attributes) {
    const mapped = transform(value);
    if (mapped !== value) {
      result = result.withAttribute(name, mapped);
    }
  }
  const children = node.children.map((child) => mapValues(child, transform));
  if (children.some((child, index) => child !== node.children[index])) {
    result = result.replaceChildren(children);
  }
  return result;
}

/**
 * Splits the string values of a tree the way values read from a source are
 * split: a child whose value holds several list elements becomes one child
 * per element (the first keeps the attributes and children), attribute
 * values with several elements become arrays. The root keeps its place; a
 * split root value is stored as an array.
 * @public
 */
export function splitListValues(
  root: ImmutableNode,
  handler: IListDelimiterHandler,
): ImmutableNode {
  const content = splitContent(root, handler);
  if (typeof root.value !== 'string') {
    return content;
  }
  const parts = handler.parse(root.value);
  return content.withValue(parts.length === 1 ? parts[0] : parts);
}

/**
 * Like {@link splitListValues} for a node that is to become a child; a split
 * value yields several nodes of the same name.
 * @public
 */
export function splitNodeValues(
  node: ImmutableNode,
  handler: IListDelimiterHandler,
): ImmutableNode[] {
  const content = splitContent(node, handler);
  if (typeof node.value !== 'string') {
    return [content];
  }
  const [first, ...rest] = handler.parse(node.value);
  return [
    content.withValue(first),
    ...rest.map((value) => ImmutableNode.of(node.name, value)),
  ];
}

function splitContent(
  node: ImmutableNode,
  handler: IListDelimiterHandler,
): ImmutableNode {
  let result = node;
  for (const [name, value] of node.attributes) {
    if (typeof value === 'string') {
      const parts = handler.parse(value);
      const split = parts.length === 1 ? parts[0] : parts;
      if (split !== value) {
        result = result.withAttribute(name, split);
      }
    }
  }
  const children = node.children.flatMap((child) =>
    splitNodeValues(child, handler),
  );
  if (
    children.length !== node.children.length ||
    children.some((child, index) => child !== node.children[index])
  ) {
    result = result.replaceChildren(children);
  }
  return result;
}

type PlainValue = string | number | boolean | bigint | Date | null;

/**
 * Plain object shape accepted by {@link nodeFromObject}. Arrays become
 * repeated children of the same name; keys starting with `@` become
 * attributes; a `#value` key sets the value of a node that also has
 * children.
 * @public
 */
export type PlainTree = {
  [key: string]: PlainValue | PlainTree | ReadonlyArray<PlainValue | PlainTree>;
};

const ATTRIBUTE_MARKER = '@';
const VALUE_KEY = '#value';

/**
 * Builds a node tree from a plain JSON-like object.
 * @example
 * ```typescript
 * const root = nodeFromObject({
 *   database: { host: 'localhost', port: 5432 },
 *   tables: { table: [{ name: 'users' }, { name: 'groups' }] },
 * });
 * ```
 * @public
 */
export function nodeFromObject(tree: PlainTree, rootName = ''): ImmutableNode {
  const builder = ImmutableNode.builder().name(rootName);
  for (const [key, entry] of Object.entries(tree)) {
    if (key === VALUE_KEY) {
      builder.value(entry);
    } else if (key.startsWith(ATTRIBUTE_MARKER)) {
      builder.addAttribute(key.slice(ATTRIBUTE_MARKER.length), entry);
    } else if (isEntryList(entry)) {
      for (const item of entry) {
        builder.addChild(entryToNode(key, item));
      }
    } else {
      builder.addChild(entryToNode(key, entry));
    }
  }
  return builder.create();
}

function entryToNode(name: string, entry: PlainValue | PlainTree): ImmutableNode {
  if (isPlainTree(entry)) {
    return nodeFromObject(entry, name);
  }
  return ImmutableNode.of(name, entry ?? undefined);
}

function isEntryList(
  value: unknown,
): value is ReadonlyArray<PlainValue | PlainTree> {
  return Array.isArray(value);
}

function isPlainTree(value: unknown): value is PlainTree {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

/**
 * Converts the children of a node back into a plain object. Leaf children
 * become their values, repeated names become arrays, attributes are written
 * with an `@` prefix.
 * @public
 */
export function nodeToObject(node: ImmutableNode): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [name, value] of node.attributes) {
    result[ATTRIBUTE_MARKER + name] = value;
  }
  if (node.value !== undefined && (node.children.length > 0 || node.attributes.size > 0)) {
    result[VALUE_KEY] = node.value;
  }
  for (const child of node.children) {
    const converted =
      child.children.length === 0 && child.attributes.size === 0
        ? child.value
        : nodeToObject(child);
    const existing = result[child.name];
    if (node.getChildrenCount(child.name) > 1) {
      result[child.name] = Array.isArray(existing)
        ? [...existing, converted]
        : [converted];
    } else {
      result[child.name] = converted;
    }
  }
  return result;
}
