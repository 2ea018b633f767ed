/**
 * Holder of the single mutable root reference of a hierarchical
 * configuration.
 *
 * All updates are computed on immutable nodes and installed with one
 * assignment, so a reader that obtained the root before an update keeps
 * seeing a consistent tree.
 * @public
 */

import { InvalidExpressionError } from '../errors/index.js';
import type { IExpressionEngine, QueryResult } from '../expr/types.js';
import { ImmutableNode } from './immutable-node.js';
import {
  compareDocumentOrder,
  nodeAtPath,
  updateAtPath,
} from './tree-utils.js';

export class NodeModel {
  private root: ImmutableNode;

  public constructor(root: ImmutableNode = ImmutableNode.of('')) {
    this.root = root;
  }

  public getRootNode(): ImmutableNode {
    return this.root;
  }

  public setRootNode(root: ImmutableNode | undefined): void {
    this.root = root ?? ImmutableNode.of('');
  }

  /**
   * Adds one new node (or attribute value) per value at the key, creating
   * missing intermediate nodes.
   */
  public addProperty(
    key: string,
    values: readonly unknown[],
    engine: IExpressionEngine,
  ): void {
    if (values.length === 0) {
      return;
    }
    this.root = addValues(this.root, key, values, engine);
  }

  /**
   * Adds whole subtrees below the node selected by the key. The node is
   * created if the key matches nothing.
   * @throws \{InvalidExpressionError\} When the key selects an attribute or
   * more than one node
   */
  public addNodes(
    key: string,
    nodes: readonly ImmutableNode[],
    engine: IExpressionEngine,
  ): void {
    if (nodes.length === 0) {
      return;
    }
    const results = engine.query(this.root, key);
    if (results.some((result) => result.kind === 'attribute')) {
      throw InvalidExpressionError.malformed(
        key,
        'nodes cannot be added to an attribute',
      );
    }
    if (results.length > 1) {
      throw InvalidExpressionError.malformed(
        key,
        'nodes can only be added to a single node',
      );
    }

    const [target] = results;
    if (target !== undefined) {
      this.root = updateAtPath(this.root, target.path, (node) =>
        node.addChildren(nodes),
      );
      return;
    }

    const data = engine.prepareAdd(this.root, key);
    if (data.isAttribute) {
      throw InvalidExpressionError.malformed(
        key,
        'nodes cannot be added to an attribute',
      );
    }
    const created = ImmutableNode.builder()
      .name(data.newNodeName)
      .addChildren(nodes)
      .create();
    this.root = updateAtPath(this.root, data.parentPath, (parent) =>
      parent.withChild(wrapInPath(data.pathNodes, [created])),
    );
  }

  /**
   * Replaces the values at the key. Values are assigned to the existing
   * matches in order; surplus values are added as new nodes, surplus
   * matches lose their value (and are removed when that leaves them empty).
   * Attribute matches receive the whole value list.
   */
  public setProperty(
    key: string,
    values: readonly unknown[],
    engine: IExpressionEngine,
  ): void {
    const results = engine.query(this.root, key);
    if (results.length === 0) {
      this.addProperty(key, values, engine);
      return;
    }

    let root = this.root;
    const cleared: Array<readonly number[]> = [];
    let valueIndex = 0;

    for (const result of results) {
      if (result.kind === 'attribute') {
        const name = result.attributeName;
        const value = values.length === 1 ? values[0] : [...values];
        root = updateAtPath(root, result.path, (node) =>
          values.length === 0
            ? node.withoutAttribute(name)
            : node.withAttribute(name, value),
        );
        continue;
      }
      if (valueIndex < values.length) {
        const value = values[valueIndex++];
        root = updateAtPath(root, result.path, (node) => node.withValue(value));
      } else {
        root = updateAtPath(root, result.path, (node) =>
          node.withValue(undefined),
        );
        cleared.push(result.path);
      }
    }

    root = pruneEmpty(root, cleared);
    const remaining = values.slice(valueIndex);
    const addsNodes = results.some((result) => result.kind === 'node');
    if (addsNodes && remaining.length > 0) {
      root = addValues(root, key, remaining, engine);
    }
    this.root = root;
  }

  /**
   * Removes the values at the key, keeping the nodes' children and
   * attributes. Nodes left without content are removed.
   * @returns The matches the values were removed from
   */
  public clearProperty(key: string, engine: IExpressionEngine): QueryResult[] {
    const results = engine.query(this.root, key);
    let root = this.root;
    const cleared: Array<readonly number[]> = [];

    for (const result of results) {
      if (result.kind === 'attribute') {
        const name = result.attributeName;
        root = updateAtPath(root, result.path, (node) =>
          node.withoutAttribute(name),
        );
      } else {
        root = updateAtPath(root, result.path, (node) =>
          node.withValue(undefined),
        );
        cleared.push(result.path);
      }
    }

    this.root = pruneEmpty(root, cleared);
    return results;
  }

  /**
   * Removes the selected nodes with their subtrees, or the selected
   * attributes.
   * @returns The removed matches
   */
  public clearTree(key: string, engine: IExpressionEngine): QueryResult[] {
    const results = engine.query(this.root, key);
    const ordered = [...results].sort((a, b) =>
      compareDocumentOrder(b.path, a.path),
    );

    let root = this.root;
    for (const result of ordered) {
      if (result.kind === 'attribute') {
        const name = result.attributeName;
        root = updateAtPath(root, result.path, (node) =>
          node.withoutAttribute(name),
        );
      } else {
        root = updateAtPath(root, result.path, () => undefined);
      }
    }
    this.root = root;
    return results;
  }

  /**
   * Removes all content; the root keeps its name.
   */
  public clear(): void {
    this.root = ImmutableNode.of(this.root.name);
  }

  /**
   * Merges a node into the root: its children are appended, its attributes
   * added, and its value and name taken over where given.
   */
  public mergeRoot(node: ImmutableNode): void {
    const name = node.name.length > 0 ? node.name : this.root.name;
    this.root = this.root
      .withName(name)
      .withValue(node.value ?? this.root.value)
      .withAttributes(node.attributes)
      .addChildren(node.children);
  }
}

function addValues(
  root: ImmutableNode,
  key: string,
  values: readonly unknown[],
  engine: IExpressionEngine,
): ImmutableNode {
  const data = engine.prepareAdd(root, key);

  if (data.isAttribute) {
    if (data.pathNodes.length > 0) {
      const holder = wrapInPath(data.pathNodes, []);
      return updateAtPath(root, data.parentPath, (parent) =>
        parent.withChild(
          withLeafAttribute(holder, data.newNodeName, combine(undefined, values)),
        ),
      );
    }
    return updateAtPath(root, data.parentPath, (parent) =>
      parent.withAttribute(
        data.newNodeName,
        combine(parent.attributes.get(data.newNodeName), values),
      ),
    );
  }

  const leaves = values.map((value) => ImmutableNode.of(data.newNodeName, value));
  return updateAtPath(root, data.parentPath, (parent) =>
    data.pathNodes.length === 0
      ? parent.addChildren(leaves)
      : parent.withChild(wrapInPath(data.pathNodes, leaves)),
  );
}

/**
 * Nests the children in a chain of new nodes with the given names.
 */
function wrapInPath(
  names: readonly string[],
  children: readonly ImmutableNode[],
): ImmutableNode {
  let current: readonly ImmutableNode[] = children;
  for (let i = names.length - 1; i >= 0; i--) {
    current = [
      ImmutableNode.builder().name(names[i]).addChildren(current).create(),
    ];
  }
  return current[0];
}

/**
 * Sets an attribute on the innermost node of a chain built by wrapInPath.
 */
function withLeafAttribute(
  node: ImmutableNode,
  name: string,
  value: unknown,
): ImmutableNode {
  const [child] = node.children;
  return child === undefined
    ? node.withAttribute(name, value)
    : node.withChildAt(0, withLeafAttribute(child, name, value));
}

function combine(existing: unknown, values: readonly unknown[]): unknown {
  const all =
    existing === undefined
      ? [...values]
      : [...(Array.isArray(existing) ? existing : [existing]), ...values];
  return all.length === 1 ? all[0] : all;
}

/**
 * Removes the nodes at the given paths, and then their ancestors, as long
 * as they are empty. The root is never removed. Paths are processed in
 * reverse document order so removals do not shift pending paths.
 */
function pruneEmpty(
  root: ImmutableNode,
  paths: ReadonlyArray<readonly number[]>,
): ImmutableNode {
  const candidates = new Map<string, readonly number[]>();
  for (const path of paths) {
    for (let length = path.length; length > 0; length--) {
      const prefix = path.slice(0, length);
      candidates.set(prefix.join('/'), prefix);
    }
  }

  const ordered = [...candidates.values()].sort((a, b) =>
    compareDocumentOrder(b, a),
  );
  let result = root;
  for (const path of ordered) {
    const node = nodeAtPath(result, path);
    if (node?.isEmpty()) {
      result = updateAtPath(result, path, () => undefined);
    }
  }
  return result;
}
