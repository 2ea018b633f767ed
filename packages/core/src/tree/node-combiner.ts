import { ImmutableNode } from './immutable-node.js';

/**
 * Merges two node trees into one. Combined configurations use a combiner to
 * build their root from the roots of their children.
 *
 * Nodes registered as list nodes are never merged with their counterparts;
 * both copies are kept side by side.
 * @public
 */
export abstract class NodeCombiner {
  private readonly listNodes = new Set<string>();

  /**
   * Marks a node name as a list node.
   */
  public addListNode(name: string): void {
    this.listNodes.add(name);
  }

  public getListNodes(): ReadonlySet<string> {
    return new Set(this.listNodes);
  }

  public isListNode(node: ImmutableNode): boolean {
    return this.listNodes.has(node.name);
  }

  public abstract combine(
    node1: ImmutableNode,
    node2: ImmutableNode,
  ): ImmutableNode;

  /**
   * Attributes of node1, plus the attributes of node2 node1 does not have.
   */
  protected combinedAttributes(
    node1: ImmutableNode,
    node2: ImmutableNode,
  ): Map<string, unknown> {
    const attributes = new Map(node2.attributes);
    for (const [name, value] of node1.attributes) {
      attributes.set(name, value);
    }
    return attributes;
  }
}

/**
 * Builds the union of two trees. A child of node1 is combined with a child
 * of node2 only if each parent has exactly one child of that name and
 * neither child has a value; all other children of both nodes are kept.
 * @example
 * ```typescript
 * // node1: <database><tables><table><name>users</name></table></tables></database>
 * // node2: <database><tables><table><name>documents</name></table></tables></database>
 * // union: <database><tables><table><name>users</name><name>documents</name></table></tables></database>
 * // with 'table' as list node the two tables stay separate
 * ```
 * @public
 */
export class UnionCombiner extends NodeCombiner {
  public combine(node1: ImmutableNode, node2: ImmutableNode): ImmutableNode {
    const result = ImmutableNode.builder()
      .name(node1.name)
      .addAttributes(this.combinedAttributes(node1, node2));

    const children2 = [...node2.children];
    for (const child1 of node1.children) {
      const child2 = this.findCombineNode(node1, node2, child1);
      if (child2 !== undefined) {
        result.addChild(this.combine(child1, child2));
        removeNode(children2, child2);
      } else {
        result.addChild(child1);
      }
    }
    result.addChildren(children2);

    return result.create();
  }

  protected findCombineNode(
    node1: ImmutableNode,
    node2: ImmutableNode,
    child: ImmutableNode,
  ): ImmutableNode | undefined {
    if (
      child.value === undefined &&
      !this.isListNode(child) &&
      node1.getChildrenCount(child.name) === 1 &&
      node2.getChildrenCount(child.name) === 1
    ) {
      const child2 = node2.getChild(child.name);
      if (child2 !== undefined && child2.value === undefined) {
        return child2;
      }
    }
    return undefined;
  }
}

/**
 * Node1 overrides node2: values and attributes of node1 win, children of
 * node2 are only taken over for names node1 does not have. Unique children
 * present in both trees are combined recursively.
 * @public
 */
export class OverrideCombiner extends NodeCombiner {
  public combine(node1: ImmutableNode, node2: ImmutableNode): ImmutableNode {
    const result = ImmutableNode.builder()
      .name(node1.name)
      .value(node1.value ?? node2.value)
      .addAttributes(this.combinedAttributes(node1, node2));

    for (const child of node1.children) {
      const child2 = this.canCombine(node1, node2, child);
      result.addChild(
        child2 !== undefined ? this.combine(child, child2) : child,
      );
    }
    for (const child of node2.children) {
      if (node1.getChildrenCount(child.name) === 0) {
        result.addChild(child);
      }
    }

    return result.create();
  }

  protected canCombine(
    node1: ImmutableNode,
    node2: ImmutableNode,
    child: ImmutableNode,
  ): ImmutableNode | undefined {
    if (
      !this.isListNode(child) &&
      node1.getChildrenCount(child.name) === 1 &&
      node2.getChildrenCount(child.name) === 1
    ) {
      return node2.getChild(child.name);
    }
    return undefined;
  }
}

/**
 * Like the union, but children are paired by their attributes: a child of
 * node1 is combined with the single child of node2 that has the same name
 * and matching attribute values. When several candidates match, none is
 * combined and, unless the name is a list node, the candidates are dropped.
 * @public
 */
export class MergeCombiner extends NodeCombiner {
  public combine(node1: ImmutableNode, node2: ImmutableNode): ImmutableNode {
    const result = ImmutableNode.builder()
      .name(node1.name)
      .value(node1.value ?? node2.value)
      .addAttributes(this.combinedAttributes(node1, node2));

    const children2 = [...node2.children];
    for (const child1 of node1.children) {
      const child2 = this.canCombine(node2, child1, children2);
      if (child2 !== undefined) {
        result.addChild(this.combine(child1, child2));
        removeNode(children2, child2);
      } else {
        result.addChild(child1);
      }
    }
    result.addChildren(children2);

    return result.create();
  }

  protected canCombine(
    node2: ImmutableNode,
    child: ImmutableNode,
    children2: ImmutableNode[],
  ): ImmutableNode | undefined {
    const candidates = node2
      .getChildren(child.name)
      .filter((candidate) => matchAttributes(child, candidate));
    if (candidates.length === 1) {
      return candidates[0];
    }
    if (candidates.length > 1 && !this.isListNode(child)) {
      for (const candidate of candidates) {
        removeNode(children2, candidate);
      }
    }
    return undefined;
  }
}

function matchAttributes(node: ImmutableNode, candidate: ImmutableNode): boolean {
  for (const [name, value] of node.attributes) {
    if (!candidate.attributes.has(name) || candidate.attributes.get(name) !== value) {
      return false;
    }
  }
  return true;
}

function removeNode(nodes: ImmutableNode[], node: ImmutableNode): void {
  const index = nodes.indexOf(node);
  if (index >= 0) {
    nodes.splice(index, 1);
  }
}
