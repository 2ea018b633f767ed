import type { Expression } from '@cfgtree/models';
import type { ImmutableNode } from '../tree/immutable-node.js';

/**
 * One match of a query: either a node, or an attribute of a node.
 * `path` holds the child indices from the queried root to `node`.
 * @public
 */
export type QueryResult =
  | {
      readonly kind: 'node';
      readonly node: ImmutableNode;
      readonly path: readonly number[];
    }
  | {
      readonly kind: 'attribute';
      readonly node: ImmutableNode;
      readonly path: readonly number[];
      readonly attributeName: string;
      readonly attributeValue: unknown;
    };

/**
 * Where and how a new property is added to a tree.
 * @public
 */
export interface NodeAddData {
  /** The deepest existing node on the key's path */
  readonly parent: ImmutableNode;
  readonly parentPath: readonly number[];
  /** Names of the intermediate nodes that do not exist yet */
  readonly pathNodes: readonly string[];
  /** Name of the new node or attribute */
  readonly newNodeName: string;
  readonly isAttribute: boolean;
}

/**
 * Interprets configuration keys against node trees.
 * @public
 */
export interface IExpressionEngine {
  parse(key: string): Expression;

  query(root: ImmutableNode, key: string | Expression): QueryResult[];

  /**
   * Key of a node below a parent with the given key; the root has the
   * empty key.
   */
  nodeKey(node: ImmutableNode, parentKey: string | undefined): string;

  attributeKey(parentKey: string | undefined, attributeName: string): string;

  /**
   * Key of a node including its occurrence index among same-named siblings.
   */
  canonicalKey(
    node: ImmutableNode,
    parentKey: string | undefined,
    parent: ImmutableNode,
  ): string;

  prepareAdd(root: ImmutableNode, key: string): NodeAddData;
}
