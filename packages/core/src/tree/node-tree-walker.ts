import type { ImmutableNode } from './immutable-node.js';

/**
 * Callbacks invoked while a tree is traversed. `path` holds the child
 * indices leading from the root to the visited node; `ancestors` the nodes
 * on that way, root first.
 * @public
 */
export interface NodeVisitor {
  visitBeforeChildren?(node: ImmutableNode, context: VisitContext): void;
  visitAfterChildren?(node: ImmutableNode, context: VisitContext): void;
  /** Polled after every callback; true stops the traversal */
  terminate?(): boolean;
}

export interface VisitContext {
  readonly path: readonly number[];
  readonly ancestors: readonly ImmutableNode[];
}

/**
 * Depth-first and breadth-first traversal of node trees.
 * @public
 */
export const NodeTreeWalker = {
  /**
   * Visits every node depth-first, calling `visitBeforeChildren` on the way
   * down and `visitAfterChildren` on the way up.
   */
  walkDFS(root: ImmutableNode | undefined, visitor: NodeVisitor): void {
    if (root !== undefined) {
      dfs(root, { path: [], ancestors: [] }, visitor);
    }
  },

  /**
   * Visits every node level by level. Only `visitBeforeChildren` is called.
   */
  walkBFS(root: ImmutableNode | undefined, visitor: NodeVisitor): void {
    if (root === undefined) {
      return;
    }
    const queue: Array<{ node: ImmutableNode; context: VisitContext }> = [
      { node: root, context: { path: [], ancestors: [] } },
    ];
    while (queue.length > 0) {
      const entry = queue.shift();
      if (entry === undefined) {
        break;
      }
      const { node, context } = entry;
      visitor.visitBeforeChildren?.(node, context);
      if (visitor.terminate?.()) {
        return;
      }
      node.children.forEach((child, index) => {
        queue.push({
          node: child,
          context: {
            path: [...context.path, index],
            ancestors: [...context.ancestors, node],
          },
        });
      });
    }
  },
};

function dfs(
  node: ImmutableNode,
  context: VisitContext,
  visitor: NodeVisitor,
): boolean {
  visitor.visitBeforeChildren?.(node, context);
  if (visitor.terminate?.()) {
    return false;
  }
  for (let index = 0; index < node.children.length; index++) {
    const proceed = dfs(
      node.children[index],
      {
        path: [...context.path, index],
        ancestors: [...context.ancestors, node],
      },
      visitor,
    );
    if (!proceed) {
      return false;
    }
  }
  visitor.visitAfterChildren?.(node, context);
  return !visitor.terminate?.();
}
