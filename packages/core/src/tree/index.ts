export { ImmutableNode, ImmutableNodeBuilder } from './immutable-node.js';
export {
  NodeTreeWalker,
  type NodeVisitor,
  type VisitContext,
} from './node-tree-walker.js';
export {
  NodeCombiner,
  UnionCombiner,
  OverrideCombiner,
  MergeCombiner,
} from './node-combiner.js';
export { NodeModel } from './node-model.js';
export {
  nodeFromObject,
  nodeToObject,
  nodeAtPath,
  updateAtPath,
  mapValues,
  compareDocumentOrder,
  splitListValues,
  splitNodeValues,
  type PlainTree,
} from './tree-utils.js';
