/**
 * A path segment selecting child nodes by name, optionally a single
 * occurrence of a repeated name.
 */
export interface NodeSegment {
  readonly kind: 'node';
  readonly name: string;
  /** 0-based occurrence index; undefined selects every occurrence */
  readonly index?: number;
}

/**
 * A trailing path segment selecting an attribute of the matched nodes.
 */
export interface AttributeSegment {
  readonly kind: 'attribute';
  readonly name: string;
}

export type PathSegment = NodeSegment | AttributeSegment;

/**
 * A parsed path expression. Only the last segment may be an attribute
 * segment. An empty segment list addresses the root node.
 */
export interface Expression {
  readonly key: string;
  readonly segments: readonly PathSegment[];
}
