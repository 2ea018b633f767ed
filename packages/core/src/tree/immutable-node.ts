import { entriesOf, type KeyedSource } from '../utils/entries.js';

/**
 * Immutable node of a hierarchical configuration tree.
 *
 * Every node has a name, an optional value, ordered attributes and an ordered
 * list of children (names may repeat). Nodes are never changed in place: the
 * `with*`/`without*` methods return new nodes that share all untouched
 * subtrees with the original, so readers holding a root keep a stable
 * snapshot.
 * @example
 * ```typescript
 * const table = ImmutableNode.builder()
 *   .name('table')
 *   .addAttribute('type', 'system')
 *   .addChild(ImmutableNode.of('name', 'users'))
 *   .create();
 * const renamed = table.withAttribute('type', 'application');
 * // table is unchanged
 * ```
 * @public
 */
export class ImmutableNode {
  public readonly name: string;
  /** undefined when the node carries no value */
  public readonly value: unknown;
  public readonly attributes: ReadonlyMap<string, unknown>;
  public readonly children: readonly ImmutableNode[];

  private constructor(
    name: string,
    value: unknown,
    attributes: ReadonlyMap<string, unknown>,
    children: readonly ImmutableNode[],
  ) {
    this.name = name;
    this.value = value === null ? undefined : value;
    this.attributes = attributes;
    this.children = Object.freeze(children);
  }

  public static builder(): ImmutableNodeBuilder {
    return new ImmutableNodeBuilder();
  }

  /**
   * Shorthand for a leaf node.
   */
  public static of(name: string, value?: unknown): ImmutableNode {
    return new ImmutableNode(name, value, new Map(), []);
  }

  /** @internal */
  public static create(
    name: string,
    value: unknown,
    attributes: ReadonlyMap<string, unknown>,
    children: readonly ImmutableNode[],
  ): ImmutableNode {
    return new ImmutableNode(name, value, attributes, children);
  }

  public hasValue(): boolean {
    return this.value !== undefined;
  }

  /**
   * A node is empty when it has neither value, attributes nor children.
   */
  public isEmpty(): boolean {
    return (
      this.value === undefined &&
      this.attributes.size === 0 &&
      this.children.length === 0
    );
  }

  public getChildren(name?: string): readonly ImmutableNode[] {
    if (name === undefined) {
      return this.children;
    }
    return this.children.filter((child) => child.name === name);
  }

  /**
   * Returns the index-th child with the given name.
   */
  public getChild(name: string, index = 0): ImmutableNode | undefined {
    return this.getChildren(name)[index];
  }

  public getChildrenCount(name?: string): number {
    return name === undefined
      ? this.children.length
      : this.getChildren(name).length;
  }

  public getAttribute(name: string): unknown {
    return this.attributes.get(name);
  }

  public withName(name: string): ImmutableNode {
    if (name === this.name) {
      return this;
    }
    return new ImmutableNode(name, this.value, this.attributes, this.children);
  }

  public withValue(value: unknown): ImmutableNode {
    if (value === this.value) {
      return this;
    }
    return new ImmutableNode(this.name, value, this.attributes, this.children);
  }

  /**
   * Appends a child after the existing ones.
   */
  public withChild(child: ImmutableNode): ImmutableNode {
    return this.withNewChildren([...this.children, child]);
  }

  /**
   * Appends several children in order.
   */
  public addChildren(children: Iterable<ImmutableNode>): ImmutableNode {
    const added = [...children];
    if (added.length === 0) {
      return this;
    }
    return this.withNewChildren([...this.children, ...added]);
  }

  /**
   * Removes exactly one child: the given instance if present, otherwise the
   * first structurally equal child.
   */
  public withoutChild(child: ImmutableNode): ImmutableNode {
    let index = this.children.indexOf(child);
    if (index < 0) {
      index = this.children.findIndex((candidate) => candidate.equals(child));
    }
    return index < 0 ? this : this.withoutChildAt(index);
  }

  /**
   * Removes every child with the given name.
   */
  public withoutChildren(name: string): ImmutableNode {
    const remaining = this.children.filter((child) => child.name !== name);
    return remaining.length === this.children.length
      ? this
      : this.withNewChildren(remaining);
  }

  /**
   * Replaces one child; returns this node when the old child is not found.
   */
  public replaceChild(
    oldChild: ImmutableNode,
    newChild: ImmutableNode,
  ): ImmutableNode {
    const index = this.children.indexOf(oldChild);
    return index < 0 ? this : this.withChildAt(index, newChild);
  }

  /**
   * Replaces the whole child list.
   */
  public replaceChildren(children: Iterable<ImmutableNode>): ImmutableNode {
    return this.withNewChildren([...children]);
  }

  /** @internal */
  public withChildAt(index: number, child: ImmutableNode): ImmutableNode {
    if (this.children[index] === child) {
      return this;
    }
    const children = [...this.children];
    children[index] = child;
    return this.withNewChildren(children);
  }

  /** @internal */
  public withoutChildAt(index: number): ImmutableNode {
    if (index < 0 || index >= this.children.length) {
      return this;
    }
    const children = [...this.children];
    children.splice(index, 1);
    return this.withNewChildren(children);
  }

  public withAttribute(name: string, value: unknown): ImmutableNode {
    const attributes = new Map(this.attributes);
    attributes.set(name, value);
    return new ImmutableNode(this.name, this.value, attributes, this.children);
  }

  public withAttributes(
    attributes: KeyedSource<unknown>,
  ): ImmutableNode {
    const merged = new Map(this.attributes);
    for (const [name, value] of entriesOf(attributes)) {
      merged.set(name, value);
    }
    return new ImmutableNode(this.name, this.value, merged, this.children);
  }

  public withoutAttribute(name: string): ImmutableNode {
    if (!this.attributes.has(name)) {
      return this;
    }
    const attributes = new Map(this.attributes);
    attributes.delete(name);
    return new ImmutableNode(this.name, this.value, attributes, this.children);
  }

  /**
   * Structural equality: name, value, attributes (in any order) and children
   * (in order).
   */
  public equals(other: ImmutableNode): boolean {
    if (this === other) {
      return true;
    }
    if (
      this.name !== other.name ||
      !valuesEqual(this.value, other.value) ||
      this.attributes.size !== other.attributes.size ||
      this.children.length !== other.children.length
    ) {
      return false;
    }
    for (const [name, value] of this.attributes) {
      if (!other.attributes.has(name)) {
        return false;
      }
      if (!valuesEqual(value, other.attributes.get(name))) {
        return false;
      }
    }
    return this.children.every((child, index) =>
      child.equals(other.children[index]),
    );
  }

  public toString(): string {
    const value = this.value === undefined ? '' : ` = ${String(this.value)}`;
    return `ImmutableNode [name=${this.name}${value}, children=${this.children.length}]`;
  }

  private withNewChildren(children: ImmutableNode[]): ImmutableNode {
    return new ImmutableNode(this.name, this.value, this.attributes, children);
  }
}

/**
 * Collects the parts of a node before creating it in one step.
 * @public
 */
export class ImmutableNodeBuilder {
  private nodeName = '';
  private nodeValue: unknown;
  private readonly nodeAttributes = new Map<string, unknown>();
  private readonly nodeChildren: ImmutableNode[] = [];

  public name(name: string): this {
    this.nodeName = name;
    return this;
  }

  public value(value: unknown): this {
    this.nodeValue = value;
    return this;
  }

  public addChild(child: ImmutableNode | undefined): this {
    if (child !== undefined) {
      this.nodeChildren.push(child);
    }
    return this;
  }

  public addChildren(children: Iterable<ImmutableNode>): this {
    for (const child of children) {
      this.nodeChildren.push(child);
    }
    return this;
  }

  public addAttribute(name: string, value: unknown): this {
    this.nodeAttributes.set(name, value);
    return this;
  }

  public addAttributes(
    attributes: KeyedSource<unknown>,
  ): this {
    for (const [name, value] of entriesOf(attributes)) {
      this.nodeAttributes.set(name, value);
    }
    return this;
  }

  public create(): ImmutableNode {
    return ImmutableNode.create(
      this.nodeName,
      this.nodeValue,
      new Map(this.nodeAttributes),
      [...this.nodeChildren],
    );
  }
}

function valuesEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) {
    return true;
  }
  if (Array.isArray(a) && Array.isArray(b)) {
    return (
      a.length === b.length && a.every((item, index) => valuesEqual(item, b[index]))
    );
  }
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  return false;
}
