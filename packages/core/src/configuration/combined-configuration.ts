import type { ConfigurationOptionsInput } from '@cfgtree/schemas';
import { createScopedLogger, type ILogger } from '../logger.js';
import { ImmutableNode } from '../tree/immutable-node.js';
import { type NodeCombiner, UnionCombiner } from '../tree/node-combiner.js';
import type { NodeModel } from '../tree/node-model.js';
import { BaseHierarchicalConfiguration } from './base-hierarchical-configuration.js';

interface ConfigurationEntry {
  readonly configuration: BaseHierarchicalConfiguration;
  readonly name: string | undefined;
  /** Names of the nodes the child's content is placed below */
  readonly at: readonly string[];
}

/**
 * A configuration whose content is combined from child configurations.
 *
 * Children are combined in the order they were added; the node combiner
 * decides how overlapping content is merged. The combined tree is rebuilt
 * on the next access after a child was added or removed, or after a child's
 * content changed. Changes made directly on the combined configuration last
 * until that rebuild.
 * @example
 * ```typescript
 * const combined = new CombinedConfiguration(new OverrideCombiner());
 * combined.addConfiguration(userSettings, 'user');
 * combined.addConfiguration(defaults, 'defaults');
 * combined.getString('ui.theme'); // user value if set, default otherwise
 * ```
 * @public
 */
export class CombinedConfiguration extends BaseHierarchicalConfiguration {
  private entries: ConfigurationEntry[] = [];
  private nodeCombiner: NodeCombiner;
  private combinedFrom: readonly ImmutableNode[] | undefined;

  public constructor(
    nodeCombiner: NodeCombiner = new UnionCombiner(),
    options: ConfigurationOptionsInput = {},
    logger: ILogger = createScopedLogger('combined-configuration'),
  ) {
    super(options, undefined, logger);
    this.nodeCombiner = nodeCombiner;
  }

  /**
   * Adds a child configuration.
   * @param name - Optional unique name for later retrieval
   * @param at - Key below which the child's content is placed
   * @throws \{Error\} When the name is already taken
   */
  public addConfiguration(
    configuration: BaseHierarchicalConfiguration,
    name?: string,
    at?: string,
  ): void {
    if (name !== undefined && this.getConfiguration(name) !== undefined) {
      throw new Error(`Configuration '${name}' is already registered`);
    }
    const path =
      at === undefined
        ? []
        : this.getExpressionEngine()
            .parse(at)
            .segments.map((segment) => segment.name);
    this.entries = [...this.entries, { configuration, name, at: path }];
    this.invalidate();
  }

  /**
   * @returns true if the configuration was a child
   */
  public removeConfiguration(
    configuration: BaseHierarchicalConfiguration | string,
  ): boolean {
    const remaining = this.entries.filter((entry) =>
      typeof configuration === 'string'
        ? entry.name !== configuration
        : entry.configuration !== configuration,
    );
    if (remaining.length === this.entries.length) {
      return false;
    }
    this.entries = remaining;
    this.invalidate();
    return true;
  }

  public getConfiguration(
    name: string,
  ): BaseHierarchicalConfiguration | undefined {
    return this.entries.find((entry) => entry.name === name)?.configuration;
  }

  public getConfigurationNames(): string[] {
    return this.entries.flatMap((entry) =>
      entry.name === undefined ? [] : [entry.name],
    );
  }

  public getNumberOfConfigurations(): number {
    return this.entries.length;
  }

  public getNodeCombiner(): NodeCombiner {
    return this.nodeCombiner;
  }

  public setNodeCombiner(nodeCombiner: NodeCombiner): void {
    this.nodeCombiner = nodeCombiner;
    this.invalidate();
  }

  /**
   * Forces a rebuild of the combined tree on the next access.
   */
  public invalidate(): void {
    this.combinedFrom = undefined;
  }

  protected override nodeModel(): NodeModel {
    const roots = this.entries.map((entry) =>
      entry.configuration.getRootNode(),
    );
    if (!this.isCombinedFrom(roots)) {
      this.model.setRootNode(this.combine(roots));
      this.combinedFrom = roots;
      this.logger.debug('Rebuilt combined configuration', {
        configurations: roots.length,
      });
    }
    return this.model;
  }

  private isCombinedFrom(roots: readonly ImmutableNode[]): boolean {
    const previous = this.combinedFrom;
    return (
      previous !== undefined &&
      previous.length === roots.length &&
      previous.every((root, index) => root === roots[index])
    );
  }

  private combine(roots: readonly ImmutableNode[]): ImmutableNode {
    const placed = roots.map((root, index) =>
      placeAt(root, this.entries[index].at),
    );
    const [first, ...rest] = placed;
    if (first === undefined) {
      return ImmutableNode.of('');
    }
    return rest.reduce(
      (combined, root) => this.nodeCombiner.combine(combined, root),
      first,
    );
  }
}

/**
 * Moves a root below a chain of new nodes; the innermost one takes over
 * the root's content.
 */
function placeAt(root: ImmutableNode, path: readonly string[]): ImmutableNode {
  if (path.length === 0) {
    return root;
  }
  let node = root.withName(path[path.length - 1]);
  for (let i = path.length - 2; i >= 0; i--) {
    node = ImmutableNode.builder().name(path[i]).addChild(node).create();
  }
  return ImmutableNode.builder().name('').addChild(node).create();
}
