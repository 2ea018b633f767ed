/**
 * Hierarchical configuration: typed, interpolating access to a tree of
 * configuration nodes addressed by keys.
 * @public
 */

import Emittery from 'emittery';
import {
  ConfigurationEventType,
  type ConfigurationEvents,
  type IListDelimiterHandler,
  type ILookup,
} from '@cfgtree/models';
import {
  ConfigurationOptionsSchema,
  type ConfigurationOptions,
  type ConfigurationOptionsInput,
} from '@cfgtree/schemas';
import {
  DefaultListDelimiterHandler,
  DisabledListDelimiterHandler,
  LegacyListDelimiterHandler,
} from '../convert/list-delimiter-handler.js';
import { PropertyConverter } from '../convert/property-converter.js';
import {
  ConversionError,
  InvalidExpressionError,
  MissingPropertyError,
} from '../errors/index.js';
import { DefaultExpressionEngine } from '../expr/expression-engine.js';
import type { IExpressionEngine, QueryResult } from '../expr/types.js';
import { ConfigurationInterpolator } from '../interpol/configuration-interpolator.js';
import {
  ConfigurationLookup,
  type IRawPropertySource,
} from '../interpol/lookups/configuration-lookup.js';
import { getDefaultPrefixLookups } from '../interpol/lookups/default-lookups.js';
import { createScopedLogger, type ILogger } from '../logger.js';
import type { KeyedSource } from '../utils/entries.js';
import { ImmutableNode } from '../tree/immutable-node.js';
import { NodeModel } from '../tree/node-model.js';
import { NodeTreeWalker } from '../tree/node-tree-walker.js';
import {
  mapValues,
  splitListValues,
  splitNodeValues,
} from '../tree/tree-utils.js';

type ConfigurationEventListener = (
  event: ConfigurationEvents[ConfigurationEventType],
) => void | Promise<void>;

/**
 * @example
 * ```typescript
 * const config = new BaseHierarchicalConfiguration();
 * config.addProperty('database.host', 'localhost');
 * config.addProperty('database.url', 'jdbc://${database.host}/app');
 * config.addProperty('tables.table.name', ['users', 'groups']);
 *
 * config.getString('database.url'); // 'jdbc://localhost/app'
 * config.getString('tables.table.name(1)'); // 'groups'
 * config.getList('tables.table.name'); // ['users', 'groups']
 * ```
 */
export class BaseHierarchicalConfiguration implements IRawPropertySource {
  protected readonly model: NodeModel;
  protected readonly logger: ILogger;
  private readonly options: ConfigurationOptions;
  private readonly events = new Emittery<ConfigurationEvents>();
  private readonly configurationLookup: ILookup;
  private interpolator: ConfigurationInterpolator;
  private interpolationParent: BaseHierarchicalConfiguration | undefined;
  private listDelimiterHandler: IListDelimiterHandler;
  private expressionEngine: IExpressionEngine;
  private throwExceptionOnMissing: boolean;

  /**
   * @param options - Validated with ConfigurationOptionsSchema
   * @param root - Initial content; string values holding several list
   * elements are split by the list delimiter handler
   * @throws \{ZodError\} When the options are invalid
   */
  public constructor(
    options: ConfigurationOptionsInput = {},
    root?: ImmutableNode,
    logger: ILogger = createScopedLogger('configuration'),
  ) {
    this.options = ConfigurationOptionsSchema.parse(options);
    this.logger = logger;
    this.listDelimiterHandler = createListDelimiterHandler(this.options);
    this.model = new NodeModel(
      root === undefined
        ? undefined
        : splitListValues(root, this.listDelimiterHandler),
    );
    this.expressionEngine =
      this.options.expressionSymbols === undefined
        ? DefaultExpressionEngine.INSTANCE
        : new DefaultExpressionEngine(this.options.expressionSymbols);
    this.throwExceptionOnMissing = this.options.throwExceptionOnMissing;
    this.configurationLookup = new ConfigurationLookup(this);
    this.interpolator = ConfigurationInterpolator.fromSpecification({
      prefixLookups: getDefaultPrefixLookups(),
      defaultLookups: [this.configurationLookup],
      enableSubstitutionInVariables: this.options.enableSubstitutionInVariables,
    });
  }

  // ---------------------------------------------------------------------
  // Reading
  // ---------------------------------------------------------------------

  public getRootNode(): ImmutableNode {
    return this.nodeModel().getRootNode();
  }

  /**
   * The stored value(s) without interpolation: undefined when nothing
   * matches, the value itself for a single match, an array otherwise.
   */
  public getRawProperty(key: string): unknown {
    const values = this.collectValues(this.query(key));
    if (values.length === 0) {
      return undefined;
    }
    return values.length === 1 ? values[0] : values;
  }

  /**
   * Like getRawProperty, with every value interpolated.
   */
  public getProperty(key: string): unknown {
    return this.interpolate(this.getRawProperty(key));
  }

  public containsKey(key: string): boolean {
    return this.getRawProperty(key) !== undefined;
  }

  /**
   * True when no node of the tree carries a value or an attribute.
   */
  public isEmpty(): boolean {
    let found = false;
    NodeTreeWalker.walkDFS(this.getRootNode(), {
      visitBeforeChildren: (node) => {
        found ||= node.hasValue() || node.attributes.size > 0;
      },
      terminate: () => found,
    });
    return !found;
  }

  /**
   * Keys of all values and attributes in document order, without
   * duplicates. With a prefix, only the prefix itself and keys below it.
   */
  public getKeys(prefix?: string): string[] {
    const engine = this.getExpressionEngine();
    const keys = new Set<string>();
    const keyStack: string[] = [];

    NodeTreeWalker.walkDFS(this.getRootNode(), {
      visitBeforeChildren: (node, { path }) => {
        const key =
          path.length === 0
            ? ''
            : engine.nodeKey(node, keyStack[keyStack.length - 1]);
        keyStack.push(key);
        if (path.length > 0 && node.hasValue()) {
          keys.add(key);
        }
        for (const attribute of node.attributes.keys()) {
          keys.add(engine.attributeKey(key, attribute));
        }
      },
      visitAfterChildren: () => {
        keyStack.pop();
      },
    });

    const result = [...keys];
    if (prefix === undefined) {
      return result;
    }
    const { propertyDelimiter, attributeStart } = this.symbolsFor(engine);
    return result.filter(
      (key) =>
        key === prefix ||
        key.startsWith(prefix + propertyDelimiter) ||
        key.startsWith(prefix + attributeStart),
    );
  }

  /**
   * First value at the key, interpolated and converted to a string.
   */
  public getString(key: string): string | undefined;
  public getString(key: string, defaultValue: string): string;
  public getString(key: string, defaultValue?: string): string | undefined {
    return this.convertedValue(key, defaultValue, (value) =>
      PropertyConverter.toStringValue(value) ?? '',
    );
  }

  /**
   * All values at the key as interpolated strings.
   */
  public getStringArray(key: string): string[] {
    return this.getList(key).flatMap((value) => {
      const text = PropertyConverter.toStringValue(value);
      return text === undefined ? [] : [text];
    });
  }

  /**
   * All values at the key, each interpolated. Missing keys give the default
   * or an empty list.
   */
  public getList(key: string, defaultValue?: readonly unknown[]): unknown[] {
    const raw = this.getRawProperty(key);
    if (raw === undefined) {
      return defaultValue === undefined ? [] : [...defaultValue];
    }
    const values = Array.isArray(raw) ? raw : [raw];
    return values.map((value) => this.interpolate(value));
  }

  public getNumber(key: string): number | undefined;
  public getNumber(key: string, defaultValue: number): number;
  public getNumber(key: string, defaultValue?: number): number | undefined {
    return this.convertedValue(key, defaultValue, PropertyConverter.toNumber);
  }

  public getInt(key: string): number | undefined;
  public getInt(key: string, defaultValue: number): number;
  public getInt(key: string, defaultValue?: number): number | undefined {
    return this.convertedValue(key, defaultValue, PropertyConverter.toInteger);
  }

  public getBigInt(key: string): bigint | undefined;
  public getBigInt(key: string, defaultValue: bigint): bigint;
  public getBigInt(key: string, defaultValue?: bigint): bigint | undefined {
    return this.convertedValue(key, defaultValue, PropertyConverter.toBigInt);
  }

  public getBoolean(key: string): boolean | undefined;
  public getBoolean(key: string, defaultValue: boolean): boolean;
  public getBoolean(key: string, defaultValue?: boolean): boolean | undefined {
    return this.convertedValue(key, defaultValue, PropertyConverter.toBoolean);
  }

  public getDate(key: string): Date | undefined;
  public getDate(key: string, defaultValue: Date): Date;
  public getDate(key: string, defaultValue?: Date): Date | undefined {
    return this.convertedValue(key, defaultValue, PropertyConverter.toDate);
  }

  // ---------------------------------------------------------------------
  // Writing
  // ---------------------------------------------------------------------

  /**
   * Adds values at the key. Strings are split by the list delimiter
   * handler, arrays add one node per element.
   */
  public addProperty(key: string, value: unknown): void {
    const values = this.getListDelimiterHandler().parse(value);
    this.nodeModel().addProperty(key, values, this.getExpressionEngine());
    this.fireEvent(ConfigurationEventType.ADD_PROPERTY, key, value);
  }

  /**
   * Replaces the values at the key; see NodeModel.setProperty for how
   * values are distributed over existing nodes.
   */
  public setProperty(key: string, value: unknown): void {
    const values = this.getListDelimiterHandler().parse(value);
    this.nodeModel().setProperty(key, values, this.getExpressionEngine());
    this.fireEvent(ConfigurationEventType.SET_PROPERTY, key, value);
  }

  /**
   * Adds subtrees below the node selected by the key. Their string values
   * are split like those of a tree passed to the constructor.
   */
  public addNodes(key: string, nodes: readonly ImmutableNode[]): void {
    const handler = this.getListDelimiterHandler();
    this.nodeModel().addNodes(
      key,
      nodes.flatMap((node) => splitNodeValues(node, handler)),
      this.getExpressionEngine(),
    );
    this.fireEvent(ConfigurationEventType.ADD_NODES, key, nodes);
  }

  public clearProperty(key: string): void {
    this.nodeModel().clearProperty(key, this.getExpressionEngine());
    this.fireEvent(ConfigurationEventType.CLEAR_PROPERTY, key);
  }

  /**
   * Removes the nodes selected by the key together with their subtrees.
   * @returns The removed matches
   */
  public clearTree(key: string): QueryResult[] {
    const removed = this.nodeModel().clearTree(key, this.getExpressionEngine());
    this.fireEvent(ConfigurationEventType.CLEAR_TREE, key);
    return removed;
  }

  public clear(): void {
    this.nodeModel().clear();
    this.fireEvent(ConfigurationEventType.CLEAR);
  }

  // ---------------------------------------------------------------------
  // Sub configurations
  // ---------------------------------------------------------------------

  /**
   * A configuration with the content below the prefix. Children and
   * attributes of all matching nodes are merged; the value is kept only
   * when exactly one match has a value. Values are interpolated through
   * this configuration's interpolator.
   */
  public subset(prefix: string): BaseHierarchicalConfiguration {
    const matches = this.query(prefix).flatMap((result) =>
      result.kind === 'node' ? [result.node] : [],
    );
    const builder = ImmutableNode.builder().name(this.getRootNode().name);
    const withValue = matches.filter((node) => node.hasValue());
    if (withValue.length === 1) {
      builder.value(withValue[0].value);
    }
    for (const node of matches) {
      builder.addChildren(node.children).addAttributes(node.attributes);
    }

    const result = this.createSubConfiguration(builder.create());
    result.interpolationParent = this;
    return result;
  }

  /**
   * An independent configuration rooted at the single node selected by the
   * key. Variables unknown to it are resolved through this configuration.
   * @throws \{InvalidExpressionError\} When the key does not select exactly
   * one node
   */
  public configurationAt(key: string): BaseHierarchicalConfiguration {
    const matches = this.nodeResults(key);
    if (matches.length !== 1) {
      throw InvalidExpressionError.malformed(
        key,
        `the key must select exactly one node, found ${matches.length}`,
      );
    }
    return this.createChildConfiguration(matches[0]);
  }

  /**
   * One configuration per node selected by the key.
   */
  public configurationsAt(key: string): BaseHierarchicalConfiguration[] {
    return this.nodeResults(key).map((node) =>
      this.createChildConfiguration(node),
    );
  }

  /**
   * One configuration per child of the node selected by the key; empty
   * unless the key selects exactly one node.
   */
  public childConfigurationsAt(key: string): BaseHierarchicalConfiguration[] {
    const matches = this.nodeResults(key);
    if (matches.length !== 1) {
      return [];
    }
    return matches[0].children.map((child) =>
      this.createChildConfiguration(child),
    );
  }

  /**
   * A copy in which every value has been interpolated.
   */
  public interpolatedConfiguration(): BaseHierarchicalConfiguration {
    const root = mapValues(this.getRootNode(), (value) =>
      this.interpolate(value),
    );
    return this.createSubConfiguration(root);
  }

  /**
   * A copy sharing the current tree and the registered lookups. Later
   * changes to either configuration do not affect the other.
   */
  public copy(): BaseHierarchicalConfiguration {
    const copy = this.createSubConfiguration(this.getRootNode());
    copy.installInterpolator(
      this.interpolator.getLookups(),
      this.interpolator
        .getDefaultLookups()
        .filter((lookup) => lookup !== this.configurationLookup),
    );
    copy.interpolator.setParentInterpolator(
      this.interpolator.getParentInterpolator(),
    );
    copy.interpolationParent = this.interpolationParent;
    return copy;
  }

  // ---------------------------------------------------------------------
  // Settings
  // ---------------------------------------------------------------------

  public getInterpolator(): ConfigurationInterpolator {
    return this.interpolationParent?.getInterpolator() ?? this.interpolator;
  }

  /**
   * Replaces the interpolator with one using the given lookups. The lookup
   * for this configuration's own keys stays the last default lookup; the
   * parent interpolator is kept.
   */
  public installInterpolator(
    prefixLookups: KeyedSource<ILookup>,
    defaultLookups: readonly ILookup[] = [],
  ): void {
    this.interpolator = ConfigurationInterpolator.fromSpecification({
      prefixLookups,
      defaultLookups: [...defaultLookups, this.configurationLookup],
      parentInterpolator: this.interpolator.getParentInterpolator(),
      enableSubstitutionInVariables:
        this.interpolator.isEnableSubstitutionInVariables(),
    });
  }

  public setParentInterpolator(
    parent: ConfigurationInterpolator | undefined,
  ): void {
    this.interpolator.setParentInterpolator(parent);
  }

  public getListDelimiterHandler(): IListDelimiterHandler {
    return this.listDelimiterHandler;
  }

  public setListDelimiterHandler(handler: IListDelimiterHandler): void {
    this.listDelimiterHandler = handler;
  }

  public getExpressionEngine(): IExpressionEngine {
    return this.expressionEngine;
  }

  public setExpressionEngine(engine: IExpressionEngine): void {
    this.expressionEngine = engine;
  }

  public isThrowExceptionOnMissing(): boolean {
    return this.throwExceptionOnMissing;
  }

  public setThrowExceptionOnMissing(enabled: boolean): void {
    this.throwExceptionOnMissing = enabled;
  }

  /**
   * Subscribes to change events.
   * @returns A function removing the listener
   */
  public on(
    event: ConfigurationEventType,
    listener: ConfigurationEventListener,
  ): () => void {
    return this.events.on(event, listener);
  }

  /**
   * Resolves with the next event of the given type.
   */
  public once(
    event: ConfigurationEventType,
  ): Promise<ConfigurationEvents[ConfigurationEventType]> {
    return this.events.once(event);
  }

  // ---------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------

  /**
   * The node model, brought up to date. Subclasses that derive their tree
   * from other sources refresh it here.
   */
  protected nodeModel(): NodeModel {
    return this.model;
  }

  /**
   * Interpolates a value; arrays element by element.
   */
  protected interpolate(value: unknown): unknown {
    if (Array.isArray(value)) {
      return value.map((element) => this.interpolate(element));
    }
    return this.getInterpolator().interpolate(value);
  }

  protected fireEvent(
    type: ConfigurationEventType,
    key?: string,
    value?: unknown,
  ): void {
    this.logger.debug('Configuration changed', { type, key });
    void this.events.emit(type, {
      type,
      key,
      value,
      timestamp: new Date().toISOString(),
    });
  }

  private createSubConfiguration(
    root: ImmutableNode,
  ): BaseHierarchicalConfiguration {
    const result = new BaseHierarchicalConfiguration(
      this.options,
      undefined,
      this.logger,
    );
    // values of an existing tree are split already
    result.model.setRootNode(root);
    result.listDelimiterHandler = this.listDelimiterHandler;
    result.expressionEngine = this.expressionEngine;
    result.throwExceptionOnMissing = this.throwExceptionOnMissing;
    return result;
  }

  private createChildConfiguration(
    root: ImmutableNode,
  ): BaseHierarchicalConfiguration {
    const result = this.createSubConfiguration(root);
    result.setParentInterpolator(this.getInterpolator());
    return result;
  }

  private query(key: string): QueryResult[] {
    return this.getExpressionEngine().query(this.getRootNode(), key);
  }

  private nodeResults(key: string): ImmutableNode[] {
    return this.query(key).flatMap((result) =>
      result.kind === 'node' ? [result.node] : [],
    );
  }

  private collectValues(results: readonly QueryResult[]): unknown[] {
    const values: unknown[] = [];
    for (const result of results) {
      const value =
        result.kind === 'attribute' ? result.attributeValue : result.node.value;
      if (Array.isArray(value)) {
        values.push(...value);
      } else if (value !== undefined && value !== null) {
        values.push(value);
      }
    }
    return values;
  }

  private convertedValue<T>(
    key: string,
    defaultValue: T | undefined,
    convert: (value: unknown) => T,
  ): T | undefined {
    const raw = this.getRawProperty(key);
    const first = Array.isArray(raw) ? raw[0] : raw;
    if (first === undefined) {
      if (defaultValue !== undefined) {
        return defaultValue;
      }
      if (this.throwExceptionOnMissing) {
        throw new MissingPropertyError(key);
      }
      return undefined;
    }

    try {
      return convert(this.interpolate(first));
    } catch (error) {
      if (error instanceof ConversionError) {
        throw error.forKey(key);
      }
      throw error;
    }
  }

  private symbolsFor(engine: IExpressionEngine): {
    propertyDelimiter: string;
    attributeStart: string;
  } {
    return engine instanceof DefaultExpressionEngine
      ? engine.symbols
      : DefaultExpressionEngine.INSTANCE.symbols;
  }
}

function createListDelimiterHandler(
  options: ConfigurationOptions,
): IListDelimiterHandler {
  if (
    options.listDelimiter === null ||
    options.listDelimiterHandler === 'disabled'
  ) {
    return new DisabledListDelimiterHandler();
  }
  return options.listDelimiterHandler === 'legacy'
    ? new LegacyListDelimiterHandler(options.listDelimiter)
    : new DefaultListDelimiterHandler(options.listDelimiter);
}
