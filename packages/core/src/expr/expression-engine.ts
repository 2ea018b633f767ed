/**
 * The default expression engine: dotted keys with occurrence indices and
 * attribute selectors.
 *
 * Keys are made of segments separated by the property delimiter. A segment
 * may end with an index, `tables.table(1).name` selecting the name of the
 * second table, and the last segment may select an attribute,
 * `tables.table(0)[@type]`. A delimiter that is part of a node name is
 * written doubled: `config..xml` names the node `config.xml`.
 * @public
 */

import type {
  AttributeSegment,
  Expression,
  ExpressionSymbols,
  NodeSegment,
  PathSegment,
} from '@cfgtree/models';
import {
  ExpressionSymbolsSchema,
  type ExpressionSymbolsInput,
} from '@cfgtree/schemas';
import { InvalidExpressionError } from '../errors/index.js';
import type { ImmutableNode } from '../tree/immutable-node.js';
import type { IExpressionEngine, NodeAddData, QueryResult } from './types.js';

/**
 * Symbols of the default key syntax.
 * @public
 */
export const DEFAULT_SYMBOLS: ExpressionSymbols = Object.freeze(
  ExpressionSymbolsSchema.parse({}),
);

export class DefaultExpressionEngine implements IExpressionEngine {
  /** Engine with the default symbols */
  public static readonly INSTANCE = new DefaultExpressionEngine();

  public readonly symbols: ExpressionSymbols;

  /**
   * @param symbols - Symbols overriding the defaults; validated on creation
   * @throws \{ZodError\} When the symbols are inconsistent
   */
  public constructor(symbols?: ExpressionSymbolsInput) {
    this.symbols =
      symbols === undefined
        ? DEFAULT_SYMBOLS
        : Object.freeze(ExpressionSymbolsSchema.parse(symbols));
  }

  /**
   * Parses a key into its segments.
   * @throws \{InvalidExpressionError\} For unclosed attribute or index
   * markers, empty names, non-numeric indices and attributes followed by
   * further segments
   */
  public parse(key: string): Expression {
    const segments: PathSegment[] = [];
    const { propertyDelimiter, attributeStart } = this.symbols;
    let pos = 0;

    while (pos < key.length) {
      pos = this.skipDelimiters(key, pos);
      if (pos >= key.length) {
        break;
      }

      if (key.startsWith(attributeStart, pos)) {
        const [segment, end] = this.readAttribute(key, pos);
        segments.push(segment);
        if (this.skipDelimiters(key, end) < key.length) {
          throw InvalidExpressionError.malformed(
            key,
            'an attribute must be the last segment',
          );
        }
        break;
      }

      const [segment, end] = this.readNodeSegment(key, pos);
      segments.push(segment);
      pos = end;
      if (pos < key.length && !key.startsWith(propertyDelimiter, pos) &&
        !key.startsWith(attributeStart, pos)) {
        throw InvalidExpressionError.malformed(
          key,
          `unexpected text after index at position ${pos}`,
        );
      }
    }

    return { key, segments };
  }

  /**
   * Evaluates a key against a tree. Segments without an index match every
   * child of that name; unmatched segments yield an empty result.
   */
  public query(root: ImmutableNode, key: string | Expression): QueryResult[] {
    const expression = typeof key === 'string' ? this.parse(key) : key;
    const results: QueryResult[] = [];
    this.findNodes(root, [], expression.segments, 0, results);
    return results;
  }

  public nodeKey(node: ImmutableNode, parentKey: string | undefined): string {
    if (parentKey === undefined) {
      return '';
    }
    return this.join(parentKey, this.escapeName(node.name));
  }

  public attributeKey(
    parentKey: string | undefined,
    attributeName: string,
  ): string {
    const { attributeStart, attributeEnd } = this.symbols;
    return (
      (parentKey ?? '') + attributeStart + attributeName + (attributeEnd ?? '')
    );
  }

  public canonicalKey(
    node: ImmutableNode,
    parentKey: string | undefined,
    parent: ImmutableNode,
  ): string {
    const index = Math.max(parent.getChildren(node.name).indexOf(node), 0);
    return (
      this.nodeKey(node, parentKey ?? '') +
      this.symbols.indexStart +
      String(index) +
      this.symbols.indexEnd
    );
  }

  /**
   * Follows the key as far as nodes exist. Segments with an index select
   * that occurrence; segments without one continue with the last child of
   * that name.
   * @throws \{InvalidExpressionError\} For keys without any segment
   */
  public prepareAdd(root: ImmutableNode, key: string): NodeAddData {
    const { segments } = this.parse(key);
    const last = segments[segments.length - 1];
    if (last === undefined) {
      throw InvalidExpressionError.malformed(
        key,
        'a key is required to add a property',
      );
    }

    let parent = root;
    const parentPath: number[] = [];
    let i = 0;
    for (; i < segments.length - 1; i++) {
      const segment = segments[i];
      const matches = childIndices(parent, segment.name);
      const occurrence =
        segment.kind === 'node' && segment.index !== undefined
          ? segment.index
          : matches.length - 1;
      const childIndex = matches[occurrence];
      if (occurrence < 0 || childIndex === undefined) {
        break;
      }
      parentPath.push(childIndex);
      parent = parent.children[childIndex];
    }

    return {
      parent,
      parentPath,
      pathNodes: segments.slice(i, segments.length - 1).map((s) => s.name),
      newNodeName: last.name,
      isAttribute: last.kind === 'attribute',
    };
  }

  private findNodes(
    node: ImmutableNode,
    path: readonly number[],
    segments: readonly PathSegment[],
    position: number,
    results: QueryResult[],
  ): void {
    const segment = segments[position];
    if (segment === undefined) {
      results.push({ kind: 'node', node, path });
      return;
    }
    if (segment.kind === 'attribute') {
      if (node.attributes.has(segment.name)) {
        results.push({
          kind: 'attribute',
          node,
          path,
          attributeName: segment.name,
          attributeValue: node.attributes.get(segment.name),
        });
      }
      return;
    }

    const matches = childIndices(node, segment.name);
    const selected =
      segment.index === undefined
        ? matches
        : matches.slice(segment.index, segment.index + 1);
    for (const childIndex of selected) {
      this.findNodes(
        node.children[childIndex],
        [...path, childIndex],
        segments,
        position + 1,
        results,
      );
    }
  }

  private skipDelimiters(key: string, start: number): number {
    const { propertyDelimiter, escapedDelimiter } = this.symbols;
    let pos = start;
    while (
      key.startsWith(propertyDelimiter, pos) &&
      !(escapedDelimiter !== null && key.startsWith(escapedDelimiter, pos))
    ) {
      pos += propertyDelimiter.length;
    }
    return pos;
  }

  private readAttribute(key: string, start: number): [AttributeSegment, number] {
    const { attributeStart, attributeEnd, propertyDelimiter } = this.symbols;
    const nameStart = start + attributeStart.length;
    let end: number;
    let next: number;
    if (attributeEnd === null) {
      const delimiter = key.indexOf(propertyDelimiter, nameStart);
      end = delimiter < 0 ? key.length : delimiter;
      next = end;
    } else {
      end = key.indexOf(attributeEnd, nameStart);
      if (end < 0) {
        throw InvalidExpressionError.malformed(
          key,
          `unclosed attribute marker '${attributeStart}'`,
        );
      }
      next = end + attributeEnd.length;
    }
    const name = key.slice(nameStart, end);
    if (name.length === 0) {
      throw InvalidExpressionError.malformed(key, 'empty attribute name');
    }
    return [{ kind: 'attribute', name }, next];
  }

  private readNodeSegment(key: string, start: number): [NodeSegment, number] {
    const {
      propertyDelimiter,
      escapedDelimiter,
      attributeStart,
      indexStart,
      indexEnd,
    } = this.symbols;
    let name = '';
    let pos = start;

    while (pos < key.length) {
      if (escapedDelimiter !== null && key.startsWith(escapedDelimiter, pos)) {
        name += propertyDelimiter;
        pos += escapedDelimiter.length;
      } else if (
        key.startsWith(propertyDelimiter, pos) ||
        key.startsWith(attributeStart, pos) ||
        key.startsWith(indexStart, pos)
      ) {
        break;
      } else {
        name += key[pos];
        pos++;
      }
    }

    if (name.length === 0) {
      throw InvalidExpressionError.malformed(
        key,
        `empty node name at position ${start}`,
      );
    }

    if (!key.startsWith(indexStart, pos)) {
      return [{ kind: 'node', name }, pos];
    }

    const indexPos = pos + indexStart.length;
    const close = key.indexOf(indexEnd, indexPos);
    if (close < 0) {
      throw InvalidExpressionError.malformed(
        key,
        `unclosed index marker '${indexStart}'`,
      );
    }
    const indexText = key.slice(indexPos, close);
    if (!/^\d+$/.test(indexText)) {
      throw InvalidExpressionError.malformed(
        key,
        `invalid index '${indexText}'`,
      );
    }
    return [
      { kind: 'node', name, index: Number.parseInt(indexText, 10) },
      close + indexEnd.length,
    ];
  }

  private escapeName(name: string): string {
    const { propertyDelimiter, escapedDelimiter } = this.symbols;
    if (escapedDelimiter === null) {
      return name;
    }
    return name.split(propertyDelimiter).join(escapedDelimiter);
  }

  private join(parentKey: string, name: string): string {
    return parentKey.length === 0
      ? name
      : parentKey + this.symbols.propertyDelimiter + name;
  }
}

function childIndices(node: ImmutableNode, name: string): number[] {
  const indices: number[] = [];
  node.children.forEach((child, index) => {
    if (child.name === name) {
      indices.push(index);
    }
  });
  return indices;
}
