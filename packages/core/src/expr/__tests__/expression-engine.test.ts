import { describe, it, expect } from 'vitest';
import { DefaultExpressionEngine } from '../expression-engine.js';
import { InvalidExpressionError } from '../../errors/index.js';
import { ImmutableNode } from '../../tree/immutable-node.js';
import { nodeFromObject } from '../../tree/tree-utils.js';

const engine = DefaultExpressionEngine.INSTANCE;

function createTree(): ImmutableNode {
  return nodeFromObject({
    tables: {
      table: [
        { '@type': 'system', name: 'users', fields: { field: ['uid', 'uname'] } },
        { '@type': 'application', name: 'documents' },
      ],
    },
    'config.xml': 'dotted',
  });
}

describe('DefaultExpressionEngine', () => {
  describe('parse', () => {
    it('should split a key into node segments', () => {
      expect(engine.parse('tables.table.name').segments).toEqual([
        { kind: 'node', name: 'tables' },
        { kind: 'node', name: 'table' },
        { kind: 'node', name: 'name' },
      ]);
    });

    it('should parse indices and a trailing attribute', () => {
      expect(engine.parse('tables.table(1)[@type]').segments).toEqual([
        { kind: 'node', name: 'tables' },
        { kind: 'node', name: 'table', index: 1 },
        { kind: 'attribute', name: 'type' },
      ]);
    });

    it('should unescape doubled delimiters', () => {
      expect(engine.parse('config..xml').segments).toEqual([
        { kind: 'node', name: 'config.xml' },
      ]);
    });

    it('should ignore leading and trailing delimiters', () => {
      expect(engine.parse('.a.b.').segments).toEqual([
        { kind: 'node', name: 'a' },
        { kind: 'node', name: 'b' },
      ]);
    });

    it('should address the root with an empty key', () => {
      expect(engine.parse('').segments).toEqual([]);
    });

    it.each([
      ['a[@type', 'unclosed attribute'],
      ['a[@]', 'empty attribute name'],
      ['a(1', 'unclosed index'],
      ['a(x)', 'non-numeric index'],
      ['a(-1)', 'negative index'],
      ['a[@type].b', 'attribute before a node'],
      ['a(1)b', 'text after an index'],
      ['(1)', 'index without a name'],
    ])('should reject %j (%s)', (key) => {
      expect(() => engine.parse(key)).toThrow(InvalidExpressionError);
    });
  });

  describe('query', () => {
    it('should match all same-named children without an index', () => {
      const results = engine.query(createTree(), 'tables.table.name');
      expect(results.map((result) => result.node.value)).toEqual([
        'users',
        'documents',
      ]);
    });

    it('should select the second child with index 1', () => {
      const [result] = engine.query(createTree(), 'tables.table(1).name');
      expect(result.node.value).toBe('documents');
      expect(result.path).toEqual([0, 1, 0]);
    });

    it('should return attribute matches with their values', () => {
      const results = engine.query(createTree(), 'tables.table[@type]');
      expect(
        results.map((result) =>
          result.kind === 'attribute' ? result.attributeValue : undefined,
        ),
      ).toEqual(['system', 'application']);
    });

    it('should yield nothing for unmatched segments', () => {
      expect(engine.query(createTree(), 'tables.view.name')).toEqual([]);
      expect(engine.query(createTree(), 'tables.table(5)')).toEqual([]);
    });

    it('should find names containing the delimiter', () => {
      const [result] = engine.query(createTree(), 'config..xml');
      expect(result.node.value).toBe('dotted');
    });

    it('should return the root for the empty key', () => {
      const root = createTree();
      const [result] = engine.query(root, '');
      expect(result.node).toBe(root);
      expect(result.path).toEqual([]);
    });
  });

  describe('key generation', () => {
    it('should build node keys with escaping', () => {
      const node = ImmutableNode.of('config.xml');
      expect(engine.nodeKey(node, undefined)).toBe('');
      expect(engine.nodeKey(node, '')).toBe('config..xml');
      expect(engine.nodeKey(node, 'files')).toBe('files.config..xml');
    });

    it('should build attribute keys', () => {
      expect(engine.attributeKey('tables.table', 'type')).toBe(
        'tables.table[@type]',
      );
      expect(engine.attributeKey(undefined, 'version')).toBe('[@version]');
    });

    it('should build canonical keys with the occurrence index', () => {
      const tables = createTree().children[0];
      expect(engine.canonicalKey(tables.children[1], 'tables', tables)).toBe(
        'tables.table(1)',
      );
    });
  });

  describe('prepareAdd', () => {
    it('should follow existing nodes and report missing ones', () => {
      const data = engine.prepareAdd(createTree(), 'tables.table(0).fields.field');
      expect(data.parentPath).toEqual([0, 0, 1]);
      expect(data.pathNodes).toEqual([]);
      expect(data.newNodeName).toBe('field');
      expect(data.isAttribute).toBe(false);
    });

    it('should continue with the last same-named child without an index', () => {
      const data = engine.prepareAdd(createTree(), 'tables.table.indexes.index');
      expect(data.parentPath).toEqual([0, 1]);
      expect(data.parent.getChild('name')?.value).toBe('documents');
      expect(data.pathNodes).toEqual(['indexes']);
    });

    it('should flag attribute keys', () => {
      const data = engine.prepareAdd(createTree(), 'tables[@count]');
      expect(data.isAttribute).toBe(true);
      expect(data.newNodeName).toBe('count');
      expect(data.parentPath).toEqual([0]);
    });

    it('should reject the empty key', () => {
      expect(() => engine.prepareAdd(createTree(), '')).toThrow(
        InvalidExpressionError,
      );
    });
  });

  describe('custom symbols', () => {
    it('should use the configured tokens', () => {
      const slashes = new DefaultExpressionEngine({
        propertyDelimiter: '/',
        escapedDelimiter: '//',
        attributeStart: '@',
        attributeEnd: null,
      });
      const results = slashes.query(createTree(), 'tables/table(0)/@type');
      expect(
        results.map((result) =>
          result.kind === 'attribute' ? result.attributeValue : undefined,
        ),
      ).toEqual(['system']);
      expect(slashes.attributeKey('tables/table', 'type')).toBe(
        'tables/table@type',
      );
    });

    it('should reject inconsistent symbols', () => {
      expect(
        () => new DefaultExpressionEngine({ propertyDelimiter: '(' }),
      ).toThrow();
    });
  });
});
