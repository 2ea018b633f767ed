import { describe, it, expect, beforeEach } from 'vitest';
import { DefaultExpressionEngine } from '../../expr/expression-engine.js';
import { InvalidExpressionError } from '../../errors/index.js';
import { ImmutableNode } from '../immutable-node.js';
import { NodeModel } from '../node-model.js';
import { nodeFromObject, nodeToObject } from '../tree-utils.js';

const engine = DefaultExpressionEngine.INSTANCE;

describe('NodeModel', () => {
  let model: NodeModel;

  beforeEach(() => {
    model = new NodeModel(
      nodeFromObject({
        tables: {
          table: [
            { name: 'users', fields: { field: ['uid', 'uname'] } },
            { name: 'documents' },
          ],
        },
      }),
    );
  });

  describe('addProperty', () => {
    it('should create missing intermediate nodes', () => {
      model.addProperty('connection.pool.size', [10], engine);
      expect(nodeToObject(model.getRootNode()).connection).toEqual({
        pool: { size: 10 },
      });
    });

    it('should add one node per value', () => {
      model.addProperty('tables.table(1).fields.field', ['docid', 'title'], engine);
      const fields = model
        .getRootNode()
        .getChild('tables')
        ?.getChild('table', 1)
        ?.getChild('fields');
      expect(fields?.getChildren('field').map((node) => node.value)).toEqual([
        'docid',
        'title',
      ]);
    });

    it('should append to the last same-named node without an index', () => {
      model.addProperty('tables.table.type', ['system'], engine);
      const tables = model.getRootNode().getChild('tables');
      expect(tables?.getChild('table', 1)?.getChild('type')?.value).toBe('system');
      expect(tables?.getChild('table', 0)?.getChild('type')).toBeUndefined();
    });

    it('should add attributes and collect repeated values', () => {
      model.addProperty('tables.table(0)[@type]', ['system'], engine);
      model.addProperty('tables.table(0)[@type]', ['view'], engine);
      const table = model.getRootNode().getChild('tables')?.getChild('table');
      expect(table?.getAttribute('type')).toEqual(['system', 'view']);
    });

    it('should create path nodes for new attributes', () => {
      model.addProperty('server.ssl[@enabled]', [true], engine);
      expect(
        model.getRootNode().getChild('server')?.getChild('ssl')?.getAttribute('enabled'),
      ).toBe(true);
    });

    it('should leave the previous root untouched', () => {
      const before = model.getRootNode();
      model.addProperty('tables.count', [2], engine);
      expect(before.getChild('tables')?.getChild('count')).toBeUndefined();
      expect(model.getRootNode()).not.toBe(before);
    });
  });

  describe('setProperty', () => {
    it('should replace existing values in order', () => {
      model.setProperty('tables.table.name', ['u', 'd'], engine);
      const names = engine
        .query(model.getRootNode(), 'tables.table.name')
        .map((result) => result.node.value);
      expect(names).toEqual(['u', 'd']);
    });

    it('should add surplus values as new nodes', () => {
      model.setProperty('tables.table(0).fields.field', ['a', 'b', 'c'], engine);
      const fields = engine
        .query(model.getRootNode(), 'tables.table(0).fields.field')
        .map((result) => result.node.value);
      expect(fields).toEqual(['a', 'b', 'c']);
    });

    it('should remove surplus nodes that become empty', () => {
      model.setProperty('tables.table(0).fields.field', ['only'], engine);
      const fields = engine
        .query(model.getRootNode(), 'tables.table(0).fields.field')
        .map((result) => result.node.value);
      expect(fields).toEqual(['only']);
    });

    it('should add the property when nothing matches', () => {
      model.setProperty('tables.count', [2], engine);
      expect(model.getRootNode().getChild('tables')?.getChild('count')?.value).toBe(2);
    });

    it('should set attribute values', () => {
      model.setProperty('tables[@count]', [2], engine);
      model.setProperty('tables[@count]', [3], engine);
      expect(model.getRootNode().getChild('tables')?.getAttribute('count')).toBe(3);
    });
  });

  describe('clearProperty', () => {
    it('should remove leaf nodes whose value is cleared', () => {
      model.clearProperty('tables.table(1).name', engine);
      const tables = model.getRootNode().getChild('tables');
      expect(tables?.getChildrenCount('table')).toBe(1);
    });

    it('should keep nodes that still have children', () => {
      model.addProperty('tables[@count]', [2], engine);
      model.setRootNode(
        model.getRootNode().withChild(
          ImmutableNode.builder()
            .name('db')
            .value('main')
            .addChild(ImmutableNode.of('host', 'h'))
            .create(),
        ),
      );
      model.clearProperty('db', engine);
      const db = model.getRootNode().getChild('db');
      expect(db?.value).toBeUndefined();
      expect(db?.getChild('host')?.value).toBe('h');
    });

    it('should remove attributes', () => {
      model.addProperty('tables[@count]', [2], engine);
      model.clearProperty('tables[@count]', engine);
      expect(model.getRootNode().getChild('tables')?.attributes.size).toBe(0);
    });
  });

  describe('clearTree', () => {
    it('should remove whole subtrees', () => {
      const removed = model.clearTree('tables.table', engine);
      expect(removed).toHaveLength(2);
      expect(model.getRootNode().getChild('tables')?.children).toHaveLength(0);
    });

    it('should remove several matches without shifting indices', () => {
      model.clearTree('tables.table(0).fields.field', engine);
      expect(
        model.getRootNode().getChild('tables')?.getChild('table')?.getChild('fields')
          ?.children,
      ).toHaveLength(0);
    });
  });

  describe('addNodes', () => {
    it('should append subtrees to an existing node', () => {
      model.addNodes('tables', [ImmutableNode.of('table', 'x')], engine);
      expect(model.getRootNode().getChild('tables')?.getChildrenCount('table')).toBe(3);
    });

    it('should create the target node when missing', () => {
      model.addNodes('views.list', [ImmutableNode.of('view', 'v1')], engine);
      expect(
        model.getRootNode().getChild('views')?.getChild('list')?.getChild('view')?.value,
      ).toBe('v1');
    });

    it('should reject keys selecting several nodes', () => {
      expect(() =>
        model.addNodes('tables.table', [ImmutableNode.of('x')], engine),
      ).toThrow(InvalidExpressionError);
    });
  });

  describe('clear and mergeRoot', () => {
    it('should keep the root name on clear', () => {
      model.setRootNode(model.getRootNode().withName('config'));
      model.clear();
      expect(model.getRootNode().name).toBe('config');
      expect(model.getRootNode().isEmpty()).toBe(true);
    });

    it('should merge another root into the current one', () => {
      model.mergeRoot(
        ImmutableNode.builder()
          .name('merged')
          .addAttribute('version', '2')
          .addChild(ImmutableNode.of('extra', 1))
          .create(),
      );
      const root = model.getRootNode();
      expect(root.name).toBe('merged');
      expect(root.getAttribute('version')).toBe('2');
      expect(root.children.map((child) => child.name)).toEqual(['tables', 'extra']);
    });
  });
});
