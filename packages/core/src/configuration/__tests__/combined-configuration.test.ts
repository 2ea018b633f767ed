import { describe, it, expect, beforeEach } from 'vitest';
import { BaseHierarchicalConfiguration } from '../base-hierarchical-configuration.js';
import { CombinedConfiguration } from '../combined-configuration.js';
import { NoOpLogger } from '../../logger.js';
import { type NodeCombiner, OverrideCombiner, UnionCombiner } from '../../tree/node-combiner.js';
import { nodeFromObject, type PlainTree } from '../../tree/tree-utils.js';

function configuration(tree: PlainTree): BaseHierarchicalConfiguration {
  return new BaseHierarchicalConfiguration({}, nodeFromObject(tree), new NoOpLogger());
}

describe('CombinedConfiguration', () => {
  let user: BaseHierarchicalConfiguration;
  let defaults: BaseHierarchicalConfiguration;

  beforeEach(() => {
    user = configuration({ ui: { theme: 'dark' }, db: { host: 'user-host' } });
    defaults = configuration({
      ui: { theme: 'light', lang: 'en' },
      db: { host: 'localhost', port: '5432', url: '${db.host}:${db.port}' },
    });
  });

  function combined(
    combiner: NodeCombiner = new OverrideCombiner(),
  ): CombinedConfiguration {
    const result = new CombinedConfiguration(combiner, {}, new NoOpLogger());
    result.addConfiguration(user, 'user');
    result.addConfiguration(defaults, 'defaults');
    return result;
  }

  it('should be empty without children', () => {
    const empty = new CombinedConfiguration(undefined, {}, new NoOpLogger());
    expect(empty.isEmpty()).toBe(true);
    expect(empty.getNumberOfConfigurations()).toBe(0);
  });

  it('should let earlier children override later ones', () => {
    const config = combined();
    expect(config.getString('ui.theme')).toBe('dark');
    expect(config.getString('ui.lang')).toBe('en');
    expect(config.getString('db.port')).toBe('5432');
  });

  it('should interpolate against the combined content', () => {
    expect(combined().getString('db.url')).toBe('user-host:5432');
  });

  it('should keep both values with the union combiner', () => {
    const config = combined(new UnionCombiner());
    expect(config.getList('ui.theme')).toEqual(['dark', 'light']);
    expect(config.getString('ui.lang')).toBe('en');
  });

  it('should keep list nodes apart', () => {
    const first = configuration({ tables: { table: { name: 'users' } } });
    const second = configuration({ tables: { table: { name: 'docs' } } });

    const merged = new CombinedConfiguration(new UnionCombiner(), {}, new NoOpLogger());
    merged.addConfiguration(first);
    merged.addConfiguration(second);
    expect(merged.getList('tables.table.name')).toEqual(['users', 'docs']);
    expect(merged.configurationsAt('tables.table')).toHaveLength(1);

    const combiner = new UnionCombiner();
    combiner.addListNode('table');
    merged.setNodeCombiner(combiner);
    expect(merged.configurationsAt('tables.table')).toHaveLength(2);
    expect(merged.getString('tables.table(1).name')).toBe('docs');
  });

  it('should place a child below a key', () => {
    const config = combined();
    config.addConfiguration(configuration({ enabled: 'true' }), 'audit', 'plugins.audit');
    expect(config.getBoolean('plugins.audit.enabled')).toBe(true);
    expect(config.getKeys('plugins')).toEqual(['plugins.audit.enabled']);
  });

  it('should rebuild after a child changed', () => {
    const config = combined();
    expect(config.getString('ui.theme')).toBe('dark');
    user.setProperty('ui.theme', 'blue');
    expect(config.getString('ui.theme')).toBe('blue');
  });

  it('should drop direct changes on the next rebuild', () => {
    const config = combined();
    config.addProperty('local', 'x');
    expect(config.getString('local')).toBe('x');

    user.addProperty('extra', 'y');
    expect(config.getString('local')).toBeUndefined();
    expect(config.getString('extra')).toBe('y');
  });

  it('should manage children by name', () => {
    const config = combined();
    expect(config.getConfigurationNames()).toEqual(['user', 'defaults']);
    expect(config.getConfiguration('defaults')).toBe(defaults);

    expect(config.removeConfiguration('user')).toBe(true);
    expect(config.removeConfiguration('user')).toBe(false);
    expect(config.getConfigurationNames()).toEqual(['defaults']);
    expect(config.getString('ui.theme')).toBe('light');

    expect(config.removeConfiguration(defaults)).toBe(true);
    expect(config.isEmpty()).toBe(true);
  });

  it('should reject duplicate names', () => {
    const config = combined();
    expect(() => config.addConfiguration(configuration({}), 'user')).toThrow(
      "Configuration 'user' is already registered",
    );
  });
});
