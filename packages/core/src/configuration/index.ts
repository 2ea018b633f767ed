export { BaseHierarchicalConfiguration } from './base-hierarchical-configuration.js';
export { CombinedConfiguration } from './combined-configuration.js';
