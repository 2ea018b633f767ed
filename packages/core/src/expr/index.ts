export { DefaultExpressionEngine, DEFAULT_SYMBOLS } from './expression-engine.js';
export type { IExpressionEngine, NodeAddData, QueryResult } from './types.js';
