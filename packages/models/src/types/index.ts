export type { ILookup } from './Lookup.js';
export type { IListDelimiterHandler } from './ListDelimiterHandler.js';
export type { ExpressionSymbols } from './ExpressionSymbols.js';
export type {
  Expression,
  PathSegment,
  NodeSegment,
  AttributeSegment,
} from './Expression.js';
export type { ConfigurationChangeEvent, ConfigurationEvents } from './events.js';
