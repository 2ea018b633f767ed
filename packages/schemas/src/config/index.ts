export { ExpressionSymbolsSchema } from './ExpressionSymbolsSchema.js';
export {
  ListDelimiterSchema,
  ListDelimiterHandlerTypeSchema,
} from './ListDelimiterSchema.js';
export { ConfigurationOptionsSchema } from './ConfigurationOptionsSchema.js';
export {
  DefaultLookupNameSchema,
  DefaultLookupSelectionSchema,
} from './DefaultLookupsSchema.js';
export { LogLevelSchema } from './LogLevelSchema.js';
