export {
  AbstractListDelimiterHandler,
  DefaultListDelimiterHandler,
  LegacyListDelimiterHandler,
  DisabledListDelimiterHandler,
} from './list-delimiter-handler.js';
export { PropertyConverter } from './property-converter.js';
