export {
  ConfigurationErrorCode,
  ConfigurationError,
  InterpolationCycleError,
  InvalidExpressionError,
  ConversionError,
  MissingPropertyError,
  UnsupportedOperationError,
} from './configuration-errors.js';
