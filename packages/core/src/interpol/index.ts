export {
  ConfigurationInterpolator,
  type InterpolatorSpecification,
} from './configuration-interpolator.js';
export * from './lookups/index.js';
