import type { ILookup } from '@cfgtree/models';
import { PropertyConverter } from '../../convert/property-converter.js';

/**
 * Anything exposing uninterpolated property values by key.
 * @public
 */
export interface IRawPropertySource {
  getRawProperty(key: string): unknown;
}

/**
 * Resolves variables against the raw values of a configuration. The
 * interpolator interpolates the returned text, so chained references and
 * cycles are seen by its cycle detection. Multi-valued properties yield
 * their first element.
 * @public
 */
export class ConfigurationLookup implements ILookup {
  public constructor(private readonly source: IRawPropertySource) {}

  public lookup(name: string): string | undefined {
    return PropertyConverter.toStringValue(this.source.getRawProperty(name));
  }
}
