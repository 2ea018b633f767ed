import { createScopedLogger } from '../../logger.js';
import { FunctionLookup } from './function-lookup.js';

const logger = createScopedLogger('codec-lookup');

/**
 * Decodes the name from base64 into a UTF-8 string.
 * @public
 */
export const base64DecoderLookup = new FunctionLookup((name) =>
  Buffer.from(name, 'base64').toString('utf8'),
);

/**
 * Encodes the UTF-8 bytes of the name as base64.
 * @public
 */
export const base64EncoderLookup = new FunctionLookup((name) =>
  Buffer.from(name, 'utf8').toString('base64'),
);

/**
 * Decodes an `application/x-www-form-urlencoded` name; `+` stands for a
 * space. Malformed escapes yield no value.
 * @public
 */
export const urlDecoderLookup = new FunctionLookup((name) => {
  try {
    return decodeURIComponent(name.replace(/\+/g, ' '));
  } catch (error) {
    logger.debug('Malformed URL encoding', { name, error: String(error) });
    return undefined;
  }
});

/**
 * Encodes the name in `application/x-www-form-urlencoded` form.
 * @public
 */
export const urlEncoderLookup = new FunctionLookup((name) =>
  encodeURIComponent(name).replace(/%20/g, '+'),
);
