import fs from 'fs';
import type { ILookup } from '@cfgtree/models';
import { createScopedLogger, type ILogger } from '../../logger.js';

const CHARSETS: Readonly<Record<string, BufferEncoding>> = {
  utf8: 'utf8',
  utf16le: 'utf16le',
  ucs2: 'utf16le',
  latin1: 'latin1',
  iso88591: 'latin1',
  ascii: 'ascii',
  usascii: 'ascii',
};

/**
 * Lookup for the `file` prefix. Names have the form `charset:path`, for
 * example `${file:UTF-8:/etc/app/banner.txt}`; the whole file content is
 * the value. Unknown charsets and unreadable files yield no value.
 * @public
 */
export class FileLookup implements ILookup {
  private readonly logger: ILogger;

  public constructor(logger: ILogger = createScopedLogger('file-lookup')) {
    this.logger = logger;
  }

  public lookup(name: string): string | undefined {
    const separator = name.indexOf(':');
    if (separator < 0) {
      return undefined;
    }
    const charset = name.slice(0, separator);
    const file = name.slice(separator + 1);
    const encoding = CHARSETS[charset.toLowerCase().replace(/[-_]/g, '')];
    if (encoding === undefined) {
      this.logger.warn('Unsupported charset', { charset, file });
      return undefined;
    }

    try {
      return fs.readFileSync(file, { encoding });
    } catch (error) {
      this.logger.warn('Cannot read file', { file, error: String(error) });
      return undefined;
    }
  }
}
