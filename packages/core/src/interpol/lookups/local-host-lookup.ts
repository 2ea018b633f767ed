import os from 'os';
import type { ILookup } from '@cfgtree/models';

/**
 * Source of local host information.
 * @public
 */
export interface HostInfo {
  name(): string;
  canonicalName(): string;
  address(): string;
}

const LOOPBACK_ADDRESS = '127.0.0.1';

/**
 * Host information from the operating system. Node offers no synchronous
 * reverse lookup, so the canonical name is the host name as well.
 * @public
 */
export const systemHostInfo: HostInfo = {
  name: () => os.hostname(),
  canonicalName: () => os.hostname(),
  address: () => {
    for (const addresses of Object.values(os.networkInterfaces())) {
      const external = addresses?.find(
        (info) => info.family === 'IPv4' && !info.internal,
      );
      if (external !== undefined) {
        return external.address;
      }
    }
    return LOOPBACK_ADDRESS;
  },
};

/**
 * Lookup for the `localhost` prefix. Understands `name`, `canonical-name`
 * and `address`.
 * @public
 */
export class LocalHostLookup implements ILookup {
  public constructor(private readonly hostInfo: HostInfo = systemHostInfo) {}

  public lookup(name: string): string | undefined {
    switch (name) {
      case 'name':
        return this.hostInfo.name();
      case 'canonical-name':
        return this.hostInfo.canonicalName();
      case 'address':
        return this.hostInfo.address();
      default:
        return undefined;
    }
  }
}
