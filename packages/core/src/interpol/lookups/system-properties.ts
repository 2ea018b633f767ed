import os from 'os';
import path from 'path';
import type { ILookup } from '@cfgtree/models';

/**
 * Process-wide key/value store of runtime facts, in the spirit of JVM
 * system properties. Seeded on first use; host applications may add or
 * override entries.
 *
 * Seeded keys: `os.name`, `os.arch`, `os.version`, `user.name`,
 * `user.home`, `user.dir`, `tmp.dir`, `file.separator`, `path.separator`,
 * `line.separator`, `node.version`, `runtime.platform`.
 * @public
 */
export class SystemProperties {
  private static store: Map<string, string> | undefined;

  public static get(name: string): string | undefined {
    return SystemProperties.properties().get(name);
  }

  public static set(name: string, value: string): void {
    SystemProperties.properties().set(name, value);
  }

  /**
   * @returns true if the property existed
   */
  public static remove(name: string): boolean {
    return SystemProperties.properties().delete(name);
  }

  public static snapshot(): ReadonlyMap<string, string> {
    return new Map(SystemProperties.properties());
  }

  /**
   * Drops all changes and reseeds the store.
   */
  public static reset(): void {
    SystemProperties.store = undefined;
  }

  private static properties(): Map<string, string> {
    SystemProperties.store ??= seedProperties();
    return SystemProperties.store;
  }
}

function seedProperties(): Map<string, string> {
  return new Map<string, string>([
    ['os.name', os.type()],
    ['os.arch', os.arch()],
    ['os.version', os.release()],
    ['user.name', currentUserName()],
    ['user.home', os.homedir()],
    ['user.dir', process.cwd()],
    ['tmp.dir', os.tmpdir()],
    ['file.separator', path.sep],
    ['path.separator', path.delimiter],
    ['line.separator', os.EOL],
    ['node.version', process.versions.node],
    ['runtime.platform', process.platform],
  ]);
}

function currentUserName(): string {
  try {
    return os.userInfo().username;
  } catch {
    // userInfo() throws for uids without a passwd entry
    return process.env.USER ?? process.env.USERNAME ?? '';
  }
}

/**
 * Lookup for the `sys` prefix, backed by {@link SystemProperties}.
 * @public
 */
export class SystemPropertiesLookup implements ILookup {
  public lookup(name: string): string | undefined {
    return SystemProperties.get(name);
  }
}
