// src/ext/configs.ts
// Live config values in a namespaced key/value store, exposed as commands

import { Manager } from '../core/manager.js';
import type { ManagerOptions } from '../config/schema.js';
import { CommandError } from '../utils/errors.js';

/** Namespace of paths given without one. */
export const DEFAULT_NAMESPACE = 'all';

/** Attribute name → one line of the value (`000`, `001`, ...). */
export type ConfigItem = Record<string, string>;

/**
 * Storage behind the config commands: items grouped into namespaces.
 */
export interface ConfigStore {
  namespaces(): Promise<string[]>;
  getItem(namespace: string, key: string): Promise<ConfigItem | undefined>;
  putItem(namespace: string, key: string, item: ConfigItem): Promise<void>;
  /** Resolves false when there was no such item */
  deleteItem(namespace: string, key: string): Promise<boolean>;
  items(namespace: string): Promise<Array<[string, ConfigItem]>>;
  dropNamespace(namespace: string): Promise<void>;
}

export class MemoryConfigStore implements ConfigStore {
  private readonly data = new Map<string, Map<string, ConfigItem>>();

  async namespaces(): Promise<string[]> {
    return Array.from(this.data.keys());
  }

  async getItem(namespace: string, key: string): Promise<ConfigItem | undefined> {
    const item = this.data.get(namespace)?.get(key);
    return item ? { ...item } : undefined;
  }

  async putItem(namespace: string, key: string, item: ConfigItem): Promise<void> {
    const items = this.data.get(namespace) ?? new Map<string, ConfigItem>();
    items.set(key, { ...item });
    this.data.set(namespace, items);
  }

  async deleteItem(namespace: string, key: string): Promise<boolean> {
    return this.data.get(namespace)?.delete(key) ?? false;
  }

  async items(namespace: string): Promise<Array<[string, ConfigItem]>> {
    const items = this.data.get(namespace);
    if (!items) {
      return [];
    }
    return Array.from(items, ([key, item]): [string, ConfigItem] => [key, { ...item }]);
  }

  async dropNamespace(namespace: string): Promise<void> {
    this.data.delete(namespace);
  }
}

export interface ConfigPath {
  namespace: string;
  key: string;
}

/**
 * Split `namespace.key` (or a bare `key`, which lives in DEFAULT_NAMESPACE).
 *
 * @throws CommandError for deeper paths
 */
export function parseConfigPath(path: string): ConfigPath {
  const parts = path.split('.');
  if (parts.length === 1) {
    return { namespace: DEFAULT_NAMESPACE, key: parts[0] };
  }
  if (parts.length === 2) {
    return { namespace: parts[0], key: parts[1] };
  }
  throw new CommandError(`Invalid key path: ${path}`);
}

export function toConfigItem(value: string): ConfigItem {
  const item: ConfigItem = {};
  value.split(/\r?\n/).forEach((line, index) => {
    item[String(index).padStart(3, '0')] = line;
  });
  return item;
}

/** Join an item's lines back together, or take only the first. */
export function fromConfigItem(item: ConfigItem, firstOnly = false): string {
  const lines = Object.keys(item)
    .sort()
    .map((attribute) => item[attribute]);
  return firstOnly ? lines[0] ?? '' : lines.join('\n');
}

/**
 * Manager with `set`, `get`, `delete`, `list` and `reset` commands over
 * `store`. Merge it into an application manager under a namespace:
 *
 * @example
 * ```typescript
 * manager.merge(createConfigsManager(store), 'configs');
 * // tool configs.set db.host localhost
 * ```
 */
export function createConfigsManager(store: ConfigStore, options: ManagerOptions = {}): Manager {
  const manager = new Manager(options);

  async function set(path: string, value: string): Promise<boolean> {
    const { namespace, key } = parseConfigPath(path);
    await store.deleteItem(namespace, key);
    await store.putItem(namespace, key, toConfigItem(value));
    return true;
  }

  async function get(path: string): Promise<string> {
    const { namespace, key } = parseConfigPath(path);
    const item = await store.getItem(namespace, key);
    if (!item) {
      throw new CommandError(`Invalid key ${path}`);
    }
    return fromConfigItem(item);
  }

  async function remove(path: string): Promise<boolean> {
    const { namespace, key } = parseConfigPath(path);
    if (!(await store.deleteItem(namespace, key))) {
      throw new CommandError(`Invalid key ${path}`);
    }
    return true;
  }

  // Without a namespace every path is listed, prefixed unless it lives in
  // DEFAULT_NAMESPACE; with one, that namespace and DEFAULT_NAMESPACE are
  // listed by bare key.
  async function list(namespace = '', expand = false): Promise<Record<string, string>> {
    const results: Record<string, string> = {};
    for (const name of (await store.namespaces()).sort()) {
      if (namespace !== '' && name !== namespace && name !== DEFAULT_NAMESPACE) {
        continue;
      }
      const prefix = namespace !== '' || name === DEFAULT_NAMESPACE ? '' : `${name}.`;
      for (const [key, item] of await store.items(name)) {
        results[`${prefix}${key}`] = fromConfigItem(item, !expand);
      }
    }
    return results;
  }

  async function reset(): Promise<void> {
    for (const name of await store.namespaces()) {
      await store.dropNamespace(name);
    }
  }

  manager.command(set, { description: 'Sets a live config value for given path.' });
  manager.command(get, { description: 'Shows the value for given path.' });
  manager.command(remove, { name: 'delete', description: 'Removes the config at given path.' });
  manager.command(list, { description: 'Lists all config paths.' });
  manager.command(reset, { description: 'Deletes all configs.' });

  return manager;
}
