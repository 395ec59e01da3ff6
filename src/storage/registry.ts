/**
 * Storage backend registry
 *
 * Backends are looked up by name when the cached path is built; an unknown
 * name is a startup failure, never a fallback.
 */

import { StorageNotFoundError } from '../whois/errors';
import { MemoryStorage } from './memory-storage';
import { Storage, StorageFactory, StorageOptions } from './types';

const createMemoryStorage: StorageFactory = (options) => new MemoryStorage(options);

const BUILTIN_BACKENDS: ReadonlyArray<[string, StorageFactory]> = [
  ['', createMemoryStorage],
  ['default', createMemoryStorage],
  ['memory', createMemoryStorage]
];

const backends = new Map<string, StorageFactory>(BUILTIN_BACKENDS);

export function registerStorage(name: string, factory: StorageFactory): void {
  backends.set(name, factory);
}

export function listStorageBackends(): string[] {
  return Array.from(backends.keys()).filter(name => name !== '');
}

export async function createStorage(options: StorageOptions): Promise<Storage> {
  const factory = backends.get(options.name);
  if (!factory) {
    throw new StorageNotFoundError(options.name);
  }
  return factory(options);
}

/**
 * Restore the built-in backend table (for testing)
 */
export function resetStorageRegistry(): void {
  backends.clear();
  for (const [name, factory] of BUILTIN_BACKENDS) {
    backends.set(name, factory);
  }
}
