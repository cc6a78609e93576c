/**
 * Namespaced registry of functions referenced by configuration blocks.
 *
 * A {@link RegistryStore} is owned by the application: it is created during
 * start-up, filled by explicit `register` calls, and passed to whatever
 * resolves `@`-blocks into objects. Nothing registers itself on import.
 *
 * @packageDocumentation
 */

import { RegistryError } from './types.js';

const NAMESPACE_SEPARATOR = '\u0000';

function namespaceKey(namespace: readonly string[]): string {
  return namespace.join(NAMESPACE_SEPARATOR);
}

function formatNamespace(namespace: readonly string[]): string {
  return namespace.join(' -> ');
}

function validateNamespace(namespace: readonly string[]): void {
  if (namespace.length === 0 || namespace.some((part) => part === '')) {
    throw new RegistryError(
      `Invalid namespace [${namespace.join(', ')}]: expected one or more non-empty names`
    );
  }
}

/**
 * Functions registered under one namespace, e.g. `['ml', 'optimizers']`.
 *
 * @template T - Type of the registered values.
 */
export class Registry<T = unknown> {
  readonly namespace: readonly string[];
  private readonly entries = new Map<string, { readonly value: T }>();

  constructor(namespace: readonly string[]) {
    validateNamespace(namespace);
    this.namespace = [...namespace];
  }

  /**
   * Registers a value under a name, replacing any previous registration.
   *
   * @param name - Name used in configuration, e.g. `adam.v1`.
   * @param value - The function (or other value) to register.
   * @returns The registered value, so the call can wrap a definition.
   */
  register<V extends T>(name: string, value: V): V {
    if (name === '') {
      throw new RegistryError(`Cannot register an empty name in ${formatNamespace(this.namespace)}`);
    }
    this.entries.set(name, { value });
    return value;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  /**
   * Looks up a registered value.
   *
   * @param name - The registered name.
   * @returns The registered value.
   * @throws RegistryError listing the available names if nothing is registered.
   */
  get(name: string): T {
    const entry = this.entries.get(name);
    if (entry === undefined) {
      const available = this.names().join(', ') || 'none';
      throw new RegistryError(
        `Can't find '${name}' in registry ${formatNamespace(this.namespace)}. Available names: ${available}`
      );
    }
    return entry.value;
  }

  /**
   * Returns every registration in this namespace, in registration order.
   */
  getAll(): ReadonlyMap<string, T> {
    return new Map([...this.entries].map(([name, entry]): [string, T] => [name, entry.value]));
  }

  /**
   * Registered names, sorted.
   */
  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  /**
   * Removes a registration.
   *
   * @param name - The registered name.
   * @returns The removed value.
   * @throws RegistryError if nothing is registered under the name.
   */
  remove(name: string): T {
    const value = this.get(name);
    this.entries.delete(name);
    return value;
  }
}

/**
 * A registration found by {@link RegistryStore.getAllUnder}.
 */
export interface RegistryEntry {
  /** Namespace followed by the registered name. */
  readonly path: readonly string[];
  readonly value: unknown;
}

/**
 * Process-scoped collection of registries.
 *
 * @example
 * ```typescript
 * const store = new RegistryStore();
 * const optimizers = store.create<(lr: number) => Optimizer>('ml', 'optimizers');
 * optimizers.register('adam.v1', (lr) => new Adam(lr));
 *
 * store.lookup(['ml', 'optimizers'], 'adam.v1');
 * ```
 */
export class RegistryStore {
  private readonly registries = new Map<string, Registry>();

  /**
   * Creates the registry for a namespace.
   *
   * @param namespace - Namespace parts, outermost first.
   * @returns The new registry.
   * @throws RegistryError if the namespace already exists.
   */
  create<T = unknown>(...namespace: string[]): Registry<T> {
    validateNamespace(namespace);
    const key = namespaceKey(namespace);
    if (this.registries.has(key)) {
      throw new RegistryError(`Namespace already exists: ${formatNamespace(namespace)}`);
    }
    const registry = new Registry<T>(namespace);
    this.registries.set(key, registry);
    return registry;
  }

  /**
   * Checks whether a namespace exists, either as a registry or as a name
   * registered inside the registry one level up.
   *
   * @param namespace - Namespace parts, outermost first.
   */
  exists(...namespace: string[]): boolean {
    if (namespace.length === 0) {
      return false;
    }
    if (this.registries.has(namespaceKey(namespace))) {
      return true;
    }
    const parent = this.registries.get(namespaceKey(namespace.slice(0, -1)));
    const name = namespace[namespace.length - 1];
    return parent !== undefined && name !== undefined && parent.has(name);
  }

  /**
   * Looks up a registered value by namespace and name.
   *
   * @param namespace - Namespace of the registry.
   * @param name - The registered name.
   * @returns The registered value.
   * @throws RegistryError if the namespace or the name is unknown.
   */
  lookup(namespace: readonly string[], name: string): unknown {
    const registry = this.registries.get(namespaceKey(namespace));
    if (registry === undefined) {
      throw new RegistryError(`Unknown namespace: ${formatNamespace(namespace)}`);
    }
    return registry.get(name);
  }

  /**
   * Returns every registration whose namespace starts with the given parts.
   *
   * @param prefix - Leading namespace parts; empty matches everything.
   * @returns Matching registrations, grouped by registry creation order.
   */
  getAllUnder(...prefix: string[]): RegistryEntry[] {
    const entries: RegistryEntry[] = [];
    for (const registry of this.registries.values()) {
      const matches = prefix.every((part, index) => registry.namespace[index] === part);
      if (!matches) {
        continue;
      }
      for (const [name, value] of registry.getAll()) {
        entries.push({ path: [...registry.namespace, name], value });
      }
    }
    return entries;
  }
}
