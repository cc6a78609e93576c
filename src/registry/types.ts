/**
 * Types and errors for the function registry.
 *
 * @packageDocumentation
 */

import type { ConfigTree, ConfigValue } from '../tree/index.js';

/**
 * Error raised for unknown names or namespaces and for duplicate namespaces.
 */
export class RegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RegistryError';
  }
}

/**
 * A configuration block that names a registered function.
 *
 * For
 * ```
 * [training.optimizer]
 * @optimizers = "adam.v1"
 * learn_rate = 0.001
 * ```
 * the reference is `{ path: ['training', 'optimizer'], namespace: 'optimizers',
 * name: 'adam.v1', args: { learn_rate: 0.001 } }`.
 */
export interface RegistryReference {
  /** Location of the block. */
  readonly path: readonly string[];
  /** The `@` key without its prefix. */
  readonly namespace: string;
  /** Value of the `@` key; normally the registered name. */
  readonly name: ConfigValue;
  /** Sibling keys that are not `@` keys. */
  readonly args: ConfigTree;
}
