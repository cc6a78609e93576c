/**
 * Function registry and registry-reference scanning.
 *
 * @packageDocumentation
 */

export { Registry, RegistryStore } from './store.js';
export type { RegistryEntry } from './store.js';
export { findRegistryReferences } from './references.js';
export { RegistryError } from './types.js';
export type { RegistryReference } from './types.js';
