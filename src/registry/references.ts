/**
 * Syntactic scan for blocks that call registered functions.
 *
 * @packageDocumentation
 */

import {
  cloneValue,
  getEntry,
  isConfigTree,
  REGISTRY_KEY_PREFIX,
  setEntry,
  type ConfigTree,
} from '../tree/index.js';
import type { RegistryReference } from './types.js';

function argumentsOf(section: ConfigTree): ConfigTree {
  const args: ConfigTree = {};
  for (const [key, value] of Object.entries(section)) {
    if (!key.startsWith(REGISTRY_KEY_PREFIX)) {
      setEntry(args, key, cloneValue(value));
    }
  }
  return args;
}

function collect(section: ConfigTree, path: readonly string[], found: RegistryReference[]): void {
  const registryKeys = Object.keys(section)
    .filter((key) => key.startsWith(REGISTRY_KEY_PREFIX))
    .sort();

  for (const key of registryKeys) {
    found.push({
      path,
      namespace: key.slice(REGISTRY_KEY_PREFIX.length),
      name: cloneValue(getEntry(section, key) ?? null),
      args: argumentsOf(section),
    });
  }

  for (const key of Object.keys(section).sort()) {
    const child = getEntry(section, key);
    if (child !== undefined && isConfigTree(child)) {
      collect(child, [...path, key], found);
    }
  }
}

/**
 * Lists every block in a tree that names a registered function, outer blocks
 * before the blocks nested in them. Nothing is looked up or invoked.
 *
 * @param tree - The tree to scan.
 * @returns One reference per `@` key, in key order within each block.
 */
export function findRegistryReferences(tree: ConfigTree): RegistryReference[] {
  const found: RegistryReference[] = [];
  for (const key of Object.keys(tree).sort()) {
    const section = getEntry(tree, key);
    if (section !== undefined && isConfigTree(section)) {
      collect(section, [key], found);
    }
  }
  return found;
}
