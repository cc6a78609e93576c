/**
 * A configuration tree bundled with its preferred top-level section order.
 *
 * @packageDocumentation
 */

import { interpolate, isInterpolated } from '../interpolate/index.js';
import { mergeWithDiagnostics } from '../merge/index.js';
import { parse, type ParseOptions } from '../parser/index.js';
import { fromBytes, render, toBytes } from '../serialize/index.js';
import {
  cloneTree,
  cloneValue,
  getAtPath,
  type ConfigTree,
  type ConfigValue,
  type MergeDiagnostic,
} from '../tree/index.js';
import { fromDisk, toDisk, type DiskOptions } from './disk.js';

/**
 * Options for building a Config from text, bytes or a file.
 */
export interface ConfigLoadOptions extends ParseOptions, DiskOptions {
  /** Top-level sections to render first. */
  readonly sectionOrder?: readonly string[] | undefined;
}

/**
 * Immutable configuration document.
 *
 * Every method that changes something returns a new Config; the tree held by
 * an instance is a private copy.
 *
 * @example
 * ```typescript
 * const base = Config.fromStr(text, { sectionOrder: ['paths', 'training'] });
 * const run = base.merge(Config.fromStr('[training]\ndropout = 0.3\n'));
 * for (const diagnostic of run.diagnostics) {
 *   console.warn(diagnostic.kind, diagnostic.path.join('.'));
 * }
 * console.log(run.toStr({ interpolate: true }));
 * ```
 */
export class Config {
  private readonly tree: ConfigTree;

  /** Top-level sections to render first. */
  readonly sectionOrder: readonly string[];

  /** What the merge that produced this Config discarded, if any. */
  readonly diagnostics: readonly MergeDiagnostic[];

  constructor(
    tree: ConfigTree = {},
    sectionOrder: readonly string[] = [],
    diagnostics: readonly MergeDiagnostic[] = []
  ) {
    this.tree = cloneTree(tree);
    this.sectionOrder = [...sectionOrder];
    this.diagnostics = diagnostics;
  }

  static fromStr(text: string, options: ConfigLoadOptions = {}): Config {
    return new Config(parse(text, options), options.sectionOrder);
  }

  static fromBytes(bytes: Uint8Array, options: ConfigLoadOptions = {}): Config {
    return new Config(fromBytes(bytes, options), options.sectionOrder);
  }

  static async fromDisk(filePath: string, options: ConfigLoadOptions = {}): Promise<Config> {
    return new Config(await fromDisk(filePath, options), options.sectionOrder);
  }

  /**
   * Returns a deep copy of the underlying tree.
   */
  toTree(): ConfigTree {
    return cloneTree(this.tree);
  }

  /**
   * Reads a value by dotted path.
   *
   * @param path - Dotted path such as `training.optimizer.lr`.
   * @returns A copy of the value, or undefined if the path does not exist.
   */
  get(path: string): ConfigValue | undefined {
    const value = getAtPath(this.tree, path.split('.'));
    return value === undefined ? undefined : cloneValue(value);
  }

  isInterpolated(): boolean {
    return isInterpolated(this.tree);
  }

  interpolate(): Config {
    return new Config(interpolate(this.tree), this.sectionOrder);
  }

  /**
   * Merges another configuration over this one. The result keeps this
   * Config's section order and records the merge diagnostics.
   *
   * @param override - Values that take precedence.
   * @returns The merged Config.
   */
  merge(override: Config | ConfigTree): Config {
    const overrideTree = override instanceof Config ? override.tree : override;
    const { tree, diagnostics } = mergeWithDiagnostics(this.tree, overrideTree);
    return new Config(tree, this.sectionOrder, diagnostics);
  }

  copy(): Config {
    return new Config(this.tree, this.sectionOrder, this.diagnostics);
  }

  toStr(options: { interpolate?: boolean } = {}): string {
    return render(this.tree, { interpolate: options.interpolate, sectionOrder: this.sectionOrder });
  }

  toBytes(options: { interpolate?: boolean } = {}): Uint8Array {
    return toBytes(this.tree, { interpolate: options.interpolate, sectionOrder: this.sectionOrder });
  }

  async toDisk(filePath: string, options: { interpolate?: boolean } & DiskOptions = {}): Promise<void> {
    await toDisk(filePath, this.tree, {
      interpolate: options.interpolate,
      sectionOrder: this.sectionOrder,
      logger: options.logger,
    });
  }
}
