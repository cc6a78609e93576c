/**
 * Configuration documents and file persistence.
 *
 * @packageDocumentation
 */

export { Config } from './config.js';
export type { ConfigLoadOptions } from './config.js';
export { fromDisk, toDisk } from './disk.js';
export type { DiskOptions } from './disk.js';
