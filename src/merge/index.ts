/**
 * Deep merge with placeholder and registered-function precedence rules.
 *
 * @packageDocumentation
 */

export { merge, mergeWithDiagnostics } from './merger.js';
