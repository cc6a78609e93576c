/**
 * Rendering of configuration trees to text and bytes.
 *
 * @packageDocumentation
 */

export { orderSections, render } from './serializer.js';
export type { RenderOptions } from './serializer.js';
export { fromBytes, toBytes } from './bytes.js';
