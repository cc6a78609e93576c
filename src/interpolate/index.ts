/**
 * Placeholder interpolation across configuration sections.
 *
 * @packageDocumentation
 */

export { interpolate, isInterpolated } from './interpolator.js';
