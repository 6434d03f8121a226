/**
 * Utilities Module
 *
 * String helpers shared by the descriptor builder.
 */

export { englishInflector, isPascalCase, pluralize } from './inflection.js';
export type { Inflector } from './inflection.js';
