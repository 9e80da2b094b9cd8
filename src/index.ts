/**
 * @module clique-configurations
 * Enumerates clique configurations over 1..n: collections of cliques in which
 * every integer belongs to one or two cliques and no clique contains another.
 */

export type { Structural, Value, Primitive } from './value-set';
export { ValueSet, compare, getHashCode, singleton } from './value-set';
export type { Clique } from './configuration';
export { CliqueConfiguration } from './configuration';
export { generateCliques, nextLevel, assertWellFormed } from './generator';
export { endingCliqueSize } from './classifier';
export type { LevelSummary, RecurrenceCheck } from './breakdown';
export { tabulateEndingSizes, summarizeLevels, checkRecurrence, maxBucketCount } from './breakdown';
export type { RenderOptions } from './render';
export { visualize, renderReport } from './render';
export { FrozenSetError, InvalidCliqueCountError, CliqueInvariantError } from './errors';
