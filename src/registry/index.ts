/**
 * Registry Module
 *
 * Argument declarations and name validation
 */

export { DefinitionRegistry } from './definition-registry';
export { Arity, PositionalDefinition, OptionalDefinition } from './definitions';
export type { DefaultValue } from './definitions';
