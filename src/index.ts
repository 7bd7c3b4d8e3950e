/**
 * argmatch
 *
 * Declarative command-line argument parsing with typed, lazily coerced values
 */

// Parser
export { ArgumentParser } from './parser/argument-parser';
export { ParsedArguments } from './parser/parsed-arguments';

// Declarations
export { Arity, PositionalDefinition, OptionalDefinition } from './registry';
export type { DefaultValue } from './registry';

// Value types
export { ValueTypes } from './coercion/value-types';
export type { ValueType, ValueTag, CoercionContext } from './coercion/value-types';

// Configuration
export * from './config';

// Errors, results, exit codes and logging
export * from './types';
export { ConsoleLogger, createConsoleLogger, BufferLogger, createBufferLogger } from './logging';
