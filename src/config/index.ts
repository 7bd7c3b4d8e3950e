/**
 * Config module - parser option resolution
 */

export {
  resolveParserConfig,
  DEFAULT_PARSER_CONFIG,
  ENV_LOG_LEVEL,
  ENV_BOOLEAN_LITERALS,
} from './parser-config';
export type {
  ParserOptions,
  ParserConfig,
  BooleanLiterals,
  ConfigSource,
  OutputStream,
  ExitHandler,
} from './parser-config';
