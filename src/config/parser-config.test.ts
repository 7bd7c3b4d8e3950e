/**
 * Tests for parser configuration resolution
 */

import { describe, it, expect } from 'vitest';
import {
  resolveParserConfig,
  DEFAULT_PARSER_CONFIG,
  ENV_LOG_LEVEL,
  ENV_BOOLEAN_LITERALS,
} from './parser-config';
import { ConfigurationError } from '../types/argument-errors';

describe('resolveParserConfig', () => {
  it('should fall back to defaults', () => {
    const config = resolveParserConfig({}, {});
    expect(config.addHelp).toBe(true);
    expect(config.exitOnHelp).toBe(true);
    expect(config.booleanLiterals).toBe('strict');
    expect(config.logLevel).toBe('warn');
    expect(config.positionalColumnWidth).toBe(DEFAULT_PARSER_CONFIG.positionalColumnWidth);
    expect(config.optionalColumnWidth).toBe(30);
    expect(config.programName).toBeNull();
    expect(config.sources.logLevel).toBe('default');
  });

  it('should prefer explicit options over the environment', () => {
    const config = resolveParserConfig(
      { logLevel: 'error', booleanLiterals: 'strict' },
      { [ENV_LOG_LEVEL]: 'debug', [ENV_BOOLEAN_LITERALS]: 'extended' }
    );
    expect(config.logLevel).toBe('error');
    expect(config.booleanLiterals).toBe('strict');
    expect(config.sources.logLevel).toBe('options');
  });

  it('should read settings from the environment', () => {
    const config = resolveParserConfig({}, { [ENV_LOG_LEVEL]: ' debug ', [ENV_BOOLEAN_LITERALS]: 'extended' });
    expect(config.logLevel).toBe('debug');
    expect(config.booleanLiterals).toBe('extended');
    expect(config.sources.booleanLiterals).toBe('env');
  });

  it('should ignore unrecognized environment values', () => {
    const config = resolveParserConfig({}, { [ENV_LOG_LEVEL]: 'loud' });
    expect(config.logLevel).toBe('warn');
    expect(config.sources.logLevel).toBe('default');
  });

  it('should keep program name and description', () => {
    const config = resolveParserConfig({ programName: 'tool', description: 'Does things' }, {});
    expect(config.programName).toBe('tool');
    expect(config.description).toBe('Does things');
  });

  it('should reject an out-of-range column width', () => {
    expect(() => resolveParserConfig({ optionalColumnWidth: 2 }, {})).toThrow(ConfigurationError);
    expect(() => resolveParserConfig({ optionalColumnWidth: 2 }, {})).toThrow(
      /^ArgumentParser: invalid parser options: optionalColumnWidth: /
    );
  });

  it('should reject an empty program name', () => {
    expect(() => resolveParserConfig({ programName: '' }, {})).toThrow(
      'ArgumentParser: invalid parser options: programName: Program name cannot be empty'
    );
  });
});
