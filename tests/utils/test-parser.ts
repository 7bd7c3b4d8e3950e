/**
 * Parser factory for tests: buffered logging, captured output, stubbed exit
 */

import { vi } from 'vitest';
import type { Mock } from 'vitest';
import { ArgumentParser } from '../../src/parser/argument-parser';
import type { ParserOptions } from '../../src/config/parser-config';
import { BufferLogger } from '../../src/logging/buffer-logger';

export interface TestParser {
  parser: ArgumentParser;
  logger: BufferLogger;
  /** Everything written to the parser's output */
  written: () => string;
  exit: Mock;
}

export function createTestParser(options: ParserOptions = {}): TestParser {
  const logger = new BufferLogger();
  const chunks: string[] = [];
  const exit = vi.fn();
  const parser = new ArgumentParser({
    logger,
    output: { write: (text: string) => chunks.push(text) },
    exit,
    ...options,
  });
  return { parser, logger, written: () => chunks.join(''), exit };
}
