/**
 * Help Text
 *
 * Usage line and the column-aligned argument listing printed for --help
 */

import type { DefinitionRegistry } from '../registry/definition-registry';
import type { OptionalDefinition, PositionalDefinition } from '../registry/definitions';

export interface HelpTextOptions {
  programName: string;
  description: string | null;
  /** Width of the name column in the positional block, including the indent */
  positionalColumnWidth: number;
  /** Width of the name column in the options block, including the indent */
  optionalColumnWidth: number;
}

const INDENT = '  ';

/** Get the usage line, e.g. `Usage: prog [options] <src> <dest>` */
export function getUsageText(registry: DefinitionRegistry, programName: string): string {
  let usage = `Usage: ${programName}`;
  if (registry.getOptionals().length > 0) {
    usage += ' [options]';
  }
  for (const positional of registry.getPositionals()) {
    usage += ` <${positional.name}>`;
  }
  return usage;
}

/** Label shown for an option, e.g. `-f, --filter FILTER` */
export function formatOptionLabel(option: OptionalDefinition): string {
  let label = option.flag !== null ? `-${option.flag}, ` : '';
  label += `--${option.name}`;
  if (option.takesValue) {
    label += ` ${option.valuePlaceholder}`;
  }
  return label;
}

function formatEntry(
  label: string,
  definition: PositionalDefinition | OptionalDefinition,
  columnWidth: number
): string {
  const width = columnWidth - INDENT.length;
  // An over-long label still gets one space before its text
  const paddedLabel = label.length >= width ? `${label} ` : label.padEnd(width);
  const text = [definition.helpText];
  if (definition.defaultRaw !== undefined) {
    text.push(`(default: ${definition.defaultRaw})`);
  }
  return `${INDENT}${paddedLabel}${text.filter((part) => part.length > 0).join(' ')}`.trimEnd();
}

/** Get the full help text: usage, description, positional and option blocks */
export function getHelpText(registry: DefinitionRegistry, options: HelpTextOptions): string {
  const lines = [getUsageText(registry, options.programName)];

  if (options.description) {
    lines.push('', options.description);
  }

  const positionals = registry.getPositionals();
  if (positionals.length > 0) {
    lines.push('', 'Positional arguments:');
    for (const positional of positionals) {
      lines.push(formatEntry(positional.name, positional, options.positionalColumnWidth));
    }
  }

  const optionals = registry.getOptionals();
  if (optionals.length > 0) {
    lines.push('', 'Options:');
    for (const optional of optionals) {
      lines.push(formatEntry(formatOptionLabel(optional), optional, options.optionalColumnWidth));
    }
  }

  return lines.join('\n');
}
