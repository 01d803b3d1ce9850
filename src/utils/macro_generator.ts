import fs from 'fs';
import path from 'path';
import { getDialectProfile, normalizeDialect } from './dialect_registry';
import type { FunctionNode } from './dialect_profile';
import { MACRO_PREFIX } from './rewrite_engine';
import type { ProjectConfig } from './project_config';
import { logger } from './logger';

const ARGUMENT_PLACEHOLDER = '__PORTABLE_ARGS__';
const ARGUMENT_EXPRESSION = '{{ expression }}';

/**
 * Renders `NAME(expression)` for one dialect. Falls back to the name as-is when the
 * dialect cannot render the call.
 */
function renderImplementation(functionName: string, primaryDialect: string, dialect: string): string {
  const fallback = `${functionName}(${ARGUMENT_EXPRESSION})`;
  try {
    const primary = getDialectProfile(primaryDialect);
    const parsed = primary.parse(`SELECT ${functionName}(${ARGUMENT_PLACEHOLDER})`);
    const [call] = parsed.tree.calls;
    if (!call) {
      return fallback;
    }
    const node: FunctionNode = { call, dialect: parsed.dialect };
    const rendered = getDialectProfile(dialect).render(node);
    if (!rendered.includes(ARGUMENT_PLACEHOLDER)) {
      return fallback;
    }
    return rendered.split(ARGUMENT_PLACEHOLDER).join(ARGUMENT_EXPRESSION);
  } catch (error) {
    logger.debug(
      `Using ${functionName} verbatim for ${dialect}: ${error instanceof Error ? error.message : String(error)}`
    );
    return fallback;
  }
}

function macroBlock(name: string, body: string): string {
  return [`{% macro ${name}(expression) %}`, `  ${body}`, '{% endmacro %}'].join('\n');
}

/**
 * Text of a dbt macro library with one `portable_<name>` dispatcher per function
 * and an implementation for each dialect plus a default.
 */
export function generateMacroLibrary(functionNames: readonly string[], dialects: readonly string[]): string {
  const [primaryDialect] = dialects;
  const canonicalDialects = [...new Set(dialects.map(normalizeDialect))];
  const names = [...new Set(functionNames.map(name => name.toUpperCase()))].sort();

  const sections = names.map(functionName => {
    const lowerName = functionName.toLowerCase();
    const blocks = [
      macroBlock(
        `${MACRO_PREFIX}${lowerName}`,
        `{{ return(adapter.dispatch('${lowerName}', 'portable')(expression)) }}`
      ),
      ...canonicalDialects.map(dialect =>
        macroBlock(`${dialect}__${lowerName}`, renderImplementation(functionName, primaryDialect, dialect))
      ),
      macroBlock(`default__${lowerName}`, renderImplementation(functionName, primaryDialect, primaryDialect)),
    ];
    return blocks.join('\n\n');
  });

  const header = [
    '{#',
    '  Portable function macros.',
    `  Dialects: ${canonicalDialects.join(', ')}`,
    '  Generated by portable-sql-rewriter; regenerate instead of editing by hand.',
    '#}',
  ].join('\n');

  return [header, ...sections].join('\n\n') + '\n';
}

/**
 * Writes the macro library for `functionNames` to the configured output path and
 * returns that path. Nothing is written for an empty list.
 */
export function writeMacroLibrary(config: ProjectConfig, functionNames: readonly string[]): string {
  const outputPath = config.macroOutputPath;
  if (functionNames.length === 0) {
    logger.info('No functions to generate macros for');
    return outputPath;
  }

  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, generateMacroLibrary(functionNames, config.dialects), 'utf-8');
  logger.info(`Wrote ${functionNames.length} portable macro(s) to ${outputPath}`);
  return outputPath;
}
