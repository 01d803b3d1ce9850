import { findAll, generate, isFunction, parse, type Dialect } from '@polyglot-sql/sdk';
import { logger } from './logger';

/**
 * Function call found in a parsed statement, described by its rendering under
 * the dialect it was parsed with.
 */
export interface SqlFunctionCall {
  name: string;
  /** Rendered call text, e.g. `COLLECT_LIST(product_id)`. */
  text: string;
  /** Rendered text between the call's parentheses. */
  argumentText: string;
  argumentCount: number;
  /** Number of function calls enclosing this one. */
  depth: number;
}

export interface SqlTree {
  text: string;
  /** Calls in the order the AST search yields them, outer calls before their arguments. */
  calls: SqlFunctionCall[];
}

export class SqlParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SqlParseError';
  }
}

const RENDERED_CALL = /^([A-Za-z_][A-Za-z0-9_]*)\s*\(([\s\S]*)\)$/;

/**
 * Top-level arguments in rendered argument text: commas outside strings,
 * quoted identifiers and nested brackets, plus one. Empty text has none.
 */
export function countArguments(argumentText: string): number {
  if (!argumentText.trim()) {
    return 0;
  }

  let commas = 0;
  let nesting = 0;
  let quote: string | undefined;
  for (let pos = 0; pos < argumentText.length; pos++) {
    const char = argumentText[pos];
    if (quote) {
      if (char === '\\') {
        pos++;
      } else if (char === quote) {
        quote = undefined;
      }
    } else if (char === "'" || char === '"' || char === '`') {
      quote = char;
    } else if (char === '(' || char === '[') {
      nesting++;
    } else if (char === ')' || char === ']') {
      nesting--;
    } else if (char === ',' && nesting === 0) {
      commas++;
    }
  }
  return commas + 1;
}

/**
 * Parses `sql` with the transpiler's grammar for `dialect` and returns every
 * function call in it. Grammar errors raise `SqlParseError`.
 */
export function parseSql(sql: string, dialect: Dialect): SqlTree {
  const result = parse(sql, dialect);
  if (!result.success || !result.ast) {
    throw new SqlParseError(result.error ?? `Could not parse SQL as ${dialect}`);
  }

  const statements = Array.isArray(result.ast) ? result.ast : [result.ast];
  const nodes = statements.flatMap(statement => findAll(statement, isFunction));
  const descendants = nodes.map(node => new Set(findAll(node, isFunction).filter(child => child !== node)));

  const calls: SqlFunctionCall[] = [];
  nodes.forEach((node, index) => {
    const rendered = generate([node], dialect);
    const text = rendered.success && rendered.sql?.length === 1 ? rendered.sql[0].trim() : undefined;
    const match = text?.match(RENDERED_CALL);
    if (!text || !match) {
      logger.debug(`Skipping function node that renders as ${text ?? rendered.error ?? 'nothing'}`);
      return;
    }

    calls.push({
      name: match[1],
      text,
      argumentText: match[2],
      argumentCount: countArguments(match[2]),
      depth: descendants.filter((children, other) => other !== index && children.has(node)).length,
    });
  });

  return { text: sql, calls };
}
