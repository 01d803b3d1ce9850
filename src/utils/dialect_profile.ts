import { Dialect, init, isInitialized, transpile } from '@polyglot-sql/sdk';
import { parseSql, SqlParseError, type SqlFunctionCall, type SqlTree } from './sql_parser';
import { loadFunctionCatalog } from './function_catalog';

export interface DialectConfiguration {
  /** Canonical dialect name, also the dbt adapter prefix of dispatch macros. */
  name: string;
  /** Other user-facing spellings that resolve to this dialect. */
  aliases: string[];
  /** Transpiler dialect identifiers, tried in order. */
  engineNames: string[];
}

/** A function call together with the dialect whose grammar produced it. */
export interface FunctionNode {
  call: SqlFunctionCall;
  dialect: string;
}

export interface ParsedSql {
  dialect: string;
  tree: SqlTree;
}

export interface DialectProfile {
  readonly name: string;
  parse(sql: string): ParsedSql;
  /** Canonical text of `node` under this dialect's surface syntax. Throws when it cannot be rendered. */
  render(node: FunctionNode): string;
  /** Built-in functions of the dialect, keyed by upper-case name, valued by implementation identity. */
  catalog(): ReadonlyMap<string, string>;
}

export class DialectRenderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DialectRenderError';
  }
}

const SELECT_PREFIX = /^SELECT\s+/i;

function resolveEngineDialect(config: DialectConfiguration): Dialect | undefined {
  const available: Dialect[] = Object.values(Dialect);
  for (const engineName of config.engineNames) {
    const match = available.find(value => String(value).toLowerCase() === engineName);
    if (match !== undefined) {
      return match;
    }
  }
  return undefined;
}

/**
 * Loads the transpiler's WebAssembly module. Rendering is synchronous afterwards.
 */
export async function initDialectEngine(): Promise<void> {
  if (!isInitialized()) {
    await init();
  }
}

/**
 * Dialect profile backed by the polyglot transpiler: its grammar parses model
 * SQL and its transpile step renders calls for other dialects.
 */
export class PolyglotDialectProfile implements DialectProfile {
  readonly name: string;
  private readonly engineDialect: Dialect | undefined;

  constructor(
    private readonly config: DialectConfiguration,
    private readonly lookup: (name: string) => PolyglotDialectProfile | undefined
  ) {
    this.name = config.name;
    this.engineDialect = resolveEngineDialect(config);
  }

  parse(sql: string): ParsedSql {
    if (!this.engineDialect) {
      throw new SqlParseError(`No transpiler grammar available for ${this.name}`);
    }
    return { dialect: this.name, tree: parseSql(sql, this.engineDialect) };
  }

  render(node: FunctionNode): string {
    const source = this.lookup(node.dialect);
    if (!source?.engineDialect || !this.engineDialect) {
      throw new DialectRenderError(`No transpiler dialect available for ${node.dialect} -> ${this.name}`);
    }

    // Transpile as a projection so every engine accepts a bare expression.
    const result = transpile(`SELECT ${node.call.text}`, source.engineDialect, this.engineDialect);
    const statement = result.success && result.sql && result.sql.length === 1 ? result.sql[0] : undefined;
    if (statement === undefined || !SELECT_PREFIX.test(statement)) {
      throw new DialectRenderError(
        `Could not render ${node.call.name} for ${this.name}: ${result.error ?? 'unexpected transpiler output'}`
      );
    }
    return statement.replace(SELECT_PREFIX, '').trim();
  }

  catalog(): ReadonlyMap<string, string> {
    return loadFunctionCatalog().get(this.name) ?? new Map();
  }
}
