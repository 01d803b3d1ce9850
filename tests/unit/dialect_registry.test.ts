import { describe, it, expect, vi } from 'vitest';
import {
  getDialectProfile,
  normalizeDialect,
  supportedDialects,
  UnsupportedDialectError,
} from '../../src/utils/dialect_registry';
import { DialectRenderError, type FunctionNode } from '../../src/utils/dialect_profile';

vi.mock('@polyglot-sql/sdk', async () => import('../helpers/fake_polyglot'));

function sparkNode(sql: string): FunctionNode {
  const parsed = getDialectProfile('spark').parse(`SELECT ${sql}`);
  return { call: parsed.tree.calls[0], dialect: parsed.dialect };
}

describe('dialect_registry', () => {
  describe('normalizeDialect', () => {
    it('SHOULD resolve aliases case-insensitively', () => {
      expect(normalizeDialect(' PostgreSQL ')).toBe('postgres');
      expect(normalizeDialect('pg')).toBe('postgres');
      expect(normalizeDialect('athena')).toBe('presto');
      expect(normalizeDialect('Spark_SQL')).toBe('spark');
    });

    it('SHOULD lower-case unknown names', () => {
      expect(normalizeDialect('MySQL')).toBe('mysql');
    });
  });

  describe('getDialectProfile', () => {
    it('SHOULD return the canonical profile', () => {
      expect(getDialectProfile('DuckDB').name).toBe('duckdb');
    });

    it('SHOULD reject unknown dialects', () => {
      expect(() => getDialectProfile('mysql')).toThrow(UnsupportedDialectError);
      expect(() => getDialectProfile('mysql')).toThrow('Unsupported SQL dialect: mysql');
    });
  });

  it('SHOULD list every supported dialect', () => {
    expect(supportedDialects()).toEqual([
      'spark',
      'databricks',
      'duckdb',
      'postgres',
      'snowflake',
      'bigquery',
      'redshift',
      'trino',
      'presto',
    ]);
  });

  describe('render', () => {
    it('SHOULD render a call in the target dialect', () => {
      const node = sparkNode('collect_list(x)');

      expect(getDialectProfile('spark').render(node)).toBe('COLLECT_LIST(x)');
      expect(getDialectProfile('duckdb').render(node)).toBe('LIST(x)');
      expect(getDialectProfile('postgres').render(node)).toBe('ARRAY_AGG(x)');
    });

    it('SHOULD throw when the engine rejects the call', () => {
      expect(() => getDialectProfile('duckdb').render(sparkNode('BROKEN_FN(x)'))).toThrow(DialectRenderError);
    });
  });

  describe('catalog', () => {
    it('SHOULD expose the dialect function table', () => {
      const catalog = getDialectProfile('duckdb').catalog();

      expect(catalog.get('LIST')).toBe('ArrayAgg');
      expect(catalog.get('COUNT')).toBe('Count');
      expect(catalog.has('COLLECT_LIST')).toBe(false);
    });
  });
});
