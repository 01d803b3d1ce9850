import type { DialectConfiguration } from '../utils/dialect_profile';

export const duckdbConfig: DialectConfiguration = {
  name: 'duckdb',
  aliases: [],
  engineNames: ['duckdb'],
};
