import type { DialectConfiguration } from '../utils/dialect_profile';

export const trinoConfig: DialectConfiguration = {
  name: 'trino',
  aliases: [],
  engineNames: ['trino', 'presto'],
};
