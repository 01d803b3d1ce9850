import type { DialectConfiguration } from '../utils/dialect_profile';

export const bigqueryConfig: DialectConfiguration = {
  name: 'bigquery',
  aliases: ['big_query'],
  engineNames: ['bigquery'],
};
