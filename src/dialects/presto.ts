import type { DialectConfiguration } from '../utils/dialect_profile';

export const prestoConfig: DialectConfiguration = {
  name: 'presto',
  aliases: ['athena'],
  engineNames: ['presto', 'trino'],
};
