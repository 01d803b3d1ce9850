import type { DialectConfiguration } from '../utils/dialect_profile';

export const redshiftConfig: DialectConfiguration = {
  name: 'redshift',
  aliases: [],
  engineNames: ['redshift', 'postgresql', 'postgres'],
};
