import type { DialectConfiguration } from '../utils/dialect_profile';

export const postgresConfig: DialectConfiguration = {
  name: 'postgres',
  aliases: ['postgresql', 'pg'],
  engineNames: ['postgresql', 'postgres'],
};
