import type { DialectConfiguration } from '../utils/dialect_profile';

export const snowflakeConfig: DialectConfiguration = {
  name: 'snowflake',
  aliases: [],
  engineNames: ['snowflake'],
};
