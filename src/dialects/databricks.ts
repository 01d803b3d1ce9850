import type { DialectConfiguration } from '../utils/dialect_profile';

// Falls back to the Spark grammar when the engine has no dedicated Databricks dialect.
export const databricksConfig: DialectConfiguration = {
  name: 'databricks',
  aliases: [],
  engineNames: ['databricks', 'spark'],
};
