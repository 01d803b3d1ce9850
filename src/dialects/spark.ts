import type { DialectConfiguration } from '../utils/dialect_profile';

// Spark SQL, also the grammar behind Databricks when the engine lacks one.
export const sparkConfig: DialectConfiguration = {
  name: 'spark',
  aliases: ['spark2', 'spark_sql'],
  engineNames: ['spark'],
};
