// src/dialects/index.ts
import { sparkConfig } from './spark';
import { databricksConfig } from './databricks';
import { duckdbConfig } from './duckdb';
import { postgresConfig } from './postgres';
import { snowflakeConfig } from './snowflake';
import { bigqueryConfig } from './bigquery';
import { redshiftConfig } from './redshift';
import { trinoConfig } from './trino';
import { prestoConfig } from './presto';

export const dialectConfigurations = {
  spark: sparkConfig,
  databricks: databricksConfig,
  duckdb: duckdbConfig,
  postgres: postgresConfig,
  snowflake: snowflakeConfig,
  bigquery: bigqueryConfig,
  redshift: redshiftConfig,
  trino: trinoConfig,
  presto: prestoConfig,
};
