import dotenv from 'dotenv';

// Don't override existing environment variables (important for tests)
// In test mode, try to load .env.test (if it exists), otherwise skip .env to avoid interference
const envFile = process.env.NODE_ENV === 'test' ? '.env.test' : '.env';
dotenv.config({ path: envFile, override: false, quiet: true });

export const otelConfig = {
  enabled: process.env.OTEL_LOGGING_ENABLED === 'true',
  serviceName: process.env.OTEL_SERVICE_NAME || 'portable-sql-rewriter',
  endpoint:
    process.env.OTEL_EXPORTER_OTLP_LOGS_ENDPOINT || process.env.OTEL_EXPORTER_OTLP_ENDPOINT || 'http://localhost:4318',
  headers: process.env.OTEL_EXPORTER_OTLP_HEADERS || '',
};

export const appConfig = {
  // Project configuration file, relative to the working directory unless absolute.
  configPath: process.env.PORTABLE_SQL_CONFIG || '.portable-sql.yml',
};
