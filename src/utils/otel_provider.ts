// src/utils/otel_provider.ts
import { LoggerProvider, BatchLogRecordProcessor } from '@opentelemetry/sdk-logs';
import { OTLPLogExporter } from '@opentelemetry/exporter-logs-otlp-http';
import { Resource } from '@opentelemetry/resources';
import { otelConfig } from '../config';
import { findProjectRoot } from './find_project_root';
import os from 'os';
import path from 'path';
import fs from 'fs';

let loggerProvider: LoggerProvider | null = null;

function getServiceVersion(): string {
  try {
    const rootPath = findProjectRoot(process.cwd()) || process.cwd();
    const packageJsonPath = path.join(rootPath, 'package.json');
    if (fs.existsSync(packageJsonPath)) {
      const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
      if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
        return String(packageJson.version);
      }
    }
  } catch (error) {
    console.error('Could not get service version', error);
  }
  return '0.0.0';
}

export function parseHeaders(headersString: string): Record<string, string> {
  const headers: Record<string, string> = {};
  if (!headersString) return headers;

  headersString.split(',').forEach(header => {
    const [key, value] = header.split('=');
    if (key && value) {
      headers[key.trim()] = value.trim();
    }
  });
  return headers;
}

export function getLoggerProvider(): LoggerProvider | null {
  if (!otelConfig.enabled) {
    return null;
  }

  if (loggerProvider) {
    return loggerProvider;
  }

  const resource = new Resource({
    'service.name': otelConfig.serviceName,
    'service.version': getServiceVersion(),
    'deployment.environment': process.env.NODE_ENV || 'production',
    'host.name': os.hostname(),
    'host.arch': os.arch(),
    'os.type': os.platform(),
  });

  const exporter = new OTLPLogExporter({
    url: otelConfig.endpoint.endsWith('/v1/logs') ? otelConfig.endpoint : `${otelConfig.endpoint}/v1/logs`,
    headers: parseHeaders(otelConfig.headers),
  });

  loggerProvider = new LoggerProvider({
    resource,
  });

  loggerProvider.addLogRecordProcessor(new BatchLogRecordProcessor(exporter));

  return loggerProvider;
}

export async function shutdown(): Promise<void> {
  if (loggerProvider) {
    await loggerProvider.shutdown();
    loggerProvider = null;
  }
}
