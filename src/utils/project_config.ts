import fs from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const projectConfigSchema = z
  .object({
    dialects: z.array(z.string().min(1)).optional(),
    // Earlier config files called the dialect list `adapters`.
    adapters: z.array(z.string().min(1)).optional(),
    model_paths: z.array(z.string().min(1)).default(['models']),
    macro_output: z.string().min(1).default('macros/portable_functions.sql'),
    scan_project: z.boolean().default(true),
  })
  .transform(({ dialects, adapters, ...rest }) => ({ ...rest, dialects: dialects ?? adapters ?? [] }))
  .refine(config => config.dialects.length >= 2, { message: 'At least 2 dialects must be specified' });

export interface ProjectConfig {
  /** Ordered; the first entry is the primary dialect. */
  dialects: string[];
  primaryDialect: string;
  modelRoots: string[];
  macroOutputPath: string;
  projectRoot: string;
  scanProject: boolean;
}

export function loadProjectConfig(configPath: string): ProjectConfig {
  const resolvedPath = path.resolve(configPath);
  if (!fs.existsSync(resolvedPath)) {
    throw new ConfigError(`Config file not found: ${resolvedPath}`);
  }

  let data: unknown;
  try {
    data = parseYaml(fs.readFileSync(resolvedPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${resolvedPath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (data === null || data === undefined) {
    throw new ConfigError('Config file is empty');
  }

  const result = projectConfigSchema.safeParse(data);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ConfigError(`Invalid config ${resolvedPath}: ${details}`);
  }

  const config = result.data;
  const projectRoot = path.dirname(resolvedPath);

  return {
    dialects: config.dialects,
    primaryDialect: config.dialects[0],
    modelRoots: config.scan_project ? config.model_paths.map(modelPath => path.resolve(projectRoot, modelPath)) : [],
    macroOutputPath: path.resolve(projectRoot, config.macro_output),
    projectRoot,
    scanProject: config.scan_project,
  };
}
