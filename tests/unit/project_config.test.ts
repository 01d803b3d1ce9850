import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ConfigError, loadProjectConfig } from '../../src/utils/project_config';

describe('project_config', () => {
  let tmpDir: string;
  let configPath: string;

  const writeConfig = (content: string) => fs.writeFileSync(configPath, content);

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'project-config-test-'));
    configPath = path.join(tmpDir, '.portable-sql.yml');
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('WHEN the config is valid', () => {
    it('SHOULD resolve paths against the config directory', () => {
      writeConfig('dialects:\n  - spark\n  - duckdb\nmodel_paths:\n  - models\n  - staging\n');

      expect(loadProjectConfig(configPath)).toEqual({
        dialects: ['spark', 'duckdb'],
        primaryDialect: 'spark',
        modelRoots: [path.join(tmpDir, 'models'), path.join(tmpDir, 'staging')],
        macroOutputPath: path.join(tmpDir, 'macros', 'portable_functions.sql'),
        projectRoot: tmpDir,
        scanProject: true,
      });
    });

    it('SHOULD accept the legacy adapters key', () => {
      writeConfig('adapters: [snowflake, bigquery]\n');

      expect(loadProjectConfig(configPath).dialects).toEqual(['snowflake', 'bigquery']);
    });

    it('SHOULD skip model roots when project scanning is disabled', () => {
      writeConfig('dialects: [spark, duckdb]\nscan_project: false\nmacro_output: out/macros.sql\n');

      const config = loadProjectConfig(configPath);

      expect(config.modelRoots).toEqual([]);
      expect(config.scanProject).toBe(false);
      expect(config.macroOutputPath).toBe(path.join(tmpDir, 'out', 'macros.sql'));
    });
  });

  describe('WHEN the config is invalid', () => {
    it('SHOULD reject a missing file', () => {
      expect(() => loadProjectConfig(configPath)).toThrow(`Config file not found: ${configPath}`);
    });

    it('SHOULD reject an empty file', () => {
      writeConfig('');

      expect(() => loadProjectConfig(configPath)).toThrow('Config file is empty');
    });

    it('SHOULD reject malformed YAML', () => {
      writeConfig('dialects: [spark, duckdb\n');

      expect(() => loadProjectConfig(configPath)).toThrow(ConfigError);
      expect(() => loadProjectConfig(configPath)).toThrow(`Invalid YAML in ${configPath}`);
    });

    it('SHOULD require at least two dialects', () => {
      writeConfig('dialects: [spark]\n');

      expect(() => loadProjectConfig(configPath)).toThrow(
        `Invalid config ${configPath}: At least 2 dialects must be specified`
      );
    });

    it('SHOULD name the offending field', () => {
      writeConfig('dialects: spark\n');

      expect(() => loadProjectConfig(configPath)).toThrow(/^Invalid config .*: dialects: /);
    });
  });
});
