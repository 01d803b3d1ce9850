import fs from 'fs';
import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { listModelFiles, rewriteModels } from '../../src/utils/model_rewriter';
import { loadProjectConfig, type ProjectConfig } from '../../src/utils/project_config';

vi.mock('@polyglot-sql/sdk', async () => import('../helpers/fake_polyglot'));

const fixturesDir = fileURLToPath(new URL('../fixtures/models', import.meta.url));

describe('model_rewriter', () => {
  let tmpDir: string;
  let config: ProjectConfig;

  const modelPath = (name: string) => path.join(tmpDir, 'models', name);

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'model-rewriter-test-'));
    fs.cpSync(fixturesDir, path.join(tmpDir, 'models'), { recursive: true });
    fs.writeFileSync(path.join(tmpDir, '.portable-sql.yml'), 'dialects: [spark, duckdb]\n');
    config = loadProjectConfig(path.join(tmpDir, '.portable-sql.yml'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('SHOULD list every model file', () => {
    expect(listModelFiles(config)).toEqual([
      modelPath('already_portable.sql'),
      modelPath('array_aggregation.sql'),
      modelPath('plain.sql'),
      modelPath('with_control_flow.sql'),
    ]);
  });

  describe('WHEN running as a dry run', () => {
    it('SHOULD report the files that would change without touching them', () => {
      const before = fs.readFileSync(modelPath('array_aggregation.sql'), 'utf-8');
      const processed = vi.fn();

      const modified = rewriteModels(config, { dryRun: true, onFileProcessed: processed });

      expect(modified).toEqual([modelPath('array_aggregation.sql'), modelPath('with_control_flow.sql')]);
      expect(processed).toHaveBeenCalledTimes(4);
      expect(processed).toHaveBeenCalledWith(modelPath('plain.sql'), false);
      expect(fs.readFileSync(modelPath('array_aggregation.sql'), 'utf-8')).toBe(before);
    });
  });

  describe('WHEN rewriting', () => {
    it('SHOULD rewrite divergent calls and leave the rest untouched', () => {
      const portable = fs.readFileSync(modelPath('already_portable.sql'), 'utf-8');

      rewriteModels(config, { dryRun: false });

      expect(fs.readFileSync(modelPath('with_control_flow.sql'), 'utf-8')).toContain(
        "{{ portable_collect_list('tag') }} as tags"
      );
      expect(fs.readFileSync(modelPath('already_portable.sql'), 'utf-8')).toBe(portable);
      expect(rewriteModels(config, { dryRun: false })).toEqual([]);
    });
  });
});
