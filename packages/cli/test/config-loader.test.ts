import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import {
  ConfigLoadError,
  findConfigPath,
  findConfigUp,
  loadConfigWithErrors,
  loadEffectiveConfig,
} from '../src/utils/config-loader.js';

describe('config-loader', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'branchgate-cli-config-'));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  describe('findConfigUp', () => {
    it('should find the config in a parent directory', () => {
      writeFileSync(join(testDir, '.branchgate.yaml'), 'branches: {}\n');
      const nested = join(testDir, 'packages', 'web', 'src');
      mkdirSync(nested, { recursive: true });

      expect(findConfigUp(nested)).toBe(testDir);
    });

    it('should return null when no directory has a config', () => {
      expect(findConfigUp(testDir)).toBeNull();
    });
  });

  describe('findConfigPath', () => {
    it('should return the full path of the config file', () => {
      writeFileSync(join(testDir, '.branchgate.yaml'), 'branches: {}\n');

      expect(findConfigPath(testDir)).toBe(join(testDir, '.branchgate.yaml'));
    });
  });

  describe('loadConfigWithErrors', () => {
    it('should return nulls when no config exists', async () => {
      expect(await loadConfigWithErrors(testDir)).toEqual({ config: null, errors: null, filePath: null });
    });

    it('should load the config with local overrides applied', async () => {
      writeFileSync(join(testDir, '.branchgate.yaml'), 'branches:\n  override_branch: develop\n');
      writeFileSync(join(testDir, '.branchgate.local.yaml'), 'branches:\n  override_branch: feature/mine\n');

      const { config, errors } = await loadConfigWithErrors(testDir);

      expect(errors).toBeNull();
      expect(config?.branches.override_branch).toBe('feature/mine');
    });

    it('should report schema errors with their path', async () => {
      writeFileSync(join(testDir, '.branchgate.yaml'), 'directory:\n  timeout_ms: -5\n');

      const { config, errors, filePath } = await loadConfigWithErrors(testDir);

      expect(config).toBeNull();
      expect(filePath).toBe(join(testDir, '.branchgate.yaml'));
      expect(errors).toHaveLength(1);
      expect(errors?.[0]).toMatch(/^directory\.timeout_ms: /);
    });

    it('should point at the local file when it is the invalid one', async () => {
      writeFileSync(join(testDir, '.branchgate.yaml'), 'branches: {}\n');
      writeFileSync(join(testDir, '.branchgate.local.yaml'), 'branches:\n  protected_names: [main]\n');

      const { filePath } = await loadConfigWithErrors(testDir);

      expect(filePath).toBe(join(testDir, '.branchgate.local.yaml'));
    });

    it('should report YAML syntax errors', async () => {
      writeFileSync(join(testDir, '.branchgate.yaml'), 'branches: [unclosed\n');

      const { config, errors } = await loadConfigWithErrors(testDir);

      expect(config).toBeNull();
      expect(errors?.[0]).toMatch(/^YAML syntax error: /);
    });
  });

  describe('loadEffectiveConfig', () => {
    it('should fall back to defaults without a config file', async () => {
      const { config, filePath } = await loadEffectiveConfig(testDir);

      expect(filePath).toBeNull();
      expect(config).toEqual({ directory: { cli: 'supabase' }, branches: { interactive_fallback: true } });
    });

    it('should throw ConfigLoadError for an invalid file', async () => {
      writeFileSync(join(testDir, '.branchgate.yaml'), 'unknown_section: true\n');

      await expect(loadEffectiveConfig(testDir)).rejects.toBeInstanceOf(ConfigLoadError);
    });
  });
});
