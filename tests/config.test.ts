import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig, mergeConfig } from '../src/core/config.js';
import { ConfigError } from '../src/core/errors.js';
import { CONFIG_FILENAME, DEFAULT_CONFIG } from '../src/types/config.js';
import { resolveSettings } from '../src/cli/context.js';

describe('config', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'lib-integrator-config-'));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  function writeConfig(content: string): void {
    writeFileSync(join(testDir, CONFIG_FILENAME), content, 'utf-8');
  }

  it('should fall back to defaults without a config file', () => {
    expect(loadConfig(testDir)).toEqual({
      libsDir: 'libs',
      vcsCommand: 'git',
      frameworkName: 'the target framework',
    });
  });

  it('should fill unspecified keys with defaults', () => {
    writeConfig(JSON.stringify({ frameworkName: 'FsmOS' }));
    expect(loadConfig(testDir)).toEqual({ ...DEFAULT_CONFIG, frameworkName: 'FsmOS' });
  });

  it('should reject malformed JSON', () => {
    writeConfig('{ libsDir: ');
    expect(() => loadConfig(testDir)).toThrow(ConfigError);
  });

  it('should reject unknown keys', () => {
    writeConfig(JSON.stringify({ libDir: 'vendor' }));
    expect(() => loadConfig(testDir)).toThrow("Unrecognized key(s) in object: 'libDir'");
  });

  it('should name the offending key', () => {
    writeConfig(JSON.stringify({ libsDir: '' }));
    expect(() => loadConfig(testDir)).toThrow(/libsDir: /);
  });

  it('should let overrides win over the loaded config', () => {
    const merged = mergeConfig(DEFAULT_CONFIG, { libsDir: 'vendor', frameworkName: undefined });
    expect(merged).toEqual({ ...DEFAULT_CONFIG, libsDir: 'vendor' });
  });

  describe('resolveSettings', () => {
    it('should resolve the libs directory against the package root', () => {
      expect(resolveSettings({}, testDir).libsDir).toBe(join(testDir, 'libs'));
    });

    it('should take the configured directory and framework', () => {
      writeConfig(JSON.stringify({ libsDir: 'third_party', frameworkName: 'FsmOS' }));
      const settings = resolveSettings({}, testDir);
      expect(settings.libsDir).toBe(join(testDir, 'third_party'));
      expect(settings.config.frameworkName).toBe('FsmOS');
    });

    it('should prefer command-line options', () => {
      writeConfig(JSON.stringify({ libsDir: 'third_party' }));
      const absolute = join(testDir, 'elsewhere');
      const settings = resolveSettings({ libsDir: absolute, framework: 'Other' }, testDir);
      expect(settings.libsDir).toBe(absolute);
      expect(settings.config.frameworkName).toBe('Other');
    });
  });
});
