/**
 * Unit tests for config-reader
 * Tests reading and validating spec-reporter.config.json
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { readConfig, parseConfig, getConfigPath, CONFIG_FILE_NAME } from '../../src/config/config-reader.js';
import { ConfigError } from '../../src/errors.js';

const DEFAULTS = {
  enabled: true,
  verbose: false,
  color: true,
  includeEmptySuites: false,
  fillerPhrases: ['with more details'],
  overrides: {},
  logLevel: 'silent',
};

describe('config-reader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'spec-reporter-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('readConfig', () => {
    it('should return the defaults when no config file exists', async () => {
      const result = await readConfig(dir);

      expect(result).toEqual(DEFAULTS);
    });

    it('should merge the config file over the defaults', async () => {
      await writeFile(
        join(dir, CONFIG_FILE_NAME),
        JSON.stringify({ verbose: true, fillerPhrases: ['with extra context'], overrides: { DescribeCar: 'the car' } })
      );

      const result = await readConfig(dir);

      expect(result).toEqual({
        ...DEFAULTS,
        verbose: true,
        fillerPhrases: ['with extra context'],
        overrides: { DescribeCar: 'the car' },
      });
    });

    it('should read an explicit config file relative to cwd', async () => {
      await writeFile(join(dir, 'custom.json'), JSON.stringify({ color: false }));

      const result = await readConfig(dir, 'custom.json');

      expect(result.color).toBe(false);
    });

    it('should fail when an explicit config file is missing', async () => {
      await expect(readConfig(dir, 'missing.json')).rejects.toThrow(ConfigError);
    });

    it('should fail on invalid JSON', async () => {
      await writeFile(join(dir, CONFIG_FILE_NAME), '{ "enabled": ');

      await expect(readConfig(dir)).rejects.toThrow(/Config file is not valid JSON/);
    });

    it('should list schema violations', async () => {
      await writeFile(join(dir, CONFIG_FILE_NAME), JSON.stringify({ enabled: 'yes', logLevel: 'loud' }));

      const error = await readConfig(dir).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues.map((issue) => issue.split(':')[0])).toEqual(['enabled', 'logLevel']);
        expect(error.file).toBe(join(dir, CONFIG_FILE_NAME));
      }
    });
  });

  describe('parseConfig', () => {
    it('should reject unknown keys', () => {
      expect(() => parseConfig({ colour: true }, 'inline')).toThrow(ConfigError);
    });

    it('should reject blank filler phrases', () => {
      expect(() => parseConfig({ fillerPhrases: ['  '] }, 'inline')).toThrow(ConfigError);
    });
  });

  describe('getConfigPath', () => {
    it('should default to the config file in cwd', () => {
      expect(getConfigPath('/work')).toBe(join('/work', CONFIG_FILE_NAME));
    });

    it('should keep absolute paths', () => {
      expect(getConfigPath('/work', '/etc/spec.json')).toBe('/etc/spec.json');
    });

    it('should resolve relative paths against cwd', () => {
      expect(getConfigPath('/work', 'conf/spec.json')).toBe('/work/conf/spec.json');
    });
  });
});
