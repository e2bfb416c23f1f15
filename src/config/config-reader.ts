/**
 * Reader for spec-reporter.config.json
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { isAbsolute, join, resolve } from 'node:path';
import { ConfigError } from '../errors.js';
import { SpecReporterConfigSchema, type SpecReporterConfig } from './config-schema.js';

export const CONFIG_FILE_NAME = 'spec-reporter.config.json';

/**
 * Resolve the config file path relative to cwd
 */
export function getConfigPath(cwd: string, file?: string): string {
  if (!file) {
    return join(cwd, CONFIG_FILE_NAME);
  }
  return isAbsolute(file) ? file : resolve(cwd, file);
}

/**
 * Validate raw config data, filling in defaults
 * @throws ConfigError listing every schema violation
 */
export function parseConfig(raw: unknown, source: string): SpecReporterConfig {
  const result = SpecReporterConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    throw new ConfigError(source, 'Invalid configuration', issues);
  }
  return result.data;
}

/**
 * Read and validate the reporter configuration
 * @param cwd - Directory the default config file is looked up in
 * @param file - Explicit config file; must exist when given
 * @returns Validated config, or the defaults when the default file does not exist
 */
export async function readConfig(cwd: string, file?: string): Promise<SpecReporterConfig> {
  const configPath = getConfigPath(cwd, file);

  if (!existsSync(configPath)) {
    if (file) {
      throw new ConfigError(configPath, 'Config file not found');
    }
    return parseConfig({}, configPath);
  }

  let content: string;
  try {
    content = await readFile(configPath, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(configPath, `Cannot read config file: ${reason}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(configPath, `Config file is not valid JSON: ${reason}`);
  }

  return parseConfig(raw, configPath);
}
