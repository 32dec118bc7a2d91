import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import yaml from 'js-yaml';
import { ArborConfig } from '../types.js';
import { validateArborConfig } from './schemas.js';
import { WorktreeError } from './errors.js';

/**
 * Get the config file path
 * Respects ARBOR_CONFIG env var, defaults to ~/.arborrc.yaml
 */
export function getConfigFilePath(): string {
  if (process.env.ARBOR_CONFIG) {
    return process.env.ARBOR_CONFIG;
  }
  return join(homedir(), '.arborrc.yaml');
}

/**
 * Parse config file contents (YAML, so JSON works too) into a frozen config.
 */
export function parseConfig(contents: string, source: string): ArborConfig {
  try {
    const data: unknown = yaml.load(contents);
    return Object.freeze(validateArborConfig(data));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new WorktreeError('InvalidConfig', `Failed to load config from ${source}`, message);
  }
}

/**
 * Read the config once at startup. A missing file yields the defaults; a
 * malformed one is an error, never silently ignored.
 */
export function loadConfig(configFile: string = getConfigFilePath()): ArborConfig {
  if (!existsSync(configFile)) {
    return Object.freeze(validateArborConfig({}));
  }
  let contents: string;
  try {
    contents = readFileSync(configFile, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new WorktreeError('InvalidConfig', `Failed to read config from ${configFile}`, message);
  }
  return parseConfig(contents, configFile);
}

export function expandPath(path: string): string {
  if (path === '~') {
    return homedir();
  }
  if (path.startsWith('~/')) {
    return join(homedir(), path.slice(2));
  }
  return path;
}
