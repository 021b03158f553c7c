/**
 * Configuration loader for Tern.
 *
 * Loads tern.config.json from the working directory or a specified path.
 * Provides the evaluator's runtime limits and trace setting.
 */

import * as fs from 'fs';
import * as path from 'path';

const CONFIG_FILENAMES = ['tern.config.json', '.ternrc.json'];

export interface TernConfig {
  /** Deepest allowed function call nesting. */
  maxDepth?: number;
  /** Node evaluations allowed per run. */
  maxSteps?: number;
  trace?: boolean;
}

/**
 * Load Tern configuration from the filesystem.
 *
 * Search order:
 * 1. Explicit path (if provided)
 * 2. tern.config.json in cwd
 * 3. .ternrc.json in cwd
 *
 * Returns empty config if no file is found (not an error).
 */
export function loadConfig(explicitPath?: string): TernConfig {
  if (explicitPath) {
    return readConfigFile(explicitPath);
  }
  return findConfigIn(process.cwd()) ?? {};
}

/**
 * Load config relative to a script file's directory, falling back to cwd.
 * Useful when running `tern path/to/script.tern` from a different cwd.
 */
export function loadConfigForScript(scriptPath: string): TernConfig {
  const scriptDir = path.dirname(path.resolve(scriptPath));
  return findConfigIn(scriptDir) ?? loadConfig();
}

function findConfigIn(dir: string): TernConfig | undefined {
  for (const filename of CONFIG_FILENAMES) {
    const filePath = path.join(dir, filename);
    if (fs.existsSync(filePath)) {
      return readConfigFile(filePath);
    }
  }
  return undefined;
}

function readConfigFile(filePath: string): TernConfig {
  const content = fs.readFileSync(filePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in config file ${filePath}: ${error.message}`);
    }
    throw error;
  }
  return validateConfig(parsed, filePath);
}

/**
 * Validate config structure. Throws on invalid config.
 */
function validateConfig(raw: unknown, filePath: string): TernConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error(`Invalid config in ${filePath}: must be an object`);
  }

  const config: TernConfig = {};
  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case 'maxDepth':
        config.maxDepth = positiveInteger(key, value, filePath);
        break;
      case 'maxSteps':
        config.maxSteps = positiveInteger(key, value, filePath);
        break;
      case 'trace':
        if (typeof value !== 'boolean') {
          throw new Error(`Invalid "trace" in ${filePath}: must be a boolean`);
        }
        config.trace = value;
        break;
      default:
        throw new Error(`Unknown config key "${key}" in ${filePath}`);
    }
  }
  return config;
}

function positiveInteger(key: string, value: unknown, filePath: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid "${key}" in ${filePath}: must be a positive integer`);
  }
  return value;
}
