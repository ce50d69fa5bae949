/**
 * Environment-backed compiler configuration
 *
 * Loads `.env` files with dotenv and maps the IDLC_* variables onto a
 * CompilerConfig. Explicit options (CLI flags, API callers) take precedence
 * over anything read here.
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';
import { existsSync } from 'node:fs';
import { ENV_KEYS, type CompilerConfig } from './constants.js';

export interface EnvOptions {
  /** Path to .env file (default: .env then .env.local in cwd) */
  envFile?: string;
  /** Base directory for resolving relative paths */
  baseDir?: string;
}

export interface LoadEnvResult {
  /** Whether any .env files were loaded */
  loaded: boolean;
  /** Paths of loaded .env files */
  files: string[];
  /** Number of variables loaded */
  count: number;
}

/**
 * Load environment variables from .env files
 */
export function loadEnv(options: EnvOptions = {}): LoadEnvResult {
  const baseDir = options.baseDir || process.cwd();
  const envFilePaths = options.envFile
    ? [resolve(baseDir, options.envFile)]
    : ['.env', '.env.local'].map((file) => resolve(baseDir, file));

  const files: string[] = [];
  let count = 0;

  // Later files override earlier ones
  for (const envPath of envFilePaths) {
    if (!existsSync(envPath)) continue;

    const result = dotenvConfig({ path: envPath, override: true });
    if (!result.error && result.parsed) {
      files.push(envPath);
      count += Object.keys(result.parsed).length;
    }
  }

  return { loaded: files.length > 0, files, count };
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return undefined;
}

/**
 * Read compiler settings from an environment map (process.env by default)
 */
export function resolveCompilerConfig(
  env: Record<string, string | undefined> = process.env
): CompilerConfig {
  const config: CompilerConfig = {};

  const extension = env[ENV_KEYS.EXTENSION]?.trim();
  if (extension) {
    config.extension = extension.startsWith('.') ? extension : `.${extension}`;
  }

  const verbose = parseBoolean(env[ENV_KEYS.VERBOSE]);
  if (verbose !== undefined) {
    config.verbose = verbose;
  }

  return config;
}
