/**
 * Generator configuration.
 *
 * Values come from CLI flags, then the environment, then an optional
 * docgen.config.json (or the file named by DOCGEN_CONFIG), then defaults.
 */

import fs from 'fs-extra';
import * as path from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';

export const CONFIG_FILE_NAME = 'docgen.config.json';

export interface DocgenConfig {
  stackDir: string;
  outputDir: string;
  html: boolean;
}

export const DEFAULT_CONFIG: DocgenConfig = {
  stackDir: 'stack',
  outputDir: 'docs',
  html: false
};

const ConfigFileSchema = z
  .object({
    stackDir: z.string().min(1).optional(),
    outputDir: z.string().min(1).optional(),
    html: z.boolean().optional()
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Settings given on the command line; absent ones fall through.
 */
export interface ConfigOverrides {
  stackDir?: string;
  outputDir?: string;
  html?: boolean;
}

export interface ResolveConfigOptions {
  /** Directory relative paths resolve against (default: process.cwd()) */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

/**
 * Read and validate the config file. A missing file yields an empty config.
 */
export async function readConfigFile(configPath: string): Promise<ConfigFile> {
  if (!(await fs.pathExists(configPath))) {
    return {};
  }

  let raw: unknown;
  try {
    raw = await fs.readJson(configPath);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`not valid JSON (${reason})`, configPath);
  }

  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(issues.join('; '), configPath);
  }
  return result.data;
}

function fromEnv(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Merge every configuration source. Directories come back absolute.
 */
export async function resolveConfig(options: ResolveConfigOptions = {}): Promise<DocgenConfig> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};

  const configPath = path.resolve(cwd, fromEnv(env.DOCGEN_CONFIG) ?? CONFIG_FILE_NAME);
  const file = await readConfigFile(configPath);

  const stackDir = overrides.stackDir ?? fromEnv(env.DOCGEN_STACK_DIR) ?? file.stackDir ?? DEFAULT_CONFIG.stackDir;
  const outputDir = overrides.outputDir ?? fromEnv(env.DOCGEN_OUTPUT_DIR) ?? file.outputDir ?? DEFAULT_CONFIG.outputDir;

  return {
    stackDir: path.resolve(cwd, stackDir),
    outputDir: path.resolve(cwd, outputDir),
    html: overrides.html ?? file.html ?? DEFAULT_CONFIG.html
  };
}
