import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { z } from 'zod';
import { DEFAULT_BRANCH, DEFAULT_OUTPUT_DIR, GITHUB_API_URL, RAW_BASE_URL } from '@skillpin/shared';
import { UsageError, errorMessage } from './errors.js';

export interface SkillpinConfig {
  token?: string;
  defaultBranch: string;
  outputDir: string;
  apiBaseUrl: string;
  rawBaseUrl: string;
  timeoutMs: number;
  createdBy?: string;
}

export const DEFAULT_CONFIG: SkillpinConfig = {
  defaultBranch: DEFAULT_BRANCH,
  outputDir: DEFAULT_OUTPUT_DIR,
  apiBaseUrl: GITHUB_API_URL,
  rawBaseUrl: RAW_BASE_URL,
  timeoutMs: 20_000,
};

const configFileSchema = z.object({
  token: z.string().min(1).optional(),
  defaultBranch: z.string().trim().min(1).optional(),
  outputDir: z.string().min(1).optional(),
  apiBaseUrl: z.string().url().optional(),
  rawBaseUrl: z.string().url().optional(),
  timeoutMs: z.number().int().positive().optional(),
  createdBy: z.string().min(1).optional(),
}).strict();

export type ConfigKey = keyof SkillpinConfig;

export const CONFIG_KEYS: readonly ConfigKey[] = [
  'token',
  'defaultBranch',
  'outputDir',
  'apiBaseUrl',
  'rawBaseUrl',
  'timeoutMs',
  'createdBy',
];

/**
 * Get the path to the skillpin config directory.
 * Override with configDir parameter for testing.
 */
export function getConfigDir(configDir?: string): string {
  return configDir ?? path.join(os.homedir(), '.skillpin');
}

export function getConfigPath(configDir?: string): string {
  return path.join(getConfigDir(configDir), 'config.json');
}

/**
 * Read the config file merged over the defaults.
 * A missing file yields the defaults; an unreadable or invalid one is a usage error.
 */
export function getConfig(configDir?: string): SkillpinConfig {
  const configPath = getConfigPath(configDir);
  if (!fs.existsSync(configPath)) {
    return { ...DEFAULT_CONFIG };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new UsageError(
      `Failed to read config at ${configPath}: ${errorMessage(err)}`,
    );
  }

  const result = configFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new UsageError(`Invalid config at ${configPath}:\n${formatIssues(result.error)}`);
  }

  return { ...DEFAULT_CONFIG, ...result.data };
}

/**
 * Write config to disk, merged with the existing file.
 * The directory is created 0700 and the file written 0600 since it may hold a token.
 */
export function setConfig(partial: Partial<SkillpinConfig>, configDir?: string): void {
  const dir = getConfigDir(configDir);
  const configPath = getConfigPath(configDir);

  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  }

  const existing = fs.existsSync(configPath) ? readConfigFile(configPath) : {};
  const result = configFileSchema.safeParse({ ...existing, ...partial });
  if (!result.success) {
    throw new UsageError(`Invalid config value:\n${formatIssues(result.error)}`);
  }
  const merged = result.data;

  fs.writeFileSync(configPath, JSON.stringify(merged, null, 2) + '\n', {
    encoding: 'utf-8',
    mode: 0o600,
  });
}

export interface RuntimeConfigOptions {
  configDir?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * The config one invocation runs with: the file, plus GITHUB_TOKEN from the environment.
 * Read once at startup and not re-read afterwards.
 */
export function loadRuntimeConfig(options: RuntimeConfigOptions = {}): SkillpinConfig {
  const env = options.env ?? process.env;
  const config = getConfig(options.configDir);
  const envToken = env.GITHUB_TOKEN?.trim();
  return envToken ? { ...config, token: envToken } : config;
}

// Only the keys present in the file, so defaults are not persisted by setConfig.
function readConfigFile(configPath: string): Partial<SkillpinConfig> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new UsageError(`Failed to read config at ${configPath}: ${errorMessage(err)}`);
  }
  const result = configFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new UsageError(`Invalid config at ${configPath}; fix or remove it before running config set`);
  }
  return result.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `  - ${i.path.join('.') || '(root)'}: ${i.message}`).join('\n');
}
