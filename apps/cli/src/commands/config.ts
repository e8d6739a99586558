import { CONFIG_KEYS, getConfig, getConfigPath, setConfig, type ConfigKey, type SkillpinConfig } from '../lib/config.js';
import { UsageError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

export interface ConfigCommandOptions {
  configDir?: string;
}

function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((k) => k === key);
}

function requireKey(key: string): ConfigKey {
  if (!isConfigKey(key)) {
    throw new UsageError(`Unknown config key "${key}". Valid keys: ${CONFIG_KEYS.join(', ')}`);
  }
  return key;
}

function parseValue(key: ConfigKey, value: string): Partial<SkillpinConfig> {
  if (key === 'timeoutMs') {
    const timeoutMs = Number(value);
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
      throw new UsageError(`timeoutMs must be a positive integer, got "${value}"`);
    }
    return { timeoutMs };
  }
  const partial: Partial<SkillpinConfig> = {};
  partial[key] = value;
  return partial;
}

function display(key: ConfigKey, value: SkillpinConfig[ConfigKey]): string {
  if (value === undefined) {
    return '(not set)';
  }
  if (key === 'token') {
    return maskToken(String(value));
  }
  return String(value);
}

export function maskToken(token: string): string {
  return token.length <= 8 ? '****' : `${token.slice(0, 4)}****${token.slice(-4)}`;
}

export function configGet(key: string, options: ConfigCommandOptions = {}): string | undefined {
  const configKey = requireKey(key);
  const value = getConfig(options.configDir)[configKey];
  const shown = value === undefined ? undefined : String(value);
  console.log(shown ?? '');
  return shown;
}

export function configSet(key: string, value: string, options: ConfigCommandOptions = {}): void {
  const configKey = requireKey(key);
  setConfig(parseValue(configKey, value), options.configDir);
  logger.success(`Set ${configKey} in ${getConfigPath(options.configDir)}`);
}

/** All keys with their effective values; the token is masked. */
export function configList(options: ConfigCommandOptions = {}): Record<ConfigKey, string> {
  const config = getConfig(options.configDir);
  const listed: Record<ConfigKey, string> = {
    token: display('token', config.token),
    defaultBranch: display('defaultBranch', config.defaultBranch),
    outputDir: display('outputDir', config.outputDir),
    apiBaseUrl: display('apiBaseUrl', config.apiBaseUrl),
    rawBaseUrl: display('rawBaseUrl', config.rawBaseUrl),
    timeoutMs: display('timeoutMs', config.timeoutMs),
    createdBy: display('createdBy', config.createdBy),
  };

  logger.info(`Config file: ${getConfigPath(options.configDir)}`);
  for (const key of CONFIG_KEYS) {
    logger.detail(`${key.padEnd(14)} ${listed[key]}`);
  }
  return listed;
}
