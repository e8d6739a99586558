export { VERSION, USER_AGENT } from './version.js';

export { logger } from './lib/logger.js';
export { getConfig, setConfig, getConfigPath, getConfigDir, loadRuntimeConfig } from './lib/config.js';
export type { SkillpinConfig, ConfigKey } from './lib/config.js';
export {
  SkillpinError,
  UsageError,
  RemoteUnavailableError,
  ReferenceNotFoundError,
  ValidationFailedError,
  IntegrityMismatchError,
  exitCodeFor,
} from './lib/errors.js';
export type { RemoteHost } from './lib/remote-host.js';
export { GitHubClient, createGitHubClient } from './lib/github-client.js';
export { digest } from './lib/integrity.js';
export { parseArtifact, serializeArtifact } from './lib/artifact.js';
export { buildProxyRecord, renderProxyRecord } from './lib/proxy-builder.js';
export type { ProxyRecord, ProxyManifest, ProxyBuildInput } from './lib/proxy-builder.js';
export { readProxyRecord, writeProxyRecord } from './lib/proxy-record.js';
export type { LoadedProxyRecord } from './lib/proxy-record.js';

export { createCommand } from './commands/create.js';
export type { CreateOptions, CreateResult } from './commands/create.js';
export { verifyCommand, verifyProxy } from './commands/verify.js';
export type { VerifyOptions, VerifyResult, UpstreamStatus } from './commands/verify.js';
export { updateCommand } from './commands/update.js';
export type { UpdateOptions, UpdateResult } from './commands/update.js';
