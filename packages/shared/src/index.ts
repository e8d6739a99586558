// Schemas
export { skillManifestSchema, type SkillManifest } from './schemas/manifest.js';
export { proxyMetadataSchema, type ProxyMetadata } from './schemas/proxy-metadata.js';

// Types
export {
  branchNameSchema,
  revisionIdSchema,
  contentHashSchema,
  toBranchName,
  toRevisionId,
  toContentHash,
  parseBranchName,
  parseRevisionId,
  parseContentHash,
  type BranchName,
  type RevisionId,
  type ContentHash,
} from './types/refs.js';
export type { RemoteReference, RawAddress, PinnedSnapshot } from './types/reference.js';

// Lib
export {
  resolveLocation,
  pinnedRawUrl,
  parseRawUrl,
  type LocationResult,
  type LocationError,
  type LocationErrorKind,
  type ResolveLocationOptions,
} from './lib/location.js';
export {
  validateManifest,
  descriptionText,
  characterCount,
  formatIssue,
  type ManifestIssue,
  type ManifestIssueKind,
} from './lib/manifest.js';
export { isRecord } from './lib/guards.js';

// Constants
export {
  SKILL_FILENAME,
  PROXY_SUFFIX,
  PROXY_LICENSE,
  DEFAULT_BRANCH,
  DEFAULT_OUTPUT_DIR,
  GITHUB_HOST,
  RAW_CONTENT_HOST,
  RAW_BASE_URL,
  GITHUB_API_URL,
  MAX_NAME_LENGTH,
  MAX_DESCRIPTION_LENGTH,
  PROXY_METADATA_KEYS,
  EXIT_CODES,
  LIABILITY_DISCLAIMER,
  type ExitCode,
} from './constants/proxy.js';
