import path from 'node:path';
import {
  pinnedRawUrl,
  resolveLocation,
  validateManifest,
  type ContentHash,
  type RevisionId,
} from '@skillpin/shared';
import { getConfig, type SkillpinConfig } from '../lib/config.js';
import { RemoteUnavailableError, UsageError, ValidationFailedError } from '../lib/errors.js';
import { createGitHubClient } from '../lib/github-client.js';
import { digest, sameBytes, shortHash, shortRevision } from '../lib/integrity.js';
import { logger } from '../lib/logger.js';
import { trackLifecycle } from '../lib/progress.js';
import { buildProxyRecord, formatTimestamp, proxyNameFor, renderProxyRecord } from '../lib/proxy-builder.js';
import { writeProxyRecord } from '../lib/proxy-record.js';
import type { RemoteHost } from '../lib/remote-host.js';
import { readRemoteSkill } from '../lib/remote-skill.js';

export type CreateState =
  | 'Resolving'
  | 'Fetching'
  | 'Validating'
  | 'Pinning'
  | 'Hashing'
  | 'Writing'
  | 'Done'
  | 'Rejected'
  | 'Failed';

export interface CreateOptions {
  /** Any supported GitHub location of the remote skill */
  url: string;
  /** Parent directory of the proxy (default: config outputDir) */
  outputDir?: string;
  /** Recorded as proxy-created-by (default: config createdBy, else "unknown") */
  createdBy?: string;
  host?: RemoteHost;
  config?: SkillpinConfig;
  configDir?: string;
  now?: () => Date;
}

export interface CreateResult {
  proxyDir: string;
  proxyName: string;
  recordPath: string;
  revision: RevisionId;
  hash: ContentHash;
  rawUrl: string;
}

/**
 * Pin a remote skill: fetch it, validate its manifest, resolve the branch to
 * a revision, hash the bytes at the pinned address and write the proxy record.
 * Nothing is written unless every step succeeds.
 */
export async function createCommand(options: CreateOptions): Promise<CreateResult> {
  const config = options.config ?? getConfig(options.configDir);
  const host = options.host ?? createGitHubClient(config);
  const now = options.now ?? (() => new Date());
  const outputDir = options.outputDir ?? config.outputDir;
  const createdBy = options.createdBy ?? config.createdBy ?? 'unknown';

  const tracker = trackLifecycle<CreateState>('create', 'Resolving', 'Resolving location...');

  try {
    const located = resolveLocation(options.url, {
      defaultBranch: config.defaultBranch,
      rawBaseUrl: config.rawBaseUrl,
    });
    if (!located.ok) {
      throw new UsageError(located.error.message, { kind: located.error.kind });
    }
    const ref = located.reference;

    tracker.enter('Fetching', `Fetching ${ref.owner}/${ref.repo}@${ref.branch}...`);
    const branchBytes = await host.fetchRaw(ref.rawUrl);

    tracker.enter('Validating', 'Validating manifest...');
    const remote = readRemoteSkill(branchBytes, ref.rawUrl);

    tracker.enter('Pinning', `Resolving ${ref.branch} to a commit...`);
    const revision = await host.resolveRevision(ref.owner, ref.repo, ref.branch);
    const rawUrl = pinnedRawUrl(ref, revision, config.rawBaseUrl);

    tracker.enter('Hashing', `Hashing content at ${shortRevision(revision)}...`);
    const pinnedBytes = await host.fetchRaw(rawUrl);
    if (!sameBytes(pinnedBytes, branchBytes)) {
      throw new RemoteUnavailableError(
        `${ref.branch} moved while the proxy was being created; run create again`,
        { branchUrl: ref.rawUrl, rawUrl },
      );
    }
    const hash = digest(pinnedBytes);

    const proxyDir = path.join(outputDir, proxyNameFor(remote.name));
    const record = buildProxyRecord({
      remoteName: remote.name,
      remoteDescription: remote.description,
      summary: remote.summary,
      owner: ref.owner,
      repo: ref.repo,
      proxyDir,
      snapshot: {
        source: options.url.trim(),
        rawUrl,
        revision,
        hash,
        branch: ref.branch,
        createdBy,
        createdAt: formatTimestamp(now()),
      },
    });

    const issues = validateManifest(record.manifest);
    if (issues.length > 0) {
      throw new ValidationFailedError(`Generated proxy manifest for ${remote.name} is invalid`, issues);
    }

    tracker.enter('Writing', `Writing ${proxyDir}...`);
    const recordPath = writeProxyRecord(proxyDir, renderProxyRecord(record));
    tracker.finish('Done');

    logger.success(`Created ${record.manifest.name} in ${proxyDir}`);
    logger.detail(`commit  ${revision}`);
    logger.detail(`sha256  ${shortHash(hash)}...`);
    logger.detail(`raw url ${rawUrl}`);

    return {
      proxyDir,
      proxyName: record.manifest.name,
      recordPath,
      revision,
      hash,
      rawUrl,
    };
  } catch (err) {
    tracker.fail(err instanceof ValidationFailedError ? 'Rejected' : 'Failed', err);
    throw err;
  }
}
