import path from 'node:path';
import {
  GITHUB_HOST,
  PROXY_METADATA_KEYS,
  parseRawUrl,
  pinnedRawUrl,
  validateManifest,
  type ContentHash,
  type RevisionId,
} from '@skillpin/shared';
import { serializeArtifact } from '../lib/artifact.js';
import { getConfig, type SkillpinConfig } from '../lib/config.js';
import { UsageError, ValidationFailedError } from '../lib/errors.js';
import { createGitHubClient } from '../lib/github-client.js';
import { digest, shortHash, shortRevision } from '../lib/integrity.js';
import { logger } from '../lib/logger.js';
import { trackLifecycle } from '../lib/progress.js';
import {
  buildProxyRecord,
  formatTimestamp,
  proxiedNameOf,
  type ProxyRecord,
} from '../lib/proxy-builder.js';
import { readProxyRecord, writeProxyRecord, type LoadedProxyRecord } from '../lib/proxy-record.js';
import type { RemoteHost } from '../lib/remote-host.js';
import { readRemoteSkill } from '../lib/remote-skill.js';

export type UpdateState =
  | 'LoadingRecord'
  | 'ResolvingRevision'
  | 'UpToDate'
  | 'Fetching'
  | 'Validating'
  | 'Hashing'
  | 'Rewriting'
  | 'DryRun'
  | 'Done'
  | 'Rejected'
  | 'Failed';

export interface UpdateOptions {
  proxyDir: string;
  /** Report what would change without writing */
  dryRun?: boolean;
  host?: RemoteHost;
  config?: SkillpinConfig;
  configDir?: string;
  now?: () => Date;
}

export type UpdateResult =
  | { status: 'up-to-date'; proxyDir: string; revision: RevisionId; hash: ContentHash; rawUrl: string }
  | {
      status: 'dry-run' | 'updated';
      proxyDir: string;
      previous: { revision: RevisionId | null; hash: ContentHash; rawUrl: string; createdAt: string | null };
      revision: RevisionId;
      hash: ContentHash;
      rawUrl: string;
      createdAt: string;
    };

/**
 * Move a proxy's pin to the current tip of its tracked branch.
 * The new content must pass the same validation as create, and keep the
 * proxied name; otherwise the record is left untouched.
 */
export async function updateCommand(options: UpdateOptions): Promise<UpdateResult> {
  const config = options.config ?? getConfig(options.configDir);
  const host = options.host ?? createGitHubClient(config);
  const now = options.now ?? (() => new Date());
  const { proxyDir, dryRun = false } = options;

  const tracker = trackLifecycle<UpdateState>('update', 'LoadingRecord', `Loading ${proxyDir}...`);

  try {
    const record = readProxyRecord(proxyDir);
    const { metadata } = record;
    const oldRawUrl = metadata['proxy-raw-url'];
    const branch = metadata['proxy-branch'];

    const address = parseRawUrl(oldRawUrl, config.rawBaseUrl);
    if (!address) {
      throw new UsageError(`Cannot read owner, repository and path from proxy-raw-url: ${oldRawUrl}`, {
        path: record.path,
      });
    }
    const { owner, repo } = address;

    tracker.enter('ResolvingRevision', `Resolving ${owner}/${repo}@${branch}...`);
    const revision = await host.resolveRevision(owner, repo, branch);

    if (revision === metadata['proxy-commit']) {
      tracker.finish('UpToDate');
      logger.success(`Already at the tip of ${branch} (${shortRevision(revision)}), nothing to update`);
      return {
        status: 'up-to-date',
        proxyDir,
        revision,
        hash: metadata['proxy-sha256'],
        rawUrl: oldRawUrl,
      };
    }

    const rawUrl = pinnedRawUrl(address, revision, config.rawBaseUrl);
    tracker.enter('Fetching', `Fetching content at ${shortRevision(revision)}...`);
    const bytes = await host.fetchRaw(rawUrl);

    tracker.enter('Validating', 'Validating manifest...');
    const remote = readRemoteSkill(bytes, rawUrl);
    const oldName = record.manifest.name;
    const proxiedName =
      (typeof oldName === 'string' ? proxiedNameOf(oldName) : null) ?? proxiedNameOf(path.basename(proxyDir));
    if (proxiedName !== null && remote.name !== proxiedName) {
      throw new ValidationFailedError(`Remote skill at ${rawUrl} was renamed`, [
        {
          kind: 'NameChanged',
          field: 'name',
          message: `name changed from "${proxiedName}" to "${remote.name}"; create a new proxy for it`,
        },
      ]);
    }

    tracker.enter('Hashing', 'Hashing content...');
    const hash = digest(bytes);
    const createdAt = formatTimestamp(now());

    const rebuilt = buildProxyRecord({
      remoteName: remote.name,
      remoteDescription: remote.description,
      summary: remote.summary,
      owner,
      repo,
      proxyDir,
      updated: true,
      snapshot: {
        source: metadata['proxy-source'] ?? `https://${GITHUB_HOST}/${owner}/${repo}`,
        rawUrl,
        revision,
        hash,
        branch,
        createdBy: metadata['proxy-created-by'] ?? config.createdBy ?? 'unknown',
        createdAt,
      },
    });

    const issues = validateManifest(rebuilt.manifest);
    if (issues.length > 0) {
      throw new ValidationFailedError(`Rebuilt proxy manifest for ${remote.name} is invalid`, issues);
    }

    const previous = {
      revision: metadata['proxy-commit'] ?? null,
      hash: metadata['proxy-sha256'],
      rawUrl: oldRawUrl,
      createdAt: metadata['proxy-created-at'] ?? null,
    };

    if (dryRun) {
      tracker.finish('DryRun');
      logger.info('Dry run, nothing written. Would update:');
      logger.detail(`proxy-commit     : ${shortRevision(previous.revision ?? 'none')} → ${shortRevision(revision)}`);
      logger.detail(`proxy-sha256     : ${shortHash(previous.hash)}... → ${shortHash(hash)}...`);
      logger.detail(`proxy-raw-url    : → ${rawUrl}`);
      logger.detail(`proxy-created-at : → ${createdAt} (updated)`);
      return { status: 'dry-run', proxyDir, previous, revision, hash, rawUrl, createdAt };
    }

    tracker.enter('Rewriting', `Rewriting ${record.path}...`);
    writeProxyRecord(proxyDir, renderMerged(record, rebuilt));
    tracker.finish('Done');

    logger.success(`Updated ${proxyDir}`);
    logger.detail(`commit ${shortRevision(previous.revision ?? 'none')} → ${shortRevision(revision)}`);
    logger.detail(`sha256 ${shortHash(hash)}...`);

    return { status: 'updated', proxyDir, previous, revision, hash, rawUrl, createdAt };
  } catch (err) {
    if (err instanceof ValidationFailedError) {
      tracker.fail('Rejected', err);
      logger.warn(`${proxyDir} was NOT updated. Review the upstream changes manually.`);
    } else {
      tracker.fail('Failed', err);
    }
    throw err;
  }
}

const GENERATED_METADATA_KEYS = new Set<string>(Object.values(PROXY_METADATA_KEYS));

/**
 * The rebuilt record, keeping any frontmatter and metadata keys of the old one
 * the builder does not generate.
 */
function renderMerged(old: LoadedProxyRecord, rebuilt: ProxyRecord): string {
  const extraMetadata = Object.fromEntries(
    Object.entries(old.metadata).filter(([key]) => !GENERATED_METADATA_KEYS.has(key)),
  );
  const manifest = {
    ...old.manifest,
    ...rebuilt.manifest,
    metadata: { ...rebuilt.manifest.metadata, ...extraMetadata },
  };
  return serializeArtifact(manifest, rebuilt.body);
}
