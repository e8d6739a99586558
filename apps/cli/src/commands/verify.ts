import { parseRawUrl, type BranchName, type ContentHash, type RevisionId } from '@skillpin/shared';
import { getConfig, type SkillpinConfig } from '../lib/config.js';
import { IntegrityMismatchError, SkillpinError, errorMessage } from '../lib/errors.js';
import { createGitHubClient } from '../lib/github-client.js';
import { digest, shortHash, shortRevision } from '../lib/integrity.js';
import { logger } from '../lib/logger.js';
import { trackLifecycle } from '../lib/progress.js';
import { readProxyRecord } from '../lib/proxy-record.js';
import type { RemoteHost } from '../lib/remote-host.js';

export type VerifyState =
  | 'LoadingRecord'
  | 'Fetching'
  | 'Comparing'
  | 'CheckingUpstream'
  | 'Intact'
  | 'Mismatch'
  | 'Failed';

export interface VerifyOptions {
  proxyDir: string;
  /** Skip resolving the tracked branch after a successful check */
  skipUpstream?: boolean;
  host?: RemoteHost;
  config?: SkillpinConfig;
  configDir?: string;
}

export type UpstreamStatus =
  | { state: 'current'; revision: RevisionId }
  | { state: 'behind'; pinned: RevisionId | null; latest: RevisionId }
  | { state: 'unknown'; reason: string }
  | { state: 'skipped' };

export type VerifyResult =
  | {
      status: 'intact';
      proxyDir: string;
      rawUrl: string;
      expected: ContentHash;
      actual: ContentHash;
      upstream: UpstreamStatus;
    }
  | {
      status: 'mismatch';
      proxyDir: string;
      rawUrl: string;
      expected: ContentHash;
      actual: ContentHash;
    };

/**
 * Re-fetch the pinned address and compare its SHA-256 with the recorded one.
 * Never writes. A mismatch is returned, not thrown; see verifyCommand.
 */
export async function verifyProxy(options: VerifyOptions): Promise<VerifyResult> {
  const config = options.config ?? getConfig(options.configDir);
  const host = options.host ?? createGitHubClient(config);
  const { proxyDir } = options;

  const tracker = trackLifecycle<VerifyState>('verify', 'LoadingRecord', `Loading ${proxyDir}...`);

  try {
    const record = readProxyRecord(proxyDir);
    const { metadata } = record;
    const rawUrl = metadata['proxy-raw-url'];
    const expected = metadata['proxy-sha256'];

    tracker.enter('Fetching', 'Fetching pinned content...');
    const bytes = await host.fetchRaw(rawUrl);

    tracker.enter('Comparing', 'Comparing checksums...');
    const actual = digest(bytes);
    if (actual !== expected) {
      tracker.finish('Mismatch');
      return { status: 'mismatch', proxyDir, rawUrl, expected, actual };
    }

    let upstream: UpstreamStatus = { state: 'skipped' };
    if (!options.skipUpstream) {
      tracker.enter('CheckingUpstream', `Checking ${metadata['proxy-branch']} for newer commits...`);
      upstream = await checkUpstream(host, config, rawUrl, metadata['proxy-branch'], metadata['proxy-commit']);
    }

    tracker.finish('Intact');
    return { status: 'intact', proxyDir, rawUrl, expected, actual, upstream };
  } catch (err) {
    tracker.fail('Failed', err);
    throw err;
  }
}

/**
 * verifyProxy, reported to the user.
 *
 * @throws IntegrityMismatchError when the pinned content no longer matches
 */
export async function verifyCommand(options: VerifyOptions): Promise<VerifyResult> {
  logger.warn('Risk and responsibility for using a proxied skill lies with the user.');

  const result = await verifyProxy(options);

  if (result.status === 'mismatch') {
    logger.error('CHECKSUM MISMATCH');
    logger.detail('The content at the pinned commit changed. Do not use this skill until it is reviewed.');
    throw new IntegrityMismatchError(
      `Pinned content of ${result.proxyDir} does not match the recorded checksum`,
      result.expected,
      result.actual,
      { proxyDir: result.proxyDir, rawUrl: result.rawUrl },
    );
  }

  logger.success(`Checksum matches (${shortHash(result.actual)}...): ${result.proxyDir} is intact`);

  const { upstream } = result;
  switch (upstream.state) {
    case 'current':
      logger.success(`Pinned commit is the tip of its branch (${shortRevision(upstream.revision)})`);
      break;
    case 'behind':
      logger.info(`Upstream has a newer commit: ${shortRevision(upstream.latest)}`);
      logger.detail(`Review the upstream changes, then run: skillpin update ${result.proxyDir}`);
      break;
    case 'unknown':
      logger.warn(`Could not check upstream: ${upstream.reason}`);
      break;
    case 'skipped':
      break;
  }

  return result;
}

async function checkUpstream(
  host: RemoteHost,
  config: SkillpinConfig,
  rawUrl: string,
  branch: BranchName,
  pinned: RevisionId | undefined,
): Promise<UpstreamStatus> {
  const address = parseRawUrl(rawUrl, config.rawBaseUrl);
  if (!address) {
    return { state: 'unknown', reason: `cannot read owner/repo from ${rawUrl}` };
  }

  let latest: RevisionId;
  try {
    latest = await host.resolveRevision(address.owner, address.repo, branch);
  } catch (err) {
    // Only remote failures are advisory here; anything else is a bug.
    if (err instanceof SkillpinError) {
      return { state: 'unknown', reason: errorMessage(err) };
    }
    throw err;
  }

  if (latest === pinned) {
    return { state: 'current', revision: latest };
  }
  return { state: 'behind', pinned: pinned ?? null, latest };
}
