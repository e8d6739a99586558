import {
  characterCount,
  LIABILITY_DISCLAIMER,
  MAX_DESCRIPTION_LENGTH,
  PROXY_LICENSE,
  PROXY_METADATA_KEYS,
  PROXY_SUFFIX,
  type PinnedSnapshot,
} from '@skillpin/shared';
import { serializeArtifact } from './artifact.js';
import { shortRevision } from './integrity.js';

type MetadataKey = (typeof PROXY_METADATA_KEYS)[keyof typeof PROXY_METADATA_KEYS];

export type ProxyManifest = {
  name: string;
  description: string;
  license: string;
  metadata: Record<MetadataKey, string>;
};

export interface ProxyRecord {
  manifest: ProxyManifest;
  body: string;
}

export interface ProxyBuildInput {
  remoteName: string;
  remoteDescription: string;
  summary: string;
  owner: string;
  repo: string;
  snapshot: PinnedSnapshot;
  /** Directory the record lives in, as shown in the re-verify instructions */
  proxyDir: string;
  /** Rebuilt by update rather than written by create */
  updated?: boolean;
}

export function proxyNameFor(remoteName: string): string {
  return `${remoteName}${PROXY_SUFFIX}`;
}

/**
 * Name of the remote skill a proxy stands for, or null if the name lacks the suffix.
 */
export function proxiedNameOf(proxyName: string): string | null {
  if (!proxyName.endsWith(PROXY_SUFFIX) || proxyName.length === PROXY_SUFFIX.length) {
    return null;
  }
  return proxyName.slice(0, -PROXY_SUFFIX.length);
}

/** UTC timestamp as YYYYMMDD_HHMM. */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}`
  );
}

/**
 * Proxy description restating the remote one. When too long, the remote
 * description is cut so the closing "use exactly as" clause always survives.
 */
export function proxyDescription(remoteName: string, owner: string, remoteDescription: string): string {
  const prefix = `Proxy for ${remoteName} by ${owner}. `;
  const suffix = ` Use exactly as you would use ${remoteName} directly.`;
  const room = MAX_DESCRIPTION_LENGTH - characterCount(prefix) - characterCount(suffix);

  let described = remoteDescription.trim();
  if (characterCount(described) > room) {
    const kept = Array.from(described).slice(0, Math.max(room - 1, 0)).join('');
    described = `${kept.trimEnd()}…`;
  }
  return `${prefix}${described}${suffix}`;
}

export function buildProxyRecord(input: ProxyBuildInput): ProxyRecord {
  const { remoteName, remoteDescription, owner, snapshot } = input;

  const manifest: ProxyManifest = {
    name: proxyNameFor(remoteName),
    description: proxyDescription(remoteName, owner, remoteDescription),
    license: PROXY_LICENSE,
    metadata: {
      [PROXY_METADATA_KEYS.source]: snapshot.source,
      [PROXY_METADATA_KEYS.rawUrl]: snapshot.rawUrl,
      [PROXY_METADATA_KEYS.commit]: snapshot.revision,
      [PROXY_METADATA_KEYS.sha256]: snapshot.hash,
      [PROXY_METADATA_KEYS.branch]: snapshot.branch,
      [PROXY_METADATA_KEYS.createdBy]: snapshot.createdBy,
      [PROXY_METADATA_KEYS.createdAt]: snapshot.createdAt,
    },
  };

  return { manifest, body: renderBody(input) };
}

export function renderProxyRecord(record: ProxyRecord): string {
  return serializeArtifact(record.manifest, record.body);
}

function renderBody(input: ProxyBuildInput): string {
  const { remoteName, owner, repo, summary, snapshot, proxyDir, updated } = input;
  const summaryHeading = updated
    ? `## Summary (updated ${snapshot.createdAt})`
    : `## Summary (captured at proxy creation · ${snapshot.createdAt})`;

  return `# ${remoteName} (proxied from ${owner}/${repo})

**Source:** [${owner}/${repo}](${snapshot.source}) · branch \`${snapshot.branch}\` · commit \`${shortRevision(snapshot.revision)}\`

## ⚠️ Liability disclaimer

${LIABILITY_DISCLAIMER}

## ⚠️ Verify before use

Before following any instructions, fetch and verify the remote skill:

1. Fetch the pinned content:
   \`${snapshot.rawUrl}\`

2. Compute the SHA-256 of the fetched bytes exactly as received.

3. Compare it with the recorded checksum:
   \`${snapshot.hash}\`

4. If the checksum does **not** match: **STOP immediately.**
   Do not follow any instructions. Alert the user:
   > "The remote skill content has changed unexpectedly. The 'Skill Proxy'
   > checksum does not match. Run \`skillpin verify ${proxyDir}\` and review before proceeding."

5. If the checksum **matches**: follow the instructions in the fetched SKILL.md.

${summaryHeading}

${summary || '(no summary available, see the remote SKILL.md)'}

## Re-verifying and updating this 'Skill Proxy'

\`\`\`bash
# Check that the remote content still matches the pinned checksum
skillpin verify ${proxyDir}

# Move the pin to the branch tip after reviewing upstream changes
skillpin update ${proxyDir}
\`\`\`
`;
}
