import { SKILL_FILENAME, skillManifestSchema, validateManifest, type ManifestIssue, type SkillManifest } from '@skillpin/shared';
import { extractSummary, parseArtifact } from './artifact.js';
import { ValidationFailedError } from './errors.js';

export interface RemoteSkill {
  manifest: SkillManifest;
  name: string;
  description: string;
  summary: string;
}

const decoder = new TextDecoder('utf-8');

/**
 * Parses and validates a fetched SKILL.md. The bytes are only decoded to read
 * the manifest; checksums are always taken over the original bytes.
 *
 * @throws ValidationFailedError when the frontmatter is malformed or breaks a rule
 */
export function readRemoteSkill(bytes: Uint8Array, url: string): RemoteSkill {
  const parsed = parseArtifact(decoder.decode(bytes));
  if (!parsed.ok) {
    throw new ValidationFailedError(
      `Remote ${SKILL_FILENAME} at ${url} is malformed`,
      [{ kind: 'MalformedManifest', field: 'frontmatter', message: parsed.message }],
      { url, reason: parsed.reason },
    );
  }

  const issues = validateManifest(parsed.manifest);
  if (issues.length > 0) {
    throw new ValidationFailedError(`Remote skill at ${url} failed validation`, issues, { url });
  }

  const result = skillManifestSchema.safeParse(parsed.manifest);
  if (!result.success) {
    throw new ValidationFailedError(
      `Remote skill at ${url} failed validation`,
      result.error.issues.map((issue): ManifestIssue => ({
        kind: 'MalformedManifest',
        field: 'frontmatter',
        message: `${issue.path.join('.') || '(root)'}: ${issue.message}`,
      })),
      { url },
    );
  }

  const manifest = result.data;
  return {
    manifest,
    name: manifest.name,
    description: manifest.description,
    summary: extractSummary(parsed.body),
  };
}
