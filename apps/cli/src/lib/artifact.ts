import yaml from 'js-yaml';
import { isRecord } from '@skillpin/shared';

export type FrontmatterScan =
  | { kind: 'found'; yaml: string; body: string }
  | { kind: 'missing' }
  | { kind: 'unterminated' };

export type ArtifactParseFailure = 'missing' | 'unterminated' | 'invalid-yaml' | 'not-a-mapping';

export type ArtifactParse =
  | { ok: true; manifest: Record<string, unknown>; body: string }
  | { ok: false; reason: ArtifactParseFailure; message: string };

const OPENING_DELIMITER = /^---[ \t]*\r?\n/;

/**
 * Locates the frontmatter block of a SKILL.md.
 *
 * The first line must be `---`; the block ends at the next line that is `---`
 * on its own (trailing whitespace allowed). A `---` inside a YAML value on a
 * longer line does not end it.
 */
export function scanFrontmatter(text: string): FrontmatterScan {
  const opening = OPENING_DELIMITER.exec(text);
  if (!opening) {
    return { kind: 'missing' };
  }

  const start = opening[0].length;
  let offset = start;
  for (;;) {
    const newline = text.indexOf('\n', offset);
    const lineEnd = newline === -1 ? text.length : newline;
    if (text.slice(offset, lineEnd).trimEnd() === '---') {
      return {
        kind: 'found',
        yaml: text.slice(start, offset),
        body: newline === -1 ? '' : text.slice(newline + 1),
      };
    }
    if (newline === -1) {
      return { kind: 'unterminated' };
    }
    offset = newline + 1;
  }
}

export function parseArtifact(text: string): ArtifactParse {
  const scan = scanFrontmatter(text);
  if (scan.kind === 'missing') {
    return { ok: false, reason: 'missing', message: 'no YAML frontmatter (the first line must be "---")' };
  }
  if (scan.kind === 'unterminated') {
    return { ok: false, reason: 'unterminated', message: 'frontmatter is not closed by a "---" line' };
  }

  let data: unknown;
  try {
    data = yaml.load(scan.yaml);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { ok: false, reason: 'invalid-yaml', message: `invalid YAML frontmatter: ${reason}` };
  }

  // An empty block is an empty manifest
  if (data === undefined || data === null) {
    return { ok: true, manifest: {}, body: scan.body };
  }
  if (!isRecord(data)) {
    return { ok: false, reason: 'not-a-mapping', message: 'frontmatter is not a key/value mapping' };
  }
  return { ok: true, manifest: data, body: scan.body };
}

export function serializeArtifact(manifest: object, body: string): string {
  const frontmatter = yaml.dump(manifest, { lineWidth: 120, noRefs: true });
  return `---\n${frontmatter}---\n\n${body}`;
}

/**
 * First prose line of a SKILL.md body: not blank, not a heading, table row or code fence.
 */
export function extractSummary(body: string): string {
  for (const line of body.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (
      trimmed.length > 0 &&
      !trimmed.startsWith('#') &&
      !trimmed.startsWith('|') &&
      !trimmed.startsWith('```')
    ) {
      return trimmed;
    }
  }
  return '';
}
