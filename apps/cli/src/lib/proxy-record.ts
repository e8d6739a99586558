import fs from 'node:fs';
import path from 'node:path';
import { SKILL_FILENAME, isRecord, proxyMetadataSchema, type ProxyMetadata } from '@skillpin/shared';
import { parseArtifact } from './artifact.js';
import { UsageError } from './errors.js';

export interface LoadedProxyRecord {
  path: string;
  manifest: Record<string, unknown>;
  metadata: ProxyMetadata;
  body: string;
  /** File content exactly as read */
  raw: string;
}

export function proxyRecordPath(proxyDir: string): string {
  return path.join(proxyDir, SKILL_FILENAME);
}

export function readProxyRecord(proxyDir: string): LoadedProxyRecord {
  const recordPath = proxyRecordPath(proxyDir);
  if (!fs.existsSync(recordPath)) {
    throw new UsageError(`No ${SKILL_FILENAME} found in ${proxyDir}`, { path: recordPath });
  }

  const raw = fs.readFileSync(recordPath, 'utf-8');
  const parsed = parseArtifact(raw);
  if (!parsed.ok) {
    throw new UsageError(`Malformed proxy record at ${recordPath}: ${parsed.message}`, {
      path: recordPath,
      reason: parsed.reason,
    });
  }

  const metadata = proxyMetadataSchema.safeParse(
    isRecord(parsed.manifest.metadata) ? parsed.manifest.metadata : {},
  );
  if (!metadata.success) {
    const issues = metadata.error.issues
      .map((i) => `  - ${i.path.join('.') || 'metadata'}: ${i.message}`)
      .join('\n');
    throw new UsageError(`${recordPath} is not a proxy skill:\n${issues}`, { path: recordPath });
  }

  return {
    path: recordPath,
    manifest: parsed.manifest,
    metadata: metadata.data,
    body: parsed.body,
    raw,
  };
}

/**
 * Replace the record in one step: write a temp file beside it, then rename.
 * A crash mid-write leaves either the old record or the new one.
 */
export function writeProxyRecord(proxyDir: string, content: string): string {
  fs.mkdirSync(proxyDir, { recursive: true });
  const recordPath = proxyRecordPath(proxyDir);
  const tempPath = path.join(proxyDir, `.${SKILL_FILENAME}.${process.pid}.tmp`);

  fs.writeFileSync(tempPath, content, 'utf-8');
  try {
    fs.renameSync(tempPath, recordPath);
  } catch (err) {
    fs.rmSync(tempPath, { force: true });
    throw err;
  }
  return recordPath;
}
