import { z } from 'zod';
import { DEFAULT_BRANCH } from '../constants/proxy.js';
import { branchNameSchema, contentHashSchema, revisionIdSchema } from '../types/refs.js';

/**
 * The `metadata` map of a proxy skill's frontmatter.
 * Only the pinned address and checksum are needed to verify.
 */
export const proxyMetadataSchema = z.object({
  'proxy-source': z.string().optional(),
  'proxy-raw-url': z.string().url('proxy-raw-url must be a URL'),
  'proxy-commit': revisionIdSchema.optional(),
  'proxy-sha256': contentHashSchema,
  'proxy-branch': branchNameSchema.default(DEFAULT_BRANCH),
  'proxy-created-by': z.string().optional(),
  'proxy-created-at': z.string().optional(),
}).passthrough();

export type ProxyMetadata = z.infer<typeof proxyMetadataSchema>;
