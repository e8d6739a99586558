import { z } from 'zod';
import { MAX_DESCRIPTION_LENGTH, MAX_NAME_LENGTH } from '../constants/proxy.js';
import { characterCount } from '../lib/manifest.js';

/**
 * Typed view of a skill manifest that already passed `validateManifest`.
 * Unknown keys are kept; a `metadata` value that is not a mapping is dropped.
 */
export const skillManifestSchema = z.object({
  name: z.string().min(1).max(MAX_NAME_LENGTH),
  description: z.union([z.string(), z.number()])
    .transform((value) => String(value))
    .pipe(z.string().trim().min(1))
    .refine((value) => characterCount(value) <= MAX_DESCRIPTION_LENGTH, {
      message: `description exceeds ${MAX_DESCRIPTION_LENGTH} characters`,
    }),
  metadata: z.record(z.string(), z.unknown()).optional().catch(undefined),
}).passthrough();

export type SkillManifest = z.infer<typeof skillManifestSchema>;
