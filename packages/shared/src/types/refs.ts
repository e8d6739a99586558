import { z } from 'zod';

// Mutable pointer (e.g. "main") vs. the immutable commit it resolved to.
// Distinct brands keep one from being passed where the other is expected.
export const branchNameSchema = z.string()
  .trim()
  .min(1, 'Branch name must not be empty')
  .refine((value) => !/\s/.test(value), 'Branch name must not contain whitespace')
  .brand<'BranchName'>();

export const revisionIdSchema = z.string()
  .regex(/^[0-9a-f]{7,64}$/, 'Revision id must be 7-64 lowercase hex characters')
  .brand<'RevisionId'>();

export const contentHashSchema = z.string()
  .regex(/^[0-9a-f]{64}$/, 'Content hash must be a 64-character lowercase hex SHA-256')
  .brand<'ContentHash'>();

export type BranchName = z.infer<typeof branchNameSchema>;
export type RevisionId = z.infer<typeof revisionIdSchema>;
export type ContentHash = z.infer<typeof contentHashSchema>;

export function toBranchName(value: string): BranchName {
  return branchNameSchema.parse(value);
}

export function toRevisionId(value: string): RevisionId {
  return revisionIdSchema.parse(value);
}

export function toContentHash(value: string): ContentHash {
  return contentHashSchema.parse(value);
}

export function parseBranchName(value: unknown): BranchName | null {
  const result = branchNameSchema.safeParse(value);
  return result.success ? result.data : null;
}

export function parseRevisionId(value: unknown): RevisionId | null {
  const result = revisionIdSchema.safeParse(value);
  return result.success ? result.data : null;
}

export function parseContentHash(value: unknown): ContentHash | null {
  const result = contentHashSchema.safeParse(value);
  return result.success ? result.data : null;
}
