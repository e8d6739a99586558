import type { BranchName, RevisionId } from '@skillpin/shared';

/**
 * The two operations the proxy lifecycle needs from the content host.
 * GitHubClient is the real one; tests pass an in-memory fake.
 */
export interface RemoteHost {
  /** Exact bytes served at a raw-content address. */
  fetchRaw(url: string): Promise<Uint8Array>;

  /** The immutable revision a branch currently points at. */
  resolveRevision(owner: string, repo: string, branch: BranchName): Promise<RevisionId>;
}
