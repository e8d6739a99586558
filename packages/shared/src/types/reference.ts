import type { BranchName, ContentHash, RevisionId } from './refs.js';

/** A remote skill location, normalized from any accepted URL shape. */
export interface RemoteReference {
  /** Raw-content address of SKILL.md at the tracked branch */
  rawUrl: string;
  owner: string;
  repo: string;
  branch: BranchName;
  /** Path of SKILL.md within the repository */
  skillPath: string;
}

/** A raw-content address split back into its parts. */
export interface RawAddress {
  owner: string;
  repo: string;
  /** Branch name or revision id; the address alone does not say which */
  ref: string;
  skillPath: string;
}

/** The immutable state captured when a proxy is created or updated. */
export interface PinnedSnapshot {
  source: string;
  rawUrl: string;
  revision: RevisionId;
  hash: ContentHash;
  branch: BranchName;
  createdBy: string;
  createdAt: string;
}
