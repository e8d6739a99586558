import {
  DEFAULT_BRANCH,
  GITHUB_HOST,
  RAW_BASE_URL,
  RAW_CONTENT_HOST,
  SKILL_FILENAME,
} from '../constants/proxy.js';
import { parseBranchName, type RevisionId } from '../types/refs.js';
import type { RawAddress, RemoteReference } from '../types/reference.js';

export type LocationErrorKind = 'InvalidReferenceKind' | 'MissingRepository' | 'MalformedLocation';

export interface LocationError {
  kind: LocationErrorKind;
  input: string;
  message: string;
}

export type LocationResult =
  | { ok: true; reference: RemoteReference }
  | { ok: false; error: LocationError };

export interface ResolveLocationOptions {
  /** Branch used when the location names none (default: "main") */
  defaultBranch?: string;
  /** Base of raw-content addresses (default: https://raw.githubusercontent.com) */
  rawBaseUrl?: string;
}

const GITHUB_HOSTNAMES = new Set([GITHUB_HOST, `www.${GITHUB_HOST}`]);

/**
 * Normalizes any supported GitHub location into a raw-content address plus its parts.
 *
 * Accepted forms:
 *   https://github.com/owner/repo
 *   https://github.com/owner/repo/tree/branch
 *   https://github.com/owner/repo/tree/branch/path/to/skill
 *   https://github.com/owner/repo/blob/branch/path/to/SKILL.md
 *   https://github.com/owner/repo/branch
 *   https://raw.githubusercontent.com/owner/repo/branch/path/to/SKILL.md
 *   https://raw.githubusercontent.com/owner/repo/refs/heads/branch/path/SKILL.md
 *
 * No network access happens here.
 */
export function resolveLocation(input: string, options: ResolveLocationOptions = {}): LocationResult {
  const defaultBranch = options.defaultBranch ?? DEFAULT_BRANCH;
  const rawBaseUrl = trimTrailingSlashes(options.rawBaseUrl ?? RAW_BASE_URL);
  const trimmed = trimTrailingSlashes(input.trim());
  const lowered = trimmed.toLowerCase();

  if (!lowered.includes(RAW_CONTENT_HOST) && !lowered.includes(GITHUB_HOST)) {
    return fail('InvalidReferenceKind', input,
      `Unsupported location "${input}": expected a ${GITHUB_HOST} or ${RAW_CONTENT_HOST} URL`);
  }

  let url: URL;
  try {
    url = new URL(/^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`);
  } catch {
    return fail('MalformedLocation', input, `Malformed location "${input}"`);
  }

  const hostname = url.hostname.toLowerCase();
  const isRaw = hostname === RAW_CONTENT_HOST;
  if (!isRaw && !GITHUB_HOSTNAMES.has(hostname)) {
    return fail('InvalidReferenceKind', input,
      `Unsupported host "${url.hostname}": expected ${GITHUB_HOST} or ${RAW_CONTENT_HOST}`);
  }

  const parts = url.pathname.split('/').filter((part) => part.length > 0);
  if (parts.length < 2) {
    return fail('MissingRepository', input,
      `Location "${input}" does not name an owner and repository`);
  }

  const owner = parts[0];
  const repo = stripGitSuffix(parts[1]);
  const rest = parts.slice(2);

  const located = isRaw ? splitRawPath(rest) : splitGitHubPath(rest);
  const branch = parseBranchName(located.branch ?? defaultBranch);
  if (!branch) {
    return fail('MalformedLocation', input, `Location "${input}" has an empty branch name`);
  }

  const skillPath = toSkillPath(located.subpath);
  return {
    ok: true,
    reference: {
      rawUrl: `${rawBaseUrl}/${owner}/${repo}/${branch}/${skillPath}`,
      owner,
      repo,
      branch,
      skillPath,
    },
  };
}

/**
 * Immutable raw-content address of the skill at a specific revision.
 */
export function pinnedRawUrl(
  location: Pick<RemoteReference, 'owner' | 'repo' | 'skillPath'>,
  revision: RevisionId,
  rawBaseUrl: string = RAW_BASE_URL,
): string {
  const { owner, repo, skillPath } = location;
  return `${trimTrailingSlashes(rawBaseUrl)}/${owner}/${repo}/${revision}/${skillPath}`;
}

/**
 * Splits a raw-content address back into owner, repo, ref and skill path.
 * Returns null for anything that is not a raw address with all four parts.
 */
export function parseRawUrl(url: string, rawBaseUrl: string = RAW_BASE_URL): RawAddress | null {
  const prefix = `${trimTrailingSlashes(rawBaseUrl)}/`;
  if (!url.startsWith(prefix)) {
    return null;
  }

  const parts = url.slice(prefix.length).split('/');
  if (parts.length < 4 || parts.some((part) => part.length === 0)) {
    return null;
  }

  const [owner, repo, ref, ...path] = parts;
  return { owner, repo, ref, skillPath: path.join('/') };
}

interface LocatedPath {
  branch?: string;
  subpath: string;
}

function splitRawPath(rest: string[]): LocatedPath {
  // refs/heads/<branch> is the long form of a branch ref
  const segments = rest[0] === 'refs' && rest[1] === 'heads' ? rest.slice(2) : rest;
  return { branch: segments[0], subpath: segments.slice(1).join('/') };
}

function splitGitHubPath(rest: string[]): LocatedPath {
  if (rest.length === 0) {
    return { subpath: '' };
  }
  if (rest[0] === 'tree' || rest[0] === 'blob') {
    return { branch: rest[1], subpath: rest.slice(2).join('/') };
  }
  return { branch: rest[0], subpath: '' };
}

function toSkillPath(subpath: string): string {
  const path = trimTrailingSlashes(subpath);
  if (path.length === 0) {
    return SKILL_FILENAME;
  }
  if (path === SKILL_FILENAME || path.endsWith(`/${SKILL_FILENAME}`)) {
    return path;
  }
  return `${path}/${SKILL_FILENAME}`;
}

function stripGitSuffix(repo: string): string {
  return repo.endsWith('.git') ? repo.slice(0, -4) : repo;
}

function trimTrailingSlashes(value: string): string {
  return value.replace(/\/+$/, '');
}

function fail(kind: LocationErrorKind, input: string, message: string): LocationResult {
  return { ok: false, error: { kind, input, message } };
}
