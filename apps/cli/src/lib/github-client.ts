import { SKILL_FILENAME, isRecord, parseRevisionId, type BranchName, type RevisionId } from '@skillpin/shared';
import type { SkillpinConfig } from './config.js';
import { httpLog } from './debug-logger.js';
import { RemoteUnavailableError, ReferenceNotFoundError, errorMessage } from './errors.js';
import type { RemoteHost } from './remote-host.js';
import { USER_AGENT } from '../version.js';

export type GitHubClientConfig = Pick<SkillpinConfig, 'apiBaseUrl' | 'token' | 'timeoutMs'>;

export class GitHubClient implements RemoteHost {
  private apiBaseUrl: string;
  private token?: string;
  private timeoutMs: number;

  constructor(config: GitHubClientConfig) {
    this.apiBaseUrl = config.apiBaseUrl.replace(/\/+$/, '');
    this.token = config.token;
    this.timeoutMs = config.timeoutMs;
  }

  // The token only goes to the API, never to raw-content hosts.
  private headers(api: boolean): Record<string, string> {
    const h: Record<string, string> = {
      'User-Agent': USER_AGENT,
    };

    if (api) {
      h['Accept'] = 'application/vnd.github.v3+json';
      if (this.token) {
        h['Authorization'] = `Bearer ${this.token}`;
      }
    }

    return h;
  }

  private async get(url: string, api: boolean): Promise<Response> {
    httpLog.info({ method: 'GET', url }, 'Request');
    let res: Response;
    try {
      res = await fetch(url, {
        method: 'GET',
        headers: this.headers(api),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      httpLog.warn({ method: 'GET', url, err: errorMessage(err) }, 'Request failed');
      throw new RemoteUnavailableError(`Network error fetching ${url}: ${errorMessage(err)}`, { url });
    }
    httpLog.info({ method: 'GET', url, status: res.status, ok: res.ok }, 'Response');
    return res;
  }

  async fetchRaw(url: string): Promise<Uint8Array> {
    const res = await this.get(url, false);

    if (res.status === 404) {
      throw new ReferenceNotFoundError(`${SKILL_FILENAME} not found at ${url}`, { url, status: 404 });
    }
    if (!res.ok) {
      throw new RemoteUnavailableError(`HTTP ${res.status} fetching ${url}`, { url, status: res.status });
    }

    try {
      return new Uint8Array(await res.arrayBuffer());
    } catch (err) {
      throw new RemoteUnavailableError(`Failed reading response from ${url}: ${errorMessage(err)}`, { url });
    }
  }

  async resolveRevision(owner: string, repo: string, branch: BranchName): Promise<RevisionId> {
    const target = `${owner}/${repo}@${branch}`;
    const url = `${this.apiBaseUrl}/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}/commits/${encodeURIComponent(branch)}`;
    const res = await this.get(url, true);

    if (res.status === 404) {
      throw new ReferenceNotFoundError(`Repository or branch not found: ${target}`, { owner, repo, branch });
    }
    if (!res.ok) {
      throw new RemoteUnavailableError(`GitHub API returned ${res.status} resolving ${target}`, {
        owner,
        repo,
        branch,
        status: res.status,
      });
    }

    let payload: unknown;
    try {
      payload = await res.json();
    } catch (err) {
      throw new RemoteUnavailableError(`GitHub API returned invalid JSON for ${target}: ${errorMessage(err)}`);
    }

    const revision = parseRevisionId(isRecord(payload) ? payload.sha : undefined);
    if (!revision) {
      throw new RemoteUnavailableError(`GitHub commit response for ${target} did not include a valid SHA`, {
        owner,
        repo,
        branch,
      });
    }
    return revision;
  }
}

/**
 * Factory: builds the client the CLI talks to GitHub with.
 */
export function createGitHubClient(config: GitHubClientConfig): GitHubClient {
  return new GitHubClient(config);
}
