export const SKILL_FILENAME = 'SKILL.md';
export const PROXY_SUFFIX = '-proxy';
export const PROXY_LICENSE = 'Apache-2.0';

export const DEFAULT_BRANCH = 'main';
export const DEFAULT_OUTPUT_DIR = './skills';

export const GITHUB_HOST = 'github.com';
export const RAW_CONTENT_HOST = 'raw.githubusercontent.com';
export const RAW_BASE_URL = `https://${RAW_CONTENT_HOST}`;
export const GITHUB_API_URL = 'https://api.github.com';

export const MAX_NAME_LENGTH = 64;
export const MAX_DESCRIPTION_LENGTH = 1024;

export const PROXY_METADATA_KEYS = {
  source: 'proxy-source',
  rawUrl: 'proxy-raw-url',
  commit: 'proxy-commit',
  sha256: 'proxy-sha256',
  branch: 'proxy-branch',
  createdBy: 'proxy-created-by',
  createdAt: 'proxy-created-at',
} as const;

export const EXIT_CODES = {
  success: 0,
  usage: 1,
  remote: 2,
  validation: 3,
  mismatch: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export const LIABILITY_DISCLAIMER = `The creator of the 'Skill Proxy' is not liable for any damages arising
from the use of this 'Skill Proxy'. The risk and responsibility lies
exclusively with the user who uses this 'Skill Proxy'. If the 'Skill Proxy'
user is an agent, then the user who is responsible for that agent bears
the responsibility.`;
