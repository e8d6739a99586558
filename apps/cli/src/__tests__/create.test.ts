import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import crypto from 'node:crypto';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { LIABILITY_DISCLAIMER } from '@skillpin/shared';

vi.mock('../lib/logger.js', () => ({
  logger: {
    info: vi.fn(),
    success: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    detail: vi.fn(),
  },
}));

vi.mock('ora', () => {
  const spinner = {
    start: vi.fn().mockReturnThis(),
    stop: vi.fn().mockReturnThis(),
    succeed: vi.fn().mockReturnThis(),
    fail: vi.fn().mockReturnThis(),
    text: '',
  };
  return { default: vi.fn(() => spinner) };
});

import { createCommand } from '../commands/create.js';
import { DEFAULT_CONFIG, type SkillpinConfig } from '../lib/config.js';
import {
  RemoteUnavailableError,
  ReferenceNotFoundError,
  UsageError,
  ValidationFailedError,
} from '../lib/errors.js';
import { readProxyRecord } from '../lib/proxy-record.js';
import { logger } from '../lib/logger.js';
import { FakeRemoteHost, REVISION_A, skillMarkdown } from './fake-remote-host.js';

const BRANCH_URL = 'https://raw.githubusercontent.com/acme/skills/main/SKILL.md';
const PINNED_URL = `https://raw.githubusercontent.com/acme/skills/${REVISION_A}/SKILL.md`;
const CREATED = new Date(Date.UTC(2026, 0, 2, 3, 4));

function sha256(text: string): string {
  return crypto.createHash('sha256').update(text, 'utf-8').digest('hex');
}

describe('createCommand', () => {
  let tmpDir: string;
  let config: SkillpinConfig;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'skillpin-create-test-'));
    config = { ...DEFAULT_CONFIG, outputDir: tmpDir };
    vi.mocked(logger.success).mockClear();
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function hostServing(content: string): FakeRemoteHost {
    return new FakeRemoteHost()
      .setFile(BRANCH_URL, content)
      .setFile(PINNED_URL, content)
      .setTip('acme', 'skills', 'main', REVISION_A);
  }

  it('writes a proxy pinned to the resolved commit and the hash of the served bytes', async () => {
    const content = skillMarkdown('demo-skill', 'x');
    const host = hostServing(content);

    const result = await createCommand({
      url: 'https://github.com/acme/skills',
      config,
      host,
      createdBy: 'tester',
      now: () => CREATED,
    });

    const proxyDir = path.join(tmpDir, 'demo-skill-proxy');
    expect(result).toEqual({
      proxyDir,
      proxyName: 'demo-skill-proxy',
      recordPath: path.join(proxyDir, 'SKILL.md'),
      revision: REVISION_A,
      hash: sha256(content),
      rawUrl: PINNED_URL,
    });
    expect(logger.success).toHaveBeenCalledWith(`Created demo-skill-proxy in ${proxyDir}`);

    const record = readProxyRecord(proxyDir);
    expect(record.manifest.name).toBe('demo-skill-proxy');
    expect(record.manifest.description).toBe(
      'Proxy for demo-skill by acme. x Use exactly as you would use demo-skill directly.',
    );
    expect(record.manifest.license).toBe('Apache-2.0');
    expect(record.metadata).toEqual({
      'proxy-source': 'https://github.com/acme/skills',
      'proxy-raw-url': PINNED_URL,
      'proxy-commit': REVISION_A,
      'proxy-sha256': sha256(content),
      'proxy-branch': 'main',
      'proxy-created-by': 'tester',
      'proxy-created-at': '20260102_0304',
    });
  });

  it('fetches the branch address, resolves the branch, then fetches the pinned address', async () => {
    const host = hostServing(skillMarkdown('demo-skill', 'x'));

    await createCommand({ url: 'https://github.com/acme/skills', config, host, now: () => CREATED });

    expect(host.fetched).toEqual([BRANCH_URL, PINNED_URL]);
    expect(host.resolved).toEqual(['acme/skills@main']);
  });

  it('renders the verify-before-use body', async () => {
    const host = hostServing(skillMarkdown('demo-skill', 'x'));

    const { proxyDir } = await createCommand({
      url: 'https://github.com/acme/skills',
      config,
      host,
      now: () => CREATED,
    });

    const { body } = readProxyRecord(proxyDir);
    expect(body.startsWith('\n# demo-skill (proxied from acme/skills)\n')).toBe(true);
    expect(body).toContain(
      `**Source:** [acme/skills](https://github.com/acme/skills) · branch \`main\` · commit \`${REVISION_A.slice(0, 12)}\``,
    );
    expect(body).toContain(LIABILITY_DISCLAIMER);
    expect(body).toContain(`   \`${PINNED_URL}\``);
    expect(body).toContain(`   \`${sha256(skillMarkdown('demo-skill', 'x'))}\``);
    expect(body).toContain(
      '## Summary (captured at proxy creation · 20260102_0304)\n\nReads PDF files and extracts text.\n',
    );
    expect(body).toContain(`skillpin verify ${proxyDir}\n`);
    expect(body).toContain(`skillpin update ${proxyDir}\n`);
  });

  it('records "unknown" as creator when none is given or configured', async () => {
    const host = hostServing(skillMarkdown('demo-skill', 'x'));

    const { proxyDir } = await createCommand({ url: 'https://github.com/acme/skills', config, host });

    expect(readProxyRecord(proxyDir).metadata['proxy-created-by']).toBe('unknown');
  });

  it('accepts a remote manifest whose metadata key is empty', async () => {
    const content = '---\nname: demo-skill\ndescription: x\nmetadata:\n---\n\n# demo-skill\n\nReads PDFs.\n';
    const host = hostServing(content);

    const result = await createCommand({ url: 'https://github.com/acme/skills', config, host });

    expect(result.hash).toBe(sha256(content));
    expect(readProxyRecord(result.proxyDir).metadata['proxy-commit']).toBe(REVISION_A);
  });

  it('uses an explicit output directory over the configured one', async () => {
    const host = hostServing(skillMarkdown('demo-skill', 'x'));
    const outputDir = path.join(tmpDir, 'elsewhere');

    const result = await createCommand({ url: 'https://github.com/acme/skills', config, host, outputDir });

    expect(result.proxyDir).toBe(path.join(outputDir, 'demo-skill-proxy'));
    expect(fs.existsSync(path.join(outputDir, 'demo-skill-proxy', 'SKILL.md'))).toBe(true);
  });

  it('keeps the closing clause when the description has to be shortened', async () => {
    const host = hostServing(skillMarkdown('demo-skill', 'd'.repeat(1024)));

    const { proxyDir } = await createCommand({ url: 'https://github.com/acme/skills', config, host });

    const description = readProxyRecord(proxyDir).manifest.description;
    expect(typeof description).toBe('string');
    if (typeof description === 'string') {
      expect(description).toHaveLength(1024);
      expect(description.endsWith('d… Use exactly as you would use demo-skill directly.')).toBe(true);
    }
  });

  describe('validation gate', () => {
    it('rejects an invalid remote name before pinning and writes nothing', async () => {
      const host = hostServing(skillMarkdown('Bad_Name', 'x'));

      const err = await createCommand({ url: 'https://github.com/acme/skills', config, host }).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ValidationFailedError);
      if (err instanceof ValidationFailedError) {
        expect(err.exitCode).toBe(3);
        expect(err.issues.map((i) => i.kind)).toEqual(['InvalidNameFormat']);
      }
      expect(host.resolved).toEqual([]);
      expect(fs.readdirSync(tmpDir)).toEqual([]);
    });

    it('reports both name and description issues', async () => {
      const host = hostServing('---\nname: a--b\n---\nbody\n');

      const err = await createCommand({ url: 'https://github.com/acme/skills', config, host }).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ValidationFailedError);
      if (err instanceof ValidationFailedError) {
        expect(err.issues.map((i) => i.kind)).toEqual(['DoubledHyphen', 'MissingDescription']);
      }
    });

    it('rejects a SKILL.md without frontmatter as malformed', async () => {
      const host = hostServing('# Just markdown\n');

      const err = await createCommand({ url: 'https://github.com/acme/skills', config, host }).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ValidationFailedError);
      if (err instanceof ValidationFailedError) {
        expect(err.issues).toEqual([
          {
            kind: 'MalformedManifest',
            field: 'frontmatter',
            message: 'no YAML frontmatter (the first line must be "---")',
          },
        ]);
      }
      expect(fs.readdirSync(tmpDir)).toEqual([]);
    });

    it('rejects a remote name that overflows once suffixed', async () => {
      const host = hostServing(skillMarkdown('a'.repeat(60), 'x'));

      const err = await createCommand({ url: 'https://github.com/acme/skills', config, host }).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ValidationFailedError);
      if (err instanceof ValidationFailedError) {
        expect(err.issues).toEqual([
          { kind: 'NameTooLong', field: 'name', message: 'name is 66 characters, maximum is 64' },
        ]);
      }
      expect(fs.readdirSync(tmpDir)).toEqual([]);
    });
  });

  it('fails without writing when the branch moves between fetches', async () => {
    const host = new FakeRemoteHost()
      .setFile(BRANCH_URL, skillMarkdown('demo-skill', 'x'))
      .setFile(PINNED_URL, skillMarkdown('demo-skill', 'y'))
      .setTip('acme', 'skills', 'main', REVISION_A);

    const err = await createCommand({ url: 'https://github.com/acme/skills', config, host }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RemoteUnavailableError);
    expect(fs.readdirSync(tmpDir)).toEqual([]);
  });

  it('rejects an unsupported location with a usage error and no network access', async () => {
    const host = new FakeRemoteHost();

    await expect(
      createCommand({ url: 'https://gitlab.com/acme/skills', config, host }),
    ).rejects.toThrow(UsageError);
    expect(host.fetched).toEqual([]);
  });

  it('surfaces a missing SKILL.md as a remote error', async () => {
    const host = new FakeRemoteHost().setTip('acme', 'skills', 'main', REVISION_A);

    const err = await createCommand({ url: 'https://github.com/acme/skills', config, host }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ReferenceNotFoundError);
    if (err instanceof ReferenceNotFoundError) {
      expect(err.exitCode).toBe(2);
    }
  });

  it('resolves a subdirectory skill on another branch', async () => {
    const branchUrl = 'https://raw.githubusercontent.com/acme/skills/dev/tools/pdf/SKILL.md';
    const pinnedUrl = `https://raw.githubusercontent.com/acme/skills/${REVISION_A}/tools/pdf/SKILL.md`;
    const content = skillMarkdown('pdf-reader', 'Reads PDFs');
    const host = new FakeRemoteHost()
      .setFile(branchUrl, content)
      .setFile(pinnedUrl, content)
      .setTip('acme', 'skills', 'dev', REVISION_A);

    const result = await createCommand({
      url: 'https://github.com/acme/skills/tree/dev/tools/pdf',
      config,
      host,
    });

    expect(result.rawUrl).toBe(pinnedUrl);
    expect(readProxyRecord(result.proxyDir).metadata['proxy-branch']).toBe('dev');
  });
});
