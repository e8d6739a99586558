#!/usr/bin/env node
import { Command } from 'commander';
import { formatIssue } from '@skillpin/shared';
import { configGet, configList, configSet } from '../commands/config.js';
import { createCommand } from '../commands/create.js';
import { updateCommand } from '../commands/update.js';
import { verifyCommand } from '../commands/verify.js';
import { loadRuntimeConfig, type SkillpinConfig } from '../lib/config.js';
import {
  IntegrityMismatchError,
  ValidationFailedError,
  errorMessage,
  exitCodeFor,
} from '../lib/errors.js';
import { VERSION } from '../version.js';

const program = new Command();

let runtimeConfig: SkillpinConfig | undefined;

// Read once per invocation; the token does not change mid-run.
function config(): SkillpinConfig {
  runtimeConfig ??= loadRuntimeConfig();
  return runtimeConfig;
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value));
}

function exitWithFailure(label: string, err: unknown): never {
  console.error(`${label} failed: ${errorMessage(err)}`);
  if (err instanceof ValidationFailedError) {
    for (const issue of err.issues) {
      console.error(`  - ${formatIssue(issue)}`);
    }
  }
  if (err instanceof IntegrityMismatchError) {
    console.error(`  expected: ${err.expected}`);
    console.error(`  actual:   ${err.actual}`);
  }
  process.exit(exitCodeFor(err));
}

program
  .name('skillpin')
  .description('Pin remote agent skills to a verified commit and checksum')
  .version(VERSION);

program
  .command('create')
  .description('Create a proxy skill pinned to the current commit of a remote SKILL.md')
  .argument('<url>', 'GitHub location of the skill (repository, tree, blob or raw URL)')
  .option('-o, --output-dir <dir>', 'Directory the proxy is created in (default: config outputDir)')
  .option('--created-by <name>', 'Recorded as proxy-created-by (default: config createdBy, then $USER)')
  .option('--json', 'Print the result as one JSON line')
  .action(async (url: string, opts: { outputDir?: string; createdBy?: string; json?: boolean }) => {
    try {
      const cfg = config();
      const result = await createCommand({
        url,
        outputDir: opts.outputDir,
        createdBy: opts.createdBy ?? cfg.createdBy ?? process.env.USER ?? 'unknown',
        config: cfg,
      });
      if (opts.json) {
        printJson({ proxy: result.proxyDir, commit: result.revision, sha256: result.hash });
      }
    } catch (err) {
      exitWithFailure('Create', err);
    }
  });

program
  .command('verify')
  .description('Check that the pinned content still matches the recorded checksum')
  .argument('<proxy-dir>', 'Directory of the proxy skill')
  .option('--no-upstream', 'Skip checking the tracked branch for newer commits')
  .option('--json', 'Print the result as one JSON line')
  .action(async (proxyDir: string, opts: { upstream: boolean; json?: boolean }) => {
    try {
      const result = await verifyCommand({
        proxyDir,
        skipUpstream: !opts.upstream,
        config: config(),
      });
      if (opts.json) {
        printJson({
          proxy: result.proxyDir,
          status: result.status,
          expected: result.expected,
          actual: result.actual,
          upstream: result.status === 'intact' ? result.upstream : null,
        });
      }
    } catch (err) {
      if (opts.json && err instanceof IntegrityMismatchError) {
        printJson({
          proxy: proxyDir,
          status: 'mismatch',
          expected: err.expected,
          actual: err.actual,
          upstream: null,
        });
      }
      exitWithFailure('Verify', err);
    }
  });

program
  .command('update')
  .description('Re-pin a proxy skill to the current tip of its tracked branch')
  .argument('<proxy-dir>', 'Directory of the proxy skill')
  .option('--dry-run', 'Show what would change without writing')
  .option('--json', 'Print the result as one JSON line')
  .action(async (proxyDir: string, opts: { dryRun?: boolean; json?: boolean }) => {
    try {
      const result = await updateCommand({
        proxyDir,
        dryRun: opts.dryRun,
        config: config(),
      });
      if (opts.json) {
        printJson({
          proxy: result.proxyDir,
          status: result.status,
          commit: result.revision,
          sha256: result.hash,
        });
      }
    } catch (err) {
      exitWithFailure('Update', err);
    }
  });

const configCmd = program
  .command('config')
  .description('Show or change settings in ~/.skillpin/config.json');

configCmd
  .command('list')
  .description('Show every setting with its effective value')
  .action(() => {
    try {
      configList();
    } catch (err) {
      exitWithFailure('Config', err);
    }
  });

configCmd
  .command('get')
  .description('Print one setting')
  .argument('<key>', 'Setting name')
  .action((key: string) => {
    try {
      configGet(key);
    } catch (err) {
      exitWithFailure('Config', err);
    }
  });

configCmd
  .command('set')
  .description('Change one setting')
  .argument('<key>', 'Setting name')
  .argument('<value>', 'New value')
  .action((key: string, value: string) => {
    try {
      configSet(key, value);
    } catch (err) {
      exitWithFailure('Config', err);
    }
  });

await program.parseAsync();
