/**
 * Policy Command
 *
 * Show the policy a ref resolves to, as the update hook would see it.
 */

import { resolveSettingsLocation, type HookSettings } from '@branch-gate/config';
import { PolicyResolver, type ResolvedPolicy } from '@branch-gate/core';
import { MemoryLogSink, Logger, describeError } from '@branch-gate/utils';
import chalk from 'chalk';
import type { Command } from 'commander';

import { createDefaultHookDeps, type HookDeps } from '../utils/hook-context.js';
import { outputYamlResult } from '../utils/yaml-output.js';

export interface PolicyReport {
  refName: string;
  branch: string | null;
  source: string;
  enforceMergeOnly: boolean;
  enforceAuthOnly: boolean;
  authTrustStorePath: string | null;
  commitScope: HookSettings['commitScope'];
  trustStoreFallback: HookSettings['trustStoreFallback'];
  warnings: string[];
}

/**
 * Resolve the policy for a ref and describe it
 *
 * @throws ConfigurationError if settings or the policy source are unreadable
 */
export async function buildPolicyReport(
  refName: string,
  configPath: string | undefined,
  deps: HookDeps = createDefaultHookDeps(),
): Promise<PolicyReport> {
  const gitDir = deps.getGitDir();
  const settings = await deps.loadSettings(resolveSettingsLocation(gitDir, configPath, deps.env));
  const source = deps.createPolicySource(settings);

  const sink = new MemoryLogSink();
  const resolved: ResolvedPolicy = new PolicyResolver(source, new Logger(sink, { debug: false }))
    .resolve(refName);

  return {
    refName,
    branch: resolved.branch,
    source: resolved.branch === null ? 'none (not a branch ref)' : source.description,
    enforceMergeOnly: resolved.policy.mergeOnly,
    enforceAuthOnly: resolved.policy.authOnly,
    authTrustStorePath: resolved.policy.trustStorePath ?? null,
    commitScope: settings.commitScope,
    trustStoreFallback: settings.trustStoreFallback,
    warnings: sink.lines.filter(line => line.includes('[WARN]')),
  };
}

export function policyCommand(program: Command): void {
  program
    .command('policy')
    .description('Show the resolved policy for a ref')
    .argument('<ref>', 'Fully qualified ref name (e.g. refs/heads/release)')
    .option('-c, --config <path>', 'Settings file (default: <git-dir>/branch-gate.config.yaml)')
    .action(async (refName: string, options: { config?: string }) => {
      try {
        const report = await buildPolicyReport(refName, options.config);
        await outputYamlResult(report);
        process.exit(0);
      } catch (error) {
        // In tests, process.exit() throws an error - rethrow it so Commander can handle it
        if (error instanceof Error && error.message.startsWith('process.exit(')) {
          throw error;
        }
        console.error(chalk.red('❌ Failed to resolve policy:'), describeError(error));
        process.exit(1);
      }
    });
}
