/**
 * YAML Output Utilities
 *
 * Structured output for operator-facing commands.
 *
 * @package branch-gate
 */

import { stringify as stringifyYaml } from 'yaml';

/**
 * Render a result as a single YAML document, with separators
 */
export function formatYamlDocument(result: unknown): string {
  const yaml = stringifyYaml(result);
  return `---\n${yaml}${yaml.endsWith('\n') ? '' : '\n'}`;
}

/**
 * Output a result as YAML to stdout and wait for the write to flush
 *
 * @example
 * ```typescript
 * await outputYamlResult({ refName: 'refs/heads/main', enforceMergeOnly: true });
 * ```
 */
export async function outputYamlResult(result: unknown): Promise<void> {
  const document = formatYamlDocument(result);
  await new Promise<void>(resolve => {
    if (process.stdout.write(document)) {
      resolve();
    } else {
      process.stdout.once('drain', resolve);
    }
  });
}
