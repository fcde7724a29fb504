/**
 * YAML Output Utilities
 *
 * Structured YAML results for scripts, written to stdout between
 * document separators.
 *
 * @package @branchgate/cli
 */

import { stringify as stringifyYaml } from 'yaml';

/**
 * Output a result as YAML to stdout
 *
 * @example
 * ```typescript
 * await outputYamlResult({ environment: 'Development', project_ref: 'devref' });
 * ```
 */
export async function outputYamlResult(result: unknown): Promise<void> {
  // Let pending stderr output land first
  await new Promise(resolve => setTimeout(resolve, 10));

  process.stdout.write('---\n');

  const yaml = stringifyYaml(result);
  process.stdout.write(yaml);

  if (!yaml.endsWith('\n')) {
    process.stdout.write('\n');
  }
  process.stdout.write('---\n');

  // Wait for stdout to flush before the caller exits
  await new Promise<void>(resolve => {
    if (process.stdout.write('')) {
      resolve();
    } else {
      process.stdout.once('drain', resolve);
    }
  });
}
