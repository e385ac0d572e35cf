import type { LifecycleResult } from '../../../lifecycle/steps.js';
import { printJson, printOutput } from '../../lib/output.js';

/**
 * Print a lifecycle result: JSON for scripts, a step/path summary otherwise
 */
export function printLifecycleResult(result: LifecycleResult, json: boolean): void {
  if (json) {
    printJson(result);
    return;
  }

  const verb = result.dryRun ? 'Would run' : 'Ran';
  const lines = [`${verb} ${result.operation} for '${result.codename}' (${result.steps.length} steps)`];
  for (const step of result.steps) {
    lines.push(`  - ${step}`);
  }
  if (result.paths.length > 0) {
    lines.push(result.operation === 'delete' ? 'Removed:' : 'Written:');
    for (const path of result.paths) {
      lines.push(`  ${path}`);
    }
  }
  printOutput(lines.join('\n'));
}
