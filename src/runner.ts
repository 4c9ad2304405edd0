import { checkErrorFinding } from './findings.js';
import { describeError } from './errors.js';
import { logger } from './logger.js';
import type { Check, Finding, ScanContext } from './types.js';

export interface RunOptions {
  /** Number of checks allowed in flight at once. 1 runs them one after another. */
  concurrency?: number;
}

async function runIsolated(check: Check, context: ScanContext): Promise<Finding[]> {
  const startedAt = performance.now();
  try {
    const findings = await check.run(context);
    logger.info(`${check.id}: ${findings.length} finding(s) in ${Math.round(performance.now() - startedAt)}ms`);
    return findings;
  } catch (error) {
    logger.error(`${check.id} failed: ${describeError(error)}`);
    return [checkErrorFinding(check, error)];
  }
}

/**
 * Runs every check and merges their findings in registry order. A check that throws is
 * reported as a single "Check Error" finding; the returned promise never rejects.
 */
export async function runChecks(
  checks: readonly Check[],
  context: ScanContext,
  options: RunOptions = {},
): Promise<Finding[]> {
  const results: Finding[][] = new Array<Finding[]>(checks.length);
  const workers = Math.max(1, Math.min(options.concurrency ?? 1, checks.length));
  let next = 0;

  async function worker(): Promise<void> {
    while (next < checks.length) {
      const index = next;
      next += 1;
      results[index] = await runIsolated(checks[index], context);
    }
  }

  await Promise.all(Array.from({ length: workers }, () => worker()));

  return results.flat();
}
