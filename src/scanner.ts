import { DEFAULT_CHECKS } from './checks.js';
import { summarizeFindings } from './reports.js';
import { runChecks } from './runner.js';
import type { Check, Finding, ScanContext, ScanSummary } from './types.js';

/** Runs the full check suite. Never rejects: failures come back as findings. */
export async function getDetailedFindings(
  context: ScanContext,
  checks: readonly Check[] = DEFAULT_CHECKS,
): Promise<Finding[]> {
  return runChecks(checks, context, { concurrency: context.config.concurrency });
}

export async function getSummaryStats(
  context: ScanContext,
  checks: readonly Check[] = DEFAULT_CHECKS,
): Promise<ScanSummary> {
  return summarizeFindings(await getDetailedFindings(context, checks));
}
