import { AwsInventory } from './aws.js';
import type { ScannerConfig } from './config.js';
import { describeError } from './errors.js';
import { configurationErrorFinding } from './findings.js';
import { logger } from './logger.js';
import { buildReport, filterFindings, sortFindings, summarizeFindings } from './reports.js';
import { getDetailedFindings } from './scanner.js';
import type { CloudInventory, Finding, FindingFilter, PostureReport, ScanSummary } from './types.js';

interface ScanOutcome {
  findings: Finding[];
  account: string | null;
}

/**
 * Probes the account before scanning. An unreachable account is reported as one
 * "Configuration Error" finding instead of six identical check errors.
 */
async function scan(config: ScannerConfig, inventory: CloudInventory): Promise<ScanOutcome> {
  let account: string;
  try {
    account = await inventory.whoAmI();
  } catch (error) {
    logger.error(`Unable to reach AWS in ${config.region}: ${describeError(error)}`);
    return { findings: [configurationErrorFinding(error)], account: null };
  }

  logger.info(`Scanning account ${account} in ${config.region}`);
  const findings = await getDetailedFindings({ inventory, config });
  return { findings, account };
}

export async function detailedFindingsTool(
  config: ScannerConfig,
  filter: FindingFilter = {},
  inventory: CloudInventory = new AwsInventory(config),
): Promise<{ total: number; noIssuesFound: boolean; findings: Finding[] }> {
  const { findings } = await scan(config, inventory);
  const selected = sortFindings(filterFindings(findings, filter));

  return {
    total: selected.length,
    noIssuesFound: selected.length === 0,
    findings: selected,
  };
}

export async function summaryStatsTool(
  config: ScannerConfig,
  inventory: CloudInventory = new AwsInventory(config),
): Promise<ScanSummary> {
  const { findings } = await scan(config, inventory);
  return summarizeFindings(findings);
}

export async function postureReportTool(
  config: ScannerConfig,
  inventory: CloudInventory = new AwsInventory(config),
): Promise<PostureReport> {
  const startedAt = performance.now();
  const { findings, account } = await scan(config, inventory);
  return buildReport(findings, startedAt, { region: config.region, account });
}
