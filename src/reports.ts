import type {
  Finding,
  FindingFilter,
  PostureReport,
  RemediationSection,
  ScanMetadata,
  ScanSummary,
  Severity,
} from './types.js';

export const ENGINE = 'Cloud Posture MCP';
export const VERSION = '1.0.0';

export const REMEDIATION_CHECKLIST: readonly RemediationSection[] = [
  {
    title: 'Immediate Actions (Critical Issues)',
    actions: [
      'Review and restrict any publicly accessible S3 buckets',
      'Disable public access for RDS instances',
      'Stop using root account for daily operations',
    ],
  },
  {
    title: 'Short-term Actions (High Priority)',
    actions: [
      'Enable MFA for all IAM users',
      'Review and tighten security group rules',
      'Implement least privilege access policies',
    ],
  },
  {
    title: 'Long-term Actions (Medium Priority)',
    actions: [
      'Regular access key rotation and cleanup',
      'Implement automated security monitoring',
      'Regular security assessments and audits',
    ],
  },
  {
    title: 'Best Practices',
    actions: [
      'Use IAM roles instead of access keys where possible',
      'Enable CloudTrail for audit logging',
      'Implement AWS Config for compliance monitoring',
      'Use AWS Security Hub for centralized security findings',
    ],
  },
];

const SEVERITY_RANK: Record<Severity, number> = { Critical: 0, High: 1, Medium: 2 };

export function summarizeFindings(findings: readonly Finding[], now: Date = new Date()): ScanSummary {
  const summary: ScanSummary = {
    totalIssues: findings.length,
    criticalIssues: 0,
    highIssues: 0,
    mediumIssues: 0,
    servicesAffected: 0,
    byService: {},
    scanTimestamp: now.toISOString(),
  };

  for (const finding of findings) {
    if (finding.severity === 'Critical') summary.criticalIssues += 1;
    else if (finding.severity === 'High') summary.highIssues += 1;
    else summary.mediumIssues += 1;

    summary.byService[finding.service] = (summary.byService[finding.service] ?? 0) + 1;
  }

  summary.servicesAffected = Object.keys(summary.byService).length;
  return summary;
}

export function groupBySeverity(findings: readonly Finding[]): Record<Severity, Finding[]> {
  const groups: Record<Severity, Finding[]> = { Critical: [], High: [], Medium: [] };
  for (const finding of findings) groups[finding.severity].push(finding);
  return groups;
}

export function filterFindings(findings: readonly Finding[], filter: FindingFilter): Finding[] {
  return findings.filter(
    (finding) =>
      (filter.severity === undefined || finding.severity === filter.severity) &&
      (filter.service === undefined || finding.service === filter.service),
  );
}

/** Most severe first, then by service and resource. */
export function sortFindings(findings: readonly Finding[]): Finding[] {
  return [...findings].sort(
    (a, b) =>
      SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity] ||
      a.service.localeCompare(b.service) ||
      a.resource.localeCompare(b.resource),
  );
}

export function buildReport(
  findings: readonly Finding[],
  startedAt: number,
  scan: Pick<ScanMetadata, 'region' | 'account'>,
): PostureReport {
  const sorted = sortFindings(findings);
  const summary = summarizeFindings(sorted);

  return {
    summary,
    findings: sorted,
    bySeverity: groupBySeverity(sorted),
    remediation: REMEDIATION_CHECKLIST.map((section) => ({ ...section, actions: [...section.actions] })),
    metadata: {
      engine: ENGINE,
      version: VERSION,
      region: scan.region,
      account: scan.account,
      timestamp: summary.scanTimestamp,
      durationMs: Math.round(performance.now() - startedAt),
    },
  };
}
