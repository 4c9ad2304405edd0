import { z } from 'zod';
import { describeError } from './errors.js';
import { SERVICES, SEVERITIES, type Check, type Finding } from './types.js';

export const RECOMMENDATIONS = {
  'Public Bucket': 'Review bucket permissions and restrict public access',
  'Access Denied': 'Ensure appropriate permissions for security scanning',
  'Permissive Security Group': 'Restrict source IP ranges to specific networks or addresses',
  'Root Account Usage': 'Use IAM users with appropriate permissions instead of root account',
  'No MFA': 'Enable MFA for all IAM users with console access',
  'Unused Access Key': 'Remove unused access keys to reduce attack surface',
  'Public Database': 'Disable public accessibility and use VPC security groups',
  'Check Error': 'Check AWS credentials and permissions',
  'Configuration Error': 'Configure AWS credentials and ensure proper permissions',
} as const;

export type IssueType = keyof typeof RECOMMENDATIONS;

const findingSchema = z.object({
  service: z.enum(SERVICES),
  issueType: z.string().min(1),
  description: z.string().min(1),
  severity: z.enum(SEVERITIES),
  resource: z.string().min(1),
  recommendation: z.string().min(1),
});

export type FindingInput = Omit<Finding, 'recommendation' | 'issueType'> & { issueType: IssueType };

/** Builds a frozen finding carrying the fixed recommendation for its issue type. */
export function createFinding(input: FindingInput): Finding {
  const finding = findingSchema.parse({ ...input, recommendation: RECOMMENDATIONS[input.issueType] });
  return Object.freeze(finding);
}

export function checkErrorFinding(check: Pick<Check, 'id'>, error: unknown): Finding {
  return createFinding({
    service: 'System',
    issueType: 'Check Error',
    description: `Error running ${check.id}: ${describeError(error)}`,
    severity: 'Medium',
    resource: 'Security Scanner',
  });
}

export function configurationErrorFinding(error: unknown): Finding {
  return createFinding({
    service: 'System',
    issueType: 'Configuration Error',
    description: `Unable to connect to AWS: ${describeError(error)}`,
    severity: 'High',
    resource: 'AWS Connection',
  });
}
