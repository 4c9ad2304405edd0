import { z } from 'zod';
import { isAccessDenied, lookup } from './errors.js';
import { createFinding } from './findings.js';
import { logger } from './logger.js';
import type { Check, FirewallRule, Finding, ScanContext, StorageGrant } from './types.js';

// ---------------------------------------------------------------------------
// storage-exposure
// ---------------------------------------------------------------------------

const PUBLIC_GRANTEE_GROUPS = ['AllUsers', 'AuthenticatedUsers'];

const principalSchema = z.union([z.string(), z.record(z.union([z.string(), z.array(z.string())]))]);

const statementSchema = z.object({
  Effect: z.string().optional(),
  Principal: principalSchema.optional(),
});

const policySchema = z.object({
  Statement: z.union([statementSchema, z.array(statementSchema)]),
});

type Principal = z.infer<typeof principalSchema>;

function isWildcardPrincipal(principal: Principal | undefined): boolean {
  if (principal === undefined) return false;
  if (typeof principal === 'string') return principal === '*';
  return Object.values(principal).some((value) => (Array.isArray(value) ? value.includes('*') : value === '*'));
}

function parsePolicy(policy: string): z.infer<typeof statementSchema>[] | null {
  let document: unknown;
  try {
    document = JSON.parse(policy);
  } catch {
    return null;
  }
  const parsed = policySchema.safeParse(document);
  if (!parsed.success) return null;
  return Array.isArray(parsed.data.Statement) ? parsed.data.Statement : [parsed.data.Statement];
}

export function policyAllowsEveryone(policy: string): boolean {
  const statements = parsePolicy(policy);
  if (statements === null) {
    return /"Principal"\s*:\s*"\*"/.test(policy);
  }
  return statements.some((statement) => statement.Effect === 'Allow' && isWildcardPrincipal(statement.Principal));
}

export function grantsArePublic(grants: StorageGrant[]): boolean {
  return grants.some((grant) =>
    PUBLIC_GRANTEE_GROUPS.some((group) => grant.granteeUri?.includes(group) ?? false),
  );
}

export const storageExposureCheck: Check = {
  id: 'storage-exposure',
  title: 'Publicly accessible S3 buckets',
  service: 'S3',
  async run({ inventory }: ScanContext): Promise<Finding[]> {
    const findings: Finding[] = [];

    for (const { name } of await inventory.listStorageContainers()) {
      let grants: StorageGrant[];
      try {
        grants = await inventory.getStorageGrants(name);
      } catch (error) {
        if (!isAccessDenied(error)) throw error;
        findings.push(
          createFinding({
            service: 'S3',
            issueType: 'Access Denied',
            description: `Cannot access bucket "${name}" for security analysis`,
            severity: 'Medium',
            resource: name,
          }),
        );
        continue;
      }

      // A bucket without a readable policy is judged on its ACL alone.
      const policy = await lookup(() => inventory.getStoragePolicy(name));
      if (!policy.found) logger.debug(`${name}: policy unavailable, checking ACL only (${policy.reason})`);
      const publicPolicy = policy.found && policy.value !== null && policyAllowsEveryone(policy.value);

      if (grantsArePublic(grants) || publicPolicy) {
        findings.push(
          createFinding({
            service: 'S3',
            issueType: 'Public Bucket',
            description: `Bucket "${name}" is publicly accessible`,
            severity: 'Critical',
            resource: name,
          }),
        );
      }
    }

    return findings;
  },
};

// ---------------------------------------------------------------------------
// network-exposure
// ---------------------------------------------------------------------------

export const SENSITIVE_PORTS = [22, 3389, 1433, 3306, 5432] as const;

const UNRESTRICTED_RANGE = '0.0.0.0/0';

export function portLabel(rule: FirewallRule): string {
  if (rule.fromPort === null) return 'all ports';
  if (rule.toPort === null || rule.fromPort === rule.toPort) return `port ${rule.fromPort}`;
  return `ports ${rule.fromPort}-${rule.toPort}`;
}

/** Severity follows the first port of the rule, not every port its range covers. */
export function opensSensitivePort(rule: FirewallRule): boolean {
  return SENSITIVE_PORTS.some((port) => port === rule.fromPort);
}

export const networkExposureCheck: Check = {
  id: 'network-exposure',
  title: 'Security groups open to the internet',
  service: 'EC2',
  async run({ inventory }: ScanContext): Promise<Finding[]> {
    const rules = await inventory.listFirewallRules();

    return rules
      .filter((rule) => rule.sourceCidr === UNRESTRICTED_RANGE)
      .map((rule) => {
        const protocol = rule.protocol === '-1' ? 'all' : rule.protocol;
        return createFinding({
          service: 'EC2',
          issueType: 'Permissive Security Group',
          description: `Security group allows ${protocol} traffic on ${portLabel(rule)} from anywhere`,
          severity: opensSensitivePort(rule) ? 'Critical' : 'High',
          resource: rule.groupId,
        });
      });
  },
};

// ---------------------------------------------------------------------------
// privileged-account-usage
// ---------------------------------------------------------------------------

export const privilegedUsageCheck: Check = {
  id: 'privileged-account-usage',
  title: 'Recent root account activity',
  service: 'IAM',
  async run({ inventory, config }: ScanContext): Promise<Finding[]> {
    const events = await inventory.lookupEventsByUser(config.privilegedUser, config.privilegedEventLimit);
    const recent = events.slice(0, config.privilegedEventLimit);
    if (recent.length === 0) return [];

    logger.warn(`${config.privilegedUser} activity: ${recent.map((event) => event.name).join(', ')}`);

    return [
      createFinding({
        service: 'IAM',
        issueType: 'Root Account Usage',
        description: `Root account has been used ${recent.length} times recently`,
        severity: 'Critical',
        resource: 'Root Account',
      }),
    ];
  },
};

// ---------------------------------------------------------------------------
// missing-mfa
// ---------------------------------------------------------------------------

export const missingMfaCheck: Check = {
  id: 'missing-mfa',
  title: 'IAM users without MFA',
  service: 'IAM',
  async run({ inventory }: ScanContext): Promise<Finding[]> {
    const findings: Finding[] = [];

    for (const { name } of await inventory.listAccounts()) {
      const devices = await inventory.listAuthDevices(name);
      if (devices.length > 0) continue;
      findings.push(
        createFinding({
          service: 'IAM',
          issueType: 'No MFA',
          description: `User "${name}" does not have MFA configured`,
          severity: 'High',
          resource: name,
        }),
      );
    }

    return findings;
  },
};

// ---------------------------------------------------------------------------
// unused-access-key
// ---------------------------------------------------------------------------

export const unusedAccessKeyCheck: Check = {
  id: 'unused-access-key',
  title: 'Access keys that were never used',
  service: 'IAM',
  async run({ inventory }: ScanContext): Promise<Finding[]> {
    const findings: Finding[] = [];

    for (const { name } of await inventory.listAccounts()) {
      for (const key of await inventory.listAccessKeys(name)) {
        const lastUsed = await lookup(() => inventory.getAccessKeyLastUsed(key.keyId));
        if (!lastUsed.found) {
          logger.debug(`${name}: skipping key ${key.keyId.slice(0, 8)}... (${lastUsed.reason})`);
          continue;
        }
        if (lastUsed.value !== null) continue;
        findings.push(
          createFinding({
            service: 'IAM',
            issueType: 'Unused Access Key',
            description: `Access key for user "${name}" has never been used`,
            severity: 'Medium',
            resource: `${name} (${key.keyId.slice(0, 8)}...)`,
          }),
        );
      }
    }

    return findings;
  },
};

// ---------------------------------------------------------------------------
// database-exposure
// ---------------------------------------------------------------------------

export const databaseExposureCheck: Check = {
  id: 'database-exposure',
  title: 'Publicly accessible RDS instances',
  service: 'RDS',
  async run({ inventory }: ScanContext): Promise<Finding[]> {
    const instances = await inventory.listDatabaseInstances();

    return instances
      .filter((instance) => instance.publiclyAccessible)
      .map((instance) =>
        createFinding({
          service: 'RDS',
          issueType: 'Public Database',
          description: `RDS instance "${instance.identifier}" is publicly accessible`,
          severity: 'Critical',
          resource: instance.identifier,
        }),
      );
  },
};

export const DEFAULT_CHECKS: readonly Check[] = [
  storageExposureCheck,
  networkExposureCheck,
  privilegedUsageCheck,
  missingMfaCheck,
  unusedAccessKeyCheck,
  databaseExposureCheck,
];
