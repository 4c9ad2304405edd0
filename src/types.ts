import type { ScannerConfig } from './config.js';

export const SEVERITIES = ['Critical', 'High', 'Medium'] as const;
export type Severity = (typeof SEVERITIES)[number];

export const SERVICES = ['S3', 'EC2', 'IAM', 'RDS', 'System'] as const;
export type Service = (typeof SERVICES)[number];

export interface Finding {
  readonly service: Service;
  readonly issueType: string;
  readonly description: string;
  readonly severity: Severity;
  readonly resource: string;
  readonly recommendation: string;
}

export interface ScanSummary {
  totalIssues: number;
  criticalIssues: number;
  highIssues: number;
  mediumIssues: number;
  servicesAffected: number;
  byService: Partial<Record<Service, number>>;
  scanTimestamp: string;
}

export interface ScanMetadata {
  engine: string;
  version: string;
  region: string;
  account: string | null;
  timestamp: string;
  durationMs: number;
}

export interface RemediationSection {
  title: string;
  actions: string[];
}

export interface PostureReport {
  summary: ScanSummary;
  findings: Finding[];
  bySeverity: Record<Severity, Finding[]>;
  remediation: RemediationSection[];
  metadata: ScanMetadata;
}

// ---------------------------------------------------------------------------
// Resource records returned by a CloudInventory
// ---------------------------------------------------------------------------

export interface StorageContainer {
  name: string;
}

export interface StorageGrant {
  /** Group URI for predefined grantees such as AllUsers. */
  granteeUri: string | null;
}

export interface FirewallRule {
  groupId: string;
  protocol: string;
  /** Absent when the rule covers every port (protocol "-1"). */
  fromPort: number | null;
  toPort: number | null;
  sourceCidr: string;
}

export interface AuditEvent {
  name: string;
}

export interface IdentityAccount {
  name: string;
}

export interface AuthDevice {
  serialNumber: string;
}

export interface AccessKey {
  keyId: string;
}

export interface DatabaseInstance {
  identifier: string;
  publiclyAccessible: boolean;
}

/**
 * Read-only view of one cloud account. Checks only talk to this interface, so a scan can run
 * against AWS or against an in-memory stand-in.
 */
export interface CloudInventory {
  listStorageContainers(): Promise<StorageContainer[]>;
  getStorageGrants(container: string): Promise<StorageGrant[]>;
  /** Raw policy document, or null when the container has none. */
  getStoragePolicy(container: string): Promise<string | null>;
  listFirewallRules(): Promise<FirewallRule[]>;
  /** Most recent events recorded for `user`, newest first, at most `limit`. */
  lookupEventsByUser(user: string, limit: number): Promise<AuditEvent[]>;
  listAccounts(): Promise<IdentityAccount[]>;
  listAuthDevices(account: string): Promise<AuthDevice[]>;
  listAccessKeys(account: string): Promise<AccessKey[]>;
  /** Null when the key has never been used. */
  getAccessKeyLastUsed(keyId: string): Promise<Date | null>;
  listDatabaseInstances(): Promise<DatabaseInstance[]>;
  /** Identity the scan runs as; rejects when the account cannot be reached. */
  whoAmI(): Promise<string>;
}

export interface ScanContext {
  inventory: CloudInventory;
  config: ScannerConfig;
}

export interface Check {
  id: string;
  title: string;
  service: Service;
  run(context: ScanContext): Promise<Finding[]>;
}

export type Lookup<T> = { found: true; value: T } | { found: false; reason: string };

export interface FindingFilter {
  severity?: Severity;
  service?: Service;
}
