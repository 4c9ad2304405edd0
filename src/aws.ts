import { CloudTrailClient, LookupAttributeKey, LookupEventsCommand } from '@aws-sdk/client-cloudtrail';
import { EC2Client, paginateDescribeSecurityGroups, type SecurityGroup } from '@aws-sdk/client-ec2';
import {
  GetAccessKeyLastUsedCommand,
  IAMClient,
  paginateListAccessKeys,
  paginateListMFADevices,
  paginateListUsers,
} from '@aws-sdk/client-iam';
import { RDSClient, paginateDescribeDBInstances } from '@aws-sdk/client-rds';
import { GetBucketAclCommand, GetBucketPolicyCommand, ListBucketsCommand, S3Client, type Grant } from '@aws-sdk/client-s3';
import { GetCallerIdentityCommand, STSClient } from '@aws-sdk/client-sts';
import type { ScannerConfig } from './config.js';
import type {
  AccessKey,
  AuditEvent,
  AuthDevice,
  CloudInventory,
  DatabaseInstance,
  FirewallRule,
  IdentityAccount,
  StorageContainer,
  StorageGrant,
} from './types.js';

/** One rule per (permission, IPv4 source range) pair. */
export function toFirewallRules(groups: SecurityGroup[]): FirewallRule[] {
  const rules: FirewallRule[] = [];

  for (const group of groups) {
    const groupId = group.GroupId ?? group.GroupName ?? 'unknown';
    for (const permission of group.IpPermissions ?? []) {
      for (const { CidrIp: sourceCidr } of permission.IpRanges ?? []) {
        if (!sourceCidr) continue;
        rules.push({
          groupId,
          protocol: permission.IpProtocol ?? '-1',
          fromPort: permission.FromPort ?? null,
          toPort: permission.ToPort ?? null,
          sourceCidr,
        });
      }
    }
  }

  return rules;
}

export function toStorageGrants(grants: Grant[]): StorageGrant[] {
  return grants.map((grant) => ({
    granteeUri: grant.Grantee?.URI ?? null,
  }));
}

export class AwsInventory implements CloudInventory {
  private readonly s3: S3Client;
  private readonly ec2: EC2Client;
  private readonly iam: IAMClient;
  private readonly cloudtrail: CloudTrailClient;
  private readonly rds: RDSClient;
  private readonly sts: STSClient;

  constructor(config: Pick<ScannerConfig, 'region' | 'maxAttempts'>) {
    const clientConfig = { region: config.region, maxAttempts: config.maxAttempts };
    this.s3 = new S3Client(clientConfig);
    this.ec2 = new EC2Client(clientConfig);
    this.iam = new IAMClient(clientConfig);
    this.cloudtrail = new CloudTrailClient(clientConfig);
    this.rds = new RDSClient(clientConfig);
    this.sts = new STSClient(clientConfig);
  }

  async listStorageContainers(): Promise<StorageContainer[]> {
    const response = await this.s3.send(new ListBucketsCommand({}));
    return (response.Buckets ?? []).flatMap((bucket) => (bucket.Name ? [{ name: bucket.Name }] : []));
  }

  async getStorageGrants(container: string): Promise<StorageGrant[]> {
    const response = await this.s3.send(new GetBucketAclCommand({ Bucket: container }));
    return toStorageGrants(response.Grants ?? []);
  }

  async getStoragePolicy(container: string): Promise<string | null> {
    try {
      const response = await this.s3.send(new GetBucketPolicyCommand({ Bucket: container }));
      return response.Policy ?? null;
    } catch (error) {
      if (error instanceof Error && error.name === 'NoSuchBucketPolicy') return null;
      throw error;
    }
  }

  async listFirewallRules(): Promise<FirewallRule[]> {
    const groups: SecurityGroup[] = [];
    for await (const page of paginateDescribeSecurityGroups({ client: this.ec2 }, {})) {
      groups.push(...(page.SecurityGroups ?? []));
    }
    return toFirewallRules(groups);
  }

  async lookupEventsByUser(user: string, limit: number): Promise<AuditEvent[]> {
    const response = await this.cloudtrail.send(
      new LookupEventsCommand({
        LookupAttributes: [{ AttributeKey: LookupAttributeKey.USERNAME, AttributeValue: user }],
        MaxResults: limit,
      }),
    );
    return (response.Events ?? []).map((event) => ({ name: event.EventName ?? 'unknown' }));
  }

  async listAccounts(): Promise<IdentityAccount[]> {
    const accounts: IdentityAccount[] = [];
    for await (const page of paginateListUsers({ client: this.iam }, {})) {
      for (const user of page.Users ?? []) {
        if (user.UserName) accounts.push({ name: user.UserName });
      }
    }
    return accounts;
  }

  async listAuthDevices(account: string): Promise<AuthDevice[]> {
    const devices: AuthDevice[] = [];
    for await (const page of paginateListMFADevices({ client: this.iam }, { UserName: account })) {
      for (const device of page.MFADevices ?? []) {
        if (device.SerialNumber) devices.push({ serialNumber: device.SerialNumber });
      }
    }
    return devices;
  }

  async listAccessKeys(account: string): Promise<AccessKey[]> {
    const keys: AccessKey[] = [];
    for await (const page of paginateListAccessKeys({ client: this.iam }, { UserName: account })) {
      for (const key of page.AccessKeyMetadata ?? []) {
        if (key.AccessKeyId) keys.push({ keyId: key.AccessKeyId });
      }
    }
    return keys;
  }

  async getAccessKeyLastUsed(keyId: string): Promise<Date | null> {
    const response = await this.iam.send(new GetAccessKeyLastUsedCommand({ AccessKeyId: keyId }));
    return response.AccessKeyLastUsed?.LastUsedDate ?? null;
  }

  async listDatabaseInstances(): Promise<DatabaseInstance[]> {
    const instances: DatabaseInstance[] = [];
    for await (const page of paginateDescribeDBInstances({ client: this.rds }, {})) {
      for (const instance of page.DBInstances ?? []) {
        if (!instance.DBInstanceIdentifier) continue;
        instances.push({
          identifier: instance.DBInstanceIdentifier,
          publiclyAccessible: instance.PubliclyAccessible ?? false,
        });
      }
    }
    return instances;
  }

  async whoAmI(): Promise<string> {
    const identity = await this.sts.send(new GetCallerIdentityCommand({}));
    return identity.Account ?? identity.Arn ?? 'unknown';
  }
}
