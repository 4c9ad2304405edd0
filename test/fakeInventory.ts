import type { ScannerConfig } from '../src/config.js';
import { AccessDeniedError } from '../src/errors.js';
import type {
  AccessKey,
  AuditEvent,
  AuthDevice,
  CloudInventory,
  DatabaseInstance,
  FirewallRule,
  IdentityAccount,
  ScanContext,
  StorageContainer,
  StorageGrant,
} from '../src/types.js';

export interface FakeBucket {
  name: string;
  grants?: StorageGrant[];
  policy?: string | null;
  aclDenied?: boolean;
  policyFails?: boolean;
}

export interface FakeKey {
  keyId: string;
  lastUsed?: Date | null;
  lookupFails?: boolean;
}

export interface FakeUser {
  name: string;
  mfaDevices?: number;
  keys?: FakeKey[];
}

export interface FakeAccount {
  buckets?: FakeBucket[];
  rules?: FirewallRule[];
  privilegedEvents?: AuditEvent[];
  users?: FakeUser[];
  databases?: DatabaseInstance[];
  failures?: Partial<Record<keyof CloudInventory, Error>>;
}

export const PRIVATE_GRANT: StorageGrant = { granteeUri: null };

export const ALL_USERS_READ: StorageGrant = {
  granteeUri: 'http://acs.amazonaws.com/groups/global/AllUsers',
};

export function ingress(groupId: string, port: number | null, sourceCidr = '0.0.0.0/0', protocol = 'tcp'): FirewallRule {
  return { groupId, protocol, fromPort: port, toPort: port, sourceCidr };
}

export class FakeInventory implements CloudInventory {
  readonly eventQueries: Array<{ user: string; limit: number }> = [];

  constructor(private readonly account: FakeAccount = {}) {}

  private fail(method: keyof CloudInventory): void {
    const failure = this.account.failures?.[method];
    if (failure) throw failure;
  }

  private bucket(name: string): FakeBucket {
    const bucket = this.account.buckets?.find((candidate) => candidate.name === name);
    if (!bucket) throw new Error(`NoSuchBucket: ${name}`);
    return bucket;
  }

  private user(name: string): FakeUser {
    const user = this.account.users?.find((candidate) => candidate.name === name);
    if (!user) throw new Error(`NoSuchEntity: ${name}`);
    return user;
  }

  async listStorageContainers(): Promise<StorageContainer[]> {
    this.fail('listStorageContainers');
    return (this.account.buckets ?? []).map(({ name }) => ({ name }));
  }

  async getStorageGrants(container: string): Promise<StorageGrant[]> {
    this.fail('getStorageGrants');
    const bucket = this.bucket(container);
    if (bucket.aclDenied) throw new AccessDeniedError(`Access Denied for ${container}`);
    return bucket.grants ?? [PRIVATE_GRANT];
  }

  async getStoragePolicy(container: string): Promise<string | null> {
    const bucket = this.bucket(container);
    if (bucket.policyFails) throw new Error('policy service unavailable');
    return bucket.policy ?? null;
  }

  async listFirewallRules(): Promise<FirewallRule[]> {
    this.fail('listFirewallRules');
    return this.account.rules ?? [];
  }

  async lookupEventsByUser(user: string, limit: number): Promise<AuditEvent[]> {
    this.fail('lookupEventsByUser');
    this.eventQueries.push({ user, limit });
    return this.account.privilegedEvents ?? [];
  }

  async listAccounts(): Promise<IdentityAccount[]> {
    this.fail('listAccounts');
    return (this.account.users ?? []).map(({ name }) => ({ name }));
  }

  async listAuthDevices(account: string): Promise<AuthDevice[]> {
    this.fail('listAuthDevices');
    const count = this.user(account).mfaDevices ?? 0;
    return Array.from({ length: count }, (_, index) => ({ serialNumber: `${account}-mfa-${index}` }));
  }

  async listAccessKeys(account: string): Promise<AccessKey[]> {
    this.fail('listAccessKeys');
    return (this.user(account).keys ?? []).map(({ keyId }) => ({ keyId }));
  }

  async getAccessKeyLastUsed(keyId: string): Promise<Date | null> {
    const key = this.account.users?.flatMap((user) => user.keys ?? []).find((candidate) => candidate.keyId === keyId);
    if (!key || key.lookupFails) throw new Error(`Unable to read last use of ${keyId}`);
    return key.lastUsed ?? null;
  }

  async listDatabaseInstances(): Promise<DatabaseInstance[]> {
    this.fail('listDatabaseInstances');
    return this.account.databases ?? [];
  }

  async whoAmI(): Promise<string> {
    this.fail('whoAmI');
    return '123456789012';
  }
}

export const testConfig: ScannerConfig = {
  region: 'eu-west-1',
  maxAttempts: 1,
  privilegedUser: 'root',
  privilegedEventLimit: 10,
  concurrency: 1,
};

export function contextFor(account: FakeAccount = {}, config: Partial<ScannerConfig> = {}): ScanContext {
  return { inventory: new FakeInventory(account), config: { ...testConfig, ...config } };
}
