import { describe, expect, it } from 'vitest';
import { createFinding } from '../src/findings.js';
import { runChecks } from '../src/runner.js';
import type { Check, Finding } from '../src/types.js';
import { contextFor } from './fakeInventory.js';

function staticCheck(id: string, findings: Finding[], delayMs = 0): Check {
  return {
    id,
    title: id,
    service: 'EC2',
    run: async () => {
      if (delayMs > 0) await new Promise((resolve) => setTimeout(resolve, delayMs));
      return findings;
    },
  };
}

function failingCheck(id: string, message: string): Check {
  return {
    id,
    title: id,
    service: 'S3',
    run: async () => {
      throw new Error(message);
    },
  };
}

const exposedGroup = createFinding({
  service: 'EC2',
  issueType: 'Permissive Security Group',
  description: 'Security group allows tcp traffic on port 8080 from anywhere',
  severity: 'High',
  resource: 'sg-web',
});

const publicDatabase = createFinding({
  service: 'RDS',
  issueType: 'Public Database',
  description: 'RDS instance "orders-db" is publicly accessible',
  severity: 'Critical',
  resource: 'orders-db',
});

describe('runChecks', () => {
  it('replaces a failing check with one check-error finding', async () => {
    const findings = await runChecks(
      [staticCheck('network-exposure', [exposedGroup]), failingCheck('storage-exposure', 'kaput')],
      contextFor(),
    );

    expect(findings).toEqual([
      exposedGroup,
      {
        service: 'System',
        issueType: 'Check Error',
        description: 'Error running storage-exposure: kaput',
        severity: 'Medium',
        resource: 'Security Scanner',
        recommendation: 'Check AWS credentials and permissions',
      },
    ]);
  });

  it('keeps registry order when checks finish out of order', async () => {
    const findings = await runChecks(
      [
        staticCheck('slow', [exposedGroup], 20),
        failingCheck('broken-a', 'throttled'),
        staticCheck('fast', [publicDatabase]),
        failingCheck('broken-b', 'timeout'),
      ],
      contextFor(),
      { concurrency: 4 },
    );

    expect(findings.map((f) => f.description)).toEqual([
      'Security group allows tcp traffic on port 8080 from anywhere',
      'Error running broken-a: throttled',
      'RDS instance "orders-db" is publicly accessible',
      'Error running broken-b: timeout',
    ]);
  });

  it('never runs more checks at once than allowed', async () => {
    let inFlight = 0;
    let peak = 0;
    const tracked = (id: string): Check => ({
      id,
      title: id,
      service: 'IAM',
      run: async () => {
        inFlight += 1;
        peak = Math.max(peak, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 5));
        inFlight -= 1;
        return [];
      },
    });

    await runChecks(['a', 'b', 'c', 'd', 'e'].map(tracked), contextFor(), { concurrency: 2 });

    expect(peak).toBe(2);
  });

  it('returns an empty collection when there is nothing to run', async () => {
    await expect(runChecks([], contextFor())).resolves.toEqual([]);
  });
});
