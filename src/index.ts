#!/usr/bin/env node

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { loadConfig } from './config.js';
import { ENGINE, VERSION } from './reports.js';
import { redactRecord } from './security.js';
import { detailedFindingsTool, postureReportTool, summaryStatsTool } from './tools.js';
import { SERVICES, SEVERITIES } from './types.js';

const config = loadConfig();

const server = new McpServer({
  name: 'cloud-posture-mcp',
  version: VERSION,
});

function asToolResult(data: object) {
  const structuredContent = redactRecord(data);
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(structuredContent, null, 2) }],
    structuredContent,
  };
}

// ---------------------------------------------------------------------------
// get_detailed_findings
// ---------------------------------------------------------------------------
server.registerTool(
  'get_detailed_findings',
  {
    description:
      'Scan the configured AWS account and return every finding: public S3 buckets, security groups ' +
      'open to 0.0.0.0/0, recent root account usage, IAM users without MFA, unused access keys and ' +
      'publicly accessible RDS instances. Findings are sorted by severity.',
    inputSchema: {
      severity: z.enum(SEVERITIES).optional().describe('Only return findings of this severity'),
      service: z.enum(SERVICES).optional().describe('Only return findings for this service'),
    },
  },
  async ({ severity, service }) => asToolResult(await detailedFindingsTool(config, { severity, service })),
);

// ---------------------------------------------------------------------------
// get_summary_stats
// ---------------------------------------------------------------------------
server.registerTool(
  'get_summary_stats',
  {
    description:
      'Scan the configured AWS account and return issue counts: total, per severity, per service, ' +
      'and the number of services affected.',
  },
  async () => asToolResult(await summaryStatsTool(config)),
);

// ---------------------------------------------------------------------------
// posture_report
// ---------------------------------------------------------------------------
server.registerTool(
  'posture_report',
  {
    description:
      'Run a full posture scan and return a consolidated report: summary, findings grouped by ' +
      'severity, a remediation checklist and scan metadata.',
  },
  async () => asToolResult(await postureReportTool(config)),
);

// ---------------------------------------------------------------------------
// Bootstrap
// ---------------------------------------------------------------------------
async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((error) => {
  process.stderr.write(`${ENGINE} server error: ${String(error)}\n`);
  process.exit(1);
});
