/**
 * Example MCP Streamable HTTP Client
 *
 * Submits a job through the master's MCP tools and polls for its result.
 *
 * Usage:
 *   1. Start the master with Streamable mode:
 *      npm run build
 *      node dist/src/index.js --mcp-transport streamable
 *
 *   2. Start at least one worker (see examples/worker.ts)
 *
 *   3. Run this client:
 *      node dist/examples/mcp-client.js
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';

function firstText(result: unknown): string {
  if (typeof result !== 'object' || result === null || !('content' in result)) return '';
  if (!Array.isArray(result.content)) return '';
  for (const item of result.content) {
    if (typeof item === 'object' && item !== null && 'text' in item && typeof item.text === 'string') {
      return item.text;
    }
  }
  return '';
}

async function main() {
  const endpoint = process.env.MASTER_URL ?? 'http://localhost:3001/mcp';

  console.log('🔌 Connecting to master via Streamable HTTP...');
  console.log(`   Server URL: ${endpoint}\n`);

  const transport = new StreamableHTTPClientTransport(new URL(endpoint));
  const client = new Client(
    {
      name: 'talus-example-client',
      version: '1.0.0',
    },
    {
      capabilities: {},
    }
  );

  try {
    await client.connect(transport);
    console.log('✅ Connected!\n');

    const toolsResponse = await client.listTools();
    console.log('📋 Available tools:');
    toolsResponse.tools.forEach((tool, index) => {
      console.log(`   ${index + 1}. ${tool.name}: ${tool.description || 'No description'}`);
    });
    console.log();

    console.log(firstText(await client.callTool({ name: 'master-info', arguments: {} })));
    console.log();
    console.log(firstText(await client.callTool({ name: 'slave-list', arguments: {} })));
    console.log();

    const submitted = firstText(
      await client.callTool({
        name: 'submit-job',
        arguments: { payload: { task: 'sleep', ms: 500 } },
      })
    );
    console.log(submitted);

    const match = /Job ID: (\S+)/.exec(submitted);
    if (!match) {
      throw new Error('No job id in submit-job response');
    }
    const jobId = match[1];

    for (let i = 0; i < 20; i++) {
      const text = firstText(await client.callTool({ name: 'get-job-result', arguments: { job_id: jobId } }));
      if (!text.includes('has not finished yet')) {
        console.log(`\n${text}`);
        break;
      }
      await new Promise((resolve) => setTimeout(resolve, 500));
    }

    await client.close();
    console.log('\n👋 Disconnected from master');
  } catch (error) {
    console.error('❌ Error:', error);
    process.exit(1);
  }
}

void main();
