import assert from 'node:assert/strict';
import test from 'node:test';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CommandValidationError } from '@aws-cli-gateway/runtime';
import { createServer, SERVER_INSTRUCTIONS } from './server.js';
import type { ToolTextResponse } from './tools/response.js';
import { createFakeGateway, type FakeGateway } from './test-utils.js';

async function connectClient(gateway: FakeGateway): Promise<Client> {
  const server = createServer({ gateway });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  const client = new Client({ name: 'test-client', version: '0.0.1' });
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  return client;
}

test('identifies itself and its instructions', async () => {
  const client = await connectClient(createFakeGateway());
  try {
    assert.deepEqual(client.getServerVersion(), { name: 'AWS MCP Server', version: '1.0.0' });
    assert.equal(client.getInstructions(), SERVER_INSTRUCTIONS);
  } finally {
    await client.close();
  }
});

test('lists the two AWS CLI tools', async () => {
  const client = await connectClient(createFakeGateway());
  try {
    const { tools } = await client.listTools();
    const names = tools.map((tool) => tool.name).sort();

    assert.deepEqual(names, ['aws_cli_help', 'aws_cli_pipeline']);
    const pipeline = tools.find((tool) => tool.name === 'aws_cli_pipeline');
    assert.deepEqual(pipeline?.inputSchema.required, ['command']);
    const help = tools.find((tool) => tool.name === 'aws_cli_help');
    assert.deepEqual(help?.inputSchema.required, ['service']);
  } finally {
    await client.close();
  }
});

test('runs commands through the gateway', async () => {
  const gateway = createFakeGateway({ run: async () => ({ status: 'success', output: 'bucket-a' }) });
  const client = await connectClient(gateway);
  try {
    const result = (await client.callTool({
      name: 'aws_cli_pipeline',
      arguments: { command: 'aws s3 ls', timeout: 10 },
    })) as ToolTextResponse;

    assert.notEqual(result.isError, true);
    assert.deepEqual(result.content, [{ type: 'text', text: 'bucket-a' }]);
    assert.equal(gateway.runCalls.length, 1);
    assert.equal(gateway.runCalls[0].command, 'aws s3 ls');
    assert.equal(gateway.runCalls[0].options?.timeoutSeconds, 10);
  } finally {
    await client.close();
  }
});

test('returns rejected commands as tool errors', async () => {
  const gateway = createFakeGateway({
    run: async () => {
      throw new CommandValidationError("Commands must start with 'aws'", 'structural');
    },
  });
  const client = await connectClient(gateway);
  try {
    const result = (await client.callTool({
      name: 'aws_cli_pipeline',
      arguments: { command: 'rm -rf /' },
    })) as ToolTextResponse;

    assert.equal(result.isError, true);
    assert.deepEqual(result.content, [
      { type: 'text', text: "Command validation error: Commands must start with 'aws'" },
    ]);
  } finally {
    await client.close();
  }
});

test('serves help text', async () => {
  const gateway = createFakeGateway();
  const client = await connectClient(gateway);
  try {
    const result = (await client.callTool({
      name: 'aws_cli_help',
      arguments: { service: 'ec2' },
    })) as ToolTextResponse;

    assert.deepEqual(result.content, [{ type: 'text', text: 'help for ec2' }]);
    assert.equal(gateway.helpCalls[0].service, 'ec2');
    assert.equal(gateway.helpCalls[0].command, undefined);
  } finally {
    await client.close();
  }
});
