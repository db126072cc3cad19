/**
 * MCP protocol round trips against an in-process server
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { Writable } from 'stream';
import winston from 'winston';
import { parseToolText } from './__tests__/utils.js';
import { defaultConfig } from './config/defaults.js';
import { Logger } from './logger/index.js';
import { SriovStateMCPServer } from './server.js';

function createSilentLogger(): Logger {
  const stream = new Writable({
    write(_chunk, _encoding, callback) {
      callback();
    },
  });
  return new Logger(defaultConfig.logging, [new winston.transports.Stream({ stream })]);
}

describe('SriovStateMCPServer', () => {
  let server: SriovStateMCPServer;
  let client: Client;

  beforeEach(async () => {
    const config = structuredClone(defaultConfig);
    config.mcp.serverName = 'sriov-state-mcp-test';
    server = new SriovStateMCPServer(config, createSilentLogger());

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    client = new Client({ name: 'test-client', version: '0.0.0' });
    await Promise.all([server.getServer().connect(serverTransport), client.connect(clientTransport)]);
  });

  afterEach(async () => {
    await client.close();
  });

  function callTool(name: string, args: Record<string, unknown>) {
    return client.request({ method: 'tools/call', params: { name, arguments: args } }, CallToolResultSchema);
  }

  it('should report server info and the tools capability', () => {
    expect(client.getServerVersion()).toEqual({ name: 'sriov-state-mcp-test', version: '0.1.0' });
    expect(client.getServerCapabilities()?.tools).toBeDefined();
  });

  it('should list the tools', async () => {
    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name)).toEqual([
      'validate_ethernet_interface',
      'plan_sriov_reconciliation',
      'get_verification_state',
      'derive_vf_names',
    ]);
  });

  it('should call a tool', async () => {
    const result = await callTool('derive_vf_names', { pfName: 'ens2f0np0', totalVfs: 1 });

    expect(parseToolText(result)).toEqual({ pfName: 'ens2f0np0', base: 'ens2f0', names: ['ens2f0v0'] });
  });

  it('should return errors as tool results', async () => {
    const result = await callTool('plan_sriov_reconciliation', {
      desired: { name: 'eth0', type: 'ethernet', ethernet: { duplex: 'diagonal' } },
    });

    expect(result.isError).toBe(true);
    expect(parseToolText(result)).toMatchObject({ field: 'duplex', path: 'ethernet.duplex' });
  });
});
