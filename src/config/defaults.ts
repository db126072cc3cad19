import type { Config } from './schema.js';

export const defaultConfig: Config = {
  server: {
    nodeEnv: 'development',
  },
  logging: {
    level: 'info',
    format: 'json',
    dir: undefined,
    maxFiles: 10,
    maxSize: '10m',
  },
  mcp: {
    serverName: 'sriov-state-mcp',
    serverVersion: '0.1.0',
    transport: 'stdio',
  },
};
