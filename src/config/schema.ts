import { z } from 'zod';

/**
 * Configuration schema; every value is checked at load time
 */

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export const LogFormatSchema = z.enum(['json', 'simple', 'pretty']);
export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export const TransportSchema = z.enum(['stdio']);

export const ServerConfigSchema = z.object({
  nodeEnv: NodeEnvSchema.default('development'),
});

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  format: LogFormatSchema.default('json'),
  // Without a directory only the console (stderr) is written to
  dir: z.string().optional(),
  maxFiles: z.number().int().min(1).default(10),
  maxSize: z.string().regex(/^\d+[bkmg]$/i).default('10m'),
});

export const MCPConfigSchema = z.object({
  serverName: z.string().min(1).default('sriov-state-mcp'),
  serverVersion: z.string().min(1).default('0.1.0'),
  transport: TransportSchema.default('stdio'),
});

export const ConfigSchema = z.object({
  server: ServerConfigSchema,
  logging: LoggingConfigSchema,
  mcp: MCPConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LogFormat = z.infer<typeof LogFormatSchema>;
export type NodeEnv = z.infer<typeof NodeEnvSchema>;
export type Transport = z.infer<typeof TransportSchema>;
