import { config as loadEnv } from 'dotenv';
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import {
  ConfigSchema,
  LogFormatSchema,
  LogLevelSchema,
  NodeEnvSchema,
  TransportSchema,
  type Config,
} from './schema.js';
import { defaultConfig } from './defaults.js';

const ENV_PREFIX = 'SRIOV_MCP_';

const FileConfigSchema = ConfigSchema.deepPartial();
type FileConfig = z.infer<typeof FileConfigSchema>;

export interface ConfigLoaderOptions {
  /** JSON file layered between defaults and the environment */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration from environment variables and config files
 * Priority: Environment Variables > Config File > Defaults
 */
export class ConfigLoader {
  private config: Config;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: ConfigLoaderOptions = {}) {
    if (!options.env) {
      loadEnv();
    }
    this.env = options.env ?? process.env;

    this.config = structuredClone(defaultConfig);
    this.loadFromFile(options.configPath ?? join(process.cwd(), 'config', 'default.json'));
    this.loadFromEnv();
    this.validate();
  }

  private loadFromFile(configPath: string): void {
    if (!existsSync(configPath)) {
      return;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(configPath, 'utf-8'));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`Failed to load config file ${configPath}: ${message}`);
      return;
    }

    const parsed = FileConfigSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid config file ${configPath}: ${parsed.error.message}`, {
        configPath,
      });
    }
    this.mergeConfig(parsed.data);
  }

  private mergeConfig(source: FileConfig): void {
    if (source.server) Object.assign(this.config.server, source.server);
    if (source.logging) Object.assign(this.config.logging, source.logging);
    if (source.mcp) Object.assign(this.config.mcp, source.mcp);
  }

  /**
   * Read and parse one variable; undefined when it is not set
   */
  private fromEnv<T extends z.ZodTypeAny>(name: string, schema: T): z.infer<T> | undefined {
    const value = this.env[name];
    if (value === undefined || value === '') {
      return undefined;
    }

    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid value for ${name}: ${JSON.stringify(value)}`, {
        variable: name,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }
    return parsed.data;
  }

  private loadFromEnv(): void {
    const int = z.coerce.number().int();

    const nodeEnv = this.fromEnv('NODE_ENV', NodeEnvSchema);
    if (nodeEnv) this.config.server.nodeEnv = nodeEnv;

    // Logging configuration
    const level = this.fromEnv(`${ENV_PREFIX}LOG_LEVEL`, LogLevelSchema);
    if (level) this.config.logging.level = level;
    const format = this.fromEnv(`${ENV_PREFIX}LOG_FORMAT`, LogFormatSchema);
    if (format) this.config.logging.format = format;
    const dir = this.fromEnv(`${ENV_PREFIX}LOG_DIR`, z.string());
    if (dir) this.config.logging.dir = dir;
    const maxFiles = this.fromEnv(`${ENV_PREFIX}LOG_MAX_FILES`, int);
    if (maxFiles !== undefined) this.config.logging.maxFiles = maxFiles;
    const maxSize = this.fromEnv(`${ENV_PREFIX}LOG_MAX_SIZE`, z.string());
    if (maxSize) this.config.logging.maxSize = maxSize;

    // MCP configuration
    const serverName = this.fromEnv(`${ENV_PREFIX}SERVER_NAME`, z.string());
    if (serverName) this.config.mcp.serverName = serverName;
    const serverVersion = this.fromEnv(`${ENV_PREFIX}SERVER_VERSION`, z.string());
    if (serverVersion) this.config.mcp.serverVersion = serverVersion;
    const transport = this.fromEnv(`${ENV_PREFIX}TRANSPORT`, TransportSchema);
    if (transport) this.config.mcp.transport = transport;
  }

  private validate(): void {
    const result = ConfigSchema.safeParse(this.config);
    if (!result.success) {
      throw new ConfigurationError(`Configuration validation failed: ${result.error.message}`);
    }
    this.config = result.data;
  }

  public getConfig(): Config {
    return this.config;
  }
}

let configInstance: ConfigLoader | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = new ConfigLoader();
  }
  return configInstance.getConfig();
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

export type { Config } from './schema.js';
