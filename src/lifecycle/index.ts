import type { Logger } from '../logger/index.js';

/**
 * Named startup/shutdown hooks for the server process
 */

export interface LifecycleHook {
  name: string;
  handler: () => Promise<void>;
}

export class LifecycleManager {
  private readonly logger: Logger;
  private readonly startupHooks: LifecycleHook[] = [];
  private readonly shutdownHooks: LifecycleHook[] = [];
  private readonly shutdownTimeout: number;
  private shuttingDown = false;

  constructor(logger: Logger, shutdownTimeout = 10000) {
    this.logger = logger;
    this.shutdownTimeout = shutdownTimeout;
  }

  onStartup(name: string, handler: () => Promise<void>): void {
    this.startupHooks.push({ name, handler });
  }

  onShutdown(name: string, handler: () => Promise<void>): void {
    this.shutdownHooks.push({ name, handler });
  }

  /**
   * Run startup hooks in registration order; the first failure aborts startup
   */
  async startup(): Promise<void> {
    for (const hook of this.startupHooks) {
      this.logger.debug(`Running startup hook: ${hook.name}`);
      try {
        await hook.handler();
      } catch (error) {
        this.logger.error(`Startup hook failed: ${hook.name}`, error);
        throw error;
      }
    }
  }

  /**
   * Run shutdown hooks newest first. A failing hook is logged and the rest
   * still run. Only the first call does anything.
   */
  async shutdown(signal?: string): Promise<void> {
    if (this.shuttingDown) {
      this.logger.warn('Shutdown already in progress');
      return;
    }
    this.shuttingDown = true;
    this.logger.info(`Shutting down${signal ? ` (signal: ${signal})` : ''}`);

    const runHooks = async (): Promise<void> => {
      for (const hook of [...this.shutdownHooks].reverse()) {
        try {
          await hook.handler();
        } catch (error) {
          this.logger.error(`Shutdown hook failed: ${hook.name}`, error);
        }
      }
    };

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`Shutdown timeout after ${this.shutdownTimeout}ms`)),
        this.shutdownTimeout
      );
    });

    try {
      await Promise.race([runHooks(), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Shut down on SIGINT/SIGTERM, then exit
   */
  handleSignals(): void {
    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      process.once(signal, () => {
        this.shutdown(signal).then(
          () => process.exit(0),
          (error: unknown) => {
            this.logger.error('Shutdown failed', error);
            process.exit(1);
          }
        );
      });
    }
  }

  isShuttingDown(): boolean {
    return this.shuttingDown;
  }
}
