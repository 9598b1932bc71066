/**
 * Signal and process-exit hooks for graceful shutdown handling
 */

import { createLogger } from '../logging-config.js';

export type CleanupFunction = () => Promise<void> | void;

type Listener = (...args: unknown[]) => void;

/**
 * The part of `process` the handler touches, injectable for tests.
 */
export interface ProcessLike {
  platform: NodeJS.Platform;
  on(event: string, listener: Listener): unknown;
  off(event: string, listener: Listener): unknown;
  exit(code?: number): void;
}

export interface SignalHandlerConfig {
  /** Cleanup function to run on shutdown */
  cleanup?: CleanupFunction;
  /** Timeout for cleanup operations in milliseconds */
  cleanupTimeout?: number;
  /** Whether to log shutdown events */
  verbose?: boolean;
  /** Exit code after a signal-triggered cleanup */
  exitCode?: number;
  /** Signals to handle; SIGBREAK is added on Windows */
  signals?: NodeJS.Signals[];
  /** Also run the cleanups synchronously on the process `exit` event */
  runOnExit?: boolean;
  process?: ProcessLike;
}

const DEFAULT_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Signal handler class for managing graceful application shutdown.
 *
 * A signal runs every cleanup (awaited, bounded by `cleanupTimeout`) and then
 * exits with `exitCode`; a second signal during shutdown exits with 1. The
 * process `exit` event runs the same cleanups synchronously, so cleanups must
 * be idempotent.
 */
export class SignalHandler {
  private config: Required<Omit<SignalHandlerConfig, 'cleanup'>>;
  private cleanupFunctions: CleanupFunction[] = [];
  private isShuttingDown: boolean = false;
  private registered = new Map<string, Listener>();
  private logger = createLogger('task_runner.shutdown');

  constructor(config: SignalHandlerConfig = {}) {
    const target = config.process ?? process;
    this.config = {
      cleanupTimeout: config.cleanupTimeout ?? 10000, // 10 seconds default
      verbose: config.verbose ?? true,
      exitCode: config.exitCode ?? 0,
      runOnExit: config.runOnExit ?? true,
      signals:
        config.signals ??
        (target.platform === 'win32'
          ? [...DEFAULT_SIGNALS, 'SIGBREAK']
          : DEFAULT_SIGNALS),
      process: target,
    };

    if (config.cleanup) {
      this.cleanupFunctions.push(config.cleanup);
    }
  }

  /**
   * Add a cleanup function to be called on shutdown
   */
  addCleanupFunction(cleanup: CleanupFunction): void {
    this.cleanupFunctions.push(cleanup);
  }

  /**
   * Remove a cleanup function
   */
  removeCleanupFunction(cleanup: CleanupFunction): void {
    const index = this.cleanupFunctions.indexOf(cleanup);
    if (index > -1) {
      this.cleanupFunctions.splice(index, 1);
    }
  }

  /**
   * Execute all cleanup functions with timeout
   */
  private async executeCleanup(): Promise<void> {
    if (this.cleanupFunctions.length === 0) {
      return;
    }

    const cleanupPromises = this.cleanupFunctions.map(
      async (cleanup, index) => {
        try {
          await cleanup();
          if (this.config.verbose) {
            this.logger.debug(
              `Cleanup function ${index + 1} completed successfully`
            );
          }
        } catch (error) {
          this.logger.error(`Cleanup function ${index + 1} failed`, error);
        }
      }
    );

    let timer: NodeJS.Timeout | undefined;
    try {
      await Promise.race([
        Promise.all(cleanupPromises),
        new Promise((_, reject) => {
          timer = setTimeout(
            () => reject(new Error('Cleanup timeout')),
            this.config.cleanupTimeout
          );
        }),
      ]);
    } catch (error) {
      this.logger.error('Cleanup operations timed out or failed', error);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Runs the cleanups without waiting; used from the `exit` event, where no
   * further asynchronous work can complete.
   */
  private runCleanupSync(): void {
    for (const [index, cleanup] of this.cleanupFunctions.entries()) {
      try {
        const result = cleanup();
        if (result instanceof Promise) {
          result.catch((error: unknown) => {
            this.logger.error(`Cleanup function ${index + 1} failed`, error);
          });
        }
      } catch (error) {
        this.logger.error(`Cleanup function ${index + 1} failed`, error);
      }
    }
  }

  /**
   * Handle shutdown signals
   */
  private async handleShutdown(signal: string): Promise<void> {
    const target = this.config.process;
    if (this.isShuttingDown) {
      if (this.config.verbose) {
        this.logger.warning(`Received ${signal} during shutdown, forcing exit`);
      }
      target.exit(1);
      return;
    }

    this.isShuttingDown = true;

    if (this.config.verbose) {
      this.logger.warning(`Received ${signal}, saving logs and shutting down...`);
    }

    await this.executeCleanup();

    if (this.config.verbose) {
      this.logger.info('Graceful shutdown completed');
    }

    target.exit(this.config.exitCode);
  }

  /**
   * Register signal handlers for graceful shutdown
   */
  register(): void {
    if (this.registered.size > 0) {
      return;
    }

    const target = this.config.process;
    for (const signal of this.config.signals) {
      const listener: Listener = () => {
        void this.handleShutdown(signal);
      };
      target.on(signal, listener);
      this.registered.set(signal, listener);
    }

    if (this.config.runOnExit) {
      const onExit: Listener = () => {
        this.runCleanupSync();
      };
      target.on('exit', onExit);
      this.registered.set('exit', onExit);
    }

    if (this.config.verbose) {
      this.logger.debug(
        `Shutdown hooks registered for ${[...this.registered.keys()].join(', ')}`
      );
    }
  }

  /**
   * Unregister signal handlers
   */
  unregister(): void {
    const target = this.config.process;
    for (const [event, listener] of this.registered) {
      target.off(event, listener);
    }
    this.registered.clear();

    if (this.config.verbose) {
      this.logger.debug('Shutdown hooks unregistered');
    }
  }

  /**
   * Manually trigger shutdown
   */
  async shutdown(): Promise<void> {
    await this.handleShutdown('manual');
  }

  /**
   * Check if currently shutting down
   */
  get shuttingDown(): boolean {
    return this.isShuttingDown;
  }
}

/**
 * Something with an idempotent export, such as a RunLogger.
 */
export interface ExportOnShutdown {
  export(): unknown;
}

/**
 * Couples an idempotent export to both the normal-exit hook and the interrupt
 * signals. Whichever fires first performs the write; the other is a no-op.
 */
export function installShutdownHooks(
  target: ExportOnShutdown,
  config: Omit<SignalHandlerConfig, 'cleanup'> = {}
): SignalHandler {
  const handler = new SignalHandler({
    ...config,
    cleanup: () => {
      target.export();
    },
  });
  handler.register();
  return handler;
}
