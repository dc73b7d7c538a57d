/**
 * Process Lifecycle Management
 *
 * Handles application startup, shutdown, and signal handling.
 * Provides hooks for graceful shutdown of resources.
 */

import { getLogger, toError, type Logger } from '../telemetry/logger.ts';

export type LifecycleHook = () => Promise<void> | void;

export interface LifecycleEvents {
  onStart: LifecycleHook[];
  onShutdown: LifecycleHook[];
  onError: ((error: Error) => void)[];
}

export interface LifecycleOptions {
  /** Milliseconds before a stuck shutdown forces the process to exit */
  shutdownTimeout?: number;
  /** Install SIGINT/SIGTERM listeners */
  handleSignals?: boolean;
  logger?: Logger;
  /** Called when the shutdown timeout expires; defaults to process.exit */
  exit?: (code: number) => void;
}

const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Lifecycle manager for the server process
 */
export class Lifecycle {
  private events: LifecycleEvents = {
    onStart: [],
    onShutdown: [],
    onError: [],
  };

  private abortController = new AbortController();
  private shutdownPromise: Promise<void> | null = null;
  private readonly shutdownTimeout: number;
  private readonly logger: Logger;
  private readonly exit: (code: number) => void;
  private readonly signalListeners = new Map<NodeJS.Signals, () => void>();

  constructor(options: LifecycleOptions = {}) {
    this.shutdownTimeout = options.shutdownTimeout ?? 30000; // 30 seconds default
    this.logger = options.logger ?? getLogger();
    this.exit = options.exit ?? ((code) => process.exit(code));
    if (options.handleSignals) {
      this.setupSignalHandlers();
    }
  }

  /**
   * Get the abort signal for graceful shutdown
   */
  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  get isShuttingDown(): boolean {
    return this.shutdownPromise !== null;
  }

  /**
   * Register a hook to run on application start
   */
  onStart(hook: LifecycleHook): void {
    this.events.onStart.push(hook);
  }

  /**
   * Register a hook to run on graceful shutdown
   */
  onShutdown(hook: LifecycleHook): void {
    this.events.onShutdown.push(hook);
  }

  /**
   * Register an error handler
   */
  onError(handler: (error: Error) => void): void {
    this.events.onError.push(handler);
  }

  /**
   * Emit the start event
   */
  async emitStart(): Promise<void> {
    for (const hook of this.events.onStart) {
      await hook();
    }
  }

  /**
   * Trigger graceful shutdown. Repeated calls share the first run.
   */
  shutdown(reason?: string): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.runShutdown(reason);
    }
    return this.shutdownPromise;
  }

  /**
   * Handle an error
   */
  handleError(error: Error): void {
    for (const handler of this.events.onError) {
      handler(error);
    }
  }

  /**
   * Remove the signal listeners this instance installed
   */
  stopSignalHandlers(): void {
    for (const [signal, listener] of this.signalListeners) {
      process.removeListener(signal, listener);
    }
    this.signalListeners.clear();
  }

  private async runShutdown(reason?: string): Promise<void> {
    this.logger.info(`Shutting down${reason ? `: ${reason}` : ''}...`);

    // Signal abort to all listeners
    this.abortController.abort();

    const forceShutdown = setTimeout(() => {
      this.logger.error('Shutdown timeout exceeded, forcing exit');
      this.exit(1);
    }, this.shutdownTimeout);
    forceShutdown.unref();

    // Run shutdown hooks in reverse order (LIFO)
    for (const hook of [...this.events.onShutdown].reverse()) {
      try {
        await hook();
      } catch (error) {
        const err = toError(error);
        this.logger.error('Error during shutdown', err);
        this.handleError(err);
      }
    }

    clearTimeout(forceShutdown);
    this.stopSignalHandlers();
    this.logger.info('Shutdown complete');
  }

  private setupSignalHandlers(): void {
    for (const signal of SHUTDOWN_SIGNALS) {
      const listener = (): void => {
        void this.shutdown(`Received ${signal}`);
      };
      this.signalListeners.set(signal, listener);
      process.once(signal, listener);
    }
  }
}
