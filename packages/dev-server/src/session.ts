import { getLogger, type Access, type Reporter, type Target } from "@bookpress/core";
import type { Builder } from "@bookpress/builder";
import { createRebuildHandler, createWatchBinding } from "./binding.js";
import { startPreviewServer, type PreviewServerOptions } from "./server.js";
import { startRebuildWatcher, type RebuildWatcherOptions } from "./watcher.js";

export type SessionState =
  | "idle"
  | "server-starting"
  | "server-running"
  | "watcher-running"
  | "shutting-down"
  | "stopped";

export interface RunningServer {
  url: string;
  stop: () => Promise<void>;
}

export interface RunningWatcher {
  directory: string;
  stop: () => Promise<void>;
}

export interface PreviewSessionOptions {
  directory: string;
  access: Access;
  port: number;
  /** Rebuild this target through `builder` whenever its sources change. */
  watch?: { target: Target; builder: Builder } | null;
  logger?: Reporter;
  startServer?: (options: PreviewServerOptions) => Promise<RunningServer>;
  startWatcher?: (options: RebuildWatcherOptions) => Promise<RunningWatcher>;
}

const waitForAbort = (signal: AbortSignal) =>
  new Promise<void>((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener("abort", () => resolve(), { once: true });
  });

export class PreviewSession {
  private state: SessionState = "idle";
  private server: RunningServer | null = null;
  private watcher: RunningWatcher | null = null;
  private shutdownPromise: Promise<void> | null = null;
  private readonly logger: Reporter;

  constructor(private readonly options: PreviewSessionOptions) {
    this.logger = options.logger ?? getLogger();
  }

  get currentState(): SessionState {
    return this.state;
  }

  async start() {
    if (this.state !== "idle") {
      throw new Error(`Preview session cannot start from state ${this.state}`);
    }
    const { directory, access, port, watch } = this.options;
    const startServer = this.options.startServer ?? startPreviewServer;
    const startWatcher = this.options.startWatcher ?? startRebuildWatcher;

    this.state = "server-starting";
    let server: RunningServer;
    try {
      server = await startServer({ directory, access, port, logger: this.logger });
    } catch (err) {
      this.state = "stopped";
      throw err;
    }
    this.server = server;
    this.state = "server-running";
    this.logger.info({ directory, url: server.url }, `Your build located at ${directory} may be previewed at ${server.url}`);
    this.logger.info("Use [Ctrl]+[C] to halt the server.");

    if (!watch) return;

    const binding = createWatchBinding(watch.target);
    this.logger.info({ directory: binding.directory }, `Watching for changes in ${binding.directory} ...`);
    try {
      this.watcher = await startWatcher({
        directory: binding.directory,
        onEvent: createRebuildHandler(binding, watch.builder, this.logger),
        logger: this.logger,
      });
    } catch (err) {
      await server.stop();
      this.server = null;
      this.state = "stopped";
      throw err;
    }
    this.state = "watcher-running";
  }

  /** Stops the watcher, waits for it to finish, then stops the server. */
  shutdown(): Promise<void> {
    if (this.shutdownPromise) return this.shutdownPromise;
    if (this.state !== "server-running" && this.state !== "watcher-running") {
      this.state = "stopped";
      return Promise.resolve();
    }
    this.state = "shutting-down";
    this.shutdownPromise = this.stopAll();
    return this.shutdownPromise;
  }

  async run(signal: AbortSignal) {
    await this.start();
    await waitForAbort(signal);
    await this.shutdown();
  }

  private async stopAll() {
    this.logger.info("Closing server...");
    try {
      if (this.watcher) {
        await this.watcher.stop();
        this.watcher = null;
      }
    } finally {
      if (this.server) {
        await this.server.stop();
        this.server = null;
      }
      this.state = "stopped";
    }
  }
}
