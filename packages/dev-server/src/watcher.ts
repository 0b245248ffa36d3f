import path from "path";
import chokidar from "chokidar";
import { getLogger, type Reporter } from "@bookpress/core";

export type WatchEventName = "add" | "addDir" | "change" | "unlink" | "unlinkDir";

export type WatchEventHandler = (event: WatchEventName, changedPath: string) => Promise<void> | void;

/** The part of a filesystem watcher the rebuild loop relies on. */
export interface WatchSource {
  onEvent(listener: (event: WatchEventName, changedPath: string) => void): void;
  onError(listener: (err: unknown) => void): void;
  ready(): Promise<void>;
  close(): Promise<void>;
}

export type WatchSourceFactory = (directory: string) => WatchSource;

export const chokidarSource: WatchSourceFactory = (directory) => {
  const watcher = chokidar.watch(directory, { ignoreInitial: true, persistent: true });
  const ready = new Promise<void>((resolve) => {
    watcher.once("ready", () => resolve());
  });
  return {
    onEvent: (listener) => {
      watcher.on("all", (event, changedPath) => listener(event, changedPath));
    },
    onError: (listener) => {
      watcher.on("error", listener);
    },
    ready: () => ready,
    close: () => watcher.close(),
  };
};

export interface RebuildWatcherOptions {
  directory: string;
  onEvent: WatchEventHandler;
  logger?: Reporter;
  source?: WatchSourceFactory;
}

export interface RebuildWatcherHandle {
  directory: string;
  /** Rebuilds started by events that have not settled yet. */
  readonly pending: number;
  stop: () => Promise<void>;
}

/**
 * Recursively watches `directory` and calls `onEvent` for every change. Events are not
 * debounced and rebuilds are not serialized, so several may run at once.
 */
export const startRebuildWatcher = async (options: RebuildWatcherOptions): Promise<RebuildWatcherHandle> => {
  const logger = options.logger ?? getLogger();
  const directory = path.resolve(options.directory);
  const source = (options.source ?? chokidarSource)(directory);
  const inFlight = new Set<Promise<void>>();
  let stopped = false;

  source.onEvent((event, changedPath) => {
    if (stopped) return;
    logger.debug({ event, path: changedPath }, "Watch event");
    const rebuild: Promise<void> = Promise.resolve()
      .then(() => options.onEvent(event, changedPath))
      .catch((err: unknown) => {
        logger.error({ err, event, path: changedPath }, "Rebuild failed");
      })
      .finally(() => {
        inFlight.delete(rebuild);
      });
    inFlight.add(rebuild);
  });
  source.onError((err) => {
    logger.error({ err, directory }, "Watcher error");
  });

  await source.ready();
  logger.debug({ directory }, "Watcher ready");

  return {
    directory,
    get pending() {
      return inFlight.size;
    },
    stop: async () => {
      stopped = true;
      await source.close();
      await Promise.all([...inFlight]);
      logger.debug({ directory }, "Watcher stopped");
    },
  };
};
