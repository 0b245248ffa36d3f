import path from "path";
import { buildStringParams, getLogger, targetPaths, type Reporter, type Target } from "@bookpress/core";
import type { Builder } from "@bookpress/builder";
import type { WatchEventHandler } from "./watcher.js";

export interface WatchBinding {
  target: string;
  directory: string;
  source: string;
  outputDir: string;
  /** Custom stylesheet of the target, `null` for the stock HTML one. */
  xslPath: string | null;
  stringParams: Readonly<Record<string, string>>;
}

/** Fixes the paths and parameters a watched target is rebuilt with for the rest of the session. */
export const createWatchBinding = (target: Target): WatchBinding => {
  const paths = targetPaths(target);
  return Object.freeze({
    target: target.name,
    directory: path.dirname(paths.source),
    source: paths.source,
    outputDir: paths.outputDir,
    xslPath: paths.xslPath,
    stringParams: Object.freeze(buildStringParams(target)),
  });
};

export const createRebuildHandler = (
  binding: WatchBinding,
  builder: Builder,
  logger: Reporter = getLogger(),
): WatchEventHandler => {
  return async (event, changedPath) => {
    logger.info({ event, path: changedPath, target: binding.target }, "Changes to source found, rebuilding target...");
    const report = await builder.buildHtml(binding.source, binding.outputDir, { ...binding.stringParams }, binding.xslPath);
    if (report.success) {
      logger.info({ target: binding.target, outputDir: report.outputDir }, "Rebuild complete");
    } else {
      logger.error({ target: binding.target, diagnostics: report.diagnostics }, "Rebuild failed");
    }
  };
};
