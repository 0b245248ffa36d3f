import path from "path";
import fs from "fs-extra";
import {
  buildStringParams,
  getLogger,
  ManifestError,
  targetPaths,
  type BookpressSettings,
  type Diagnostic,
  type Project,
  type Reporter,
  type Target,
  type TargetFormat,
} from "@bookpress/core";
import { spawnCommand, type CommandRunner } from "./run.js";

export { spawnCommand, type CommandRunner, type CommandOptions, type CommandResult } from "./run.js";

export interface BuildReport {
  target: string;
  success: boolean;
  outputDir: string;
  diagnostics: Diagnostic[];
}

/**
 * The conversion engine as seen by the CLI and the preview session.
 */
export interface Builder {
  build(targetName: string | undefined, clean?: boolean): Promise<BuildReport>;
  /** `xslPath` replaces the stock HTML stylesheet when given. */
  buildHtml(
    source: string,
    outputDir: string,
    stringParams: Record<string, string>,
    xslPath?: string | null,
  ): Promise<BuildReport>;
}

export interface XsltBuilderOptions {
  project: Project;
  settings: BookpressSettings;
  logger?: Reporter;
  run?: CommandRunner;
}

interface ConversionJob {
  name: string;
  format: TargetFormat;
  source: string;
  outputDir: string;
  stylesheet: string;
  stringParams: Record<string, string>;
}

const addDiagnostic = (
  list: Diagnostic[],
  code: string,
  message: string,
  location?: string,
  details?: string,
) => {
  list.push({ severity: "error", code, message, location, details });
};

export const stylesheetFor = (stylesheets: string, format: TargetFormat): string =>
  path.join(stylesheets, `pretext-${format === "pdf" ? "latex" : format}.xsl`);

export const xsltprocArgs = (job: ConversionJob, output?: string): string[] => [
  "--xinclude",
  ...Object.entries(job.stringParams).flatMap(([key, value]) => ["--stringparam", key, value]),
  ...(output ? ["--output", output] : []),
  job.stylesheet,
  job.source,
];

export const createXsltBuilder = (options: XsltBuilderOptions): Builder => {
  const { project, settings } = options;
  const logger = options.logger ?? getLogger();
  const run = options.run ?? spawnCommand;

  const exec = async (
    diagnostics: Diagnostic[],
    command: string,
    args: string[],
    cwd: string,
    location: string,
  ): Promise<boolean> => {
    logger.debug({ command, args, cwd }, "Running conversion step");
    try {
      const result = await run(command, args, { cwd });
      if (result.code === 0) return true;
      addDiagnostic(
        diagnostics,
        "BP_DIAG_BUILD_FAILED",
        `${command} exited with code ${String(result.code)}`,
        location,
        result.stderr.trim() || undefined,
      );
    } catch (err) {
      addDiagnostic(diagnostics, "BP_DIAG_BUILD_FAILED", `Failed to run ${command}: ${String(err)}`, location);
    }
    return false;
  };

  const convert = async (job: ConversionJob): Promise<BuildReport> => {
    const diagnostics: Diagnostic[] = [];

    if (!(await fs.pathExists(job.source))) {
      addDiagnostic(diagnostics, "BP_DIAG_SOURCE_MISSING", `Source file missing for ${job.name}: ${job.source}`, job.source);
    } else if (!(await fs.pathExists(job.stylesheet))) {
      addDiagnostic(
        diagnostics,
        "BP_DIAG_STYLESHEET_MISSING",
        `Stylesheet missing for ${job.name}: ${job.stylesheet}`,
        job.stylesheet,
      );
    } else {
      await fs.ensureDir(job.outputDir);
      if (job.format === "html") {
        await exec(diagnostics, settings.executables.xsltproc, xsltprocArgs(job), job.outputDir, job.source);
      } else {
        const texFile = `${path.basename(job.source, path.extname(job.source))}.tex`;
        const converted = await exec(
          diagnostics,
          settings.executables.xsltproc,
          xsltprocArgs(job, path.join(job.outputDir, texFile)),
          job.outputDir,
          job.source,
        );
        if (converted && job.format === "pdf") {
          await exec(
            diagnostics,
            settings.executables.pdflatex,
            ["-interaction=nonstopmode", texFile],
            job.outputDir,
            path.join(job.outputDir, texFile),
          );
        }
      }
    }

    const success = diagnostics.length === 0;
    if (success) {
      logger.info({ target: job.name, outputDir: job.outputDir }, "Build complete");
    } else {
      logger.error({ target: job.name, diagnostics }, "Build emitted diagnostics");
    }
    return { target: job.name, success, outputDir: job.outputDir, diagnostics };
  };

  return {
    build: async (targetName, clean = false) => {
      let target: Target | null;
      try {
        target = project.target(targetName);
      } catch (err) {
        if (!(err instanceof ManifestError)) throw err;
        logger.error({ target: targetName, code: err.code }, err.message);
        return { target: targetName ?? "", success: false, outputDir: "", diagnostics: [err.toDiagnostic()] };
      }
      if (!target) {
        const diagnostics: Diagnostic[] = [];
        addDiagnostic(
          diagnostics,
          "BP_DIAG_TARGET_NOT_FOUND",
          `Target ${targetName ?? "(default)"} not found`,
          project.document.filePath ?? undefined,
        );
        logger.error({ target: targetName }, "Build target could not be found");
        return { target: targetName ?? "", success: false, outputDir: "", diagnostics };
      }

      const paths = targetPaths(target);
      if (clean) {
        logger.warn({ outputDir: paths.outputDir }, "Destroying output directory before build");
        await fs.emptyDir(paths.outputDir);
      }
      logger.info({ target: target.name, format: target.format }, "Building target");
      return convert({
        name: target.name,
        format: target.format,
        source: paths.source,
        outputDir: paths.outputDir,
        stylesheet: paths.xslPath ?? stylesheetFor(settings.stylesheets, target.format),
        stringParams: buildStringParams(target),
      });
    },

    buildHtml: (source, outputDir, stringParams, xslPath) =>
      convert({
        name: path.basename(source),
        format: "html",
        source,
        outputDir,
        stylesheet: xslPath ?? stylesheetFor(settings.stylesheets, "html"),
        stringParams,
      }),
  };
};
